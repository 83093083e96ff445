export {
  GifFileLoader,
  LoggingBubbleSurface,
  LoggingWindowSurface,
  readGifSize,
} from "./headless"
export { HEADLESS_MONITOR, type RunningPet, launchPet, reportStartupFailure } from "./launch"
