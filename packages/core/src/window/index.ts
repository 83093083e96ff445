export { type ScreenGeometry, StaticScreenGeometry } from "./ScreenGeometry"
export { type WindowSurface, PetWindow } from "./PetWindow"
