export { dispatchCommand, dispatchJson, dispatchRaw } from "./CommandDispatcher"
