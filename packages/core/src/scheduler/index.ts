export { type Clock, systemClock, VirtualClock } from "./clock"
export { TimerQueue } from "./TimerQueue"
export { VirtualTimeDriver } from "./VirtualTimeDriver"
export { NodeTimerDriver } from "./NodeTimerDriver"
