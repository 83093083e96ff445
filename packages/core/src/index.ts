/**
 * @deskpet/core
 *
 * Behavior orchestration for the desk pet: poses, walking, dragging, the
 * speech bubble, pomodoro and the timer-driven behaviors.
 */

export * from "./animation"
export * from "./bubble"
export * from "./commands"
export * from "./config"
export * from "./scheduler"
export * from "./settings"
export * from "./window"
export * from "./runtime"

export {
  AUTO_ROUNDTRIP_KEY,
  BehaviorScheduler,
  CHATTER_KEY,
  REST_PERIODIC_KEY,
  REST_POSE_BACK_KEY,
  REST_SNOOZE_KEY,
  type BehaviorFlags,
  type SchedulerTimings,
} from "./behaviors/BehaviorScheduler"
export { ENCOURAGE_LINES, REST_TIPS } from "./behaviors/messages"
export {
  EdgeOutcome,
  IDLE_ROUNDTRIP,
  ROUNDTRIP_EDGE_HITS,
  beginRoundtrip,
  registerEdgeHit,
  type RoundtripWalk,
} from "./behaviors/roundtrip"
export { DragController, ReleaseOutcome, type PointerButton } from "./drag/DragController"
export { PetEventBus, type PetEvents, type PetEventName } from "./events/PetEventBus"
export { createLogger, setLogLevel, type LogLevel, type Logger } from "./logging/logger"
export { PetStateMachine, type SetStateOptions } from "./pet/PetStateMachine"
export {
  POMODORO_TICK_KEY,
  PomodoroTimer,
  formatMinutesSeconds,
  type PomodoroMode,
  type PomodoroState,
} from "./pomodoro/PomodoroTimer"
export { Outcome } from "./util/outcome"
export { mathRandom, type RandomSource } from "./util/random"
export { describeError, extractErrorTag } from "./util/error-utils"
export { WALK_TICK_KEY, WalkController, type EdgeHit, type WalkSettings } from "./walk/WalkController"
export {
  PetController,
  STARTUP_GREETING_KEY,
  STARTUP_ON_SCREEN_KEY,
  createPetController,
  type ActivityFlags,
  type PetControllerOptions,
  type PetHost,
  type PetSnapshot,
} from "./PetController"
