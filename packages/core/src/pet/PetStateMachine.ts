import { isPoseState, type PoseState } from "@deskpet/shared"
import type { AnimationSet } from "../animation/AnimationSet"
import type { PetEventBus } from "../events/PetEventBus"
import { createLogger } from "../logging/logger"
import type { WalkController } from "../walk/WalkController"
import { POSE_HANDLERS, type PoseContext, type PoseHandler } from "./pose-handlers"

const log = createLogger("Pose")

export const ANNOUNCE_DURATION_MS = 2400
export const DEFAULT_ANNOUNCE_TITLE = "Hey"

export interface SetStateOptions {
  /** Show a bubble for the change when a title or text is given */
  readonly announce?: boolean
  readonly title?: string
  readonly text?: string
}

export interface PetStateMachineDeps {
  readonly animations: AnimationSet
  readonly walk: WalkController
  readonly events: PetEventBus
  /** Resize pass run after every transition */
  readonly rescale: () => void
  readonly notify: (title: string, message: string, durationMs: number) => void
}

/**
 * Owns the current pose. The only way to change it is `setState`.
 */
export class PetStateMachine {
  private current: PoseState = "sitting"
  private currentHandler: PoseHandler | null = null
  private readonly ctx: PoseContext

  constructor(private readonly deps: PetStateMachineDeps) {
    this.ctx = { walk: deps.walk }
  }

  get pose(): PoseState {
    return this.current
  }

  setState(target: string, options: SetStateOptions = {}): void {
    if (!isPoseState(target)) {
      log.debug(`Ignoring unknown pose "${target}"`)
      return
    }

    const { animations, events } = this.deps
    const previous = this.current

    this.currentHandler?.exit(this.ctx)
    animations.stopAll()

    this.current = target
    animations.get(target).start()

    const handler = POSE_HANDLERS[target]
    this.currentHandler = handler
    handler.enter(this.ctx)

    this.deps.rescale()

    if (previous !== target) {
      events.emit("pose:changed", { from: previous, to: target })
    }

    const title = options.title ?? ""
    const text = options.text ?? ""
    if (options.announce && (title !== "" || text !== "")) {
      this.deps.notify(title || DEFAULT_ANNOUNCE_TITLE, text, ANNOUNCE_DURATION_MS)
    }
  }
}
