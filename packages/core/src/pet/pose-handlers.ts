import type { PoseState, WalkDirection } from "@deskpet/shared"
import type { WalkController } from "../walk/WalkController"

/**
 * What a pose handler may touch. Keeps handlers decoupled from the
 * state machine itself.
 */
export interface PoseContext {
  readonly walk: WalkController
}

/**
 * Per-pose side effects, run after the pose's animation has started.
 */
export interface PoseHandler {
  enter(ctx: PoseContext): void
  exit(ctx: PoseContext): void
}

class RestingPose implements PoseHandler {
  enter(ctx: PoseContext): void {
    ctx.walk.stop()
  }

  exit(_ctx: PoseContext): void {}
}

class WalkingPose implements PoseHandler {
  constructor(private readonly direction: WalkDirection) {}

  enter(ctx: PoseContext): void {
    ctx.walk.start(this.direction)
  }

  // Kinematics keep running across a turn-around; a resting pose stops them.
  exit(_ctx: PoseContext): void {}
}

export const POSE_HANDLERS: Record<PoseState, PoseHandler> = {
  sitting: new RestingPose(),
  lyingDown: new RestingPose(),
  walkingLeft: new WalkingPose(-1),
  walkingRight: new WalkingPose(1),
}
