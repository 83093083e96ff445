import { Schema } from "effect"

// ============================================================================
// Pose States
// ============================================================================

/**
 * Every pose the companion sprite can hold. Exactly one is active at a time.
 */
export const POSE_STATES = [
  "sitting",
  "lyingDown",
  "walkingLeft",
  "walkingRight",
] as const

export type PoseState = (typeof POSE_STATES)[number]

export const PoseStateSchema = Schema.Literal(...POSE_STATES)

/**
 * Poses that drive the walk kinematics.
 */
export const WALKING_POSES = ["walkingLeft", "walkingRight"] as const

export type WalkingPose = (typeof WALKING_POSES)[number]

// ============================================================================
// Walk Direction
// ============================================================================

export type WalkDirection = -1 | 1

export const WalkDirectionSchema = Schema.Literal(-1, 1)

const poseStateSet = new Set<string>(POSE_STATES)
const walkingPoseSet = new Set<string>(WALKING_POSES)

export const isPoseState = (value: string): value is PoseState =>
  poseStateSet.has(value)

export const isWalkingPose = (value: string): value is WalkingPose =>
  walkingPoseSet.has(value)

/**
 * Walking pose that faces the given direction.
 */
export const walkingPoseFor = (direction: WalkDirection): WalkingPose =>
  direction < 0 ? "walkingLeft" : "walkingRight"

/**
 * Direction implied by a pose, or null for the resting poses.
 */
export const directionOfPose = (pose: PoseState): WalkDirection | null => {
  switch (pose) {
    case "walkingLeft":
      return -1
    case "walkingRight":
      return 1
    case "sitting":
    case "lyingDown":
      return null
  }
}

export const flipDirection = (direction: WalkDirection): WalkDirection =>
  direction < 0 ? 1 : -1
