import { Effect } from "effect"
import { join } from "node:path"
import {
  MissingAssetError,
  POSE_STATES,
  isWalkingPose,
  type PoseState,
  type Size,
} from "@deskpet/shared"

// ============================================================================
// External renderer contract
// ============================================================================

/**
 * One decoded, playable pose animation.
 */
export interface AnimationSurface {
  start(): void
  stop(): void
  /** Size of the frame currently decoded, or null before the first frame. */
  currentFrameSize(): Size | null
  setPlaybackSpeedPercent(percent: number): void
  setRenderedSize(size: Size): void
}

export interface AnimationLoader {
  exists(path: string): boolean
  open(path: string): AnimationSurface
}

// ============================================================================
// Asset paths
// ============================================================================

export const POSE_ASSET_FILES: Record<PoseState, string> = {
  sitting: "dog_sit_tr.gif",
  lyingDown: "dog_laydown_tr.gif",
  walkingLeft: "dog_walkingleft_tr.gif",
  walkingRight: "dog_walkingright_tr.gif",
}

export const resolveAssetPaths = (assetsDir: string): Record<PoseState, string> => ({
  sitting: join(assetsDir, POSE_ASSET_FILES.sitting),
  lyingDown: join(assetsDir, POSE_ASSET_FILES.lyingDown),
  walkingLeft: join(assetsDir, POSE_ASSET_FILES.walkingLeft),
  walkingRight: join(assetsDir, POSE_ASSET_FILES.walkingRight),
})

export interface PlaybackSpeeds {
  readonly idle: number
  readonly walk: number
}

// ============================================================================
// AnimationSet
// ============================================================================

/**
 * The four pose animations plus the uniform base size shared by all of
 * them, so switching pose never resizes the window.
 */
export class AnimationSet {
  private renderedSize: Size | null = null

  constructor(
    private readonly surfaces: Record<PoseState, AnimationSurface>,
    readonly baseSize: Size | null
  ) {}

  get(pose: PoseState): AnimationSurface {
    return this.surfaces[pose]
  }

  stopAll(): void {
    for (const pose of POSE_STATES) this.surfaces[pose].stop()
  }

  /**
   * Push a new rendered size to every animation. Skips the call when the
   * size has not changed; rescaling decoded frames is not cheap.
   */
  applyRenderedSize(size: Size): boolean {
    if (
      this.renderedSize &&
      this.renderedSize.width === size.width &&
      this.renderedSize.height === size.height
    ) {
      return false
    }
    for (const pose of POSE_STATES) this.surfaces[pose].setRenderedSize(size)
    this.renderedSize = { ...size }
    return true
  }
}

/**
 * Largest width and largest height across the given frame sizes.
 */
export function uniformBaseSize(sizes: ReadonlyArray<Size | null>): Size | null {
  const known = sizes.filter(
    (size): size is Size => size !== null && size.width > 0 && size.height > 0
  )
  if (known.length === 0) return null
  return {
    width: Math.max(...known.map((size) => size.width)),
    height: Math.max(...known.map((size) => size.height)),
  }
}

/**
 * Open every pose animation. Fails with MissingAssetError for the first
 * pose whose file is absent; nothing is opened in that case.
 */
export const loadAnimationSet = (
  loader: AnimationLoader,
  paths: Record<PoseState, string>,
  speeds: PlaybackSpeeds
): Effect.Effect<AnimationSet, MissingAssetError> =>
  Effect.gen(function* () {
    for (const pose of POSE_STATES) {
      if (!loader.exists(paths[pose])) {
        return yield* Effect.fail(new MissingAssetError({ pose, path: paths[pose] }))
      }
    }

    const open = (pose: PoseState): AnimationSurface => {
      const surface = loader.open(paths[pose])
      surface.setPlaybackSpeedPercent(isWalkingPose(pose) ? speeds.walk : speeds.idle)
      return surface
    }

    const surfaces: Record<PoseState, AnimationSurface> = {
      sitting: open("sitting"),
      lyingDown: open("lyingDown"),
      walkingLeft: open("walkingLeft"),
      walkingRight: open("walkingRight"),
    }

    const baseSize = uniformBaseSize(POSE_STATES.map((pose) => surfaces[pose].currentFrameSize()))
    return new AnimationSet(surfaces, baseSize)
  })
