export {
  type AnimationSurface,
  type AnimationLoader,
  type PlaybackSpeeds,
  POSE_ASSET_FILES,
  AnimationSet,
  loadAnimationSet,
  resolveAssetPaths,
  uniformBaseSize,
} from "./AnimationSet"
