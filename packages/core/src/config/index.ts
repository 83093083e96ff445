/**
 * Configuration Module
 */

export {
  type PetConfigData,
  DEFAULT_PET_CONFIG,
  PetConfig,
  PetConfigEffect,
  PetConfigLive,
  defaultPetConfig,
  loadConfigSync,
} from "./PetConfig"
