import {
  SETTING_KEYS,
  coerceSetting,
  coerceSettings,
  type PetSettings,
  type SettingKey,
} from "@deskpet/shared"

/**
 * Typed key-value persistence. Reads never fail: a stored value that does
 * not decode comes back as the key's default.
 */
export interface SettingsStore {
  get<K extends SettingKey>(key: K): PetSettings[K]
  set<K extends SettingKey>(key: K, value: PetSettings[K]): void
  snapshot(): PetSettings
}

/**
 * Raw values kept in memory exactly as given, coerced on read.
 */
export class InMemorySettingsStore implements SettingsStore {
  protected readonly raw: Record<string, unknown>

  constructor(initial: Readonly<Record<string, unknown>> = {}) {
    this.raw = { ...initial }
  }

  get<K extends SettingKey>(key: K): PetSettings[K] {
    return coerceSetting(key, this.raw[key])
  }

  set<K extends SettingKey>(key: K, value: PetSettings[K]): void {
    this.raw[key] = value
  }

  snapshot(): PetSettings {
    return coerceSettings(this.raw)
  }

  /** Keys that currently hold a stored value. */
  storedKeys(): SettingKey[] {
    return SETTING_KEYS.filter((key) => key in this.raw)
  }
}
