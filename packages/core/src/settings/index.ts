export { type SettingsStore, InMemorySettingsStore } from "./SettingsStore"
export { JsonFileSettingsStore } from "./JsonFileSettingsStore"
