export * from "./schemas/pose"
export * from "./schemas/geometry"
export * from "./schemas/settings"
export * from "./schemas/commands"
export * from "./schemas/errors"
