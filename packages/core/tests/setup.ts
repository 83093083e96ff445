import { setLogLevel } from "../src/logging/logger"

// Behavior logs are noise in test output
setLogLevel("silent")
