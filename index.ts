export * from "./lib/collections"
export * from "./lib/matrix"
export * from "./lib/digest"
export * from "./lib/describe"
export * from "./lib/utils"
export * from "./lib/config"
export { StreamIoError, StreamNotSeekableError } from "./lib/errors"
export { Logger, DEFAULT_LOG_DIR, type LogEntry, type LogFormat, type LogLevel } from "./lib/logger"
export { safeExecute, type SafeResult } from "./lib/safe-execute"
