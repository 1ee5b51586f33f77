export { NullLogger } from "./adapters/null/null-logger"
export { PinoLogger } from "./adapters/pino/pino-logger"
export type { PinoLoggerDeps } from "./adapters/pino/pino-logger"
export type { LogContext, LogContextPatch, LogEvent, LogMeta } from "./ports/log-context"
export { logLevelNames } from "./ports/log-level"
export type { LogLevelName } from "./ports/log-level"
export type { Logger } from "./ports/logger"
export type { LoggerOptions } from "./ports/logger-options"
