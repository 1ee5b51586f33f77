/**
 * Machine-readable error code, always lowercase snake case
 * (e.g. `"missing_env_var"`, `"unrecognized_descriptor"`).
 */
export type ErrorCode = Lowercase<string>

/**
 * Structured details attached to an error: variable names, document keys,
 * target types. Never the resolved value of a field.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /**
   * `true` for expected failures caused by input or environment (a missing
   * variable, a malformed document), `false` for broken invariants.
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date
}

/**
 * JSON-safe shape of an error, as written to logs.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
