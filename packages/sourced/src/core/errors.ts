import { BaseError, type ErrorContext } from "@explicit-config/errors"

export type DeserializationErrorCode =
  | "missing_value"
  | "invalid_literal"
  | "invalid_descriptor"
  | "unrecognized_descriptor"

/**
 * The document node for a field has the wrong shape. Raised while the
 * document is loaded, never during resolution.
 */
export class DeserializationError extends BaseError<DeserializationErrorCode> {
  /** Keys of the offending mapping, sorted; empty for non-mapping nodes. */
  readonly keys: readonly string[]

  constructor(
    code: DeserializationErrorCode,
    message: string,
    options: { keys?: readonly string[]; context?: ErrorContext } = {},
  ) {
    const keys = Object.freeze([...(options.keys ?? [])])

    super(message, { code, context: { ...options.context, keys } })

    this.keys = keys
  }
}

export type ResolutionErrorCode =
  | "missing_env_var"
  | "parse_failure"
  | "no_source_provided"
  | "validation_failed"

export abstract class ResolutionError<
  C extends ResolutionErrorCode = ResolutionErrorCode,
> extends BaseError<C> {}

export class MissingEnvVarError extends ResolutionError<"missing_env_var"> {
  constructor(readonly varName: string) {
    super(`Environment variable ${varName} is not set`, {
      code: "missing_env_var",
      context: { varName },
    })
  }
}

export type ParseFailureDetails = {
  varName: string
  rawValue: string
  targetType: string
  reason: string
}

/**
 * The variable is set but its text is not a valid `targetType`.
 *
 * `rawValue` is non-enumerable and kept out of `context`, so serializers and
 * loggers never write it.
 */
export class ParseFailureError extends ResolutionError<"parse_failure"> {
  declare readonly rawValue: string
  readonly varName: string
  readonly targetType: string
  readonly reason: string

  constructor(details: ParseFailureDetails) {
    const { rawValue, ...described } = details

    super(
      `Environment variable ${details.varName} is not a valid ${details.targetType}: ${details.reason}`,
      { code: "parse_failure", context: described },
    )

    Object.defineProperty(this, "rawValue", { value: rawValue, enumerable: false })
    this.varName = details.varName
    this.targetType = details.targetType
    this.reason = details.reason
  }
}

export class NoSourceProvidedError extends ResolutionError<"no_source_provided"> {
  constructor() {
    super("No value or source was declared", { code: "no_source_provided" })
  }
}

export class ValidationFailedError extends ResolutionError<"validation_failed"> {
  constructor(
    readonly source: string,
    message = "Validation failed",
  ) {
    super(message, { code: "validation_failed", context: { source } })
  }
}

/**
 * Every way `resolve()` can fail. Narrow on `code`.
 */
export type ResolutionFailure =
  | MissingEnvVarError
  | ParseFailureError
  | NoSourceProvidedError
  | ValidationFailedError

export type FieldFailure = {
  readonly field: string
  /** Provenance of the failing field, e.g. "env:APP_PORT". */
  readonly source: string
  readonly error: ResolutionFailure
}

/**
 * One or more fields of a set failed to resolve.
 */
export class ConfigResolutionError extends BaseError<"config_resolution_failed"> {
  readonly failures: readonly FieldFailure[]

  constructor(failures: readonly FieldFailure[]) {
    const lines = failures.map((f) => `  ${f.field} (${f.source}): ${f.error.message}`)

    super(`Configuration resolution failed:\n${lines.join("\n")}`, {
      code: "config_resolution_failed",
      context: { fields: failures.map((f) => f.field) },
    })

    this.failures = Object.freeze([...failures])
  }
}
