import { type Logger, NullLogger } from "@explicit-config/logger"
import type { EnvReader } from "../ports/env-reader"
import { ConfigResolutionError, type FieldFailure } from "./errors"
import { ResolvedConfig } from "./resolved-config"
import type { SourcedValue } from "./sourced-value"

export type SourcedFields = Record<string, SourcedValue<unknown>>

export type ResolvedFields<F extends SourcedFields> = {
  [K in keyof F]: F[K] extends SourcedValue<infer T> ? T : never
}

export type ResolveAllOptions<F extends SourcedFields> = {
  /**
   * Values for fields whose source is unset. A declared source that fails is
   * reported, never replaced by a default.
   */
  defaults?: Partial<ResolvedFields<F>>

  /** @default a reader over `process.env` */
  env?: EnvReader

  /** @default NullLogger */
  logger?: Logger
}

export type ResolveAllResult<T extends object> =
  | { readonly success: true; readonly config: ResolvedConfig<T> }
  | { readonly success: false; readonly error: ConfigResolutionError }

/**
 * Resolves every field of a set, each from its own declared source.
 *
 * All or nothing: when any field fails, no values are returned and the error
 * lists every failing field.
 */
export function resolveAll<F extends SourcedFields>(
  fields: F,
  options: ResolveAllOptions<F> = {},
): ResolveAllResult<ResolvedFields<F>> {
  const { defaults, env } = options
  const logger = options.logger ?? new NullLogger()
  const values: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}
  const failures: FieldFailure[] = []

  for (const field of Object.keys(fields) as Array<keyof F & string>) {
    const sourced = fields[field]
    const source = sourced.describe()

    if (sourced.kind === "unset" && defaults !== undefined && Object.hasOwn(defaults, field)) {
      values[field] = defaults[field]
      provenance[field] = "default"
      logger.debug("resolved config field", { field, source: "default" })
      continue
    }

    const result = sourced.resolve({ env })

    if (result.success) {
      values[field] = result.value
      provenance[field] = source
      logger.debug("resolved config field", { field, source })
    } else {
      failures.push({ field, source, error: result.error })
      logger.warn("config field failed to resolve", { field, source, err: result.error })
    }
  }

  if (failures.length > 0) {
    return { success: false, error: new ConfigResolutionError(failures) }
  }

  return {
    success: true,
    config: new ResolvedConfig<ResolvedFields<F>>(values as ResolvedFields<F>, provenance),
  }
}
