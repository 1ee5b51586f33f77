import type { ResolutionFailure } from "../core/errors"
import type { EnvReader } from "./env-reader"
import type { ResolveResult } from "./resolve-result"
import type { Source, SourceKind } from "./source"

export type ResolveOptions = {
  /**
   * Where environment sources are looked up.
   *
   * @default a reader over `process.env`
   */
  env?: EnvReader
}

/**
 * One configuration field together with its declared source.
 *
 * @typeParam T - The concrete field type.
 *
 * @example
 * ```typescript
 * const schema = z.object({
 *   port: sourced(z.number().int()),
 *   host: sourced(z.string()),
 * })
 *
 * const doc = schema.parse({ port: 8080, host: { env: "APP_HOST" } })
 *
 * doc.port.resolve()  // { success: true, value: 8080 }
 * doc.host.describe() // "env:APP_HOST"
 * ```
 */
export interface ISourcedValue<T> {
  readonly source: Source<T>

  readonly kind: SourceKind

  /** Name of `T`, as reported in parse failures. */
  readonly typeName: string

  /**
   * Turns the declared source into a value.
   *
   * A literal resolves without I/O. An environment source performs one lookup
   * per call and is never cached. An unset field fails with
   * `no_source_provided`.
   */
  resolve(options?: ResolveOptions): ResolveResult<T>

  /**
   * Like {@link resolve}, returning `fallback` on any failure.
   */
  resolveOr(fallback: T, options?: ResolveOptions): T

  /**
   * Like {@link resolve}, computing the fallback from the failure.
   */
  resolveOrElse(fallback: (error: ResolutionFailure) => T, options?: ResolveOptions): T

  /**
   * Resolves, then rejects values for which `predicate` returns `false`
   * with a `validation_failed` error.
   */
  resolveAndValidate(
    predicate: (value: T) => boolean,
    options?: ResolveOptions & { message?: string },
  ): ResolveResult<T>

  /**
   * Provenance of the field: "literal", "env:NAME" or "unset".
   */
  describe(): string

  /**
   * The declared source in document form: the literal value, `{ env: NAME }`,
   * or `undefined` when unset.
   */
  toJSON(): unknown
}
