/**
 * A set of resolved configuration fields, each traceable to its one source.
 *
 * @typeParam T - Shape of the resolved values.
 *
 * @example
 * ```typescript
 * const result = resolveAll({ port, host }, { defaults: { port: 3000 } })
 *
 * if (result.success) {
 *   result.config.get("port")      // 8080
 *   result.config.explain("host")  // "env:APP_HOST"
 * }
 * ```
 */
export interface IResolvedConfig<T extends object> {
  /** Frozen resolved values */
  readonly value: Readonly<T>

  get<K extends keyof T & string>(key: K): T[K]

  keys(): (keyof T & string)[]

  /**
   * Where the value of `key` came from: "literal", "env:NAME", or "default"
   * when an unset field took a caller-supplied default.
   */
  explain<K extends keyof T & string>(key: K): string

  /**
   * Unique provenance strings, in field order.
   */
  sourcesUsed(): string[]
}
