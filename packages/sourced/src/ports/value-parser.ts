export type ParseSuccess<T> = {
  readonly success: true
  readonly value: T
}

export type ParseFailure = {
  readonly success: false
  /** Why the input was rejected, e.g. "expected an integer". */
  readonly reason: string
}

export type ParseOutcome<T> = ParseSuccess<T> | ParseFailure

/**
 * Everything a `SourcedValue<T>` needs to know about `T`.
 *
 * @typeParam T - The concrete field type.
 */
export interface ValueParser<T> {
  /** Name of `T` used in error messages, e.g. "integer". */
  readonly typeName: string

  /**
   * Accepts a node from an already-parsed configuration document as `T`.
   */
  parseLiteral(node: unknown): ParseOutcome<T>

  /**
   * Parses the text of an environment variable as `T`.
   */
  parseEnv(raw: string): ParseOutcome<T>
}
