/**
 * Read-only access to environment variables by name.
 *
 * Implementations must look the variable up on every call; resolution relies
 * on seeing the environment as it is at that moment.
 */
export interface EnvReader {
  /**
   * Human-readable name for diagnostics, e.g. "process.env".
   */
  readonly name: string

  /**
   * Returns the variable's value, or `undefined` when it is not set.
   * An empty string is a set value.
   */
  get(varName: string): string | undefined
}
