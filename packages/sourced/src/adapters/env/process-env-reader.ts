import type { EnvReader } from "../../ports/env-reader"

/**
 * Reads the live process environment. Nothing is captured at construction,
 * so changes to `process.env` are visible to the next lookup.
 */
export class ProcessEnvReader implements EnvReader {
  readonly name = "process.env"

  get(varName: string): string | undefined {
    return process.env[varName]
  }
}
