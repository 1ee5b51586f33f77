import type { EnvReader } from "../../ports/env-reader"

export type RecordEnvReaderOptions = {
  /** @default "record" */
  name?: string
}

/**
 * Reads from a caller-owned record. The record is held by reference, so
 * later writes to it are seen by later lookups.
 */
export class RecordEnvReader implements EnvReader {
  readonly name: string

  constructor(
    private readonly env: Readonly<Record<string, string | undefined>>,
    options: RecordEnvReaderOptions = {},
  ) {
    this.name = options.name ?? "record"
  }

  get(varName: string): string | undefined {
    return Object.hasOwn(this.env, varName) ? this.env[varName] : undefined
  }
}
