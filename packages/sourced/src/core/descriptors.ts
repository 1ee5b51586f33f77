import type { DescribedSource } from "../ports/source"

/**
 * Recognizes one descriptor mapping, `{ [key]: payload }`, in a document.
 */
export type SourceDescriptor = {
  /** The mapping's only key, e.g. "env". */
  readonly key: string

  /** Shape the payload must have, for error messages. */
  readonly expects: string

  /** Returns the source for a valid payload, `undefined` otherwise. */
  read(payload: unknown): DescribedSource | undefined

  /** Writes the source back in document form. */
  write(source: DescribedSource): Record<string, unknown> | undefined
}

export const envDescriptor: SourceDescriptor = {
  key: "env",
  expects: "a non-empty string naming an environment variable",

  read(payload) {
    return typeof payload === "string" && payload.length > 0
      ? { kind: "env", name: payload }
      : undefined
  },

  write(source) {
    return source.kind === "env" ? { env: source.name } : undefined
  },
}

/**
 * Descriptor keys recognized in documents. Adding a source kind means adding
 * an entry here; existing documents keep their meaning.
 */
export const descriptors: readonly SourceDescriptor[] = [envDescriptor]

export function findDescriptor(key: string): SourceDescriptor | undefined {
  return descriptors.find((d) => d.key === key)
}
