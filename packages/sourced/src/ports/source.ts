/**
 * The value was written directly in the configuration document.
 */
export type LiteralSource<T> = {
  readonly kind: "literal"
  readonly value: T
}

/**
 * The value is read from the named environment variable when resolved.
 */
export type EnvSource = {
  readonly kind: "env"
  readonly name: string
}

/**
 * The document declared neither a value nor a source.
 */
export type UnsetSource = {
  readonly kind: "unset"
}

/**
 * Sources declared through a descriptor mapping such as `{ "env": "NAME" }`.
 * New source kinds join this union.
 */
export type DescribedSource = EnvSource

/**
 * The single declared origin of a configuration field.
 *
 * Exactly one variant is active; it is fixed when the field is deserialized.
 */
export type Source<T> = LiteralSource<T> | DescribedSource | UnsetSource

export type SourceKind = Source<unknown>["kind"]
