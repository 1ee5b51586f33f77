import type { Source } from "../ports/source"
import type { ValueParser } from "../ports/value-parser"
import { findDescriptor } from "./descriptors"
import { DeserializationError } from "./errors"

export type DeserializeOptions = {
  /**
   * Whether the field may be absent. An absent optional field (or a `null`
   * that `T` does not accept) reads as unset.
   *
   * @default false
   */
  optional?: boolean
}

export type DeserializeResult<V> =
  | { readonly success: true; readonly value: V }
  | { readonly success: false; readonly error: DeserializationError }

export function isPlainObject(node: unknown): node is Record<string, unknown> {
  if (typeof node !== "object" || node === null || Array.isArray(node)) return false

  const proto: unknown = Object.getPrototypeOf(node)

  return proto === Object.prototype || proto === null
}

/**
 * Reads the declared source of one field from a parsed document node.
 *
 * A mapping whose only key is a known descriptor (`{ "env": "NAME" }`) is
 * checked first, so it wins over a literal even when `T` is itself a mapping.
 * Everything else goes through `parser.parseLiteral`.
 */
export function deserializeSource<T>(
  node: unknown,
  parser: ValueParser<T>,
  options: DeserializeOptions = {},
): DeserializeResult<Source<T>> {
  const optional = options.optional ?? false

  if (node === undefined) {
    return optional
      ? { success: true, value: { kind: "unset" } }
      : {
          success: false,
          error: new DeserializationError("missing_value", "A value or source is required"),
        }
  }

  const keys = isPlainObject(node) ? Object.keys(node).sort() : undefined
  const descriptor =
    keys?.length === 1 && keys[0] !== undefined ? findDescriptor(keys[0]) : undefined

  if (descriptor && isPlainObject(node)) {
    const described = descriptor.read(node[descriptor.key])

    if (described) return { success: true, value: described }
  }

  const literal = parser.parseLiteral(node)

  if (literal.success) {
    return { success: true, value: { kind: "literal", value: literal.value } }
  }

  if (node === null && optional) {
    return { success: true, value: { kind: "unset" } }
  }

  if (descriptor) {
    return {
      success: false,
      error: new DeserializationError(
        "invalid_descriptor",
        `Source descriptor "${descriptor.key}" expects ${descriptor.expects}`,
        { keys: [descriptor.key] },
      ),
    }
  }

  if (keys) {
    return {
      success: false,
      error: new DeserializationError(
        "unrecognized_descriptor",
        `Unrecognized source descriptor with keys {${keys.join(", ")}}: ` +
          `not a valid ${parser.typeName} either`,
        { keys, context: { reason: literal.reason } },
      ),
    }
  }

  return {
    success: false,
    error: new DeserializationError(
      "invalid_literal",
      `Invalid ${parser.typeName} literal: ${literal.reason}`,
      { context: { targetType: parser.typeName, reason: literal.reason } },
    ),
  }
}
