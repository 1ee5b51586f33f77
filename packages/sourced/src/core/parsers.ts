import type { ParseFailure, ParseSuccess, ValueParser } from "../ports/value-parser"

const INTEGER_TEXT = /^[+-]?\d+$/
const DECIMAL_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

function ok<T>(value: T): ParseSuccess<T> {
  return { success: true, value }
}

function fail(reason: string): ParseFailure {
  return { success: false, reason }
}

function describeNode(node: unknown): string {
  if (node === null) return "null"
  if (Array.isArray(node)) return "array"

  return typeof node
}

/**
 * Strings. Environment text is taken as-is and never fails.
 */
export const stringParser: ValueParser<string> = {
  typeName: "string",

  parseLiteral(node) {
    return typeof node === "string"
      ? ok(node)
      : fail(`expected a string, got ${describeNode(node)}`)
  },

  parseEnv(raw) {
    return ok(raw)
  },
}

/**
 * Safe integers. Environment text must be an optional sign followed by
 * decimal digits, with no surrounding whitespace.
 */
export const integerParser: ValueParser<number> = {
  typeName: "integer",

  parseLiteral(node) {
    return typeof node === "number" && Number.isSafeInteger(node)
      ? ok(node)
      : fail(`expected an integer, got ${describeNode(node)}`)
  },

  parseEnv(raw) {
    if (!INTEGER_TEXT.test(raw)) return fail("expected an integer")

    const value = Number(raw)

    return Number.isSafeInteger(value) ? ok(value) : fail("integer out of range")
  },
}

/**
 * Finite numbers. Environment text must be decimal, optionally with an
 * exponent; hex, binary and octal prefixes are rejected. `NaN` and the
 * infinities are rejected in both forms.
 */
export const numberParser: ValueParser<number> = {
  typeName: "number",

  parseLiteral(node) {
    return typeof node === "number" && Number.isFinite(node)
      ? ok(node)
      : fail(`expected a finite number, got ${describeNode(node)}`)
  },

  parseEnv(raw) {
    if (!DECIMAL_TEXT.test(raw)) return fail("expected a number")

    const value = Number(raw)

    return Number.isFinite(value) ? ok(value) : fail("expected a number")
  },
}

/**
 * Booleans. Environment text must be exactly "true" or "false".
 */
export const booleanParser: ValueParser<boolean> = {
  typeName: "boolean",

  parseLiteral(node) {
    return typeof node === "boolean"
      ? ok(node)
      : fail(`expected a boolean, got ${describeNode(node)}`)
  },

  parseEnv(raw) {
    if (raw === "true") return ok(true)
    if (raw === "false") return ok(false)

    return fail('expected "true" or "false"')
  },
}
