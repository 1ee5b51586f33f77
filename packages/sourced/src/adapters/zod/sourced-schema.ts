import { z } from "zod"
import type { ValueParser } from "../../ports/value-parser"
import { type SourcedValue, deserializeSourced } from "../../core/sourced-value"
import { type ZodParserOptions, zodParser } from "./zod-parser"

export type SourcedSchemaOptions = ZodParserOptions & {
  /**
   * Whether the field may be left out of the document, reading as unset.
   *
   * @default false
   */
  optional?: boolean
}

function toParser<T>(
  schemaOrParser: z.ZodType<T> | ValueParser<T>,
  options: ZodParserOptions,
): ValueParser<T> {
  return "parseEnv" in schemaOrParser ? schemaOrParser : zodParser(schemaOrParser, options)
}

/**
 * A zod schema for one configuration field that records where its value
 * comes from.
 *
 * Accepts a literal matching `schema`, or a descriptor such as
 * `{ "env": "APP_PORT" }`, and produces a {@link SourcedValue}. Shape problems
 * are reported as zod issues whose `params.code` is the deserialization
 * error code.
 *
 * @example
 * ```typescript
 * const ServerSettings = z.object({
 *   port: sourced(z.number().int(), { optional: true }),
 *   host: sourced(z.string()),
 * })
 *
 * const settings = ServerSettings.parse(JSON.parse(text))
 * settings.port.resolveOr(3000)
 * ```
 */
export function sourced<T>(
  schemaOrParser: z.ZodType<T> | ValueParser<T>,
  options: SourcedSchemaOptions = {},
): z.ZodType<SourcedValue<T>, unknown> {
  const parser = toParser(schemaOrParser, options)
  const deserializeOptions = { optional: options.optional ?? false }

  return z.unknown().transform((node, ctx) => {
    const result = deserializeSourced(node, parser, deserializeOptions)

    if (result.success) return result.value

    ctx.issues.push({
      code: "custom",
      message: result.error.message,
      input: node,
      params: { code: result.error.code, keys: [...result.error.keys] },
    })

    return z.NEVER
  })
}
