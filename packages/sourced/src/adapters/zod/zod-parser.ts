import { z } from "zod"
import type { ParseOutcome, ValueParser } from "../../ports/value-parser"

export type ZodParserOptions = {
  /**
   * Name of the target type in error messages.
   *
   * @default the schema's type, e.g. "number" or "object"
   */
  typeName?: string
}

function firstIssue(error: z.ZodError): string {
  const issue = error.issues[0]

  if (!issue) return "invalid value"

  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
}

function parseJson(raw: string): { success: true; value: unknown } | { success: false } {
  try {
    const value: unknown = JSON.parse(raw)

    return { success: true, value }
  } catch {
    return { success: false }
  }
}

/**
 * Adapts a zod schema to a {@link ValueParser}.
 *
 * Environment text is first offered to the schema as a string. When that is
 * rejected and the text is valid JSON, the decoded value is offered instead,
 * so `z.number()` accepts "8080" and `z.object(...)` accepts a JSON object.
 */
export function zodParser<S extends z.ZodType>(
  schema: S,
  options: ZodParserOptions = {},
): ValueParser<z.output<S>> {
  const typeName = options.typeName ?? schema._zod.def.type

  return {
    typeName,

    parseLiteral(node): ParseOutcome<z.output<S>> {
      const result = schema.safeParse(node)

      return result.success
        ? { success: true, value: result.data }
        : { success: false, reason: firstIssue(result.error) }
    },

    parseEnv(raw): ParseOutcome<z.output<S>> {
      const direct = schema.safeParse(raw)

      if (direct.success) return { success: true, value: direct.data }

      const json = parseJson(raw)

      if (!json.success) return { success: false, reason: firstIssue(direct.error) }

      const decoded = schema.safeParse(json.value)

      return decoded.success
        ? { success: true, value: decoded.data }
        : { success: false, reason: firstIssue(decoded.error) }
    },
  }
}
