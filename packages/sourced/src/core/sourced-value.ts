import { ProcessEnvReader } from "../adapters/env/process-env-reader"
import type { EnvReader } from "../ports/env-reader"
import type { ResolveResult } from "../ports/resolve-result"
import type { ISourcedValue, ResolveOptions } from "../ports/sourced-value"
import type { DescribedSource, Source, SourceKind } from "../ports/source"
import type { ValueParser } from "../ports/value-parser"
import { descriptors } from "./descriptors"
import {
  type DeserializeOptions,
  type DeserializeResult,
  deserializeSource,
  isPlainObject,
} from "./deserialize"
import {
  MissingEnvVarError,
  NoSourceProvidedError,
  ParseFailureError,
  type ResolutionFailure,
  ValidationFailedError,
} from "./errors"

const processEnv = new ProcessEnvReader()

function deepFreeze<V>(value: V): V {
  if (Array.isArray(value) || isPlainObject(value)) {
    for (const item of Object.values(value)) deepFreeze(item)
    Object.freeze(value)
  }

  return value
}

/**
 * A configuration value that records where it comes from.
 *
 * Arrays and plain objects inside a literal are frozen in place, so a
 * resolved value cannot rewrite the declared source.
 */
export class SourcedValue<T> implements ISourcedValue<T> {
  private constructor(
    readonly source: Source<T>,
    private readonly parser: ValueParser<T>,
  ) {
    if (source.kind === "literal") deepFreeze(source.value)
    Object.freeze(source)
    Object.freeze(this)
  }

  static literal<T>(value: T, parser: ValueParser<T>): SourcedValue<T> {
    return new SourcedValue<T>({ kind: "literal", value }, parser)
  }

  static env<T>(name: string, parser: ValueParser<T>): SourcedValue<T> {
    return new SourcedValue<T>({ kind: "env", name }, parser)
  }

  static unset<T>(parser: ValueParser<T>): SourcedValue<T> {
    return new SourcedValue<T>({ kind: "unset" }, parser)
  }

  static deserialize<T>(
    node: unknown,
    parser: ValueParser<T>,
    options?: DeserializeOptions,
  ): DeserializeResult<SourcedValue<T>> {
    const result = deserializeSource(node, parser, options)

    if (!result.success) return result

    return { success: true, value: new SourcedValue<T>(result.value, parser) }
  }

  get kind(): SourceKind {
    return this.source.kind
  }

  get typeName(): string {
    return this.parser.typeName
  }

  resolve(options: ResolveOptions = {}): ResolveResult<T> {
    const source = this.source

    switch (source.kind) {
      case "literal":
        return { success: true, value: source.value }
      case "env":
        return this.resolveEnv(source.name, options.env ?? processEnv)
      case "unset":
        return { success: false, error: new NoSourceProvidedError() }
    }
  }

  resolveOr(fallback: T, options?: ResolveOptions): T {
    const result = this.resolve(options)

    return result.success ? result.value : fallback
  }

  resolveOrElse(fallback: (error: ResolutionFailure) => T, options?: ResolveOptions): T {
    const result = this.resolve(options)

    return result.success ? result.value : fallback(result.error)
  }

  resolveAndValidate(
    predicate: (value: T) => boolean,
    options: ResolveOptions & { message?: string } = {},
  ): ResolveResult<T> {
    const result = this.resolve(options)

    if (!result.success || predicate(result.value)) return result

    return {
      success: false,
      error: new ValidationFailedError(this.describe(), options.message),
    }
  }

  describe(): string {
    const source = this.source

    return source.kind === "env" ? `env:${source.name}` : source.kind
  }

  toJSON(): unknown {
    const source = this.source

    switch (source.kind) {
      case "literal":
        return source.value
      case "unset":
        return undefined
      default:
        return writeDescriptor(source)
    }
  }

  private resolveEnv(varName: string, env: EnvReader): ResolveResult<T> {
    const raw = env.get(varName)

    if (raw === undefined) {
      return { success: false, error: new MissingEnvVarError(varName) }
    }

    const parsed = this.parser.parseEnv(raw)

    if (parsed.success) return { success: true, value: parsed.value }

    return {
      success: false,
      error: new ParseFailureError({
        varName,
        rawValue: raw,
        targetType: this.parser.typeName,
        reason: parsed.reason,
      }),
    }
  }
}

function writeDescriptor(source: DescribedSource): Record<string, unknown> | undefined {
  for (const descriptor of descriptors) {
    const written = descriptor.write(source)

    if (written) return written
  }

  return undefined
}

/**
 * Reads one field from a parsed document node. See {@link deserializeSource}
 * for the precedence between descriptor and literal shapes.
 */
export function deserializeSourced<T>(
  node: unknown,
  parser: ValueParser<T>,
  options?: DeserializeOptions,
): DeserializeResult<SourcedValue<T>> {
  return SourcedValue.deserialize(node, parser, options)
}
