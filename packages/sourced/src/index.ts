export { ProcessEnvReader } from "./adapters/env/process-env-reader"
export { RecordEnvReader } from "./adapters/env/record-env-reader"
export type { RecordEnvReaderOptions } from "./adapters/env/record-env-reader"
export { sourced } from "./adapters/zod/sourced-schema"
export type { SourcedSchemaOptions } from "./adapters/zod/sourced-schema"
export { zodParser } from "./adapters/zod/zod-parser"
export type { ZodParserOptions } from "./adapters/zod/zod-parser"
export { descriptors, envDescriptor } from "./core/descriptors"
export type { SourceDescriptor } from "./core/descriptors"
export { deserializeSource } from "./core/deserialize"
export type { DeserializeOptions, DeserializeResult } from "./core/deserialize"
export {
  ConfigResolutionError,
  DeserializationError,
  MissingEnvVarError,
  NoSourceProvidedError,
  ParseFailureError,
  ResolutionError,
  ValidationFailedError,
} from "./core/errors"
export type {
  DeserializationErrorCode,
  FieldFailure,
  ParseFailureDetails,
  ResolutionErrorCode,
  ResolutionFailure,
} from "./core/errors"
export { booleanParser, integerParser, numberParser, stringParser } from "./core/parsers"
export { resolveAll } from "./core/resolve-all"
export type {
  ResolveAllOptions,
  ResolveAllResult,
  ResolvedFields,
  SourcedFields,
} from "./core/resolve-all"
export { ResolvedConfig } from "./core/resolved-config"
export { deserializeSourced, SourcedValue } from "./core/sourced-value"
export type { IResolvedConfig } from "./ports/config"
export type { EnvReader } from "./ports/env-reader"
export type { FailedResolution, ResolvedValue, ResolveResult } from "./ports/resolve-result"
export type { ISourcedValue, ResolveOptions } from "./ports/sourced-value"
export type {
  DescribedSource,
  EnvSource,
  LiteralSource,
  Source,
  SourceKind,
  UnsetSource,
} from "./ports/source"
export type { ParseFailure, ParseOutcome, ParseSuccess, ValueParser } from "./ports/value-parser"
