export { ArgsSource, type ArgsSourceOptions } from "./adapters/args/args-source"
export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { FunctionSource, type LookupFunction } from "./adapters/function/function-source"
export { FormSource } from "./adapters/http/form-source"
export { JsonRequestSource } from "./adapters/http/json-request-source"
export { JsonFileSource, type JsonFileSourceOptions } from "./adapters/json/json-file-source"
export { MapSource } from "./adapters/map/map-source"
export { coerce } from "./core/coerce"
export { Complex } from "./core/complex"
export { extractFieldMetadata, type FieldMetadata } from "./core/field-metadata"
export {
  type ComplexKind,
  type CustomField,
  type CustomFieldOptions,
  type FieldDescriptor,
  type FieldKind,
  type FieldTags,
  type FieldValue,
  type FloatKind,
  field,
  type IntegerKind,
  type PrimitiveField,
  type PrimitiveKind,
  zeroValue,
} from "./core/fields"
export { formatValue } from "./core/format-value"
export { type LoadRecordOptions, loadRecord } from "./core/load"
export { LoadedRecord } from "./core/loaded-record"
export { type FieldOutcome, type FieldStatus, type LookupOptions, lookup } from "./core/lookup"
export {
  defineRecord,
  type FieldMap,
  type InferRecord,
  type NamedField,
  type RecordOf,
  type RecordSchema,
} from "./core/record-schema"
export { resolveKey, type SequenceResult } from "./core/resolve-sequence"
export { scanLine, tokenScanner } from "./core/scan"
export {
  InvalidRecordArgumentError,
  InvalidSchemaError,
  MissingRequiredFieldError,
  SourceLookupFailedError,
  SourceUnavailableError,
  TypeCoercionFailedError,
} from "./errors/errors"
export { isLookupError } from "./errors/is-lookup-error"
export {
  type ErrorContext,
  LookupError,
  type LookupErrorCode,
  type SerializedError,
  serializeError,
} from "./errors/lookup-error"
export type { Reporter } from "./ports/reporter"
export type { FieldScanner, ScanResult } from "./ports/scanner"
export { found, type LookupResult, type LookupSource, notFound } from "./ports/source"
export { discardReporter } from "./reporters/discard-reporter"
export { DupReporter } from "./reporters/dup-reporter"
export { EMPTY_SECRET, FilterSecretsReporter, SET_SECRET } from "./reporters/filter-secrets-reporter"
export { FmtReporter, type FmtReporterOptions, type TextWriter } from "./reporters/fmt-reporter"
export { LoggerReporter, type LoggerReporterOptions } from "./reporters/logger-reporter"
export { MapReporter } from "./reporters/map-reporter"
