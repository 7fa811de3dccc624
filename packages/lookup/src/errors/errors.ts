import { describeCause, LookupError } from "./lookup-error"

export class InvalidRecordArgumentError extends LookupError<"invalid_record_argument"> {
  constructor(reason: string) {
    super(`lookup needs a mutable record object: ${reason}`, {
      code: "invalid_record_argument",
      context: { reason },
    })
  }
}

export type SourceLookupFailedDetails = {
  field: string
  key: string
  source: string
  cause: unknown
}

export class SourceLookupFailedError extends LookupError<"source_lookup_failed"> {
  constructor({ field, key, source, cause }: SourceLookupFailedDetails) {
    super(`lookup for field "${field}" failed: ${describeCause(cause)}`, {
      code: "source_lookup_failed",
      context: { field, key, source },
      cause,
    })
  }
}

export class MissingRequiredFieldError extends LookupError<"missing_required_field"> {
  constructor({ field, key }: { field: string; key: string }) {
    super(`missing value for required field "${field}"`, {
      code: "missing_required_field",
      context: { field, key },
    })
  }
}

export type TypeCoercionFailedDetails = {
  field: string
  key: string
  value: string
  kind: string
  cause: unknown
}

export class TypeCoercionFailedError extends LookupError<"type_coercion_failed"> {
  constructor({ field, key, value, kind, cause }: TypeCoercionFailedDetails) {
    super(
      `value ${JSON.stringify(value)} for field "${field}" is not ${kind}: ${describeCause(cause)}`,
      {
        code: "type_coercion_failed",
        context: { field, key, value, kind },
        cause,
      },
    )
  }
}

export class SourceUnavailableError extends LookupError<"source_unavailable"> {
  constructor(source: string, reason: string, cause?: unknown) {
    super(`source "${source}" is unavailable: ${reason}`, {
      code: "source_unavailable",
      context: { source },
      ...(cause !== undefined && { cause }),
    })
  }
}

export class InvalidSchemaError extends LookupError<"invalid_schema"> {
  constructor(field: string, reason: string) {
    super(`invalid field "${field}": ${reason}`, {
      code: "invalid_schema",
      context: { field },
    })
  }
}
