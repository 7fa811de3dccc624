export type LookupErrorCode =
  | "invalid_record_argument"
  | "source_lookup_failed"
  | "missing_required_field"
  | "type_coercion_failed"
  | "source_unavailable"
  | "invalid_schema"

/**
 * Structured metadata attached to errors (field names, keys, source names)
 * so callers do not have to parse messages.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export type LookupErrorOptions<C extends LookupErrorCode = LookupErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
}>

/**
 * Serialized error shape for logging and transport. JSON.stringify-safe.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  cause?: SerializedError
  stack?: string
}>

export class LookupError<C extends LookupErrorCode = LookupErrorCode> extends Error {
  readonly code: C
  readonly context: ErrorContext
  readonly timestamp: Date

  constructor(message: string, options: LookupErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

/**
 * Serialize any error (or thrown value) to a consistent shape.
 *
 * Source adapters may reject with anything; causes are serialized
 * recursively so a `source_lookup_failed` error keeps the adapter's reason.
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  const includeStack = options?.includeStack ?? false

  if (err instanceof LookupError) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      timestamp: err.timestamp.toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      timestamp: new Date().toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: typeof err === "string" ? {} : { value: err },
    timestamp: new Date().toISOString(),
  }
}

/**
 * Human-readable reason of a thrown value, for embedding in messages.
 */
export function describeCause(err: unknown): string {
  if (err instanceof Error) return err.message
  if (typeof err === "string") return err

  return "unknown error"
}
