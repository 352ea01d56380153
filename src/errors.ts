/**
 * Raised when an operation that needs an object schema (or a live object value)
 * is handed something else. This is a programming error, not a lookup miss.
 */
export class InvalidUsageError extends Error {
  /** The operation whose contract was violated, e.g. `Mapper.typeMap` */
  readonly method: string
  /** The schema def type or runtime value kind that was actually met */
  readonly kind: string

  constructor(method: string, kind: string, detail?: string) {
    super(`[zodreflect] ${method}: ${detail ?? `call on ${kind} value, expected object`}`)
    this.name = 'InvalidUsageError'
    this.method = method
    this.kind = kind
  }
}
