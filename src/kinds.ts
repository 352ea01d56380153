/**
 * Schema kind helpers.
 *
 * Small predicates over Zod schemas and live values used by discovery and the
 * accessors: unwrapping wrapper layers, dereferencing one optional/nullable
 * level, and naming the kind of whatever was met for diagnostics.
 */

import { z } from 'zod'

export type ObjectSchema = z.core.$ZodObject

const SHAPE_KEYS = new WeakMap<ObjectSchema, readonly string[]>()

/**
 * Strip one wrapper layer (optional, nullable, default, pipe, lazy, ...).
 * Returns undefined when the schema is not a wrapper.
 */
export function unwrapOnce(schema: z.core.$ZodType): z.core.$ZodType | undefined {
  if (
    schema instanceof z.core.$ZodOptional ||
    schema instanceof z.core.$ZodNullable ||
    schema instanceof z.core.$ZodDefault ||
    schema instanceof z.core.$ZodCatch ||
    schema instanceof z.core.$ZodReadonly ||
    schema instanceof z.core.$ZodPrefault ||
    schema instanceof z.core.$ZodNonOptional
  ) {
    return schema._zod.def.innerType
  }
  if (schema instanceof z.core.$ZodPipe) {
    return schema._zod.def.in
  }
  if (schema instanceof z.core.$ZodLazy) {
    return schema._zod.def.getter()
  }
  return undefined
}

/**
 * Is this an optional-reference wrapper (`.optional()` / `.nullable()`)?
 */
export function isReference(
  schema: z.core.$ZodType
): schema is z.core.$ZodOptional | z.core.$ZodNullable {
  return schema instanceof z.core.$ZodOptional || schema instanceof z.core.$ZodNullable
}

/**
 * Dereference exactly one optional/nullable layer.
 *
 * @example
 * ```ts
 * deref(Address.optional()) // => Address
 * deref(Address)            // => Address
 * ```
 */
export function deref(schema: z.core.$ZodType): z.core.$ZodType {
  return isReference(schema) ? schema._zod.def.innerType : schema
}

export function isObjectSchema(schema: z.core.$ZodType): schema is ObjectSchema {
  return schema instanceof z.core.$ZodObject
}

/**
 * Declared field names of an object schema, in declaration order.
 */
export function shapeKeys(schema: ObjectSchema): readonly string[] {
  let keys = SHAPE_KEYS.get(schema)
  if (!keys) {
    keys = Object.freeze(Object.keys(schema._zod.def.shape))
    SHAPE_KEYS.set(schema, keys)
  }
  return keys
}

export function kindOf(schema: z.core.$ZodType): string {
  return schema._zod.def.type
}

export function isRecordValue(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Runtime kind of a live value, for error messages.
 */
export function valueKind(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'array'
  if (value instanceof Map) return 'map'
  return typeof value
}
