/**
 * Navigation of live records along a traversal.
 *
 * - fieldByIndexes() - writable reference, allocating missing intermediates
 * - fieldByIndexesReadOnly() - plain read, never touches the record
 */

import { z } from 'zod'
import { InvalidUsageError } from './errors'
import {
  deref,
  isObjectSchema,
  isRecordValue,
  isReference,
  kindOf,
  shapeKeys,
  valueKind,
  type ObjectSchema
} from './kinds'
import type { FieldRef } from './types'
import { zeroValue } from './zero'

function slotRef(
  owner: Record<string, unknown>,
  key: string,
  schema: z.core.$ZodType
): FieldRef {
  return {
    schema,
    key,
    get: () => owner[key],
    set: value => {
      owner[key] = value
    }
  }
}

/**
 * Reference to the record itself. It can be read but not replaced.
 */
export function rootRef(value: unknown, schema: z.core.$ZodType): FieldRef {
  return {
    schema,
    key: undefined,
    get: () => value,
    set: () => {
      throw new InvalidUsageError('FieldRef.set', 'root', 'cannot replace the root record')
    }
  }
}

/**
 * Fresh value for a missing slot, or undefined when the slot stays empty.
 */
function allocate(schema: z.core.$ZodType): unknown {
  if (isReference(schema)) {
    return zeroValue(deref(schema))
  }
  if (schema instanceof z.core.$ZodRecord) return {}
  if (schema instanceof z.core.$ZodMap) return new Map()
  if (isObjectSchema(schema)) return zeroValue(schema)
  return undefined
}

/**
 * Resolve the object schema and declared key for one step of a traversal.
 */
function step(
  method: string,
  schema: z.core.$ZodType,
  pos: number
): { objectSchema: ObjectSchema; key: string } {
  const objectSchema = deref(schema)
  if (!isObjectSchema(objectSchema)) {
    throw new InvalidUsageError(method, kindOf(objectSchema))
  }
  const key = shapeKeys(objectSchema)[pos]
  if (key === undefined) {
    throw new InvalidUsageError(method, 'object', `field position ${pos} out of range`)
  }
  return { objectSchema, key }
}

/**
 * Return a writable reference to the field reached by `index`.
 *
 * Missing optional/nullable objects, records, maps and nested objects along
 * the way are allocated and stored, so the returned reference can always be
 * written. An empty traversal references the record itself.
 *
 * @example
 * ```ts
 * const user = {}
 * fieldByIndexes(User, user, [1, 0]).set('Paris')
 * // user => { address: { city: 'Paris', ... } }
 * ```
 */
export function fieldByIndexes(
  schema: z.core.$ZodType,
  value: unknown,
  index: readonly number[]
): FieldRef {
  let ref = rootRef(value, schema)
  let current = value
  let currentSchema = schema

  for (const pos of index) {
    const { objectSchema, key } = step('fieldByIndexes', currentSchema, pos)
    if (!isRecordValue(current)) {
      throw new InvalidUsageError('fieldByIndexes', valueKind(current))
    }

    const fieldSchema: z.core.$ZodType = objectSchema._zod.def.shape[key]
    let child = current[key]
    if (child === undefined || child === null) {
      const allocated = allocate(fieldSchema)
      if (allocated !== undefined) {
        current[key] = allocated
        child = allocated
      }
    }

    ref = slotRef(current, key, fieldSchema)
    current = child
    currentSchema = fieldSchema
  }

  return ref
}

/**
 * Read the field reached by `index` without allocating anything.
 * Yields undefined when an intermediate value is missing.
 */
export function fieldByIndexesReadOnly(
  schema: z.core.$ZodType,
  value: unknown,
  index: readonly number[]
): unknown {
  let current = value
  let currentSchema = schema

  for (const pos of index) {
    const { objectSchema, key } = step('fieldByIndexesReadOnly', currentSchema, pos)
    if (current === undefined || current === null) return undefined
    if (!isRecordValue(current)) {
      throw new InvalidUsageError('fieldByIndexesReadOnly', valueKind(current))
    }
    current = current[key]
    currentSchema = objectSchema._zod.def.shape[key]
  }

  return current
}
