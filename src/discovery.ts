/**
 * Field discovery.
 *
 * Walks an object schema breadth first, following nested objects and embedded
 * objects, and records one FieldInfo per reachable field.
 */

import type { z } from 'zod'
import { InvalidUsageError } from './errors'
import { TypeMap } from './fields'
import { deref, isObjectSchema, kindOf, shapeKeys, type ObjectSchema } from './kinds'
import { getTag, isEmbedded, isInternal } from './meta'
import type { FieldInfo, MapperOptions } from './types'
import { zeroValue } from './zero'

type PendingType = {
  schema: ObjectSchema
  /** Traversal of the field that led here; empty for the root */
  index: readonly number[]
  parentPath: string
}

/**
 * Split 'name,opt,key=value' into the name and its options.
 */
export function parseName(raw: string): { name: string; options: Record<string, string> } {
  const parts = raw.split(',')
  if (parts.length <= 1) {
    return { name: raw, options: {} }
  }

  const entries = parts.slice(1).map((opt): [string, string] => {
    const kv = opt.split('=')
    return [kv[0], kv.length > 1 ? kv[1] : '']
  })
  return { name: parts[0], options: Object.fromEntries(entries) }
}

/**
 * Build the type map of `root` under the given naming policy.
 */
export function getMapping(root: z.core.$ZodType, options: MapperOptions = {}): TypeMap {
  const { tagName = '', mapFunc, tagMapFunc } = options
  const schema = deref(root)
  if (!isObjectSchema(schema)) {
    throw new InvalidUsageError('getMapping', kindOf(schema))
  }

  const fields: FieldInfo[] = []
  const queue: PendingType[] = [{ schema, index: [], parentPath: '' }]

  while (queue.length > 0) {
    const pending = queue.shift()
    if (!pending) break

    const shape = pending.schema._zod.def.shape
    shapeKeys(pending.schema).forEach((key, pos) => {
      const fieldSchema: z.core.$ZodType = shape[key]

      let tag = ''
      let raw = ''
      const tagged = tagName !== '' ? getTag(fieldSchema, tagName) : undefined
      if (tagged !== undefined) {
        tag = tagged
        raw = tagged
      } else if (mapFunc) {
        raw = mapFunc(key)
      }

      const { name, options: fieldOptions } = parseName(raw)

      if (tagMapFunc) {
        tag = tagMapFunc(tag)
      }

      const path = pending.parentPath === '' ? name : `${pending.parentPath}.${name}`

      // '-' disables the field and everything below it
      if (name === '-') return
      if (isInternal(fieldSchema)) return

      const index = Object.freeze([...pending.index, pos])
      const embedded = isEmbedded(fieldSchema)

      if (embedded) {
        const target = deref(fieldSchema)
        if (!isObjectSchema(target)) {
          throw new InvalidUsageError('embed', kindOf(target))
        }
        // an untagged embedding adds no name segment for its children
        queue.push({ schema: target, index, parentPath: tag !== '' ? path : pending.parentPath })
      } else if (isObjectSchema(fieldSchema)) {
        queue.push({ schema: fieldSchema, index, parentPath: path })
      }

      fields.push(
        Object.freeze({
          index,
          path,
          field: Object.freeze({ key, schema: fieldSchema }),
          // fresh per read: Map, Set and Date zeros stay mutable when frozen
          get zero() {
            return zeroValue(fieldSchema)
          },
          name,
          options: Object.freeze(fieldOptions),
          embedded,
          tag
        })
      )
    })
  }

  return new TypeMap(schema, fields)
}
