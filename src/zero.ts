import { z } from 'zod'
import { shapeKeys, unwrapOnce } from './kinds'

/**
 * Build a fresh zero value for a schema.
 *
 * Optional fields are `undefined`, nullable ones `null`, objects carry the
 * zero of every declared key. Schemas with no natural zero yield `undefined`.
 */
export function zeroValue(schema: z.core.$ZodType): unknown {
  if (schema instanceof z.core.$ZodOptional) return undefined
  if (schema instanceof z.core.$ZodNullable) return null

  if (schema instanceof z.core.$ZodObject) {
    const shape: z.core.$ZodShape = schema._zod.def.shape
    const out: Record<string, unknown> = {}
    for (const key of shapeKeys(schema)) {
      out[key] = zeroValue(shape[key])
    }
    return out
  }

  if (schema instanceof z.core.$ZodTuple) {
    return schema._zod.def.items.map(item => zeroValue(item))
  }
  if (schema instanceof z.core.$ZodLiteral) {
    return schema._zod.def.values[0]
  }
  if (schema instanceof z.core.$ZodEnum) {
    return Object.values(schema._zod.def.entries)[0]
  }
  if (schema instanceof z.core.$ZodUnion) {
    const first = schema._zod.def.options[0]
    return first ? zeroValue(first) : undefined
  }

  switch (schema._zod.def.type) {
    case 'string':
      return ''
    case 'number':
      return 0
    case 'bigint':
      return 0n
    case 'boolean':
      return false
    case 'date':
      return new Date(0)
    case 'null':
      return null
    case 'record':
      return {}
    case 'map':
      return new Map()
    case 'set':
      return new Set()
    case 'array':
      return []
  }

  const inner = unwrapOnce(schema)
  return inner ? zeroValue(inner) : undefined
}
