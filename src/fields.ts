import type { z } from 'zod'
import type { FieldInfo } from './types'

/**
 * Ordered, immutable list of the mapped fields of one object schema.
 *
 * Order is discovery order: every field of an object comes before the fields
 * promoted from the objects it embeds, so the first match for a path is the
 * shallowest one.
 */
export class TypeMap implements Iterable<FieldInfo> {
  readonly schema: z.core.$ZodObject
  readonly fields: readonly FieldInfo[]

  constructor(schema: z.core.$ZodObject, fields: readonly FieldInfo[]) {
    this.schema = schema
    this.fields = Object.freeze([...fields])
  }

  get length(): number {
    return this.fields.length
  }

  [Symbol.iterator](): Iterator<FieldInfo> {
    return this.fields[Symbol.iterator]()
  }

  /**
   * First field whose path equals `path`, or undefined.
   */
  getByPath(path: string): FieldInfo | undefined {
    return this.fields.find(fi => fi.path === path)
  }

  /**
   * Field reached by exactly this traversal. A prefix of a longer traversal
   * does not match.
   */
  getByTraversal(index: readonly number[]): FieldInfo | undefined {
    return this.fields.find(
      fi => fi.index.length === index.length && fi.index.every((pos, i) => pos === index[i])
    )
  }

  /**
   * Fields keyed by path, leaving out embedded entries and unnamed fields.
   * When paths collide the field discovered last wins.
   */
  fieldMap(): Map<string, FieldInfo> {
    const fm = new Map<string, FieldInfo>()
    for (const fi of this.fields) {
      if (fi.name !== '' && !fi.embedded) {
        fm.set(fi.path, fi)
      }
    }
    return fm
  }
}
