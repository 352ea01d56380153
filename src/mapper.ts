/**
 * Mapper - resolves mapped field names on object schemas and caches the
 * result per schema.
 */

import type { z } from 'zod'
import { fieldByIndexes, rootRef } from './access'
import { getMapping } from './discovery'
import { InvalidUsageError } from './errors'
import type { TypeMap } from './fields'
import { deref, isObjectSchema, isRecordValue, kindOf, valueKind, type ObjectSchema } from './kinds'
import type { FieldRef, MapperOptions, NameFunc } from './types'

/**
 * General purpose mapper of names to object schema fields.
 *
 * Names come from a metadata tag when one is configured and present, and
 * otherwise from `mapFunc` applied to the declared key. Type maps are built
 * once per schema and kept for the life of the mapper.
 *
 * @example
 * ```ts
 * const mapper = new Mapper({ tagName: 'db' })
 * const Person = z.object({
 *   name: z.string().meta({ db: 'name' }),
 *   address: z.object({ city: z.string().meta({ db: 'city' }) }).meta({ db: 'addr' })
 * })
 * mapper.traversalsByName(Person, ['addr.city', 'missing'])
 * // => [[1, 0], []]
 * ```
 */
export class Mapper {
  private readonly cache = new Map<ObjectSchema, TypeMap>()
  private readonly options: Readonly<MapperOptions>

  constructor(options: MapperOptions = {}) {
    this.options = Object.freeze({ ...options })
  }

  /**
   * Type map of `schema`, built on first request. An optional or nullable
   * object is dereferenced first.
   */
  typeMap(schema: z.core.$ZodType): TypeMap {
    const objectSchema = mustBeObject('Mapper.typeMap', schema)

    // synchronous check-then-store, nothing can interleave
    let mapping = this.cache.get(objectSchema)
    if (!mapping) {
      mapping = getMapping(objectSchema, this.options)
      this.cache.set(objectSchema, mapping)
    }
    return mapping
  }

  /**
   * Writable reference to the field mapped to `name`.
   *
   * When nothing is mapped to `name` the reference points at `value` itself.
   * Use tryFieldByName() to tell a miss apart.
   */
  fieldByName(schema: z.core.$ZodType, value: unknown, name: string): FieldRef {
    const objectSchema = mustBeObject('Mapper.fieldByName', schema)
    const record = mustBeRecord('Mapper.fieldByName', value)

    const fi = this.typeMap(objectSchema).getByPath(name)
    if (!fi) {
      return rootRef(record, objectSchema)
    }
    return fieldByIndexes(objectSchema, record, fi.index)
  }

  /**
   * Like fieldByName(), but returns undefined when nothing is mapped to `name`.
   */
  tryFieldByName(schema: z.core.$ZodType, value: unknown, name: string): FieldRef | undefined {
    const objectSchema = mustBeObject('Mapper.tryFieldByName', schema)
    const record = mustBeRecord('Mapper.tryFieldByName', value)

    const fi = this.typeMap(objectSchema).getByPath(name)
    return fi ? fieldByIndexes(objectSchema, record, fi.index) : undefined
  }

  /**
   * References for each of `names`, in order; undefined for names not mapped.
   */
  fieldsByName(
    schema: z.core.$ZodType,
    value: unknown,
    names: readonly string[]
  ): Array<FieldRef | undefined> {
    const objectSchema = mustBeObject('Mapper.fieldsByName', schema)
    const record = mustBeRecord('Mapper.fieldsByName', value)

    const tm = this.typeMap(objectSchema)
    return names.map(name => {
      const fi = tm.getByPath(name)
      return fi ? fieldByIndexes(objectSchema, record, fi.index) : undefined
    })
  }

  /**
   * Traversal for each of `names`, in order; an empty traversal for names
   * not mapped.
   */
  traversalsByName(schema: z.core.$ZodType, names: readonly string[]): number[][] {
    const tm = this.typeMap(mustBeObject('Mapper.traversalsByName', schema))
    return names.map(name => {
      const fi = tm.getByPath(name)
      return fi ? [...fi.index] : []
    })
  }
}

/**
 * Mapper obeying the metadata tag `tagName`. An empty tag name is ignored.
 */
export function createMapper(tagName: string): Mapper {
  return new Mapper({ tagName })
}

/**
 * Mapper obeying a metadata tag, falling back to `mapFunc(key)` for untagged fields.
 */
export function createMapperFunc(tagName: string, mapFunc: NameFunc): Mapper {
  return new Mapper({ tagName, mapFunc })
}

/**
 * Mapper with both a name function and a tag value function, for tags such as
 * 'name,omitempty' whose raw value the caller wants to rewrite.
 */
export function createMapperTagFunc(
  tagName: string,
  mapFunc: NameFunc,
  tagMapFunc: NameFunc
): Mapper {
  return new Mapper({ tagName, mapFunc, tagMapFunc })
}

function mustBeObject(method: string, schema: z.core.$ZodType): ObjectSchema {
  const target = deref(schema)
  if (!isObjectSchema(target)) {
    throw new InvalidUsageError(method, kindOf(target))
  }
  return target
}

function mustBeRecord(method: string, value: unknown): Record<string, unknown> {
  if (!isRecordValue(value)) {
    throw new InvalidUsageError(method, valueKind(value))
  }
  return value
}
