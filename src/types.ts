/**
 * Shared type definitions.
 */

import type { z } from 'zod'

/**
 * Maps a declared field name (or a raw tag value) to another string.
 */
export type NameFunc = (name: string) => string

/**
 * Naming policy of a Mapper, fixed at construction.
 */
export type MapperOptions = {
  /** Metadata key holding the field name, e.g. 'db'. Empty or absent disables tags */
  tagName?: string
  /** Derives a name from the declared field name when no tag is present */
  mapFunc?: NameFunc
  /** Applied to the raw tag value; the result is kept on FieldInfo.tag */
  tagMapFunc?: NameFunc
}

/**
 * A field as declared on its object schema.
 */
export type DeclaredField = {
  /** Key in the object shape */
  key: string
  /** Declared schema of the field, wrappers included */
  schema: z.core.$ZodType
}

/**
 * Everything known about one mapped field of an object schema.
 */
export type FieldInfo = {
  /** Field positions from the root schema down to this field */
  readonly index: readonly number[]
  /** Dot-joined mapped name, the lookup key */
  readonly path: string
  readonly field: DeclaredField
  /** Zero value of the declared schema, a fresh instance on every read */
  readonly zero: unknown
  /** Mapped name of this field alone, options stripped */
  readonly name: string
  /** Options parsed from the name, e.g. 'name,omitempty' gives { omitempty: '' } */
  readonly options: Readonly<Record<string, string>>
  /** True for the entry standing for an embedded object itself */
  readonly embedded: boolean
  /** Raw tag value after tagMapFunc */
  readonly tag: string
}

/**
 * Writable reference to a slot inside a live record.
 */
export interface FieldRef<T = unknown> {
  /** Declared schema of the referenced slot */
  readonly schema: z.core.$ZodType
  /** Key of the slot in its owner; undefined for a reference to the record itself */
  readonly key: string | undefined
  get(): T
  set(value: T): void
}
