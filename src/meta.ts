/**
 * Field metadata: tags and markers.
 *
 * Tags are ordinary Zod metadata entries (`.meta({ db: 'name,omitempty' })`).
 * Two markers change how discovery treats a field:
 * - embed() - anonymous composition, the embedded object's fields are promoted
 * - internal() - the field is not externally visible and is never mapped
 */

import { z } from 'zod'
import { unwrapOnce } from './kinds'

export const EMBEDDED_META_KEY = 'zodreflect:embedded'
export const INTERNAL_META_KEY = 'zodreflect:internal'

type Metadata = Readonly<Record<string, unknown>>

const METADATA_CACHE = new WeakMap<z.core.$ZodType, Metadata | undefined>()

/**
 * Get the metadata of a schema, merged across its wrapper layers.
 *
 * Entries on outer layers win over entries on the schemas they wrap.
 *
 * @example
 * ```ts
 * const schema = z.string().meta({ db: 'email' }).optional().meta({ json: 'mail' })
 * getMetadata(schema)
 * // => { db: 'email', json: 'mail' }
 * ```
 */
export function getMetadata(schema: z.core.$ZodType): Metadata | undefined {
  if (METADATA_CACHE.has(schema)) {
    return METADATA_CACHE.get(schema)
  }

  const layers: Record<string, unknown>[] = []
  const visited = new Set<z.core.$ZodType>()
  let current: z.core.$ZodType | undefined = schema

  while (current) {
    if (visited.has(current)) break
    visited.add(current)

    const meta = z.globalRegistry.get(current)
    if (meta !== undefined) layers.push(meta)

    current = unwrapOnce(current)
  }

  let merged: Metadata | undefined
  if (layers.length > 0) {
    const entries: Record<string, unknown> = {}
    for (const layer of layers.reverse()) Object.assign(entries, layer)
    merged = Object.freeze(entries)
  }
  METADATA_CACHE.set(schema, merged)
  return merged
}

/**
 * Read the tag stored under `tagName`. Returns undefined when the field carries
 * no such tag; a non-string tag value is reported and ignored.
 */
export function getTag(schema: z.core.$ZodType, tagName: string): string | undefined {
  const meta = getMetadata(schema)
  if (meta === undefined || !Object.hasOwn(meta, tagName)) return undefined

  const value = meta[tagName]
  if (typeof value !== 'string') {
    console.warn(`[zodreflect] ignoring non-string "${tagName}" tag of type ${typeof value}`)
    return undefined
  }
  return value
}

/**
 * Embed an object schema into the enclosing object, promoting its fields.
 *
 * Without a tag the embedded fields keep their own names; with a tag they are
 * prefixed by it. Wrap the result in `.optional()` / `.nullable()` for an
 * embedded reference. No other wrapper may surround an embedded schema:
 * `.default()`, `.transform()` and the like make discovery throw
 * InvalidUsageError('embed', ...).
 *
 * @example
 * ```ts
 * const Base = z.object({ id: z.number().meta({ db: 'id' }) })
 * const Derived = z.object({
 *   base: embed(Base),
 *   extra: z.string().meta({ db: 'extra' })
 * })
 * // mapped names: 'id', 'extra'
 * ```
 */
export function embed<T extends z.ZodObject>(schema: T, tags?: z.core.GlobalMeta): T {
  return schema.meta({ ...tags, [EMBEDDED_META_KEY]: true })
}

/**
 * Mark a field as internal. Internal fields never appear in a type map.
 */
export function internal<T extends z.ZodType>(schema: T): T {
  return schema.meta({ [INTERNAL_META_KEY]: true })
}

export function isEmbedded(schema: z.core.$ZodType): boolean {
  return getMetadata(schema)?.[EMBEDDED_META_KEY] === true
}

export function isInternal(schema: z.core.$ZodType): boolean {
  return getMetadata(schema)?.[INTERNAL_META_KEY] === true
}
