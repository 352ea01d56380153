/**
 * zodreflect - named field access for Zod object schemas
 *
 * @example
 * import { z } from 'zod'
 * import { Mapper, embed } from 'zodreflect'
 *
 * const mapper = new Mapper({ tagName: 'db' })
 * const ref = mapper.fieldByName(User, user, 'addr.city')
 * ref.set('Lyon')
 */

export { fieldByIndexes, fieldByIndexesReadOnly } from './access'
export { getMapping, parseName } from './discovery'
export { InvalidUsageError } from './errors'
export { TypeMap } from './fields'
export { deref } from './kinds'
export { createMapper, createMapperFunc, createMapperTagFunc, Mapper } from './mapper'
export {
  EMBEDDED_META_KEY,
  embed,
  getMetadata,
  INTERNAL_META_KEY,
  internal,
  isEmbedded,
  isInternal
} from './meta'
export type { DeclaredField, FieldInfo, FieldRef, MapperOptions, NameFunc } from './types'
export { zeroValue } from './zero'
