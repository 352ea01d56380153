import { describe, expect, it } from 'vitest'
import * as zodreflect from '../src'

describe('package exports', () => {
  it('exposes the mapper and its factories', () => {
    expect(typeof zodreflect.Mapper).toBe('function')
    expect(typeof zodreflect.createMapper).toBe('function')
    expect(typeof zodreflect.createMapperFunc).toBe('function')
    expect(typeof zodreflect.createMapperTagFunc).toBe('function')
  })

  it('exposes the accessors and schema helpers', () => {
    expect(typeof zodreflect.fieldByIndexes).toBe('function')
    expect(typeof zodreflect.fieldByIndexesReadOnly).toBe('function')
    expect(typeof zodreflect.deref).toBe('function')
    expect(typeof zodreflect.embed).toBe('function')
    expect(typeof zodreflect.internal).toBe('function')
    expect(typeof zodreflect.getMapping).toBe('function')
  })

  it('exposes the error class', () => {
    expect(new zodreflect.InvalidUsageError('op', 'string')).toBeInstanceOf(Error)
    expect(new zodreflect.InvalidUsageError('op', 'string').message).toBe(
      '[zodreflect] op: call on string value, expected object'
    )
  })
})
