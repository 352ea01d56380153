import { afterEach, describe, expect, it, vi } from 'vitest'
import { z } from 'zod'
import { EMBEDDED_META_KEY, embed, getMetadata, internal, isEmbedded, isInternal } from '../src'
import { getTag } from '../src/meta'
import { Base } from './fixtures/schemas'

describe('meta.ts', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('getMetadata', () => {
    it('returns metadata from schema.meta()', () => {
      const schema = z.string().meta({ db: 'email' })

      expect(getMetadata(schema)).toEqual({ db: 'email' })
    })

    it('returns undefined for schemas without metadata', () => {
      expect(getMetadata(z.string())).toBeUndefined()
    })

    it('reads metadata through optional and nullable wrappers', () => {
      const schema = z.string().meta({ db: 'email' }).optional().nullable()

      expect(getMetadata(schema)).toEqual({ db: 'email' })
    })

    it('lets outer layers override inner ones', () => {
      const schema = z.string().meta({ db: 'a', json: 'x' }).optional().meta({ db: 'b' })

      expect(getMetadata(schema)).toEqual({ db: 'b', json: 'x' })
    })
  })

  describe('getTag', () => {
    it('returns the tag value when present', () => {
      expect(getTag(z.string().meta({ db: 'name,omitempty' }), 'db')).toBe('name,omitempty')
    })

    it('returns undefined when the tag is absent', () => {
      expect(getTag(z.string().meta({ json: 'name' }), 'db')).toBeUndefined()
    })

    it('keeps an empty tag value', () => {
      expect(getTag(z.string().meta({ db: '' }), 'db')).toBe('')
    })

    it('warns about and ignores a non-string tag', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

      expect(getTag(z.string().meta({ db: 42 }), 'db')).toBeUndefined()
      expect(warn).toHaveBeenCalledWith('[zodreflect] ignoring non-string "db" tag of type number')
    })
  })

  describe('markers', () => {
    it('embed() marks a copy and leaves the original alone', () => {
      const embedded = embed(Base)

      expect(isEmbedded(embedded)).toBe(true)
      expect(isEmbedded(Base)).toBe(false)
      expect(embedded).not.toBe(Base)
    })

    it('embed() keeps the marker through optional and nullable', () => {
      expect(isEmbedded(embed(Base).optional())).toBe(true)
      expect(isEmbedded(embed(Base).nullable())).toBe(true)
    })

    it('embed() stores the given tags beside the marker', () => {
      expect(getMetadata(embed(Base, { db: 'base' }))).toEqual({
        db: 'base',
        [EMBEDDED_META_KEY]: true
      })
    })

    it('internal() marks a field as internal', () => {
      const field = internal(z.string().meta({ db: 'secret' }))

      expect(isInternal(field)).toBe(true)
      expect(getMetadata(field)?.db).toBe('secret')
      expect(isInternal(z.string())).toBe(false)
    })
  })
})
