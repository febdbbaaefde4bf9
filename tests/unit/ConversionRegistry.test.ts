/**
 * ConversionRegistry Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { z } from 'zod'
import {
  ConversionRegistry,
  conversionKey,
  describeSchemaError,
  type ConversionContext,
} from '../../src/main/providers/base/ConversionRegistry'
import { ConversionError, FeatureNotSupportedError } from '../../src/main/providers/errors'
import { Movie } from '../../src/main/media/video'

const RawMovieSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
})

const ctx: ConversionContext = { clientId: 1, clientType: 'plex', baseUrl: 'http://plex.test' }

describe('ConversionRegistry', () => {
  let registry: ConversionRegistry

  beforeEach(() => {
    registry = new ConversionRegistry().register('plex', 'movie', 'movie', RawMovieSchema, (context, raw) =>
      new Movie({ details: { title: raw.name, externalIds: [{ source: context.clientType, id: raw.id }] } })
    )
  })

  it('keys entries by client type, raw type and media type', () => {
    expect(conversionKey('plex', 'movie', 'movie')).toBe('plex:movie:movie')
    expect(registry.keys()).toEqual(['plex:movie:movie'])
    expect(registry.has('plex', 'movie', 'movie')).toBe(true)
    expect(registry.has('emby', 'movie', 'movie')).toBe(false)
  })

  it('converts a valid object', () => {
    const movie = registry.convert(ctx, 'movie', 'movie', { id: '7', name: 'Heat' })

    expect(movie).toBeInstanceOf(Movie)
    expect(movie.details.title).toBe('Heat')
    expect(movie.details.externalIds.getID('plex')).toBe('7')
  })

  it('replaces a converter registered under the same key', () => {
    registry.register('plex', 'movie', 'movie', RawMovieSchema, () => new Movie({ details: { title: 'Replaced' } }))

    expect(registry.size).toBe(1)
    expect(registry.convert(ctx, 'movie', 'movie', { id: '7', name: 'Heat' }).details.title).toBe('Replaced')
  })

  it('reports a missing field by name', () => {
    expect(() => registry.convert(ctx, 'movie', 'movie', { id: '7' })).toThrow(
      new ConversionError('plex', 'movie', 'missing required field (name)')
    )
  })

  it('treats an empty required string as missing', () => {
    expect(() => registry.convert(ctx, 'movie', 'movie', { id: '', name: 'Heat' })).toThrow(
      'plex movie: missing required field (id)'
    )
  })

  it('reports a wrongly typed field with its path', () => {
    expect(() => registry.convert(ctx, 'movie', 'movie', { id: '7', name: 5 })).toThrow(
      'plex movie: invalid field (name): Expected string, received number'
    )
  })

  it('raises FeatureNotSupportedError without a converter', () => {
    expect(() => registry.convert(ctx, 'show', 'series', {})).toThrow(FeatureNotSupportedError)
    expect(() => registry.convert({ ...ctx, clientType: 'emby' }, 'movie', 'movie', {})).toThrow(
      '(emby: convert movie to movie)'
    )
  })

  it('wraps a failing converter', () => {
    const cause = new Error('boom')
    registry.register('plex', 'movie', 'movie', RawMovieSchema, () => {
      throw cause
    })

    let caught: unknown
    try {
      registry.convert(ctx, 'movie', 'movie', { id: '7', name: 'Heat' })
    } catch (error) {
      caught = error
    }
    expect(caught).toBeInstanceOf(ConversionError)
    expect(caught).toMatchObject({ message: 'plex movie: conversion to movie failed', cause })
  })

  it('describes an empty issue list', () => {
    expect(describeSchemaError(new z.ZodError([]))).toBe('invalid object')
  })

  it('describes a root-level failure', () => {
    const result = RawMovieSchema.safeParse(null)
    expect(result.success).toBe(false)
    if (!result.success) {
      expect(describeSchemaError(result.error)).toBe('invalid field ((root)): Expected object, received null')
    }
  })
})
