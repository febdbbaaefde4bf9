/**
 * MediaItem Unit Tests
 *
 * Envelope behaviour, narrowing and stored-form decoding.
 */

import { describe, it, expect } from 'vitest'
import {
  MediaItem,
  MediaItemDecodeError,
  createMediaItem,
  deserializeAnyMediaItem,
  deserializeMediaItem,
  isMediaItemOfType,
  serializeMediaItem,
} from '../../src/main/media/MediaItem'
import { MediaItemList } from '../../src/main/media/MediaItemList'
import { movieCodec, playlistCodec, seriesCodec } from '../../src/main/media/codecs'
import { Movie, Series } from '../../src/main/media/video'
import { Track } from '../../src/main/media/music'
import { Playlist } from '../../src/main/media/lists'

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/

function heat(): MediaItem<Movie> {
  return createMediaItem(
    'movie',
    new Movie({
      details: { title: 'Heat', releaseYear: 1995, releaseDate: new Date('1995-12-15T00:00:00Z') },
      resolution: '1080p',
    })
  )
}

describe('createMediaItem', () => {
  it('mints a v4 UUID and copies denormalized fields', () => {
    const item = heat()

    expect(item.uuid).toMatch(UUID_PATTERN)
    expect(item.id).toBe(0)
    expect(item.type).toBe('movie')
    expect(item.title).toBe('Heat')
    expect(item.releaseYear).toBe(1995)
    expect(item.releaseDate).toEqual(new Date('1995-12-15T00:00:00Z'))
  })

  it('mints a different UUID each time', () => {
    expect(heat().uuid).not.toBe(heat().uuid)
  })
})

describe('MediaItem', () => {
  it('records client keys and external IDs', () => {
    const item = heat()
    item.setClientInfo(1, 'plex', '501')
    item.addExternalID('tmdb', '949')
    item.addExternalID('imdb', '')

    expect(item.getClientItemID(1)).toBe('501')
    expect(item.getClientItemID(2)).toBe('')
    expect(item.getExternalID('tmdb')).toBe('949')
    expect(item.externalIds.has('imdb')).toBe(false)
  })

  it('keeps envelope fields when the payload has none', () => {
    const item = new MediaItem({ uuid: 'u-1', type: 'track', data: new Track(), title: 'Kept', releaseYear: 2001 })
    item.syncDenormalizedFields()

    expect(item.title).toBe('Kept')
    expect(item.releaseYear).toBe(2001)
  })

  it('narrows by type tag and payload class', () => {
    const item: MediaItem = heat()

    expect(item.isType('movie')).toBe(true)
    expect(item.asMovie()?.data.resolution).toBe('1080p')
    expect(item.asSeries()).toBeNull()
    expect(item.isList()).toBe(false)
  })

  it('rejects a tag that disagrees with the payload', () => {
    const item: MediaItem = new MediaItem({ uuid: 'u-1', type: 'series', data: new Movie() })

    expect(isMediaItemOfType(item, 'series')).toBe(false)
    expect(isMediaItemOfType(item, 'movie')).toBe(false)
    expect(item.asSeries()).toBeNull()
  })

  it('recognises lists', () => {
    const item: MediaItem = createMediaItem('playlist', new Playlist({ details: { title: 'Road Trip' } }))

    expect(item.isPlaylist()).toBe(true)
    expect(item.isCollection()).toBe(false)
    expect(item.isList()).toBe(true)
    expect(item.asPlaylist()?.data.mediaType).toBe('playlist')
  })
})

describe('serialization', () => {
  it('restores an item with its UUID, identity maps and payload', () => {
    const item = heat()
    item.id = 7
    item.setClientInfo(1, 'plex', '501')
    item.syncClients.updateSyncStatus(1, 'success', new Date('2024-03-01T00:00:00Z'))
    item.addExternalID('tmdb', '949')
    item.data.credits.push({ name: 'John Doe', role: 'actor', character: 'Neil', department: '' })

    const restored = deserializeMediaItem(serializeMediaItem(item), movieCodec)

    expect(restored.id).toBe(7)
    expect(restored.uuid).toBe(item.uuid)
    expect(restored.title).toBe('Heat')
    expect(restored.releaseDate).toEqual(new Date('1995-12-15T00:00:00Z'))
    expect(restored.getClientItemID(1)).toBe('501')
    expect(restored.syncClients.getByClientID(1)?.lastSynced).toEqual(new Date('2024-03-01T00:00:00Z'))
    expect(restored.getExternalID('tmdb')).toBe('949')
    expect(restored.data).toBeInstanceOf(Movie)
    expect(restored.data.resolution).toBe('1080p')
    expect(restored.data.credits).toEqual([{ name: 'John Doe', role: 'actor', character: 'Neil', department: '' }])
  })

  it('restores list items with dated history', () => {
    const playlist = new Playlist({ details: { title: 'Road Trip' } })
    playlist.addItem({ itemId: 3, lastChanged: new Date('2024-01-01T00:00:00Z') }, 1)
    const item = createMediaItem('playlist', playlist)

    const restored = deserializeMediaItem(serializeMediaItem(item), playlistCodec)

    expect(restored.data.getItemIDs()).toEqual([3])
    expect(restored.data.items[0].lastChanged).toEqual(new Date('2024-01-01T00:00:00Z'))
    expect(restored.data.items[0].changeHistory[0].timestamp).toBeInstanceOf(Date)
  })

  it('fails on a type tag mismatch', () => {
    const blob = serializeMediaItem(heat())

    expect(() => deserializeMediaItem(blob, seriesCodec)).toThrow(MediaItemDecodeError)
    expect(() => deserializeMediaItem(blob, seriesCodec)).toThrow(/is a movie, expected series$/)
  })

  it('fails on invalid JSON', () => {
    expect(() => deserializeAnyMediaItem('{not json')).toThrow('Stored item is not valid JSON')
  })

  it('fails on an invalid envelope', () => {
    expect(() => deserializeAnyMediaItem(JSON.stringify({ uuid: 'not-a-uuid', type: 'movie' }))).toThrow(
      /^Invalid media item envelope/
    )
  })

  it('fails on an invalid payload', () => {
    const item = heat()
    const raw = { ...item.toJSON(), data: { details: { releaseYear: 'nineteen' } } }

    expect(() => deserializeMediaItem(JSON.stringify(raw), movieCodec)).toThrow(
      `Invalid movie payload for item ${item.uuid}`
    )
  })

  it('rejects the unknown type', () => {
    const raw = { ...heat().toJSON(), type: 'unknown' }
    expect(() => deserializeAnyMediaItem(JSON.stringify(raw))).toThrow(/has no concrete media type$/)
  })

  it('decodes by the stored tag', () => {
    const series = createMediaItem('series', new Series({ details: { title: 'The Wire' } }))
    const restored = deserializeAnyMediaItem(serializeMediaItem(series))

    expect(restored.asSeries()?.title).toBe('The Wire')
  })
})

describe('MediaItemList', () => {
  it('groups by type and follows the display order', () => {
    const movie = heat()
    const series = createMediaItem('series', new Series({ details: { title: 'The Wire' } }))
    const list = new MediaItemList({ listType: 'playlist', listOriginId: 2 })

    list.add(movie, 1)
    list.add(series, 0)
    list.addListItem('missing-uuid', 2)

    expect(list.listType).toBe('playlist')
    expect(list.getTotalItems()).toBe(2)
    expect(list.getItemsOfType('movie').map((i) => i.title)).toEqual(['Heat'])
    expect(list.getByUUID(series.uuid)?.title).toBe('The Wire')
    expect(list.getOrdered().map((i) => i.title)).toEqual(['The Wire', 'Heat'])
  })

  it('replaces an item with the same UUID', () => {
    const movie = heat()
    const list = new MediaItemList()
    list.add(movie)
    list.add(movie)

    const seen: string[] = []
    list.forEach((item) => seen.push(item.uuid))
    expect(seen).toEqual([movie.uuid])
    expect(list.listType).toBe('unknown')
  })
})
