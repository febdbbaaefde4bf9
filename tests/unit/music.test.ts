/**
 * Music Variant Unit Tests
 */

import { describe, it, expect } from 'vitest'
import { Album, Artist, Track } from '../../src/main/media/music'

describe('Artist', () => {
  it('ignores counts given to the constructor', () => {
    const artist = new Artist({
      albumCount: 40,
      trackCount: 400,
      albums: [{ albumId: 2, albumName: 'Second', trackIds: [21, 22] }],
    })

    expect(artist.albumCount).toBe(1)
    expect(artist.trackCount).toBe(2)
  })

  it('ignores album ID 0', () => {
    const artist = new Artist()
    artist.addAlbumTrackIDs(0, 'Unknown', [1, 2])
    expect(artist.albums).toEqual([])
    expect(artist.trackCount).toBe(0)
  })

  it('fills an empty album name and unions track IDs', () => {
    const artist = new Artist()
    artist.addAlbumTrackIDs(5, '', [51])
    artist.mergeTrackIDsByAlbum(5, 'Fifth', [51, 52])
    artist.mergeTrackIDsByAlbum(5, 'Renamed', [])

    expect(artist.getAlbumByID(5)).toEqual({ albumId: 5, albumName: 'Fifth', trackIds: [51, 52] })
    expect(artist.getTrackIDsByAlbum(5)).toEqual([51, 52])
    expect(artist.getTrackIDsByAlbum(6)).toEqual([])
  })

  it('lists albums in ascending ID order', () => {
    const artist = new Artist()
    artist.addAlbumTrackIDs(9, 'Ninth', [91])
    artist.addAlbumTrackIDs(3, 'Third', [31, 32])

    expect(artist.getOrderedAlbums()).toEqual([3, 9])
    expect(artist.getAllTrackIDs()).toEqual([91, 31, 32])
  })

  it('merges albums, genres and scalars', () => {
    const artist = new Artist({ genres: ['Jazz'], albums: [{ albumId: 1, albumName: 'First', trackIds: [11] }] })
    artist.merge(
      new Artist({
        biography: 'Born somewhere.',
        genres: ['Jazz', 'Fusion'],
        albums: [
          { albumId: 1, albumName: 'First', trackIds: [12] },
          { albumId: 2, albumName: 'Second', trackIds: [21] },
        ],
      })
    )

    expect(artist.biography).toBe('Born somewhere.')
    expect(artist.genres).toEqual(['Jazz', 'Fusion'])
    expect(artist.albumCount).toBe(2)
    expect(artist.trackCount).toBe(3)
    expect(artist.getTrackIDsByAlbum(1)).toEqual([11, 12])
  })
})

describe('Album', () => {
  it('keeps the reported track count until track IDs are known', () => {
    const album = new Album({ trackCount: 12 })
    expect(album.trackCount).toBe(12)

    album.addTrackIDs([1, 2, 3])
    expect(album.trackCount).toBe(3)
  })

  it('fills a missing track count on merge', () => {
    const album = new Album({ artistName: 'Miles' })
    album.merge(new Album({ artistName: 'Other', artistId: 'ar-1', trackCount: 9 }))

    expect(album.trackCount).toBe(9)
    expect(album.artistName).toBe('Miles')
    expect(album.artistId).toBe('ar-1')
  })

  it('derives the count from merged track IDs', () => {
    const album = new Album({ trackIds: [1, 2] })
    album.merge(new Album({ trackIds: [2, 3], trackCount: 20 }))

    expect(album.trackIds).toEqual([1, 2, 3])
    expect(album.trackCount).toBe(3)
  })
})

describe('Track', () => {
  it('fills gaps only', () => {
    const track = new Track({ number: 3, albumName: 'Kind of Blue' })
    track.merge(new Track({ number: 4, discNumber: 1, albumName: 'Other', composer: 'Miles Davis' }))

    expect(track.number).toBe(3)
    expect(track.discNumber).toBe(1)
    expect(track.albumName).toBe('Kind of Blue')
    expect(track.composer).toBe('Miles Davis')
  })
})
