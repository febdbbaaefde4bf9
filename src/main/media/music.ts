/**
 * Music variants: Artist, Album, Track
 */

import { BaseMediaData, type MediaData, type VariantInit } from './MediaDetails'
import { cloneCredits, mergeCredits, mergeUnique } from './mergeUtils'
import type { AlbumData, AlbumEntry, ArtistData, Credit, TrackData } from './schemas'

// ============================================================================
// ARTIST
// ============================================================================

/**
 * Artist with a per-album track index.
 *
 * `albumCount` and `trackCount` summarize `albums` and are recomputed on
 * every mutation of the index; values passed to the constructor are ignored.
 */
export class Artist extends BaseMediaData {
  readonly mediaType = 'artist' as const
  albums: AlbumEntry[]
  albumCount = 0
  trackCount = 0
  biography: string
  genres: string[]
  similarArtists: string[]
  startYear: number
  endYear: number
  rating: number
  credits: Credit[]

  constructor(init: VariantInit<ArtistData> = {}) {
    super(init.details)
    this.albums = []
    this.biography = init.biography ?? ''
    this.genres = [...(init.genres ?? [])]
    this.similarArtists = [...(init.similarArtists ?? [])]
    this.startYear = init.startYear ?? 0
    this.endYear = init.endYear ?? 0
    this.rating = init.rating ?? 0
    this.credits = cloneCredits(init.credits)

    for (const album of init.albums ?? []) {
      this.mergeTrackIDsByAlbum(album.albumId, album.albumName, album.trackIds)
    }
    this.updateCounts()
  }

  getAlbumByID(albumId: number): AlbumEntry | undefined {
    return this.albums.find((a) => a.albumId === albumId)
  }

  /**
   * Add tracks to an album, creating the album entry on first use.
   * An album ID of 0 is ignored.
   */
  addAlbumTrackIDs(albumId: number, albumName: string, trackIds: readonly number[]): void {
    if (albumId === 0) return
    this.mergeTrackIDsByAlbum(albumId, albumName, trackIds)
  }

  mergeTrackIDsByAlbum(albumId: number, albumName: string, trackIds: readonly number[]): void {
    let album = this.getAlbumByID(albumId)
    if (!album) {
      album = { albumId, albumName, trackIds: [] }
      this.albums.push(album)
    } else if (!album.albumName) {
      album.albumName = albumName
    }
    mergeUnique(album.trackIds, trackIds)
    this.updateCounts()
  }

  mergeAlbums(other: Artist): void {
    for (const album of other.albums) {
      this.mergeTrackIDsByAlbum(album.albumId, album.albumName, album.trackIds)
    }
    this.updateCounts()
  }

  getTrackIDsByAlbum(albumId: number): number[] {
    return [...(this.getAlbumByID(albumId)?.trackIds ?? [])]
  }

  // Album IDs in ascending order
  getOrderedAlbums(): number[] {
    return this.albums.map((a) => a.albumId).sort((a, b) => a - b)
  }

  getAllTrackIDs(): number[] {
    return this.albums.flatMap((a) => a.trackIds)
  }

  merge(other: MediaData): void {
    if (!(other instanceof Artist)) return

    this.details.merge(other.details)
    if (!this.biography) this.biography = other.biography
    if (!this.startYear) this.startYear = other.startYear
    if (!this.endYear) this.endYear = other.endYear
    if (!this.rating) this.rating = other.rating
    mergeUnique(this.genres, other.genres)
    mergeUnique(this.similarArtists, other.similarArtists)
    mergeCredits(this.credits, other.credits)
    this.mergeAlbums(other)
  }

  toJSON(): ArtistData {
    return {
      details: this.details.toJSON(),
      albums: this.albums.map((a) => ({ ...a, trackIds: [...a.trackIds] })),
      albumCount: this.albumCount,
      trackCount: this.trackCount,
      biography: this.biography,
      genres: [...this.genres],
      similarArtists: [...this.similarArtists],
      startYear: this.startYear,
      endYear: this.endYear,
      rating: this.rating,
      credits: cloneCredits(this.credits),
    }
  }

  private updateCounts(): void {
    this.albumCount = this.albums.length
    this.trackCount = this.albums.reduce((sum, a) => sum + a.trackIds.length, 0)
  }
}

// ============================================================================
// ALBUM
// ============================================================================

export class Album extends BaseMediaData {
  readonly mediaType = 'album' as const
  artistId: string
  artistName: string
  trackCount: number
  trackIds: number[]
  credits: Credit[]

  constructor(init: VariantInit<AlbumData> = {}) {
    super(init.details)
    this.artistId = init.artistId ?? ''
    this.artistName = init.artistName ?? ''
    this.trackCount = init.trackCount ?? 0
    this.trackIds = []
    this.credits = cloneCredits(init.credits)
    if (init.trackIds?.length) this.addTrackIDs(init.trackIds)
  }

  /**
   * Once the album knows its track IDs, `trackCount` follows them. Until
   * then it holds whatever count the media server reported.
   */
  addTrackIDs(trackIds: readonly number[]): void {
    mergeUnique(this.trackIds, trackIds)
    if (this.trackIds.length > 0) this.trackCount = this.trackIds.length
  }

  merge(other: MediaData): void {
    if (!(other instanceof Album)) return

    this.details.merge(other.details)
    if (!this.artistId) this.artistId = other.artistId
    if (!this.artistName) this.artistName = other.artistName
    if (!this.trackCount) this.trackCount = other.trackCount
    mergeCredits(this.credits, other.credits)
    this.addTrackIDs(other.trackIds)
  }

  toJSON(): AlbumData {
    return {
      details: this.details.toJSON(),
      artistId: this.artistId,
      artistName: this.artistName,
      trackCount: this.trackCount,
      trackIds: [...this.trackIds],
      credits: cloneCredits(this.credits),
    }
  }
}

// ============================================================================
// TRACK
// ============================================================================

export class Track extends BaseMediaData {
  readonly mediaType = 'track' as const
  number: number
  discNumber: number
  albumId: string
  albumName: string
  artistId: string
  artistName: string
  composer: string
  lyrics: string
  credits: Credit[]

  constructor(init: VariantInit<TrackData> = {}) {
    super(init.details)
    this.number = init.number ?? 0
    this.discNumber = init.discNumber ?? 0
    this.albumId = init.albumId ?? ''
    this.albumName = init.albumName ?? ''
    this.artistId = init.artistId ?? ''
    this.artistName = init.artistName ?? ''
    this.composer = init.composer ?? ''
    this.lyrics = init.lyrics ?? ''
    this.credits = cloneCredits(init.credits)
  }

  merge(other: MediaData): void {
    if (!(other instanceof Track)) return

    this.details.merge(other.details)
    if (!this.number) this.number = other.number
    if (!this.discNumber) this.discNumber = other.discNumber
    if (!this.albumId) this.albumId = other.albumId
    if (!this.albumName) this.albumName = other.albumName
    if (!this.artistId) this.artistId = other.artistId
    if (!this.artistName) this.artistName = other.artistName
    if (!this.composer) this.composer = other.composer
    if (!this.lyrics) this.lyrics = other.lyrics
    mergeCredits(this.credits, other.credits)
  }

  toJSON(): TrackData {
    return {
      details: this.details.toJSON(),
      number: this.number,
      discNumber: this.discNumber,
      albumId: this.albumId,
      albumName: this.albumName,
      artistId: this.artistId,
      artistName: this.artistName,
      composer: this.composer,
      lyrics: this.lyrics,
      credits: cloneCredits(this.credits),
    }
  }
}
