/**
 * MediaDetails and the MediaData contract
 *
 * MediaDetails is the metadata block shared by every media variant. Each
 * variant (Movie, Series, Track, Playlist...) implements MediaData on top of it.
 */

import { ExternalIDs, Ratings } from './identity'
import { mergeUnique } from './mergeUtils'
import type { Artwork, MediaDetailsData, MediaType } from './schemas'

const ARTWORK_KEYS = ['poster', 'background', 'banner', 'thumbnail', 'logo'] as const

export function emptyArtwork(): Artwork {
  return { poster: '', background: '', banner: '', thumbnail: '', logo: '' }
}

export class MediaDetails {
  title: string
  description: string
  releaseDate?: Date
  releaseYear: number
  addedAt?: Date
  updatedAt?: Date
  genres: string[]
  tags: string[]
  studios: string[]
  contentRating: string
  language: string
  externalIds: ExternalIDs
  ratings: Ratings
  userRating: number
  artwork: Artwork
  duration: number // seconds
  isFavorite: boolean

  constructor(init: Partial<MediaDetailsData> = {}) {
    this.title = init.title ?? ''
    this.description = init.description ?? ''
    this.releaseDate = init.releaseDate
    this.releaseYear = init.releaseYear ?? 0
    this.addedAt = init.addedAt
    this.updatedAt = init.updatedAt
    this.genres = [...(init.genres ?? [])]
    this.tags = [...(init.tags ?? [])]
    this.studios = [...(init.studios ?? [])]
    this.contentRating = init.contentRating ?? ''
    this.language = init.language ?? ''
    this.externalIds = new ExternalIDs(init.externalIds)
    this.ratings = new Ratings(init.ratings)
    this.userRating = init.userRating ?? 0
    this.artwork = { ...emptyArtwork(), ...init.artwork }
    this.duration = init.duration ?? 0
    this.isFavorite = init.isFavorite ?? false
  }

  /**
   * Fold another observation of the same entity into this one.
   * Present scalars are kept; lists and identity maps are unioned.
   */
  merge(other: MediaDetails): void {
    if (!this.title) this.title = other.title
    if (!this.description) this.description = other.description
    if (!this.releaseDate) this.releaseDate = other.releaseDate
    if (!this.releaseYear) this.releaseYear = other.releaseYear
    if (!this.addedAt) this.addedAt = other.addedAt
    if (!this.updatedAt) this.updatedAt = other.updatedAt
    if (!this.contentRating) this.contentRating = other.contentRating
    if (!this.language) this.language = other.language
    if (!this.userRating) this.userRating = other.userRating
    if (!this.duration) this.duration = other.duration
    if (!this.isFavorite) this.isFavorite = other.isFavorite

    mergeUnique(this.genres, other.genres)
    mergeUnique(this.tags, other.tags)
    mergeUnique(this.studios, other.studios)
    this.externalIds.merge(other.externalIds)
    this.ratings.merge(other.ratings)

    for (const key of ARTWORK_KEYS) {
      if (!this.artwork[key]) this.artwork[key] = other.artwork[key]
    }
  }

  toJSON(): MediaDetailsData {
    return {
      title: this.title,
      description: this.description,
      releaseDate: this.releaseDate,
      releaseYear: this.releaseYear,
      addedAt: this.addedAt,
      updatedAt: this.updatedAt,
      genres: [...this.genres],
      tags: [...this.tags],
      studios: [...this.studios],
      contentRating: this.contentRating,
      language: this.language,
      externalIds: this.externalIds.toJSON(),
      ratings: this.ratings.toJSON(),
      userRating: this.userRating,
      artwork: { ...this.artwork },
      duration: this.duration,
      isFavorite: this.isFavorite,
    }
  }
}

/**
 * Merged copy of two detail blocks; neither input is modified.
 */
export function mergeMediaDetails(primary: MediaDetails, secondary: MediaDetails): MediaDetails {
  const merged = new MediaDetails(primary.toJSON())
  merged.merge(secondary)
  return merged
}

// ============================================================================
// MEDIA DATA CONTRACT
// ============================================================================

/**
 * Capability shared by every media variant.
 *
 * `merge` is a silent no-op when `other` is a different variant.
 */
export interface MediaData {
  readonly mediaType: MediaType
  getDetails(): MediaDetails
  setDetails(details: MediaDetails): void
  merge(other: MediaData): void
  toJSON(): unknown
}

export abstract class BaseMediaData implements MediaData {
  abstract readonly mediaType: MediaType
  details: MediaDetails

  constructor(details?: Partial<MediaDetailsData> | MediaDetails) {
    this.details = details instanceof MediaDetails ? details : new MediaDetails(details)
  }

  getDetails(): MediaDetails {
    return this.details
  }

  setDetails(details: MediaDetails): void {
    this.details = details
  }

  abstract merge(other: MediaData): void
  abstract toJSON(): unknown
}

/**
 * Constructor input for a variant: any subset of its stored fields, with the
 * details given either as plain data or as an existing MediaDetails.
 */
export type VariantInit<D extends { details: MediaDetailsData }> = Partial<Omit<D, 'details'>> & {
  details?: Partial<MediaDetailsData> | MediaDetails
}
