/**
 * Video variants: Movie, Series, Season, Episode
 *
 * Episode and season counts are always derived from the ID index they
 * summarize and are recomputed after every mutation.
 */

import { BaseMediaData, type MediaData, type VariantInit } from './MediaDetails'
import { cloneCredits, mergeCredits, mergeUnique } from './mergeUtils'
import type { Credit, EpisodeData, MovieData, SeasonData, SeasonEntry, SeriesData } from './schemas'

// ============================================================================
// MOVIE
// ============================================================================

export class Movie extends BaseMediaData {
  readonly mediaType = 'movie' as const
  credits: Credit[]
  trailerUrl: string
  resolution: string
  videoCodec: string
  audioCodec: string
  subtitleUrls: string[]

  constructor(init: VariantInit<MovieData> = {}) {
    super(init.details)
    this.credits = cloneCredits(init.credits)
    this.trailerUrl = init.trailerUrl ?? ''
    this.resolution = init.resolution ?? ''
    this.videoCodec = init.videoCodec ?? ''
    this.audioCodec = init.audioCodec ?? ''
    this.subtitleUrls = [...(init.subtitleUrls ?? [])]
  }

  merge(other: MediaData): void {
    if (!(other instanceof Movie)) return

    this.details.merge(other.details)
    if (!this.trailerUrl) this.trailerUrl = other.trailerUrl
    if (!this.resolution) this.resolution = other.resolution
    if (!this.videoCodec) this.videoCodec = other.videoCodec
    if (!this.audioCodec) this.audioCodec = other.audioCodec
    mergeUnique(this.subtitleUrls, other.subtitleUrls)
    mergeCredits(this.credits, other.credits)
  }

  toJSON(): MovieData {
    return {
      details: this.details.toJSON(),
      credits: cloneCredits(this.credits),
      trailerUrl: this.trailerUrl,
      resolution: this.resolution,
      videoCodec: this.videoCodec,
      audioCodec: this.audioCodec,
      subtitleUrls: [...this.subtitleUrls],
    }
  }
}

// ============================================================================
// SERIES
// ============================================================================

export class Series extends BaseMediaData {
  readonly mediaType = 'series' as const
  seasons: SeasonEntry[]
  episodeCount = 0
  seasonCount = 0
  releaseYear: number
  contentRating: string
  rating: number
  network: string
  status: string
  genres: string[]
  credits: Credit[]

  constructor(init: VariantInit<SeriesData> = {}) {
    super(init.details)
    this.seasons = []
    this.releaseYear = init.releaseYear ?? 0
    this.contentRating = init.contentRating ?? ''
    this.rating = init.rating ?? 0
    this.network = init.network ?? ''
    this.status = init.status ?? ''
    this.genres = [...(init.genres ?? [])]
    this.credits = cloneCredits(init.credits)

    for (const season of init.seasons ?? []) {
      this.addSeasonEpisodeIDs(season.seasonNumber, season.episodeIds)
      if (season.seasonId) this.setSeasonID(season.seasonNumber, season.seasonId)
    }
    this.updateCounts()
  }

  getSeason(seasonNumber: number): SeasonEntry | undefined {
    return this.seasons.find((s) => s.seasonNumber === seasonNumber)
  }

  addSeasonEpisodeIDs(seasonNumber: number, episodeIds: readonly number[]): void {
    mergeUnique(this.ensureSeason(seasonNumber).episodeIds, episodeIds.filter((id) => id > 0))
    this.updateCounts()
  }

  mergeEpisodeIDsBySeason(episodesBySeason: ReadonlyMap<number, readonly number[]>): void {
    for (const [seasonNumber, episodeIds] of episodesBySeason) {
      this.addSeasonEpisodeIDs(seasonNumber, episodeIds)
    }
  }

  setSeasonID(seasonNumber: number, seasonId: number): void {
    this.ensureSeason(seasonNumber).seasonId = seasonId
    this.updateCounts()
  }

  mergeSeasons(other: Series): void {
    for (const season of other.seasons) {
      const existing = this.getSeason(season.seasonNumber)
      if (!existing?.seasonId && season.seasonId) {
        this.setSeasonID(season.seasonNumber, season.seasonId)
      }
      this.addSeasonEpisodeIDs(season.seasonNumber, season.episodeIds)
    }
  }

  getOrderedSeasons(): SeasonEntry[] {
    return [...this.seasons].sort((a, b) => a.seasonNumber - b.seasonNumber)
  }

  getAllEpisodeIDs(): number[] {
    return this.getOrderedSeasons().flatMap((s) => s.episodeIds)
  }

  merge(other: MediaData): void {
    if (!(other instanceof Series)) return

    this.details.merge(other.details)
    if (!this.releaseYear) this.releaseYear = other.releaseYear
    if (!this.contentRating) this.contentRating = other.contentRating
    if (!this.rating) this.rating = other.rating
    if (!this.network) this.network = other.network
    if (!this.status) this.status = other.status
    mergeUnique(this.genres, other.genres)
    mergeCredits(this.credits, other.credits)
    this.mergeSeasons(other)
  }

  toJSON(): SeriesData {
    return {
      details: this.details.toJSON(),
      seasons: this.seasons.map((s) => ({ ...s, episodeIds: [...s.episodeIds] })),
      episodeCount: this.episodeCount,
      seasonCount: this.seasonCount,
      releaseYear: this.releaseYear,
      contentRating: this.contentRating,
      rating: this.rating,
      network: this.network,
      status: this.status,
      genres: [...this.genres],
      credits: cloneCredits(this.credits),
    }
  }

  private ensureSeason(seasonNumber: number): SeasonEntry {
    let season = this.getSeason(seasonNumber)
    if (!season) {
      season = { seasonNumber, seasonId: 0, episodeIds: [] }
      this.seasons.push(season)
    }
    return season
  }

  private updateCounts(): void {
    this.seasonCount = this.seasons.length
    this.episodeCount = this.seasons.reduce((sum, s) => sum + s.episodeIds.length, 0)
  }
}

// ============================================================================
// SEASON
// ============================================================================

export class Season extends BaseMediaData {
  readonly mediaType = 'season' as const
  number: number
  title: string
  overview: string
  episodeIds: number[]
  episodeCount = 0
  seriesId: string
  seriesName: string
  credits: Credit[]

  constructor(init: VariantInit<SeasonData> = {}) {
    super(init.details)
    this.number = init.number ?? 0
    this.title = init.title ?? ''
    this.overview = init.overview ?? ''
    this.episodeIds = []
    this.seriesId = init.seriesId ?? ''
    this.seriesName = init.seriesName ?? ''
    this.credits = cloneCredits(init.credits)
    this.addEpisodeIDs(init.episodeIds ?? [])
  }

  addEpisodeIDs(episodeIds: readonly number[]): void {
    mergeUnique(this.episodeIds, episodeIds.filter((id) => id > 0))
    this.episodeCount = this.episodeIds.length
  }

  merge(other: MediaData): void {
    if (!(other instanceof Season)) return

    this.details.merge(other.details)
    // Season numbers <= 0 mean "unknown"
    if (this.number <= 0 && other.number > 0) this.number = other.number
    if (!this.title) this.title = other.title
    if (!this.overview) this.overview = other.overview
    if (!this.seriesId) this.seriesId = other.seriesId
    if (!this.seriesName) this.seriesName = other.seriesName
    mergeCredits(this.credits, other.credits)
    this.addEpisodeIDs(other.episodeIds)
  }

  toJSON(): SeasonData {
    return {
      details: this.details.toJSON(),
      number: this.number,
      title: this.title,
      overview: this.overview,
      episodeIds: [...this.episodeIds],
      episodeCount: this.episodeCount,
      seriesId: this.seriesId,
      seriesName: this.seriesName,
      credits: cloneCredits(this.credits),
    }
  }
}

// ============================================================================
// EPISODE
// ============================================================================

export class Episode extends BaseMediaData {
  readonly mediaType = 'episode' as const
  number: number
  seasonNumber: number
  seasonId: string
  seriesId: string
  seriesTitle: string
  credits: Credit[]

  constructor(init: VariantInit<EpisodeData> = {}) {
    super(init.details)
    this.number = init.number ?? 0
    this.seasonNumber = init.seasonNumber ?? 0
    this.seasonId = init.seasonId ?? ''
    this.seriesId = init.seriesId ?? ''
    this.seriesTitle = init.seriesTitle ?? ''
    this.credits = cloneCredits(init.credits)
  }

  merge(other: MediaData): void {
    if (!(other instanceof Episode)) return

    this.details.merge(other.details)
    if (this.number <= 0 && other.number > 0) this.number = other.number
    if (this.seasonNumber <= 0 && other.seasonNumber > 0) this.seasonNumber = other.seasonNumber
    if (!this.seasonId) this.seasonId = other.seasonId
    if (!this.seriesId) this.seriesId = other.seriesId
    if (!this.seriesTitle) this.seriesTitle = other.seriesTitle
    mergeCredits(this.credits, other.credits)
  }

  toJSON(): EpisodeData {
    return {
      details: this.details.toJSON(),
      number: this.number,
      seasonNumber: this.seasonNumber,
      seasonId: this.seasonId,
      seriesId: this.seriesId,
      seriesTitle: this.seriesTitle,
      credits: cloneCredits(this.credits),
    }
  }
}
