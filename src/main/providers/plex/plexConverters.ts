/**
 * Plex converters
 *
 * Turn `MediaContainer.Metadata` entries into media payloads. Every payload
 * carries the entry's ratingKey under the "plex" external ID source, which is
 * the key the item is tracked by on this server.
 */

import { MediaDetails } from '../../media/MediaDetails'
import { Episode, Movie, Season, Series } from '../../media/video'
import { Album, Artist, Track } from '../../media/music'
import { Collection, Playlist } from '../../media/lists'
import type { Credit, ExternalID, Rating } from '../../media/schemas'
import { PlexMetadataSchema, type PlexMetadata } from '../../types/plex'
import type { ConversionContext, ConversionRegistry } from '../base/ConversionRegistry'
import {
  cleanStrings,
  makeCredit,
  millisecondsToSeconds,
  normalizeAudioCodec,
  normalizeResolutionLabel,
  normalizeVideoCodec,
  parseAgentGuid,
  parseDate,
  releaseYearOf,
  unixSecondsToDate,
} from '../utils/ProviderUtils'

// ============================================================================
// SHARED FIELDS
// ============================================================================

function artworkUrl(ctx: ConversionContext, path: string | undefined): string {
  if (!path) return ''
  return path.startsWith('/') ? `${ctx.baseUrl}${path}` : path
}

function plexExternalIds(ctx: ConversionContext, raw: PlexMetadata): ExternalID[] {
  const ids: ExternalID[] = [{ source: ctx.clientType, id: raw.ratingKey }]
  const guids = [...raw.Guid.map((g) => g.id), ...(raw.guid ? [raw.guid] : [])]
  for (const guid of guids) {
    const parsed = parseAgentGuid(guid)
    if (parsed) ids.push(parsed)
  }
  return ids
}

function plexRatings(raw: PlexMetadata): Rating[] {
  const ratings: Rating[] = []
  if (raw.rating) ratings.push({ source: 'plex', value: raw.rating, votes: 0 })
  if (raw.audienceRating) ratings.push({ source: 'plex_audience', value: raw.audienceRating, votes: 0 })
  return ratings
}

export function plexDetails(ctx: ConversionContext, raw: PlexMetadata): MediaDetails {
  const releaseDate = parseDate(raw.originallyAvailableAt)
  return new MediaDetails({
    title: raw.title,
    description: raw.summary,
    releaseDate,
    releaseYear: releaseYearOf(raw.year, releaseDate),
    addedAt: unixSecondsToDate(raw.addedAt),
    updatedAt: unixSecondsToDate(raw.updatedAt),
    genres: cleanStrings(raw.Genre.map((g) => g.tag)),
    tags: cleanStrings(raw.Label.map((l) => l.tag)),
    studios: cleanStrings([raw.studio]),
    contentRating: raw.contentRating ?? '',
    externalIds: plexExternalIds(ctx, raw),
    ratings: plexRatings(raw),
    userRating: raw.userRating ?? 0,
    artwork: {
      poster: artworkUrl(ctx, raw.thumb ?? raw.composite),
      background: artworkUrl(ctx, raw.art),
      banner: artworkUrl(ctx, raw.banner),
      thumbnail: artworkUrl(ctx, raw.thumb),
      logo: '',
    },
    duration: millisecondsToSeconds(raw.duration),
  })
}

function plexCredits(raw: PlexMetadata): Credit[] {
  return [
    ...raw.Role.map((r) => makeCredit(r.tag, 'actor', r.role ?? '', 'Acting')),
    ...raw.Director.map((d) => makeCredit(d.tag, 'director', '', 'Directing')),
    ...raw.Writer.map((w) => makeCredit(w.tag, 'writer', '', 'Writing')),
  ]
}

// ============================================================================
// CONVERTERS
// ============================================================================

export function convertPlexMovie(ctx: ConversionContext, raw: PlexMetadata): Movie {
  const media = raw.Media[0]
  return new Movie({
    details: plexDetails(ctx, raw),
    credits: plexCredits(raw),
    resolution: normalizeResolutionLabel(media?.videoResolution),
    videoCodec: normalizeVideoCodec(media?.videoCodec),
    audioCodec: normalizeAudioCodec(media?.audioCodec),
  })
}

export function convertPlexShow(ctx: ConversionContext, raw: PlexMetadata): Series {
  const details = plexDetails(ctx, raw)
  return new Series({
    details,
    releaseYear: details.releaseYear,
    contentRating: details.contentRating,
    rating: raw.audienceRating ?? raw.rating ?? 0,
    network: raw.studio ?? '',
    genres: details.genres,
    credits: plexCredits(raw),
  })
}

export function convertPlexSeason(ctx: ConversionContext, raw: PlexMetadata): Season {
  return new Season({
    details: plexDetails(ctx, raw),
    number: raw.index ?? 0,
    title: raw.title,
    overview: raw.summary,
    seriesId: raw.parentRatingKey ?? '',
    seriesName: raw.parentTitle ?? '',
  })
}

export function convertPlexEpisode(ctx: ConversionContext, raw: PlexMetadata): Episode {
  return new Episode({
    details: plexDetails(ctx, raw),
    number: raw.index ?? 0,
    seasonNumber: raw.parentIndex ?? 0,
    seasonId: raw.parentRatingKey ?? '',
    seriesId: raw.grandparentRatingKey ?? '',
    seriesTitle: raw.grandparentTitle ?? '',
    credits: plexCredits(raw),
  })
}

export function convertPlexArtist(ctx: ConversionContext, raw: PlexMetadata): Artist {
  const details = plexDetails(ctx, raw)
  return new Artist({
    details,
    biography: raw.summary,
    genres: details.genres,
    similarArtists: cleanStrings(raw.Similar.map((s) => s.tag)),
    rating: raw.rating ?? 0,
  })
}

export function convertPlexAlbum(ctx: ConversionContext, raw: PlexMetadata): Album {
  return new Album({
    details: plexDetails(ctx, raw),
    artistId: raw.parentRatingKey ?? '',
    artistName: raw.parentTitle ?? '',
    trackCount: raw.leafCount ?? 0,
  })
}

export function convertPlexTrack(ctx: ConversionContext, raw: PlexMetadata): Track {
  return new Track({
    details: plexDetails(ctx, raw),
    number: raw.index ?? 0,
    discNumber: raw.parentIndex ?? 0,
    albumId: raw.parentRatingKey ?? '',
    albumName: raw.parentTitle ?? '',
    artistId: raw.grandparentRatingKey ?? '',
    // Track-level artist differs from the album artist on compilations
    artistName: raw.originalTitle ?? raw.grandparentTitle ?? '',
  })
}

export function convertPlexPlaylist(ctx: ConversionContext, raw: PlexMetadata): Playlist {
  return new Playlist({
    details: plexDetails(ctx, raw),
    originClientId: ctx.clientId,
    isSmart: raw.smart ?? false,
  })
}

export function convertPlexCollection(ctx: ConversionContext, raw: PlexMetadata): Collection {
  return new Collection({
    details: plexDetails(ctx, raw),
    originClientId: ctx.clientId,
    isSmart: raw.smart ?? false,
  })
}

export function registerPlexConverters(registry: ConversionRegistry): ConversionRegistry {
  return registry
    .register('plex', 'movie', 'movie', PlexMetadataSchema, convertPlexMovie)
    .register('plex', 'show', 'series', PlexMetadataSchema, convertPlexShow)
    .register('plex', 'season', 'season', PlexMetadataSchema, convertPlexSeason)
    .register('plex', 'episode', 'episode', PlexMetadataSchema, convertPlexEpisode)
    .register('plex', 'artist', 'artist', PlexMetadataSchema, convertPlexArtist)
    .register('plex', 'album', 'album', PlexMetadataSchema, convertPlexAlbum)
    .register('plex', 'track', 'track', PlexMetadataSchema, convertPlexTrack)
    .register('plex', 'playlist', 'playlist', PlexMetadataSchema, convertPlexPlaylist)
    .register('plex', 'collection', 'collection', PlexMetadataSchema, convertPlexCollection)
}
