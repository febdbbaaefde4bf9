/**
 * Subsonic converters (artists, albums, songs, playlists)
 */

import { MediaDetails } from '../../media/MediaDetails'
import { Album, Artist, Track } from '../../media/music'
import { Playlist } from '../../media/lists'
import type { ExternalID, MediaDetailsData } from '../../media/schemas'
import {
  SubsonicAlbumSchema,
  SubsonicArtistSchema,
  SubsonicPlaylistSchema,
  SubsonicSongSchema,
  type SubsonicAlbum,
  type SubsonicArtist,
  type SubsonicPlaylist,
  type SubsonicSong,
} from '../../types/subsonic'
import type { ConversionContext, ConversionRegistry } from '../base/ConversionRegistry'
import { cleanStrings, parseDate } from '../utils/ProviderUtils'

function coverArtUrl(ctx: ConversionContext, coverArt: string | undefined): string {
  if (!coverArt) return ''
  return `${ctx.baseUrl}/rest/getCoverArt.view?id=${encodeURIComponent(coverArt)}`
}

function subsonicExternalIds(ctx: ConversionContext, id: string, musicBrainzId: string | undefined): ExternalID[] {
  const ids: ExternalID[] = [{ source: ctx.clientType, id }]
  if (musicBrainzId) ids.push({ source: 'musicbrainz', id: musicBrainzId })
  return ids
}

function subsonicDetails(ctx: ConversionContext, init: Partial<MediaDetailsData>, coverArt: string | undefined): MediaDetails {
  const poster = init.artwork?.poster || coverArtUrl(ctx, coverArt)
  return new MediaDetails({
    ...init,
    artwork: { poster, background: '', banner: '', thumbnail: poster, logo: '' },
  })
}

export function convertSubsonicArtist(ctx: ConversionContext, raw: SubsonicArtist): Artist {
  return new Artist({
    details: subsonicDetails(
      ctx,
      {
        title: raw.name,
        externalIds: subsonicExternalIds(ctx, raw.id, raw.musicBrainzId),
        isFavorite: Boolean(raw.starred),
        artwork: { poster: raw.artistImageUrl ?? '', background: '', banner: '', thumbnail: '', logo: '' },
      },
      raw.coverArt
    ),
  })
}

export function convertSubsonicAlbum(ctx: ConversionContext, raw: SubsonicAlbum): Album {
  return new Album({
    details: subsonicDetails(
      ctx,
      {
        title: raw.name,
        releaseYear: raw.year ?? 0,
        addedAt: parseDate(raw.created),
        genres: cleanStrings([raw.genre]),
        duration: raw.duration ?? 0,
        externalIds: subsonicExternalIds(ctx, raw.id, raw.musicBrainzId),
        userRating: raw.userRating ?? 0,
        isFavorite: Boolean(raw.starred),
      },
      raw.coverArt
    ),
    artistId: raw.artistId ?? '',
    artistName: raw.artist ?? '',
    trackCount: raw.songCount ?? 0,
  })
}

export function convertSubsonicSong(ctx: ConversionContext, raw: SubsonicSong): Track {
  return new Track({
    details: subsonicDetails(
      ctx,
      {
        title: raw.title,
        releaseYear: raw.year ?? 0,
        addedAt: parseDate(raw.created),
        genres: cleanStrings([raw.genre]),
        duration: raw.duration ?? 0,
        externalIds: subsonicExternalIds(ctx, raw.id, raw.musicBrainzId),
        userRating: raw.userRating ?? 0,
        isFavorite: Boolean(raw.starred),
      },
      raw.coverArt
    ),
    number: raw.track ?? 0,
    discNumber: raw.discNumber ?? 0,
    albumId: raw.albumId ?? '',
    albumName: raw.album ?? '',
    artistId: raw.artistId ?? '',
    artistName: raw.artist ?? '',
  })
}

export function convertSubsonicPlaylist(ctx: ConversionContext, raw: SubsonicPlaylist): Playlist {
  return new Playlist({
    details: subsonicDetails(
      ctx,
      {
        title: raw.name,
        description: raw.comment ?? '',
        addedAt: parseDate(raw.created),
        updatedAt: parseDate(raw.changed),
        duration: raw.duration ?? 0,
        externalIds: subsonicExternalIds(ctx, raw.id, undefined),
      },
      raw.coverArt
    ),
    originClientId: ctx.clientId,
    isPublic: raw.public ?? false,
  })
}

export function registerSubsonicConverters(registry: ConversionRegistry): ConversionRegistry {
  return registry
    .register('subsonic', 'artist', 'artist', SubsonicArtistSchema, convertSubsonicArtist)
    .register('subsonic', 'album', 'album', SubsonicAlbumSchema, convertSubsonicAlbum)
    .register('subsonic', 'song', 'track', SubsonicSongSchema, convertSubsonicSong)
    .register('subsonic', 'playlist', 'playlist', SubsonicPlaylistSchema, convertSubsonicPlaylist)
}
