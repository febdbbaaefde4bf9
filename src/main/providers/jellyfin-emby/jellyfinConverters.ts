/**
 * Jellyfin / Emby converters
 *
 * Both servers describe items with the same BaseItemDto shape, so one set of
 * converters is registered for each client type. The item's own Id is stored
 * under the client type's external ID source ("jellyfin" or "emby").
 */

import { MediaDetails } from '../../media/MediaDetails'
import { Episode, Movie, Season, Series } from '../../media/video'
import { Album, Artist, Track } from '../../media/music'
import { Collection, Playlist } from '../../media/lists'
import type { ClientType, Credit, ExternalID, Rating } from '../../media/schemas'
import { JELLYFIN_ITEM_KINDS, JellyfinItemSchema, type JellyfinItem } from '../../types/jellyfin'
import type { ConversionContext, ConversionRegistry } from '../base/ConversionRegistry'
import {
  cleanStrings,
  makeCredit,
  normalizeAudioCodec,
  normalizeResolution,
  normalizeVideoCodec,
  parseDate,
  releaseYearOf,
  ticksToSeconds,
} from '../utils/ProviderUtils'

// ============================================================================
// SHARED FIELDS
// ============================================================================

function imageUrl(ctx: ConversionContext, item: JellyfinItem, imageType: string): string {
  const tag = item.ImageTags[imageType]
  if (!tag) return ''
  return `${ctx.baseUrl}/Items/${item.Id}/Images/${imageType}?tag=${tag}`
}

function backdropUrl(ctx: ConversionContext, item: JellyfinItem): string {
  const tag = item.BackdropImageTags[0]
  if (!tag) return ''
  return `${ctx.baseUrl}/Items/${item.Id}/Images/Backdrop/0?tag=${tag}`
}

/**
 * ProviderIds keyed by lowercased provider name. `musicBrainzKey` names the
 * MusicBrainz entry that identifies this kind of item; it is also stored
 * under plain "musicbrainz".
 */
function jellyfinExternalIds(ctx: ConversionContext, item: JellyfinItem, musicBrainzKey?: string): ExternalID[] {
  const ids: ExternalID[] = [{ source: ctx.clientType, id: item.Id }]
  for (const [provider, value] of Object.entries(item.ProviderIds)) {
    if (!value) continue
    ids.push({ source: provider.toLowerCase(), id: value })
    if (musicBrainzKey && provider === musicBrainzKey) {
      ids.push({ source: 'musicbrainz', id: value })
    }
  }
  return ids
}

function jellyfinRatings(ctx: ConversionContext, item: JellyfinItem): Rating[] {
  const ratings: Rating[] = []
  if (item.CommunityRating) ratings.push({ source: ctx.clientType, value: item.CommunityRating, votes: 0 })
  if (item.CriticRating) ratings.push({ source: 'critic', value: item.CriticRating, votes: 0 })
  return ratings
}

export function jellyfinDetails(ctx: ConversionContext, item: JellyfinItem, musicBrainzKey?: string): MediaDetails {
  const releaseDate = parseDate(item.PremiereDate)
  return new MediaDetails({
    title: item.Name,
    description: item.Overview ?? '',
    releaseDate,
    releaseYear: releaseYearOf(item.ProductionYear, releaseDate),
    addedAt: parseDate(item.DateCreated),
    genres: cleanStrings(item.Genres),
    tags: cleanStrings(item.Tags),
    studios: cleanStrings(item.Studios.map((s) => s.Name)),
    contentRating: item.OfficialRating ?? '',
    language: item.PreferredMetadataLanguage ?? '',
    externalIds: jellyfinExternalIds(ctx, item, musicBrainzKey),
    ratings: jellyfinRatings(ctx, item),
    userRating: item.UserData?.Rating ?? 0,
    isFavorite: item.UserData?.IsFavorite ?? false,
    artwork: {
      poster: imageUrl(ctx, item, 'Primary'),
      background: backdropUrl(ctx, item),
      banner: imageUrl(ctx, item, 'Banner'),
      thumbnail: imageUrl(ctx, item, 'Thumb'),
      logo: imageUrl(ctx, item, 'Logo'),
    },
    duration: ticksToSeconds(item.RunTimeTicks),
  })
}

const PERSON_DEPARTMENTS: Record<string, string> = {
  Actor: 'Acting',
  GuestStar: 'Acting',
  Director: 'Directing',
  Writer: 'Writing',
  Producer: 'Production',
  Composer: 'Sound',
}

function jellyfinCredits(item: JellyfinItem): Credit[] {
  return item.People.map((person) => {
    const type = person.Type ?? ''
    const role = type === 'GuestStar' ? 'actor' : type.toLowerCase()
    const character = role === 'actor' ? person.Role ?? '' : ''
    return makeCredit(person.Name, role, character, PERSON_DEPARTMENTS[type] ?? '')
  })
}

function streamOfType(item: JellyfinItem, type: string) {
  return item.MediaStreams.find((s) => s.Type === type)
}

// ============================================================================
// CONVERTERS
// ============================================================================

export function convertJellyfinMovie(ctx: ConversionContext, item: JellyfinItem): Movie {
  const video = streamOfType(item, 'Video')
  const audio = streamOfType(item, 'Audio')
  const subtitleUrls = item.MediaStreams
    .filter((s) => s.Type === 'Subtitle' && s.IsExternal && s.DeliveryUrl)
    .map((s) => `${ctx.baseUrl}${s.DeliveryUrl ?? ''}`)

  return new Movie({
    details: jellyfinDetails(ctx, item),
    credits: jellyfinCredits(item),
    trailerUrl: item.RemoteTrailers[0]?.Url ?? '',
    resolution: normalizeResolution(video?.Width, video?.Height),
    videoCodec: normalizeVideoCodec(video?.Codec),
    audioCodec: normalizeAudioCodec(audio?.Codec),
    subtitleUrls,
  })
}

export function convertJellyfinSeries(ctx: ConversionContext, item: JellyfinItem): Series {
  const details = jellyfinDetails(ctx, item)
  return new Series({
    details,
    releaseYear: details.releaseYear,
    contentRating: details.contentRating,
    rating: item.CommunityRating ?? 0,
    network: item.Studios[0]?.Name ?? '',
    status: item.Status ?? '',
    genres: details.genres,
    credits: jellyfinCredits(item),
  })
}

export function convertJellyfinSeason(ctx: ConversionContext, item: JellyfinItem): Season {
  return new Season({
    details: jellyfinDetails(ctx, item),
    number: item.IndexNumber ?? 0,
    title: item.Name,
    overview: item.Overview ?? '',
    seriesId: item.SeriesId ?? '',
    seriesName: item.SeriesName ?? '',
  })
}

export function convertJellyfinEpisode(ctx: ConversionContext, item: JellyfinItem): Episode {
  return new Episode({
    details: jellyfinDetails(ctx, item),
    number: item.IndexNumber ?? 0,
    seasonNumber: item.ParentIndexNumber ?? 0,
    seasonId: item.SeasonId ?? '',
    seriesId: item.SeriesId ?? '',
    seriesTitle: item.SeriesName ?? '',
    credits: jellyfinCredits(item),
  })
}

export function convertJellyfinArtist(ctx: ConversionContext, item: JellyfinItem): Artist {
  const details = jellyfinDetails(ctx, item, 'MusicBrainzArtist')
  return new Artist({
    details,
    biography: item.Overview ?? '',
    genres: details.genres,
    startYear: item.ProductionYear ?? 0,
    endYear: parseDate(item.EndDate)?.getUTCFullYear() ?? 0,
    rating: item.CommunityRating ?? 0,
  })
}

export function convertJellyfinAlbum(ctx: ConversionContext, item: JellyfinItem): Album {
  const albumArtist = item.AlbumArtists[0]
  return new Album({
    details: jellyfinDetails(ctx, item, 'MusicBrainzAlbum'),
    artistId: albumArtist?.Id ?? '',
    artistName: item.AlbumArtist ?? albumArtist?.Name ?? '',
    trackCount: item.ChildCount ?? item.SongCount ?? 0,
  })
}

export function convertJellyfinTrack(ctx: ConversionContext, item: JellyfinItem): Track {
  const artist = item.ArtistItems[0]
  const composer = item.People.find((p) => p.Type === 'Composer')
  return new Track({
    details: jellyfinDetails(ctx, item, 'MusicBrainzTrack'),
    number: item.IndexNumber ?? 0,
    discNumber: item.ParentIndexNumber ?? 0,
    albumId: item.AlbumId ?? '',
    albumName: item.Album ?? '',
    artistId: artist?.Id ?? '',
    artistName: artist?.Name ?? item.AlbumArtist ?? '',
    composer: composer?.Name ?? '',
  })
}

export function convertJellyfinPlaylist(ctx: ConversionContext, item: JellyfinItem): Playlist {
  return new Playlist({
    details: jellyfinDetails(ctx, item),
    originClientId: ctx.clientId,
  })
}

export function convertJellyfinBoxSet(ctx: ConversionContext, item: JellyfinItem): Collection {
  return new Collection({
    details: jellyfinDetails(ctx, item),
    originClientId: ctx.clientId,
  })
}

function registerFor(registry: ConversionRegistry, clientType: ClientType): ConversionRegistry {
  const kinds = JELLYFIN_ITEM_KINDS
  return registry
    .register(clientType, kinds.movie, 'movie', JellyfinItemSchema, convertJellyfinMovie)
    .register(clientType, kinds.series, 'series', JellyfinItemSchema, convertJellyfinSeries)
    .register(clientType, kinds.season, 'season', JellyfinItemSchema, convertJellyfinSeason)
    .register(clientType, kinds.episode, 'episode', JellyfinItemSchema, convertJellyfinEpisode)
    .register(clientType, kinds.artist, 'artist', JellyfinItemSchema, convertJellyfinArtist)
    .register(clientType, kinds.album, 'album', JellyfinItemSchema, convertJellyfinAlbum)
    .register(clientType, kinds.track, 'track', JellyfinItemSchema, convertJellyfinTrack)
    .register(clientType, kinds.playlist, 'playlist', JellyfinItemSchema, convertJellyfinPlaylist)
    .register(clientType, kinds.collection, 'collection', JellyfinItemSchema, convertJellyfinBoxSet)
}

export function registerJellyfinEmbyConverters(registry: ConversionRegistry): ConversionRegistry {
  registerFor(registry, 'jellyfin')
  return registerFor(registry, 'emby')
}
