/**
 * Payload codecs
 *
 * One codec per media type. Each validates the stored JSON of a payload with
 * its schema and rebuilds the model class from it.
 */

import type { z } from 'zod'
import type { MediaData } from './MediaDetails'
import { Episode, Movie, Season, Series } from './video'
import { Album, Artist, Track } from './music'
import { Collection, Playlist } from './lists'
import {
  AlbumSchema,
  ArtistSchema,
  EpisodeSchema,
  ItemListSchema,
  MovieSchema,
  SeasonSchema,
  SeriesSchema,
  TrackSchema,
  type MediaType,
} from './schemas'
import type { ConcreteMediaType, MediaDataByType } from './variants'

export interface MediaDataCodec<T extends MediaData> {
  readonly type: MediaType
  decode(raw: unknown): T
}

function defineCodec<S extends z.ZodTypeAny, T extends MediaData>(
  type: ConcreteMediaType,
  schema: S,
  build: (data: z.output<S>) => T
): MediaDataCodec<T> {
  return {
    type,
    decode: (raw) => build(schema.parse(raw)),
  }
}

export const movieCodec = defineCodec('movie', MovieSchema, (d) => new Movie(d))
export const seriesCodec = defineCodec('series', SeriesSchema, (d) => new Series(d))
export const seasonCodec = defineCodec('season', SeasonSchema, (d) => new Season(d))
export const episodeCodec = defineCodec('episode', EpisodeSchema, (d) => new Episode(d))
export const artistCodec = defineCodec('artist', ArtistSchema, (d) => new Artist(d))
export const albumCodec = defineCodec('album', AlbumSchema, (d) => new Album(d))
export const trackCodec = defineCodec('track', TrackSchema, (d) => new Track(d))
export const playlistCodec = defineCodec('playlist', ItemListSchema, (d) => new Playlist(d))
export const collectionCodec = defineCodec('collection', ItemListSchema, (d) => new Collection(d))

export const mediaDataCodecs: { [K in ConcreteMediaType]: MediaDataCodec<MediaDataByType[K]> } = {
  movie: movieCodec,
  series: seriesCodec,
  season: seasonCodec,
  episode: episodeCodec,
  artist: artistCodec,
  album: albumCodec,
  track: trackCodec,
  playlist: playlistCodec,
  collection: collectionCodec,
}
