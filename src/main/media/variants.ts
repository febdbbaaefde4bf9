/**
 * Media type tag -> payload class table
 */

import type { MediaData } from './MediaDetails'
import type { MediaType } from './schemas'
import { Episode, Movie, Season, Series } from './video'
import { Album, Artist, Track } from './music'
import { Collection, Playlist } from './lists'

export interface MediaDataByType {
  movie: Movie
  series: Series
  season: Season
  episode: Episode
  artist: Artist
  album: Album
  track: Track
  playlist: Playlist
  collection: Collection
}

export type ConcreteMediaType = keyof MediaDataByType

export const mediaDataClasses = {
  movie: Movie,
  series: Series,
  season: Season,
  episode: Episode,
  artist: Artist,
  album: Album,
  track: Track,
  playlist: Playlist,
  collection: Collection,
} as const

export function isConcreteMediaType(type: MediaType): type is ConcreteMediaType {
  return type !== 'unknown'
}

/**
 * Narrow a payload to the variant for `type`. Checks the payload's own tag
 * before its class.
 */
export function isMediaDataOfType<K extends ConcreteMediaType>(
  data: MediaData,
  type: K
): data is MediaDataByType[K] {
  return data.mediaType === type && data instanceof mediaDataClasses[type]
}
