// Subsonic / OpenSubsonic REST API shapes (f=json)

import { z } from 'zod'
import { LooseNumberSchema, OptionalRawIdSchema, RawIdSchema } from './common'

export const SubsonicArtistSchema = z.object({
  id: RawIdSchema,
  name: z.string().default(''),
  coverArt: z.string().optional(),
  artistImageUrl: z.string().optional(),
  albumCount: z.number().optional(),
  starred: z.string().optional(),
  musicBrainzId: z.string().optional(),
})

// "Child" in the Subsonic API: a song entry
export const SubsonicSongSchema = z.object({
  id: RawIdSchema,
  title: z.string().default(''),
  album: z.string().optional(),
  albumId: OptionalRawIdSchema,
  artist: z.string().optional(),
  artistId: OptionalRawIdSchema,
  track: z.number().optional(),
  discNumber: z.number().optional(),
  year: LooseNumberSchema,
  genre: z.string().optional(),
  duration: z.number().optional(), // seconds
  coverArt: z.string().optional(),
  created: z.string().optional(),
  starred: z.string().optional(),
  userRating: z.number().optional(),
  musicBrainzId: z.string().optional(),
  isDir: z.boolean().optional(),
})

export const SubsonicAlbumSchema = z.object({
  id: RawIdSchema,
  name: z.string().default(''),
  artist: z.string().optional(),
  artistId: OptionalRawIdSchema,
  coverArt: z.string().optional(),
  songCount: z.number().optional(),
  duration: z.number().optional(),
  year: LooseNumberSchema,
  genre: z.string().optional(),
  created: z.string().optional(),
  starred: z.string().optional(),
  userRating: z.number().optional(),
  musicBrainzId: z.string().optional(),
  song: z.array(z.unknown()).default([]),
})

export const SubsonicPlaylistSchema = z.object({
  id: RawIdSchema,
  name: z.string().default(''),
  comment: z.string().optional(),
  owner: z.string().optional(),
  public: z.boolean().optional(),
  songCount: z.number().optional(),
  duration: z.number().optional(),
  created: z.string().optional(),
  changed: z.string().optional(),
  coverArt: z.string().optional(),
  entry: z.array(z.unknown()).default([]),
})

export const SubsonicErrorSchema = z.object({
  code: z.number(),
  message: z.string().default(''),
})

/**
 * The `subsonic-response` body. Only the payload keys used here are
 * described; entries stay unvalidated until conversion.
 */
export const SubsonicResponseSchema = z.object({
  'subsonic-response': z.object({
    status: z.enum(['ok', 'failed']),
    version: z.string().optional(),
    error: SubsonicErrorSchema.optional(),
    artists: z
      .object({
        index: z.array(z.object({ artist: z.array(z.unknown()).default([]) })).default([]),
      })
      .optional(),
    albumList2: z.object({ album: z.array(z.unknown()).default([]) }).optional(),
    searchResult3: z.object({ song: z.array(z.unknown()).default([]) }).optional(),
    playlists: z.object({ playlist: z.array(z.unknown()).default([]) }).optional(),
    playlist: z.unknown().optional(),
    song: z.unknown().optional(),
    album: z.unknown().optional(),
    artist: z.unknown().optional(),
  }),
})

export type SubsonicArtist = z.infer<typeof SubsonicArtistSchema>
export type SubsonicSong = z.infer<typeof SubsonicSongSchema>
export type SubsonicAlbum = z.infer<typeof SubsonicAlbumSchema>
export type SubsonicPlaylist = z.infer<typeof SubsonicPlaylistSchema>
export type SubsonicBody = z.infer<typeof SubsonicResponseSchema>['subsonic-response']
