// Jellyfin / Emby API shapes (both servers share the BaseItemDto format)

import { z } from 'zod'
import { LooseNumberSchema, OptionalRawIdSchema, RawIdSchema } from './common'

export const JellyfinNameIdSchema = z.object({
  Name: z.string().default(''),
  Id: OptionalRawIdSchema,
})

export const JellyfinPersonSchema = z.object({
  Name: z.string(),
  Role: z.string().optional(),
  Type: z.string().optional(),
})

export const JellyfinMediaStreamSchema = z.object({
  Type: z.string(),
  Codec: z.string().optional(),
  Height: z.number().optional(),
  Width: z.number().optional(),
  DeliveryUrl: z.string().optional(),
  IsExternal: z.boolean().optional(),
})

export const JellyfinUserDataSchema = z.object({
  IsFavorite: z.boolean().optional(),
  Rating: LooseNumberSchema,
  PlayCount: z.number().optional(),
})

export const JellyfinItemSchema = z.object({
  Id: RawIdSchema,
  Name: z.string().default(''),
  Type: z.string().optional(),
  Overview: z.string().optional(),
  Taglines: z.array(z.string()).default([]),
  ProductionYear: z.number().optional(),
  PremiereDate: z.string().optional(),
  DateCreated: z.string().optional(),
  EndDate: z.string().optional(),
  RunTimeTicks: z.number().optional(), // 100ns ticks
  OfficialRating: z.string().optional(),
  CommunityRating: LooseNumberSchema,
  CriticRating: LooseNumberSchema,
  Genres: z.array(z.string()).default([]),
  Tags: z.array(z.string()).default([]),
  Studios: z.array(JellyfinNameIdSchema).default([]),
  ProviderIds: z.record(z.string().nullable()).default({}),
  People: z.array(JellyfinPersonSchema).default([]),
  ImageTags: z.record(z.string()).default({}),
  BackdropImageTags: z.array(z.string()).default([]),
  UserData: JellyfinUserDataSchema.optional(),
  RemoteTrailers: z.array(z.object({ Url: z.string() })).default([]),
  MediaStreams: z.array(JellyfinMediaStreamSchema).default([]),
  PreferredMetadataLanguage: z.string().optional(),

  // Hierarchy
  IndexNumber: z.number().optional(),
  ParentIndexNumber: z.number().optional(),
  SeriesId: OptionalRawIdSchema,
  SeriesName: z.string().optional(),
  SeasonId: OptionalRawIdSchema,
  ParentId: OptionalRawIdSchema,
  Status: z.string().optional(),
  ChildCount: z.number().optional(),

  // Music
  Album: z.string().optional(),
  AlbumId: OptionalRawIdSchema,
  AlbumArtist: z.string().optional(),
  AlbumArtists: z.array(JellyfinNameIdSchema).default([]),
  ArtistItems: z.array(JellyfinNameIdSchema).default([]),
  SongCount: z.number().optional(),
  AlbumCount: z.number().optional(),

  // Playlists / box sets
  IsFolder: z.boolean().optional(),
  MediaType: z.string().optional(),
})

export const JellyfinItemsResponseSchema = z.object({
  Items: z.array(z.unknown()).default([]),
  TotalRecordCount: z.number().optional(),
  StartIndex: z.number().optional(),
})

export const JellyfinSystemInfoSchema = z.object({
  ServerName: z.string().optional(),
  Version: z.string().optional(),
  Id: z.string().optional(),
})

export const JellyfinCreatedItemSchema = z.object({
  Id: RawIdSchema,
})

export type JellyfinItem = z.infer<typeof JellyfinItemSchema>
export type JellyfinItemsResponse = z.infer<typeof JellyfinItemsResponseSchema>

// Media types the shared converters handle, by BaseItemKind
export const JELLYFIN_ITEM_KINDS = {
  movie: 'Movie',
  series: 'Series',
  season: 'Season',
  episode: 'Episode',
  artist: 'MusicArtist',
  album: 'MusicAlbum',
  track: 'Audio',
  playlist: 'Playlist',
  collection: 'BoxSet',
} as const
