/**
 * Media Model Schemas
 *
 * Zod schemas for every persisted shape of the media model. The plain data
 * types used by the model classes are inferred from these, so the stored JSON
 * and the in-memory model cannot drift apart.
 */

import { z } from 'zod'

// ============================================================================
// ENUMS
// ============================================================================

export const MediaTypeSchema = z.enum([
  'movie',
  'series',
  'season',
  'episode',
  'artist',
  'album',
  'track',
  'playlist',
  'collection',
  'unknown',
])

export const ClientTypeSchema = z.enum(['plex', 'jellyfin', 'emby', 'subsonic'])

export const SyncStatusSchema = z.enum(['success', 'failed', 'pending', 'unknown'])

export const ChangeTypeSchema = z.enum(['add', 'remove', 'update', 'reorder', 'sync'])

export type MediaType = z.infer<typeof MediaTypeSchema>
export type ClientType = z.infer<typeof ClientTypeSchema>
export type SyncStatus = z.infer<typeof SyncStatusSchema>
export type ChangeType = z.infer<typeof ChangeTypeSchema>

// Internal database IDs (items, users, clients)
const IdSchema = z.number().int().nonnegative()
const OptionalDateSchema = z.coerce.date().optional()

// ============================================================================
// IDENTITY
// ============================================================================

export const ExternalIDSchema = z.object({
  source: z.string(),
  id: z.string(),
})

export const RatingSchema = z.object({
  source: z.string(),
  value: z.number().default(0),
  votes: z.number().int().default(0),
})

export const SyncClientSchema = z.object({
  clientId: IdSchema,
  clientType: ClientTypeSchema,
  itemId: z.string(),
  lastSynced: OptionalDateSchema,
  syncStatus: SyncStatusSchema.default('unknown'),
})

export type ExternalID = z.infer<typeof ExternalIDSchema>
export type Rating = z.infer<typeof RatingSchema>
export type SyncClient = z.infer<typeof SyncClientSchema>

// ============================================================================
// DETAILS
// ============================================================================

export const ArtworkSchema = z.object({
  poster: z.string().default(''),
  background: z.string().default(''),
  banner: z.string().default(''),
  thumbnail: z.string().default(''),
  logo: z.string().default(''),
})

export const CreditSchema = z.object({
  name: z.string(),
  role: z.string().default(''),
  character: z.string().default(''),
  department: z.string().default(''),
})

export const MediaDetailsSchema = z.object({
  title: z.string().default(''),
  description: z.string().default(''),
  releaseDate: OptionalDateSchema,
  releaseYear: z.number().int().default(0),
  addedAt: OptionalDateSchema,
  updatedAt: OptionalDateSchema,
  genres: z.array(z.string()).default([]),
  tags: z.array(z.string()).default([]),
  studios: z.array(z.string()).default([]),
  contentRating: z.string().default(''),
  language: z.string().default(''),
  externalIds: z.array(ExternalIDSchema).default([]),
  ratings: z.array(RatingSchema).default([]),
  userRating: z.number().default(0),
  artwork: ArtworkSchema.default({}),
  duration: z.number().default(0),
  isFavorite: z.boolean().default(false),
})

export type Artwork = z.infer<typeof ArtworkSchema>
export type Credit = z.infer<typeof CreditSchema>
export type MediaDetailsData = z.infer<typeof MediaDetailsSchema>

// ============================================================================
// VIDEO
// ============================================================================

export const MovieSchema = z.object({
  details: MediaDetailsSchema.default({}),
  credits: z.array(CreditSchema).default([]),
  trailerUrl: z.string().default(''),
  resolution: z.string().default(''),
  videoCodec: z.string().default(''),
  audioCodec: z.string().default(''),
  subtitleUrls: z.array(z.string()).default([]),
})

export const SeasonEntrySchema = z.object({
  seasonNumber: z.number().int(),
  seasonId: IdSchema.default(0),
  episodeIds: z.array(IdSchema).default([]),
})

export const SeriesSchema = z.object({
  details: MediaDetailsSchema.default({}),
  seasons: z.array(SeasonEntrySchema).default([]),
  episodeCount: z.number().int().default(0),
  seasonCount: z.number().int().default(0),
  releaseYear: z.number().int().default(0),
  contentRating: z.string().default(''),
  rating: z.number().default(0),
  network: z.string().default(''),
  status: z.string().default(''),
  genres: z.array(z.string()).default([]),
  credits: z.array(CreditSchema).default([]),
})

export const SeasonSchema = z.object({
  details: MediaDetailsSchema.default({}),
  number: z.number().int().default(0),
  title: z.string().default(''),
  overview: z.string().default(''),
  episodeIds: z.array(IdSchema).default([]),
  episodeCount: z.number().int().default(0),
  seriesId: z.string().default(''),
  seriesName: z.string().default(''),
  credits: z.array(CreditSchema).default([]),
})

export const EpisodeSchema = z.object({
  details: MediaDetailsSchema.default({}),
  number: z.number().int().default(0),
  seasonNumber: z.number().int().default(0),
  seasonId: z.string().default(''),
  seriesId: z.string().default(''),
  seriesTitle: z.string().default(''),
  credits: z.array(CreditSchema).default([]),
})

export type MovieData = z.infer<typeof MovieSchema>
export type SeasonEntry = z.infer<typeof SeasonEntrySchema>
export type SeriesData = z.infer<typeof SeriesSchema>
export type SeasonData = z.infer<typeof SeasonSchema>
export type EpisodeData = z.infer<typeof EpisodeSchema>

// ============================================================================
// MUSIC
// ============================================================================

export const AlbumEntrySchema = z.object({
  albumId: IdSchema,
  albumName: z.string().default(''),
  trackIds: z.array(IdSchema).default([]),
})

export const ArtistSchema = z.object({
  details: MediaDetailsSchema.default({}),
  albums: z.array(AlbumEntrySchema).default([]),
  albumCount: z.number().int().default(0),
  trackCount: z.number().int().default(0),
  biography: z.string().default(''),
  genres: z.array(z.string()).default([]),
  similarArtists: z.array(z.string()).default([]),
  startYear: z.number().int().default(0),
  endYear: z.number().int().default(0),
  rating: z.number().default(0),
  credits: z.array(CreditSchema).default([]),
})

export const AlbumSchema = z.object({
  details: MediaDetailsSchema.default({}),
  artistId: z.string().default(''),
  artistName: z.string().default(''),
  trackCount: z.number().int().default(0),
  trackIds: z.array(IdSchema).default([]),
  credits: z.array(CreditSchema).default([]),
})

export const TrackSchema = z.object({
  details: MediaDetailsSchema.default({}),
  number: z.number().int().default(0),
  discNumber: z.number().int().default(0),
  albumId: z.string().default(''),
  albumName: z.string().default(''),
  artistId: z.string().default(''),
  artistName: z.string().default(''),
  composer: z.string().default(''),
  lyrics: z.string().default(''),
  credits: z.array(CreditSchema).default([]),
})

export type AlbumEntry = z.infer<typeof AlbumEntrySchema>
export type ArtistData = z.infer<typeof ArtistSchema>
export type AlbumData = z.infer<typeof AlbumSchema>
export type TrackData = z.infer<typeof TrackSchema>

// ============================================================================
// LISTS
// ============================================================================

export const ChangeRecordSchema = z.object({
  clientId: IdSchema,
  itemId: z.string(),
  changeType: ChangeTypeSchema,
  timestamp: z.coerce.date(),
})

export const ListItemSchema = z.object({
  itemId: IdSchema,
  position: z.number().int().nonnegative(),
  lastChanged: z.coerce.date(),
  changeHistory: z.array(ChangeRecordSchema).default([]),
})

export const SyncListItemSchema = z.object({
  itemId: z.string(),
  position: z.number().int().nonnegative(),
  lastChanged: OptionalDateSchema,
  changeHistory: z.array(ChangeRecordSchema).default([]),
})

export const ListSyncStateSchema = z.object({
  clientId: IdSchema,
  clientListId: z.string().default(''),
  items: z.array(SyncListItemSchema).default([]),
  lastSynced: OptionalDateSchema,
})

export const SmartCriteriaSchema = z.record(z.union([z.string(), z.number(), z.boolean()]))

export const ItemListSchema = z.object({
  details: MediaDetailsSchema.default({}),
  items: z.array(ListItemSchema).default([]),
  itemCount: z.number().int().default(0),
  ownerId: IdSchema.default(0),
  originClientId: IdSchema.default(0),
  isPublic: z.boolean().default(false),
  sharedWith: z.array(IdSchema).default([]),
  lastSynced: OptionalDateSchema,
  lastModified: OptionalDateSchema,
  modifiedBy: IdSchema.default(0),
  isSmart: z.boolean().default(false),
  smartCriteria: SmartCriteriaSchema.default({}),
  autoUpdateTime: OptionalDateSchema,
  syncStates: z.array(ListSyncStateSchema).default([]),
})

export type ChangeRecord = z.infer<typeof ChangeRecordSchema>
export type ListItem = z.infer<typeof ListItemSchema>
export type SyncListItem = z.infer<typeof SyncListItemSchema>
export type ListSyncStateData = z.infer<typeof ListSyncStateSchema>
export type SmartCriteria = z.infer<typeof SmartCriteriaSchema>
export type ItemListData = z.infer<typeof ItemListSchema>

// ============================================================================
// ENVELOPE
// ============================================================================

/**
 * Stored envelope. `data` stays opaque here and is decoded in a second pass
 * by the codec the caller selects for the payload type.
 */
export const MediaItemEnvelopeSchema = z.object({
  id: IdSchema.default(0),
  uuid: z.string().uuid(),
  type: MediaTypeSchema,
  ownerId: IdSchema.default(0),
  title: z.string().default(''),
  releaseDate: OptionalDateSchema,
  releaseYear: z.number().int().default(0),
  streamUrl: z.string().default(''),
  downloadUrl: z.string().default(''),
  createdAt: OptionalDateSchema,
  updatedAt: OptionalDateSchema,
  syncClients: z.array(SyncClientSchema).default([]),
  externalIds: z.array(ExternalIDSchema).default([]),
  data: z.unknown(),
})

export type MediaItemEnvelope = z.infer<typeof MediaItemEnvelopeSchema>
