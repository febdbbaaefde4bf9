// Plex Media Server API shapes

import { z } from 'zod'
import { LooseNumberSchema, OptionalRawIdSchema, RawIdSchema } from './common'

export const PlexGuidSchema = z.object({
  id: z.string(),
})

export const PlexTagSchema = z.object({
  tag: z.string(),
})

export const PlexRoleSchema = z.object({
  tag: z.string(),
  role: z.string().optional(),
})

export const PlexPartSchema = z.object({
  key: z.string().optional(),
  file: z.string().optional(),
})

export const PlexMediaSchema = z.object({
  videoResolution: z.string().optional(),
  videoCodec: z.string().optional(),
  audioCodec: z.string().optional(),
  Part: z.array(PlexPartSchema).default([]),
})

/**
 * One entry of `MediaContainer.Metadata`. Plex uses the same object for
 * every library type; which fields are present depends on `type`.
 */
export const PlexMetadataSchema = z.object({
  ratingKey: RawIdSchema,
  key: z.string().optional(),
  guid: z.string().optional(),
  type: z.string().optional(),
  title: z.string().default(''),
  summary: z.string().default(''),
  tagline: z.string().optional(),
  studio: z.string().optional(),
  contentRating: z.string().optional(),
  rating: LooseNumberSchema,
  audienceRating: LooseNumberSchema,
  userRating: LooseNumberSchema,
  year: LooseNumberSchema,
  originallyAvailableAt: z.string().optional(),
  addedAt: z.number().optional(), // unix seconds
  updatedAt: z.number().optional(), // unix seconds
  duration: z.number().optional(), // milliseconds
  thumb: z.string().optional(),
  art: z.string().optional(),
  banner: z.string().optional(),
  composite: z.string().optional(),

  // Hierarchy (season/episode/album/track)
  index: z.number().optional(),
  parentIndex: z.number().optional(),
  parentRatingKey: OptionalRawIdSchema,
  grandparentRatingKey: OptionalRawIdSchema,
  parentTitle: z.string().optional(),
  grandparentTitle: z.string().optional(),
  originalTitle: z.string().optional(),
  leafCount: z.number().optional(),
  librarySectionID: OptionalRawIdSchema,
  childCount: z.number().optional(),

  // Playlists
  playlistType: z.string().optional(),
  smart: z.boolean().optional(),

  Guid: z.array(PlexGuidSchema).default([]),
  Genre: z.array(PlexTagSchema).default([]),
  Label: z.array(PlexTagSchema).default([]),
  Role: z.array(PlexRoleSchema).default([]),
  Director: z.array(PlexTagSchema).default([]),
  Writer: z.array(PlexTagSchema).default([]),
  Similar: z.array(PlexTagSchema).default([]),
  Media: z.array(PlexMediaSchema).default([]),
})

/**
 * Response envelope. Entries stay unvalidated here so one malformed item
 * does not fail the whole page.
 */
export const PlexContainerSchema = z.object({
  MediaContainer: z.object({
    size: z.number().optional(),
    totalSize: z.number().optional(),
    friendlyName: z.string().optional(),
    machineIdentifier: z.string().optional(),
    version: z.string().optional(),
    Metadata: z.array(z.unknown()).default([]),
    Directory: z.array(z.unknown()).default([]),
  }),
})

export const PlexLibrarySectionSchema = z.object({
  key: RawIdSchema,
  title: z.string().default(''),
  type: z.string(),
})

// Just the key of a list entry
export const PlexEntryKeySchema = z.object({
  ratingKey: RawIdSchema,
})

export type PlexGuid = z.infer<typeof PlexGuidSchema>
export type PlexMetadata = z.infer<typeof PlexMetadataSchema>
export type PlexContainer = z.infer<typeof PlexContainerSchema>
export type PlexLibrarySection = z.infer<typeof PlexLibrarySectionSchema>

// Plex's numeric library types, as used by /library/all?type=N
export const PLEX_TYPE_IDS = {
  movie: 1,
  show: 2,
  season: 3,
  episode: 4,
  artist: 8,
  album: 9,
  track: 10,
} as const

export type PlexLibraryType = keyof typeof PLEX_TYPE_IDS
