/**
 * MediaItem
 *
 * Envelope around a media payload: internal ID, stable UUID, type tag, the
 * identity maps and a few denormalized fields for querying.
 *
 * `createMediaItem` is the only place a media item UUID is minted. Items
 * read back from storage keep the UUID they were stored with.
 */

import { v4 as uuidv4 } from 'uuid'
import { ExternalIDs, SyncClients } from './identity'
import type { MediaData } from './MediaDetails'
import type { Collection, Playlist } from './lists'
import type { Album, Artist, Track } from './music'
import type { Episode, Movie, Season, Series } from './video'
import {
  MediaItemEnvelopeSchema,
  type ClientType,
  type ExternalID,
  type MediaItemEnvelope,
  type MediaType,
  type SyncClient,
} from './schemas'
import { mediaDataCodecs, type MediaDataCodec } from './codecs'
import { isConcreteMediaType, isMediaDataOfType, type ConcreteMediaType, type MediaDataByType } from './variants'

export interface MediaItemInit<T extends MediaData> {
  uuid: string
  type: MediaType
  data: T
  id?: number
  ownerId?: number
  title?: string
  releaseDate?: Date
  releaseYear?: number
  streamUrl?: string
  downloadUrl?: string
  createdAt?: Date
  updatedAt?: Date
  syncClients?: readonly SyncClient[]
  externalIds?: readonly ExternalID[]
}

export class MediaItem<T extends MediaData = MediaData> {
  id: number
  readonly uuid: string
  type: MediaType
  ownerId: number // 0 = system owned
  title: string
  releaseDate?: Date
  releaseYear: number
  streamUrl: string
  downloadUrl: string
  createdAt?: Date
  updatedAt?: Date
  syncClients: SyncClients
  externalIds: ExternalIDs
  data: T

  constructor(init: MediaItemInit<T>) {
    this.id = init.id ?? 0
    this.uuid = init.uuid
    this.type = init.type
    this.ownerId = init.ownerId ?? 0
    this.title = init.title ?? ''
    this.releaseDate = init.releaseDate
    this.releaseYear = init.releaseYear ?? 0
    this.streamUrl = init.streamUrl ?? ''
    this.downloadUrl = init.downloadUrl ?? ''
    this.createdAt = init.createdAt
    this.updatedAt = init.updatedAt
    this.syncClients = new SyncClients(init.syncClients)
    this.externalIds = new ExternalIDs(init.externalIds)
    this.data = init.data
  }

  /**
   * Record the key this item has on a media server. Upserts on the
   * (clientId, clientType) pair.
   */
  setClientInfo(clientId: number, clientType: ClientType, itemKey: string): void {
    this.syncClients.setClientInfo(clientId, clientType, itemKey)
  }

  getClientItemID(clientId: number): string {
    return this.syncClients.getClientItemID(clientId)
  }

  /** No-op for an empty ID. */
  addExternalID(source: string, id: string): void {
    if (id === '') return
    this.externalIds.addOrUpdate(source, id)
  }

  getExternalID(source: string): string {
    return this.externalIds.getID(source)
  }

  /** Copy title and release info from the payload's details. */
  syncDenormalizedFields(): void {
    const details = this.data.getDetails()
    if (details.title) this.title = details.title
    if (details.releaseDate) this.releaseDate = details.releaseDate
    if (details.releaseYear) this.releaseYear = details.releaseYear
  }

  isType<K extends ConcreteMediaType>(type: K): boolean {
    return isMediaItemOfType(this, type)
  }

  asMovie(): MediaItem<Movie> | null {
    return isMediaItemOfType(this, 'movie') ? this : null
  }

  asSeries(): MediaItem<Series> | null {
    return isMediaItemOfType(this, 'series') ? this : null
  }

  asSeason(): MediaItem<Season> | null {
    return isMediaItemOfType(this, 'season') ? this : null
  }

  asEpisode(): MediaItem<Episode> | null {
    return isMediaItemOfType(this, 'episode') ? this : null
  }

  asArtist(): MediaItem<Artist> | null {
    return isMediaItemOfType(this, 'artist') ? this : null
  }

  asAlbum(): MediaItem<Album> | null {
    return isMediaItemOfType(this, 'album') ? this : null
  }

  asTrack(): MediaItem<Track> | null {
    return isMediaItemOfType(this, 'track') ? this : null
  }

  asPlaylist(): MediaItem<Playlist> | null {
    return isMediaItemOfType(this, 'playlist') ? this : null
  }

  asCollection(): MediaItem<Collection> | null {
    return isMediaItemOfType(this, 'collection') ? this : null
  }

  isPlaylist(): boolean {
    return isMediaItemOfType(this, 'playlist')
  }

  isCollection(): boolean {
    return isMediaItemOfType(this, 'collection')
  }

  isList(): boolean {
    return this.isPlaylist() || this.isCollection()
  }

  toJSON(): Record<string, unknown> {
    return {
      id: this.id,
      uuid: this.uuid,
      type: this.type,
      ownerId: this.ownerId,
      title: this.title,
      releaseDate: this.releaseDate,
      releaseYear: this.releaseYear,
      streamUrl: this.streamUrl,
      downloadUrl: this.downloadUrl,
      createdAt: this.createdAt,
      updatedAt: this.updatedAt,
      syncClients: this.syncClients.toJSON(),
      externalIds: this.externalIds.toJSON(),
      data: this.data.toJSON(),
    }
  }
}

// ============================================================================
// CREATION & NARROWING
// ============================================================================

/**
 * Wrap a freshly converted payload. Mints a new UUID and starts with empty
 * identity maps; title and release info are copied from the payload.
 */
export function createMediaItem<K extends ConcreteMediaType>(
  type: K,
  data: MediaDataByType[K]
): MediaItem<MediaDataByType[K]> {
  const item = new MediaItem({ uuid: uuidv4(), type, data })
  item.syncDenormalizedFields()
  return item
}

/** Tag first, then the payload's class. */
export function isMediaItemOfType<K extends ConcreteMediaType>(
  item: MediaItem,
  type: K
): item is MediaItem<MediaDataByType[K]> {
  return item.type === type && isMediaDataOfType(item.data, type)
}

// ============================================================================
// SERIALIZATION
// ============================================================================

export class MediaItemDecodeError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause })
    this.name = 'MediaItemDecodeError'
  }
}

export function serializeMediaItem(item: MediaItem): string {
  return JSON.stringify(item.toJSON())
}

/**
 * Two-pass decode: the envelope is validated first with the payload left
 * opaque, then the payload is decoded by the codec for the expected type.
 */
export function deserializeMediaItem<T extends MediaData>(blob: string, codec: MediaDataCodec<T>): MediaItem<T> {
  const envelope = parseEnvelope(blob)
  if (envelope.type !== codec.type) {
    throw new MediaItemDecodeError(
      `Stored item ${envelope.uuid} is a ${envelope.type}, expected ${codec.type}`
    )
  }

  let data: T
  try {
    data = codec.decode(envelope.data)
  } catch (error) {
    throw new MediaItemDecodeError(`Invalid ${codec.type} payload for item ${envelope.uuid}`, error)
  }

  return new MediaItem({ ...envelope, data })
}

/** Decode with the codec selected by the stored type tag. */
export function deserializeAnyMediaItem(blob: string): MediaItem {
  const envelope = parseEnvelope(blob)
  const type = envelope.type
  if (!isConcreteMediaType(type)) {
    throw new MediaItemDecodeError(`Stored item ${envelope.uuid} has no concrete media type`)
  }
  return deserializeMediaItem<MediaData>(blob, mediaDataCodecs[type])
}

function parseEnvelope(blob: string): MediaItemEnvelope {
  let raw: unknown
  try {
    raw = JSON.parse(blob)
  } catch (error) {
    throw new MediaItemDecodeError('Stored item is not valid JSON', error)
  }

  const parsed = MediaItemEnvelopeSchema.safeParse(raw)
  if (!parsed.success) {
    throw new MediaItemDecodeError(`Invalid media item envelope: ${parsed.error.message}`, parsed.error)
  }
  return parsed.data
}
