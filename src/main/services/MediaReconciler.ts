/**
 * MediaReconciler
 *
 * Decides whether an item fetched from a media server is one the store
 * already knows. Lookup order:
 * 1. the server's own key for the item (same client, same type)
 * 2. a shared external ID of the same type (tmdb, imdb, tvdb, musicbrainz)
 *
 * A match is merged into the stored item; otherwise the item is stored fresh.
 * The whole lookup-merge-save sequence is synchronous, so two reconciles
 * never interleave.
 */

import type { MediaItem } from '../media/MediaItem'
import type { MediaItemRepository } from './database/MediaItemRepository'

export type ReconcileStatus = 'added' | 'merged'

export interface ReconcileResult {
  item: MediaItem
  status: ReconcileStatus
}

// External ID sources trusted to identify the same work across servers
export const MATCHING_ID_SOURCES = ['tmdb', 'imdb', 'tvdb', 'musicbrainz'] as const

export class MediaReconciler {
  constructor(private readonly repository: MediaItemRepository) {}

  /**
   * Stored item that `incoming` refers to, or null when it is new.
   */
  findMatch(incoming: MediaItem): MediaItem | null {
    for (const client of incoming.syncClients.toArray()) {
      if (!client.itemId) continue
      const match = this.repository.findByClientItemID(client.clientId, client.itemId, incoming.type)
      if (match) return match
    }

    for (const source of MATCHING_ID_SOURCES) {
      const id = incoming.getExternalID(source)
      if (!id) continue
      const match = this.repository.findByExternalID(incoming.type, source, id)
      if (match) return match
    }

    return null
  }

  reconcile(incoming: MediaItem, now: Date = new Date()): ReconcileResult {
    for (const client of incoming.syncClients.toArray()) {
      incoming.syncClients.updateSyncStatus(client.clientId, 'success', now)
    }

    const existing = this.findMatch(incoming)
    if (!existing) {
      this.repository.insert(incoming)
      return { item: incoming, status: 'added' }
    }

    mergeMediaItems(existing, incoming)
    this.repository.update(existing)
    return { item: existing, status: 'merged' }
  }
}

/**
 * Fold `incoming` into `existing`: payload merge, identity maps unioned,
 * envelope scalars fill gaps. The stored item keeps its ID and UUID.
 */
export function mergeMediaItems(existing: MediaItem, incoming: MediaItem): void {
  existing.data.merge(incoming.data)
  existing.syncClients.merge(incoming.syncClients)
  existing.externalIds.merge(incoming.externalIds)
  // Keep the item-level ID list in step with the payload's
  existing.externalIds.merge(existing.data.getDetails().externalIds)

  if (!existing.streamUrl) existing.streamUrl = incoming.streamUrl
  if (!existing.downloadUrl) existing.downloadUrl = incoming.downloadUrl
  if (!existing.ownerId) existing.ownerId = incoming.ownerId
  existing.syncDenormalizedFields()
}
