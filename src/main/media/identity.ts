/**
 * Identity Maps
 *
 * Append-or-update ledgers that tie a media entity to identifiers outside the
 * internal store: third-party metadata IDs (tmdb, imdb, musicbrainz...),
 * per-source ratings, and the item key each connected media server uses.
 *
 * Lookups return '' (or 0) when nothing is mapped. Callers treat '' as
 * "no mapping", never as a usable ID. Entries are never removed.
 */

import type { ClientType, ExternalID, Rating, SyncClient, SyncStatus } from './schemas'

// ============================================================================
// EXTERNAL IDS
// ============================================================================

export class ExternalIDs {
  private entries: ExternalID[]

  constructor(entries: readonly ExternalID[] = []) {
    this.entries = []
    for (const entry of entries) {
      this.addOrUpdate(entry.source, entry.id)
    }
  }

  get size(): number {
    return this.entries.length
  }

  getID(source: string): string {
    return this.entries.find((e) => e.source === source)?.id ?? ''
  }

  has(source: string): boolean {
    return this.entries.some((e) => e.source === source)
  }

  addOrUpdate(source: string, id: string): void {
    const existing = this.entries.find((e) => e.source === source)
    if (existing) {
      existing.id = id
      return
    }
    this.entries.push({ source, id })
  }

  /**
   * Upsert every mapped source of `other`. Empty IDs are skipped.
   */
  merge(other: ExternalIDs): void {
    for (const entry of other.entries) {
      if (!entry.id) continue
      this.addOrUpdate(entry.source, entry.id)
    }
  }

  toArray(): ExternalID[] {
    return this.entries.map((e) => ({ ...e }))
  }

  toJSON(): ExternalID[] {
    return this.toArray()
  }
}

// ============================================================================
// RATINGS
// ============================================================================

export class Ratings {
  private entries: Rating[]

  constructor(entries: readonly Rating[] = []) {
    this.entries = []
    for (const entry of entries) {
      this.addOrUpdate(entry.source, entry.value, entry.votes)
    }
  }

  get size(): number {
    return this.entries.length
  }

  getRating(source: string): number {
    return this.entries.find((r) => r.source === source)?.value ?? 0
  }

  getRatingVotes(source: string): number {
    return this.entries.find((r) => r.source === source)?.votes ?? 0
  }

  addOrUpdate(source: string, value: number, votes = 0): void {
    const existing = this.entries.find((r) => r.source === source)
    if (existing) {
      existing.value = value
      existing.votes = votes
      return
    }
    this.entries.push({ source, value, votes })
  }

  // Upsert by source; unrated entries (value 0) are skipped
  merge(other: Ratings): void {
    for (const rating of other.entries) {
      if (rating.value === 0) continue
      this.addOrUpdate(rating.source, rating.value, rating.votes)
    }
  }

  toArray(): Rating[] {
    return this.entries.map((r) => ({ ...r }))
  }

  toJSON(): Rating[] {
    return this.toArray()
  }
}

// ============================================================================
// SYNC CLIENTS
// ============================================================================

/**
 * Which media server knows this entity under which key.
 *
 * `addClient` keys on clientId alone; `setClientInfo` / `merge` key on the
 * (clientId, clientType) pair.
 */
export class SyncClients {
  private entries: SyncClient[]

  constructor(entries: readonly SyncClient[] = []) {
    this.entries = entries.map((e) => ({ ...e }))
  }

  get size(): number {
    return this.entries.length
  }

  getClientItemID(clientId: number): string {
    return this.getByClientID(clientId)?.itemId ?? ''
  }

  getByClientID(clientId: number): SyncClient | undefined {
    return this.entries.find((e) => e.clientId === clientId)
  }

  isClientPresent(clientId: number): boolean {
    return this.entries.some((e) => e.clientId === clientId)
  }

  addClient(clientId: number, clientType: ClientType, itemId: string): void {
    const existing = this.getByClientID(clientId)
    if (existing) {
      existing.clientType = clientType
      existing.itemId = itemId
      return
    }
    this.entries.push({ clientId, clientType, itemId, syncStatus: 'unknown' })
  }

  setClientInfo(clientId: number, clientType: ClientType, itemId: string): void {
    const existing = this.find(clientId, clientType)
    if (existing) {
      existing.itemId = itemId
      return
    }
    this.entries.push({ clientId, clientType, itemId, syncStatus: 'unknown' })
  }

  updateSyncStatus(clientId: number, status: SyncStatus, syncedAt: Date = new Date()): void {
    const existing = this.getByClientID(clientId)
    if (!existing) return
    existing.syncStatus = status
    if (status === 'success') {
      existing.lastSynced = syncedAt
    }
  }

  getSyncStatus(clientId: number): SyncStatus {
    return this.getByClientID(clientId)?.syncStatus ?? 'unknown'
  }

  merge(other: SyncClients): void {
    for (const entry of other.entries) {
      const existing = this.find(entry.clientId, entry.clientType)
      if (!existing) {
        this.entries.push({ ...entry })
        continue
      }
      if (entry.itemId) existing.itemId = entry.itemId
      if (entry.lastSynced && (!existing.lastSynced || entry.lastSynced > existing.lastSynced)) {
        existing.lastSynced = entry.lastSynced
        existing.syncStatus = entry.syncStatus
      }
    }
  }

  toArray(): SyncClient[] {
    return this.entries.map((e) => ({ ...e }))
  }

  toJSON(): SyncClient[] {
    return this.toArray()
  }

  private find(clientId: number, clientType: ClientType): SyncClient | undefined {
    return this.entries.find((e) => e.clientId === clientId && e.clientType === clientType)
  }
}
