/**
 * Lists: Playlist and Collection
 *
 * Both keep items as a sequence where `items[i].position === i` and
 * `itemCount === items.length` after every mutation. Playlists are ordered
 * and may repeat an item; collections hold each item ID at most once.
 */

import { BaseMediaData, type MediaData, type VariantInit } from './MediaDetails'
import { ListSyncStates, type ListSyncState } from './ListSyncState'
import { mergeUnique } from './mergeUtils'
import type { ChangeType, ItemListData, ListItem, SmartCriteria } from './schemas'

export type ListType = 'playlist' | 'collection'

// Item as handed to addItem; position is optional and clamped to the end
export interface NewListItem {
  itemId: number
  position?: number
  lastChanged?: Date
}

export class ListItemNotFoundError extends Error {
  constructor(readonly itemId: number, readonly position?: number) {
    super(
      position === undefined
        ? `item ${itemId} not found`
        : `item ${itemId} not found at position ${position}`
    )
    this.name = 'ListItemNotFoundError'
  }
}

function cloneListItem(item: ListItem): ListItem {
  return { ...item, changeHistory: item.changeHistory.map((c) => ({ ...c })) }
}

// ============================================================================
// ITEM LIST (shared base)
// ============================================================================

export abstract class ItemList extends BaseMediaData {
  abstract readonly mediaType: ListType
  items: ListItem[]
  itemCount: number
  ownerId: number
  originClientId: number // 0 = internal store
  isPublic: boolean
  sharedWith: number[]
  lastSynced?: Date
  lastModified?: Date
  modifiedBy: number
  isSmart: boolean
  smartCriteria: SmartCriteria
  autoUpdateTime?: Date
  syncStates: ListSyncStates

  constructor(init: VariantInit<ItemListData> = {}) {
    super(init.details)
    this.items = (init.items ?? []).map(cloneListItem)
    this.itemCount = this.items.length
    this.ownerId = init.ownerId ?? 0
    this.originClientId = init.originClientId ?? 0
    this.isPublic = init.isPublic ?? false
    this.sharedWith = [...(init.sharedWith ?? [])]
    this.lastSynced = init.lastSynced
    this.lastModified = init.lastModified
    this.modifiedBy = init.modifiedBy ?? 0
    this.isSmart = init.isSmart ?? false
    this.smartCriteria = { ...init.smartCriteria }
    this.autoUpdateTime = init.autoUpdateTime
    this.syncStates = new ListSyncStates(init.syncStates)
  }

  findItemByID(itemId: number): ListItem | undefined {
    return this.items.find((item) => item.itemId === itemId)
  }

  getItemIDs(): number[] {
    return this.items.map((item) => item.itemId)
  }

  /**
   * Insert at `item.position` when it lies within [0, length], otherwise
   * append. Items at or after the insertion point shift down by one.
   */
  addItem(item: NewListItem, clientId: number): void {
    const now = new Date()
    const position =
      item.position !== undefined && item.position >= 0 && item.position <= this.items.length
        ? item.position
        : this.items.length

    const entry: ListItem = {
      itemId: item.itemId,
      position,
      lastChanged: item.lastChanged ?? now,
      changeHistory: [],
    }
    this.record(entry, clientId, 'add', now)

    this.items.splice(position, 0, entry)
    this.resequence(clientId, now)
    this.touch(clientId, now)
  }

  /** Remove the first entry for `itemId` and close the gap. */
  removeItem(itemId: number, clientId: number): void {
    const index = this.items.findIndex((item) => item.itemId === itemId)
    if (index === -1) {
      throw new ListItemNotFoundError(itemId)
    }
    this.removeAt(index, clientId)
  }

  removeItemAtPosition(itemId: number, position: number, clientId: number): void {
    const item = this.items[position]
    if (!item || item.itemId !== itemId) {
      throw new ListItemNotFoundError(itemId, position)
    }
    this.removeAt(position, clientId)
  }

  /** Sort by position and renumber from 0. */
  normalizePositions(): void {
    this.items.sort((a, b) => a.position - b.position)
    this.items.forEach((item, index) => {
      item.position = index
    })
    this.itemCount = this.items.length
  }

  /** Integrity report; empty when the list is consistent. */
  validateItems(): string[] {
    const issues: string[] = []
    const positions = new Set<number>()

    for (const item of this.items) {
      if (positions.has(item.position)) {
        issues.push(`duplicate position: ${item.position}`)
      }
      positions.add(item.position)
    }
    for (let i = 0; i < this.items.length; i++) {
      if (!positions.has(i)) {
        issues.push(`missing position: ${i}`)
      }
    }
    if (this.itemCount !== this.items.length) {
      issues.push(`itemCount ${this.itemCount} does not match ${this.items.length} items`)
    }
    return issues
  }

  /** Zero-based page of items. */
  getPage(page: number, pageSize: number): ListItem[] {
    if (page < 0 || pageSize <= 0) return []
    const start = page * pageSize
    return this.items.slice(start, start + pageSize)
  }

  /** Visit items in order; returning false from the callback stops early. */
  forEach(callback: (item: ListItem) => boolean | void): void {
    for (const item of this.items) {
      if (callback(item) === false) return
    }
  }

  getListSyncState(clientId: number): ListSyncState | undefined {
    return this.syncStates.getListSyncState(clientId)
  }

  /**
   * Details and list settings fill gaps. Items are left alone: list content
   * is reconciled through sync states, not by merging observations.
   */
  protected mergeList(other: ItemList): void {
    this.details.merge(other.details)
    if (!this.ownerId) this.ownerId = other.ownerId
    if (!this.originClientId) this.originClientId = other.originClientId
    if (!this.isPublic) this.isPublic = other.isPublic
    if (!this.isSmart) this.isSmart = other.isSmart
    if (!this.lastSynced) this.lastSynced = other.lastSynced
    if (!this.autoUpdateTime) this.autoUpdateTime = other.autoUpdateTime
    for (const [key, value] of Object.entries(other.smartCriteria)) {
      if (!(key in this.smartCriteria)) this.smartCriteria[key] = value
    }
    mergeUnique(this.sharedWith, other.sharedWith)
  }

  toJSON(): ItemListData {
    return {
      details: this.details.toJSON(),
      items: this.items.map(cloneListItem),
      itemCount: this.itemCount,
      ownerId: this.ownerId,
      originClientId: this.originClientId,
      isPublic: this.isPublic,
      sharedWith: [...this.sharedWith],
      lastSynced: this.lastSynced,
      lastModified: this.lastModified,
      modifiedBy: this.modifiedBy,
      isSmart: this.isSmart,
      smartCriteria: { ...this.smartCriteria },
      autoUpdateTime: this.autoUpdateTime,
      syncStates: this.syncStates.toJSON(),
    }
  }

  protected removeAt(index: number, clientId: number): void {
    const now = new Date()
    this.items.splice(index, 1)
    this.resequence(clientId, now)
    this.touch(clientId, now)
  }

  /** Renumber positions to indices, recording a reorder on every item that moved. */
  protected resequence(clientId: number, now: Date): void {
    this.items.forEach((item, index) => {
      if (item.position !== index) {
        item.position = index
        item.lastChanged = now
        this.record(item, clientId, 'reorder', now)
      }
    })
    this.itemCount = this.items.length
  }

  protected record(item: ListItem, clientId: number, changeType: ChangeType, now: Date): void {
    item.changeHistory.push({ clientId, itemId: String(item.itemId), changeType, timestamp: now })
  }

  protected touch(clientId: number, now: Date): void {
    this.lastModified = now
    this.modifiedBy = clientId
  }
}

// ============================================================================
// PLAYLIST
// ============================================================================

export class Playlist extends ItemList {
  readonly mediaType = 'playlist' as const

  /**
   * Move the first entry for `itemId` to `newPosition` (clamped to the list).
   */
  reorderItem(itemId: number, newPosition: number, clientId: number): void {
    const index = this.items.findIndex((item) => item.itemId === itemId)
    if (index === -1) {
      throw new ListItemNotFoundError(itemId)
    }
    const target = Math.max(0, Math.min(newPosition, this.items.length - 1))
    if (target === index) return

    const now = new Date()
    const [moved] = this.items.splice(index, 1)
    this.items.splice(target, 0, moved)
    this.resequence(clientId, now)
    this.touch(clientId, now)
  }

  /**
   * Server item keys whose position on the server differs from the local
   * position of the item they map to. Keys `toInternalId` cannot map are skipped.
   */
  detectItemOrderConflicts(
    state: ListSyncState,
    toInternalId: (clientItemId: string) => number | undefined
  ): string[] {
    const localPositions = new Map<number, number>()
    for (const item of this.items) {
      if (!localPositions.has(item.itemId)) localPositions.set(item.itemId, item.position)
    }

    const conflicts: string[] = []
    for (const clientItem of state.items) {
      const internalId = toInternalId(clientItem.itemId)
      if (internalId === undefined) continue
      const localPosition = localPositions.get(internalId)
      if (localPosition !== undefined && localPosition !== clientItem.position) {
        conflicts.push(clientItem.itemId)
      }
    }
    return conflicts
  }

  merge(other: MediaData): void {
    if (!(other instanceof Playlist)) return
    this.mergeList(other)
  }

  clone(): Playlist {
    return new Playlist(this.toJSON())
  }
}

/**
 * New playlist holding `primary`'s items followed by the items of
 * `secondary` that `primary` does not contain. Neither input is modified.
 */
export function mergePlaylists(primary: Playlist, secondary: Playlist): Playlist {
  const result = primary.clone()
  const known = new Set(result.getItemIDs())

  for (const item of secondary.items) {
    if (known.has(item.itemId)) continue
    known.add(item.itemId)
    result.items.push({ ...cloneListItem(item), position: result.items.length })
  }

  result.normalizePositions()
  result.lastModified = new Date()
  return result
}

// ============================================================================
// COLLECTION
// ============================================================================

export class Collection extends ItemList {
  readonly mediaType = 'collection' as const
  private itemMap: Map<number, number> | null = null

  findItemByID(itemId: number): ListItem | undefined {
    const index = this.getItemMap().get(itemId)
    return index === undefined ? undefined : this.items[index]
  }

  /** No-op when the item is already in the collection. */
  addItem(item: NewListItem, clientId: number): void {
    if (this.getItemMap().has(item.itemId)) return
    super.addItem(item, clientId)
    this.rebuildItemMap()
  }

  removeItem(itemId: number, clientId: number): void {
    super.removeItem(itemId, clientId)
    this.rebuildItemMap()
  }

  removeItemAtPosition(itemId: number, position: number, clientId: number): void {
    super.removeItemAtPosition(itemId, position, clientId)
    this.rebuildItemMap()
  }

  normalizePositions(): void {
    super.normalizePositions()
    this.rebuildItemMap()
  }

  /**
   * Keep the first entry for each item ID and drop later ones, then renumber.
   * Running it again changes nothing.
   */
  ensureNoDuplicates(): void {
    const seen = new Set<number>()
    const unique: ListItem[] = []
    for (const item of this.items) {
      if (seen.has(item.itemId)) continue
      seen.add(item.itemId)
      unique.push(item)
    }

    if (unique.length !== this.items.length) {
      const now = new Date()
      this.items = unique
      this.resequence(this.modifiedBy, now)
    }
    this.itemCount = this.items.length
    this.rebuildItemMap()
  }

  merge(other: MediaData): void {
    if (!(other instanceof Collection)) return
    this.mergeList(other)
  }

  // Built on first lookup
  private getItemMap(): Map<number, number> {
    if (!this.itemMap) this.itemMap = this.buildItemMap()
    return this.itemMap
  }

  private rebuildItemMap(): void {
    this.itemMap = this.buildItemMap()
  }

  private buildItemMap(): Map<number, number> {
    const map = new Map<number, number>()
    this.items.forEach((item, index) => {
      if (!map.has(item.itemId)) map.set(item.itemId, index)
    })
    return map
  }
}
