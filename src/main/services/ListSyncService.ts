/**
 * ListSyncService
 *
 * Moves playlist and collection contents between the store and media servers.
 *
 * - Pull: read a list's item keys from a server, record them in the list's
 *   sync state for that server and add the items the store knows to the list.
 * - Push: translate the list's items into one server's keys and create the
 *   list there, or add the missing entries to the list it already maps to.
 *
 * Removals are not propagated in either direction.
 */

import type { MediaItem } from '../media/MediaItem'
import { MediaItemList } from '../media/MediaItemList'
import type { Collection, ListType, Playlist } from '../media/lists'
import type { SyncListItem } from '../media/schemas'
import { FeatureNotSupportedError } from '../providers/errors'
import type { MediaProvider } from '../providers/base/MediaProvider'
import type { MediaItemRepository } from './database/MediaItemRepository'
import type { MediaReconciler } from './MediaReconciler'

export type ListMediaItem = MediaItem<Playlist> | MediaItem<Collection>

export interface PullResult {
  list: ListMediaItem
  // Server keys read from the list
  clientItemIds: string[]
  // Keys with no stored item yet
  unresolved: string[]
  itemsAdded: number
}

export interface TranslationResult {
  clientItemIds: string[]
  // Internal item IDs that have no key on the client
  missing: number[]
}

export interface PushResult {
  clientListId: string
  created: boolean
  itemsAdded: number
  missing: number[]
}

/** The item narrowed to a playlist or collection; null for anything else. */
export function asListItem(item: MediaItem): ListMediaItem | null {
  return item.asPlaylist() ?? item.asCollection()
}

function toSyncItems(keys: readonly string[], now: Date): SyncListItem[] {
  return keys.map((itemId, position) => ({ itemId, position, lastChanged: now, changeHistory: [] }))
}

export class ListSyncService {
  constructor(
    private readonly repository: MediaItemRepository,
    private readonly reconciler: MediaReconciler
  ) {}

  // ============================================================================
  // PULL
  // ============================================================================

  /**
   * Fetch one list from a server, reconcile it into the store and pull its
   * contents.
   *
   * @throws Error when the server has no such list
   */
  async pullList(provider: MediaProvider, listType: ListType, clientListId: string): Promise<PullResult> {
    const fetched = await provider.getItem(listType, clientListId)
    if (!fetched) {
      throw new Error(`${listType} ${clientListId} not found on ${provider.name}`)
    }

    const { item } = this.reconciler.reconcile(fetched)
    const list = asListItem(item)
    if (!list) {
      throw new Error(`Stored item ${item.uuid} for ${listType} ${clientListId} is a ${item.type}`)
    }
    return this.pullContents(provider, list)
  }

  /**
   * Read the server's entries for a list already in the store. Entries the
   * list does not hold yet are appended in server order. A playlist keeps
   * repeated entries (as many copies as the server lists); a collection
   * holds each item once.
   */
  async pullContents(provider: MediaProvider, list: ListMediaItem, now: Date = new Date()): Promise<PullResult> {
    const listType = list.data.mediaType
    const clientListId = list.getClientItemID(provider.clientId)
    if (!clientListId) {
      throw new Error(`${listType} ${list.uuid} has no key on ${provider.name}`)
    }

    const keys = await provider.getListItemIds(listType, clientListId)

    const state = list.data.syncStates.mergeItemsIntoSyncState(provider.clientId, toSyncItems(keys, now), clientListId, now)
    if (!state.validateItemOrdering()) {
      state.normalizePositions()
    }

    // Copies already in the list, used up as the server's entries match them
    const listed = new Map<number, number>()
    for (const entry of list.data.items) {
      listed.set(entry.itemId, (listed.get(entry.itemId) ?? 0) + 1)
    }

    const unresolved: string[] = []
    let itemsAdded = 0
    for (const key of keys) {
      const member = this.repository.findByClientItemID(provider.clientId, key)
      if (!member) {
        unresolved.push(key)
        continue
      }
      const copies = listed.get(member.id) ?? 0
      if (copies > 0) {
        listed.set(member.id, copies - 1)
        continue
      }
      if (listType === 'collection' && list.data.findItemByID(member.id)) continue
      list.data.addItem({ itemId: member.id, lastChanged: now }, provider.clientId)
      itemsAdded++
    }

    list.data.lastSynced = now
    this.repository.save(list)

    if (unresolved.length > 0) {
      console.warn(`[ListSyncService] ${unresolved.length} item(s) of ${listType} ${clientListId} on ${provider.name} are not in the store`)
    }
    console.log(`[ListSyncService] Pulled ${listType} "${list.title}" from ${provider.name}: ${keys.length} entries, ${itemsAdded} added`)

    return { list, clientItemIds: keys, unresolved, itemsAdded }
  }

  /**
   * Load the stored items a list holds, in list order. Entries whose item is
   * no longer stored are left out.
   */
  expandList(list: ListMediaItem): MediaItemList {
    const expanded = new MediaItemList({
      listType: list.data.mediaType,
      listOriginId: list.data.originClientId,
      ownerId: list.data.ownerId,
    })
    for (const entry of list.data.items) {
      const member = this.repository.getById(entry.itemId)
      if (member) expanded.add(member, entry.position)
    }
    return expanded
  }

  // ============================================================================
  // PUSH
  // ============================================================================

  /**
   * The client's keys for the list's items, in list order. Items the client
   * does not know are reported in `missing`.
   */
  translateToClientItemIDs(list: Playlist | Collection, clientId: number): TranslationResult {
    const clientItemIds: string[] = []
    const missing: number[] = []

    for (const entry of list.items) {
      const item = this.repository.getById(entry.itemId)
      const key = item?.getClientItemID(clientId) ?? ''
      if (key) {
        clientItemIds.push(key)
      } else {
        missing.push(entry.itemId)
      }
    }
    return { clientItemIds, missing }
  }

  /**
   * Bring a server's copy of the list up to date with the stored one.
   *
   * @throws FeatureNotSupportedError when the list does not exist there and
   *   the server cannot create lists of this type
   */
  async pushList(provider: MediaProvider, list: ListMediaItem, now: Date = new Date()): Promise<PushResult> {
    const listType = list.data.mediaType
    const { clientItemIds, missing } = this.translateToClientItemIDs(list.data, provider.clientId)
    if (missing.length > 0) {
      console.warn(`[ListSyncService] ${missing.length} item(s) of "${list.title}" have no key on ${provider.name}`)
    }

    const state = list.data.getListSyncState(provider.clientId)
    let clientListId = state?.clientListId || list.getClientItemID(provider.clientId)
    let created = false
    let itemsAdded = 0

    if (clientListId) {
      const existing = new Set(await provider.getListItemIds(listType, clientListId))
      const toAdd = clientItemIds.filter((key) => !existing.has(key))
      await provider.addItemsToList(listType, clientListId, toAdd)
      itemsAdded = toAdd.length
    } else {
      const canCreate = listType === 'playlist' ? provider.capabilities.createPlaylist : provider.capabilities.createCollection
      if (!canCreate) {
        throw new FeatureNotSupportedError(provider.providerType, `creating a ${listType}`)
      }
      clientListId = await provider.createList(listType, list.title, clientItemIds)
      created = true
      itemsAdded = clientItemIds.length
    }

    list.setClientInfo(provider.clientId, provider.providerType, clientListId)
    list.syncClients.updateSyncStatus(provider.clientId, 'success', now)
    const synced = list.data.syncStates.mergeItemsIntoSyncState(
      provider.clientId,
      toSyncItems(clientItemIds, now),
      clientListId,
      now
    )
    if (!synced.validateItemOrdering()) {
      synced.normalizePositions()
    }
    list.data.lastSynced = now
    this.repository.save(list)

    console.log(
      `[ListSyncService] Pushed ${listType} "${list.title}" to ${provider.name} (${clientListId}): ${created ? 'created' : 'updated'}, ${itemsAdded} added`
    )
    return { clientListId, created, itemsAdded, missing }
  }
}
