/**
 * ListSyncState
 *
 * Per-server snapshot of a playlist or collection: which list it maps to on
 * that server and the server's own item keys in order.
 */

import type { ChangeRecord, ListSyncStateData, SyncListItem } from './schemas'

function cloneSyncItem(item: SyncListItem): SyncListItem {
  return {
    ...item,
    changeHistory: item.changeHistory.map((c) => ({ ...c })),
  }
}

export class ListSyncState {
  clientId: number
  clientListId: string
  items: SyncListItem[]
  lastSynced?: Date

  constructor(init: Partial<ListSyncStateData> & { clientId: number }) {
    this.clientId = init.clientId
    this.clientListId = init.clientListId ?? ''
    this.items = (init.items ?? []).map(cloneSyncItem)
    this.lastSynced = init.lastSynced
  }

  /** True when every item's position equals its index. */
  validateItemOrdering(): boolean {
    return this.items.every((item, index) => item.position === index)
  }

  normalizePositions(): void {
    this.items.sort((a, b) => a.position - b.position)
    this.items.forEach((item, index) => {
      item.position = index
    })
  }

  getItemIDs(): string[] {
    return this.items.map((item) => item.itemId)
  }

  toJSON(): ListSyncStateData {
    return {
      clientId: this.clientId,
      clientListId: this.clientListId,
      items: this.items.map(cloneSyncItem),
      lastSynced: this.lastSynced,
    }
  }
}

export class ListSyncStates {
  private states: ListSyncState[]

  constructor(states: readonly ListSyncStateData[] = []) {
    this.states = states.map((s) => new ListSyncState(s))
  }

  get size(): number {
    return this.states.length
  }

  getListSyncState(clientId: number): ListSyncState | undefined {
    return this.states.find((s) => s.clientId === clientId)
  }

  findByClientListID(clientListId: string): ListSyncState | undefined {
    return this.states.find((s) => s.clientListId === clientListId)
  }

  /**
   * Fold a fresh snapshot from one server into its stored state.
   *
   * Items are matched by the server's item key. A match is replaced only when
   * the incoming item changed strictly later; on equal timestamps the stored
   * entry stays. Unknown keys are appended. Positions are taken as given, so
   * callers check `validateItemOrdering()` afterwards.
   */
  mergeItemsIntoSyncState(
    clientId: number,
    incoming: readonly SyncListItem[],
    clientListId: string,
    now: Date = new Date()
  ): ListSyncState {
    const stamped = incoming.map((item) => {
      const copy = cloneSyncItem(item)
      if (!copy.lastChanged) copy.lastChanged = now
      const record: ChangeRecord = { clientId, itemId: copy.itemId, changeType: 'sync', timestamp: now }
      copy.changeHistory.push(record)
      return copy
    })

    const state = this.getListSyncState(clientId)
    if (!state) {
      const created = new ListSyncState({ clientId, clientListId, items: stamped, lastSynced: now })
      this.states.push(created)
      return created
    }

    const indexById = new Map<string, number>()
    state.items.forEach((item, index) => indexById.set(item.itemId, index))

    for (const item of stamped) {
      const existingIndex = indexById.get(item.itemId)
      if (existingIndex === undefined) {
        indexById.set(item.itemId, state.items.length)
        state.items.push(item)
        continue
      }
      const existingChanged = state.items[existingIndex].lastChanged?.getTime() ?? 0
      const incomingChanged = item.lastChanged?.getTime() ?? 0
      if (incomingChanged > existingChanged) {
        state.items[existingIndex] = item
      }
    }

    state.lastSynced = now
    state.clientListId = clientListId
    return state
  }

  toArray(): ListSyncState[] {
    return [...this.states]
  }

  toJSON(): ListSyncStateData[] {
    return this.states.map((s) => s.toJSON())
  }
}
