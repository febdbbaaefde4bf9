/**
 * ListSyncState Unit Tests
 */

import { describe, it, expect } from 'vitest'
import { ListSyncState, ListSyncStates } from '../../src/main/media/ListSyncState'
import type { SyncListItem } from '../../src/main/media/schemas'

const t1 = new Date('2024-01-01T00:00:00Z')
const t2 = new Date('2024-02-01T00:00:00Z')
const now = new Date('2024-03-01T00:00:00Z')

function item(itemId: string, position: number, lastChanged?: Date): SyncListItem {
  return { itemId, position, lastChanged, changeHistory: [] }
}

describe('ListSyncState', () => {
  it('checks and repairs ordering', () => {
    const state = new ListSyncState({ clientId: 1, items: [item('b', 3), item('a', 1)] })
    expect(state.validateItemOrdering()).toBe(false)

    state.normalizePositions()
    expect(state.getItemIDs()).toEqual(['a', 'b'])
    expect(state.validateItemOrdering()).toBe(true)
  })
})

describe('ListSyncStates', () => {
  it('creates a state for a new client', () => {
    const states = new ListSyncStates()
    const state = states.mergeItemsIntoSyncState(1, [item('a', 0), item('b', 1, t1)], 'pl-1', now)

    expect(states.size).toBe(1)
    expect(state.clientListId).toBe('pl-1')
    expect(state.lastSynced).toEqual(now)
    expect(state.items[0].lastChanged).toEqual(now)
    expect(state.items[1].lastChanged).toEqual(t1)
    expect(state.items[0].changeHistory).toEqual([{ clientId: 1, itemId: 'a', changeType: 'sync', timestamp: now }])
  })

  it('does not modify the incoming items', () => {
    const incoming = [item('a', 0)]
    new ListSyncStates().mergeItemsIntoSyncState(1, incoming, 'pl-1', now)

    expect(incoming[0].lastChanged).toBeUndefined()
    expect(incoming[0].changeHistory).toEqual([])
  })

  it('replaces an entry only on a strictly later change', () => {
    const states = new ListSyncStates([{ clientId: 1, clientListId: 'pl-1', items: [item('a', 0, t1), item('b', 1, t2)] }])

    const state = states.mergeItemsIntoSyncState(1, [item('a', 5, t2), item('b', 7, t2), item('c', 2, t2)], 'pl-1', now)

    expect(state.getItemIDs()).toEqual(['a', 'b', 'c'])
    expect(state.items.map((i) => i.position)).toEqual([5, 1, 2])
    expect(state.validateItemOrdering()).toBe(false)
    expect(state.lastSynced).toEqual(now)
  })

  it('updates the list key', () => {
    const states = new ListSyncStates([{ clientId: 1, clientListId: 'old', items: [] }])
    states.mergeItemsIntoSyncState(1, [], 'new', now)

    expect(states.findByClientListID('new')?.clientId).toBe(1)
    expect(states.findByClientListID('old')).toBeUndefined()
  })

  it('keeps states per client', () => {
    const states = new ListSyncStates()
    states.mergeItemsIntoSyncState(1, [item('a', 0)], 'pl-1', now)
    states.mergeItemsIntoSyncState(2, [item('x', 0)], 'pl-9', now)

    expect(states.getListSyncState(1)?.getItemIDs()).toEqual(['a'])
    expect(states.getListSyncState(2)?.getItemIDs()).toEqual(['x'])
    expect(states.toJSON().map((s) => s.clientListId)).toEqual(['pl-1', 'pl-9'])
  })
})
