/**
 * ListSyncService Unit Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { openDatabase, type SqliteDatabase } from '../../src/main/database/getDatabase'
import { MediaItemRepository } from '../../src/main/services/database/MediaItemRepository'
import { MediaReconciler } from '../../src/main/services/MediaReconciler'
import { ListSyncService, asListItem, type ListMediaItem } from '../../src/main/services/ListSyncService'
import { createMediaItem, type MediaItem } from '../../src/main/media/MediaItem'
import { Movie } from '../../src/main/media/video'
import { Collection, Playlist } from '../../src/main/media/lists'
import { FeatureNotSupportedError } from '../../src/main/providers/errors'
import { FakeProvider } from '../helpers/fakeProvider'

const NOW = new Date('2026-03-01T12:00:00Z')

describe('ListSyncService', () => {
  let db: SqliteDatabase
  let repository: MediaItemRepository
  let service: ListSyncService
  let plex: FakeProvider
  let jellyfin: FakeProvider
  let heat: MediaItem
  let ronin: MediaItem

  function storedMovie(title: string, plexKey: string, jellyfinKey?: string): MediaItem {
    const item = createMediaItem('movie', new Movie({ details: { title } }))
    item.setClientInfo(1, 'plex', plexKey)
    if (jellyfinKey) item.setClientInfo(2, 'jellyfin', jellyfinKey)
    repository.insert(item)
    return item
  }

  function storedPlaylist(plexKey?: string, members: readonly MediaItem[] = []): MediaItem<Playlist> {
    const item = createMediaItem('playlist', new Playlist({ details: { title: 'Crime Night' } }))
    if (plexKey) item.setClientInfo(1, 'plex', plexKey)
    for (const member of members) {
      item.data.addItem({ itemId: member.id, lastChanged: NOW }, 0)
    }
    repository.insert(item)
    return item
  }

  beforeEach(() => {
    db = openDatabase(':memory:')
    repository = new MediaItemRepository(db)
    service = new ListSyncService(repository, new MediaReconciler(repository))
    plex = new FakeProvider({ clientId: 1, name: 'Home Plex' })
    jellyfin = new FakeProvider({ clientId: 2, providerType: 'jellyfin', name: 'Jellyfin' })

    heat = storedMovie('Heat', '501', 'j-501')
    ronin = storedMovie('Ronin', '502')
  })

  afterEach(() => {
    db.close()
  })

  it('narrows list items only', () => {
    expect(asListItem(heat)).toBeNull()
    expect(asListItem(storedPlaylist())?.type).toBe('playlist')
  })

  describe('pullContents', () => {
    it('adds known entries in server order and records the sync state', async () => {
      const list = storedPlaylist('pl1')
      plex.lists.set('pl1', ['502', '999', '501'])

      const result = await service.pullContents(plex, list, NOW)

      expect(result.clientItemIds).toEqual(['502', '999', '501'])
      expect(result.unresolved).toEqual(['999'])
      expect(result.itemsAdded).toBe(2)
      expect(list.data.getItemIDs()).toEqual([ronin.id, heat.id])
      expect(list.data.lastSynced).toEqual(NOW)

      const state = list.data.getListSyncState(1)
      expect(state?.clientListId).toBe('pl1')
      expect(state?.getItemIDs()).toEqual(['502', '999', '501'])

      const stored = repository.getById(list.id)?.asPlaylist()
      expect(stored?.data.getItemIDs()).toEqual([ronin.id, heat.id])
    })

    it('does not add an entry twice', async () => {
      const list = storedPlaylist('pl1', [heat])
      plex.lists.set('pl1', ['501', '502'])

      const result = await service.pullContents(plex, list, NOW)

      expect(result.itemsAdded).toBe(1)
      expect(list.data.getItemIDs()).toEqual([heat.id, ronin.id])
    })

    it('keeps repeated playlist entries and pulls them only once', async () => {
      const list = storedPlaylist('pl1')
      plex.lists.set('pl1', ['501', '502', '501'])

      const first = await service.pullContents(plex, list, NOW)
      const second = await service.pullContents(plex, list, NOW)

      expect(first.itemsAdded).toBe(3)
      expect(second.itemsAdded).toBe(0)
      expect(list.data.getItemIDs()).toEqual([heat.id, ronin.id, heat.id])
    })

    it('holds each collection member once', async () => {
      const collection = createMediaItem('collection', new Collection({ details: { title: 'Heist Films' } }))
      collection.setClientInfo(1, 'plex', 'c1')
      repository.insert(collection)
      plex.lists.set('c1', ['501', '501', '502'])

      const result = await service.pullContents(plex, collection, NOW)

      expect(result.itemsAdded).toBe(2)
      expect(collection.data.getItemIDs()).toEqual([heat.id, ronin.id])
    })

    it('needs the list key on that server', async () => {
      const list = storedPlaylist()

      await expect(service.pullContents(plex, list)).rejects.toThrow(`playlist ${list.uuid} has no key on Home Plex`)
    })
  })

  describe('pullList', () => {
    it('stores the list then pulls its entries', async () => {
      const remote = createMediaItem('collection', new Collection({ details: { title: 'Heist Films' } }))
      remote.setClientInfo(1, 'plex', 'c1')
      plex.items = [remote]
      plex.lists.set('c1', ['501'])

      const result = await service.pullList(plex, 'collection', 'c1')

      expect(result.list.id).toBeGreaterThan(0)
      expect(result.list.data.getItemIDs()).toEqual([heat.id])
      expect(repository.count('collection')).toBe(1)
    })

    it('fails for a list the server does not have', async () => {
      await expect(service.pullList(plex, 'playlist', 'nope')).rejects.toThrow('playlist nope not found on Home Plex')
    })
  })

  describe('expandList', () => {
    it('loads the stored members in list order', () => {
      const list = storedPlaylist('pl1', [heat, ronin])
      list.data.addItem({ itemId: 999, lastChanged: NOW }, 0)

      const expanded = service.expandList(list)

      expect(expanded.listType).toBe('playlist')
      expect(expanded.getOrdered().map((item) => item.title)).toEqual(['Ronin', 'Heat'])
      expect(expanded.getItemsOfType('movie')).toHaveLength(2)
    })
  })

  describe('translateToClientItemIDs', () => {
    it('maps entries to client keys and reports the rest', () => {
      const list = storedPlaylist(undefined, [heat, ronin])

      expect(service.translateToClientItemIDs(list.data, 2)).toEqual({ clientItemIds: ['j-501'], missing: [ronin.id] })
      expect(service.translateToClientItemIDs(list.data, 1)).toEqual({ clientItemIds: ['501', '502'], missing: [] })
    })
  })

  describe('pushList', () => {
    it('creates the list on a server that does not have it', async () => {
      const list: ListMediaItem = storedPlaylist('pl1', [heat, ronin])

      const result = await service.pushList(jellyfin, list, NOW)

      expect(result).toEqual({ clientListId: 'new-1', created: true, itemsAdded: 1, missing: [ronin.id] })
      expect(jellyfin.created).toEqual([{ listType: 'playlist', name: 'Crime Night', itemKeys: ['j-501'] }])
      expect(list.getClientItemID(2)).toBe('new-1')
      expect(list.syncClients.getSyncStatus(2)).toBe('success')
      expect(list.data.getListSyncState(2)?.getItemIDs()).toEqual(['j-501'])
      expect(repository.findByClientItemID(2, 'new-1', 'playlist')?.id).toBe(list.id)
    })

    it('adds only the entries the server list lacks', async () => {
      const list = storedPlaylist('pl1', [heat, ronin])
      plex.lists.set('pl1', ['501'])

      const result = await service.pushList(plex, list, NOW)

      expect(result).toEqual({ clientListId: 'pl1', created: false, itemsAdded: 1, missing: [] })
      expect(plex.added).toEqual([{ listType: 'playlist', clientListId: 'pl1', itemKeys: ['502'] }])
      expect(plex.created).toHaveLength(0)
    })

    it('refuses when the server cannot create that kind of list', async () => {
      const subsonic = new FakeProvider({
        clientId: 3,
        providerType: 'subsonic',
        name: 'Navidrome',
        capabilities: { mediaTypes: ['track', 'playlist'], createCollection: false },
      })
      const collection = createMediaItem('collection', new Collection({ details: { title: 'Heist Films' } }))
      repository.insert(collection)

      await expect(service.pushList(subsonic, collection, NOW)).rejects.toBeInstanceOf(FeatureNotSupportedError)
      expect(subsonic.created).toHaveLength(0)
    })
  })
})
