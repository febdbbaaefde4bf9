/**
 * Jellyfin / Emby Provider Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { JellyfinProvider } from '../../src/main/providers/jellyfin-emby/JellyfinProvider'
import { EmbyProvider } from '../../src/main/providers/jellyfin-emby/EmbyProvider'
import { createConversionRegistry } from '../../src/main/providers/ProviderFactory'
import { FakeServer, ok, reply } from '../helpers/fakeServer'

const movies = [
  { Id: 'm1', Name: 'Alpha', Type: 'Movie', ProviderIds: { Tmdb: '101' } },
  { Name: 'Broken', Type: 'Movie' },
  { Id: 'm3', Name: 'Gamma', Type: 'Movie' },
]

const users = [
  { Id: 'u-viewer', Policy: { IsAdministrator: false } },
  { Id: 'u-admin', Policy: { IsAdministrator: true } },
]

describe('JellyfinProvider', () => {
  let server: FakeServer
  let provider: JellyfinProvider

  beforeEach(() => {
    server = new FakeServer()
    provider = new JellyfinProvider(
      { type: 'jellyfin', id: 2, name: 'Jellyfin', serverUrl: 'http://jellyfin.test:8096', apiKey: 'test-key' },
      createConversionRegistry(),
      { httpAdapter: server.adapter, pageSize: 2 }
    )
    server.on('GET', '/Users', users)
  })

  it('authenticates with the MediaBrowser header', async () => {
    server.on('GET', '/System/Info', { ServerName: 'Den', Version: '10.9.0' })

    const result = await provider.testConnection()

    expect(result).toMatchObject({ success: true, serverName: 'Den', serverVersion: '10.9.0' })
    const { config } = server.requests[0]
    expect(config.baseURL).toBe('http://jellyfin.test:8096')
    expect(config.headers.get('X-Emby-Token')).toBe('test-key')
    expect(config.headers.get('Authorization')).toBe(
      'MediaBrowser Client="MediaBridge", Device="MediaBridge", DeviceId="mediabridge-2", Version="1.0.0", Token="test-key"'
    )
  })

  describe('fetchItems', () => {
    beforeEach(() => {
      server.handle('GET', '/Items', (request) => {
        const start = Number(request.params.StartIndex)
        const limit = Number(request.params.Limit)
        return ok({ Items: movies.slice(start, start + limit), TotalRecordCount: movies.length })
      })
    })

    it('resolves an administrator once and pages by StartIndex', async () => {
      const { items, skipped } = await provider.fetchItems('movie')

      expect(items.map((item) => item.title)).toEqual(['Alpha', 'Gamma'])
      expect(skipped).toBe(1)
      expect(server.requestsTo('GET', '/Users')).toHaveLength(1)

      const pages = server.requestsTo('GET', '/Items')
      expect(pages.map((request) => request.params.StartIndex)).toEqual([0, 2])
      expect(pages[0].params).toMatchObject({
        UserId: 'u-admin',
        IncludeItemTypes: 'Movie',
        Recursive: true,
        Limit: 2,
      })
      expect(console.warn).toHaveBeenCalledWith(
        '[jellyfinProvider 2] Skipping Movie: jellyfin Movie: missing required field (Id)'
      )
    })

    it('keys items by the server Id and keeps provider IDs', async () => {
      const { items } = await provider.fetchItems('movie')

      expect(items[0].getClientItemID(2)).toBe('m1')
      expect(items[0].getExternalID('tmdb')).toBe('101')
    })

    it('passes search and favourite filters', async () => {
      await provider.fetchItems('movie', { query: 'Alp', favorites: true, limit: 1 })

      expect(server.requestsTo('GET', '/Items')[0].params).toMatchObject({ SearchTerm: 'Alp', IsFavorite: true, Limit: 1 })
    })
  })

  it('uses a configured user without looking one up', async () => {
    const configured = new JellyfinProvider(
      {
        type: 'jellyfin',
        id: 2,
        name: 'Jellyfin',
        serverUrl: 'http://jellyfin.test:8096',
        apiKey: 'test-key',
        userId: 'u-1',
      },
      createConversionRegistry(),
      { httpAdapter: server.adapter }
    )
    server.on('GET', '/Users/u-1/Items/m1', movies[0])

    const item = await configured.getItem('movie', 'm1')

    expect(item?.title).toBe('Alpha')
    expect(server.requestsTo('GET', '/Users')).toHaveLength(0)
  })

  it('fails when the API key sees no user', async () => {
    server.on('GET', '/Users', [])

    await expect(provider.fetchItems('movie')).rejects.toMatchObject({
      code: 'REQUEST_ERROR',
      message: 'jellyfin users: no user visible to this API key',
    })
  })

  it('returns null for an unknown item', async () => {
    expect(await provider.getItem('movie', 'missing')).toBeNull()
  })

  describe('lists', () => {
    it('reads playlist entries for the user and box set children by parent', async () => {
      server
        .on('GET', '/Playlists/p1/Items', { Items: [{ Id: 'm1' }, { Id: 3 }, { Name: 'no id' }] })
        .on('GET', '/Items', { Items: [{ Id: 'm3' }] })

      expect(await provider.getListItemIds('playlist', 'p1')).toEqual(['m1', '3'])
      expect(await provider.getListItemIds('collection', 'b1')).toEqual(['m3'])

      expect(server.requestsTo('GET', '/Playlists/p1/Items')[0].params).toEqual({ UserId: 'u-admin' })
      expect(server.requestsTo('GET', '/Items')[0].params).toEqual({ UserId: 'u-admin', ParentId: 'b1' })
    })

    it('creates a playlist owned by the user', async () => {
      server.on('POST', '/Playlists', { Id: 'p9' })

      const key = await provider.createList('playlist', 'Road Trip', ['m1', 'm3'])

      expect(key).toBe('p9')
      expect(server.requestsTo('POST', '/Playlists')[0].params).toEqual({
        Name: 'Road Trip',
        Ids: 'm1,m3',
        UserId: 'u-admin',
      })
    })

    it('creates a collection without a user', async () => {
      server.on('POST', '/Collections', { Id: 'b9' })

      expect(await provider.createList('collection', 'Heist Films', ['m1'])).toBe('b9')
      expect(server.requestsTo('POST', '/Collections')[0].params).toEqual({ Name: 'Heist Films', Ids: 'm1' })
      expect(server.requestsTo('GET', '/Users')).toHaveLength(0)
    })

    it('adds entries to an existing collection', async () => {
      server.on('POST', '/Collections/b1/Items', {})

      await provider.addItemsToList('collection', 'b1', ['m1', 'm3'])

      expect(server.requestsTo('POST', '/Collections/b1/Items')[0].params).toEqual({ Ids: 'm1,m3' })
    })

    it('reports a malformed create response', async () => {
      server.on('POST', '/Collections', {})

      await expect(provider.createList('collection', 'Heist Films', ['m1'])).rejects.toMatchObject({
        code: 'SERVICE_ERROR',
        message: 'jellyfin create collection: unexpected response (missing required field (Id))',
      })
    })
  })
})

describe('EmbyProvider', () => {
  let server: FakeServer
  let provider: EmbyProvider

  beforeEach(() => {
    server = new FakeServer()
    provider = new EmbyProvider(
      { type: 'emby', id: 3, name: 'Emby', serverUrl: 'http://emby.test:8096/', apiKey: 'test-key', userId: 'u-1' },
      createConversionRegistry(),
      { httpAdapter: server.adapter }
    )
  })

  it('serves the API under /emby with the Emby auth header', async () => {
    server.on('GET', '/System/Info', { ServerName: 'Attic', Version: '4.8.0' })

    const result = await provider.testConnection()

    expect(result).toMatchObject({ success: true, serverName: 'Attic' })
    const { config } = server.requests[0]
    expect(config.baseURL).toBe('http://emby.test:8096/emby')
    expect(config.headers.get('X-Emby-Authorization')).toBe(
      'Emby Client="MediaBridge", Device="MediaBridge", DeviceId="mediabridge-3", Version="1.0.0", Token="test-key"'
    )
  })

  it('converts items with the emby key', async () => {
    server.on('GET', '/Users/u-1/Items/e7', { Id: 'e7', Name: 'Heat', Type: 'Movie' })

    const item = await provider.getItem('movie', 'e7')

    expect(item?.getClientItemID(3)).toBe('e7')
    expect(item?.syncClients.getByClientID(3)?.clientType).toBe('emby')
  })

  it('reports server errors from the connection test', async () => {
    server.handle('GET', '/System/Info', () => reply(503))

    expect(await provider.testConnection()).toEqual({
      success: false,
      error: 'emby system info: server error (HTTP 503)',
    })
  })
})
