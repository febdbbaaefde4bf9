/**
 * MediaSyncService Unit Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { openDatabase, type SqliteDatabase } from '../../src/main/database/getDatabase'
import { MediaItemRepository } from '../../src/main/services/database/MediaItemRepository'
import { MediaReconciler } from '../../src/main/services/MediaReconciler'
import { ListSyncService } from '../../src/main/services/ListSyncService'
import { MediaSyncService, type SyncPhase } from '../../src/main/services/MediaSyncService'
import type { OperationProgress } from '../../src/main/services/utils/ProgressTracker'
import { createMediaItem, type MediaItem } from '../../src/main/media/MediaItem'
import { Movie } from '../../src/main/media/video'
import { Playlist } from '../../src/main/media/lists'
import { FeatureNotSupportedError } from '../../src/main/providers/errors'
import { FakeProvider } from '../helpers/fakeProvider'

function movie(clientId: number, key: string, title: string): MediaItem {
  const item = createMediaItem('movie', new Movie({ details: { title } }))
  item.setClientInfo(clientId, 'plex', key)
  return item
}

function playlist(clientId: number, key: string, title: string): MediaItem {
  const item = createMediaItem('playlist', new Playlist({ details: { title } }))
  item.setClientInfo(clientId, 'plex', key)
  return item
}

describe('MediaSyncService', () => {
  let db: SqliteDatabase
  let repository: MediaItemRepository
  let service: MediaSyncService
  let provider: FakeProvider

  beforeEach(() => {
    db = openDatabase(':memory:')
    repository = new MediaItemRepository(db)
    const reconciler = new MediaReconciler(repository)
    service = new MediaSyncService(reconciler, new ListSyncService(repository, reconciler))

    provider = new FakeProvider({ clientId: 1, name: 'Home Plex', capabilities: { mediaTypes: ['movie', 'playlist'] } })
    provider.items = [movie(1, '501', 'Heat'), movie(1, '502', 'Ronin'), playlist(1, 'pl1', 'Crime Night')]
    provider.lists.set('pl1', ['502', '501'])
  })

  afterEach(() => {
    db.close()
  })

  it('syncs every supported type parents first and reports the rest', async () => {
    const result = await service.syncProvider(provider)

    expect(result).toMatchObject({
      success: true,
      clientId: 1,
      clientName: 'Home Plex',
      itemsFetched: 3,
      itemsAdded: 3,
      itemsMerged: 0,
      itemsSkipped: 0,
      errors: [],
    })
    expect(result.unsupported).toEqual(['series', 'season', 'episode', 'artist', 'album', 'track', 'collection'])
    expect(provider.fetched).toEqual(['movie', 'playlist'])
    expect(repository.count()).toBe(3)
  })

  it('pulls list contents against the items already stored', async () => {
    await service.syncProvider(provider)

    const stored = repository.list('playlist')[0].asPlaylist()
    const ronin = repository.findByClientItemID(1, '502')
    const heat = repository.findByClientItemID(1, '501')
    expect(stored?.data.getItemIDs()).toEqual([ronin?.id, heat?.id])
    expect(stored?.data.getListSyncState(1)?.getItemIDs()).toEqual(['502', '501'])
  })

  it('merges on a second run', async () => {
    await service.syncProvider(provider)
    provider.items = [movie(1, '501', 'Heat')]

    const result = await service.syncProvider(provider, { types: ['movie'] })

    expect(result).toMatchObject({ itemsFetched: 1, itemsAdded: 0, itemsMerged: 1 })
    expect(repository.count('movie')).toBe(2)
  })

  it('runs requested types in sync order', async () => {
    await service.syncProvider(provider, { types: ['playlist', 'movie'] })
    expect(provider.fetched).toEqual(['movie', 'playlist'])
  })

  it('records a failing type and carries on', async () => {
    provider.failures.set('movie', new Error('plex fetch page at 0: cannot reach server (ECONNREFUSED)'))

    const result = await service.syncProvider(provider)

    expect(result.success).toBe(false)
    expect(result.errors).toEqual(['movie: plex fetch page at 0: cannot reach server (ECONNREFUSED)'])
    expect(provider.fetched).toEqual(['movie', 'playlist'])
    expect(repository.count('playlist')).toBe(1)
  })

  it('treats an unsupported feature as unsupported, not failed', async () => {
    provider.failures.set('playlist', new FeatureNotSupportedError('plex', 'playlist items'))

    const result = await service.syncProvider(provider)

    expect(result.success).toBe(true)
    expect(result.unsupported).toContain('playlist')
  })

  it('counts skipped raw items', async () => {
    provider.skipped.movie = 4

    const result = await service.syncProvider(provider, { types: ['movie'] })

    expect(result.itemsSkipped).toBe(4)
  })

  it('reports progress through to completion', async () => {
    const updates: OperationProgress<SyncPhase>[] = []

    await service.syncProvider(provider, { types: ['movie'], onProgress: (progress) => updates.push(progress) })

    expect(updates.map((update) => update.phase)).toEqual(['fetching', 'reconciling', 'reconciling', 'complete'])
    expect(updates[2]).toMatchObject({ current: 2, total: 2, currentItem: 'Ronin', percentage: 100 })
    expect(updates[3]).toMatchObject({ current: 2, total: 2, phase: 'complete' })
  })

  it('stops between types once cancelled', async () => {
    const result = await service.syncProvider(provider, {
      onProgress: (progress) => {
        if (progress.phase === 'fetching') service.cancel()
      },
    })

    expect(result.cancelled).toBe(true)
    expect(result.success).toBe(false)
    expect(result.errors).toEqual(['Sync cancelled by user'])
    expect(provider.fetched).toEqual(['movie'])
  })

  it('syncs several servers and clears an earlier cancellation', async () => {
    const other = new FakeProvider({ clientId: 2, providerType: 'jellyfin', name: 'Jellyfin', capabilities: { mediaTypes: ['movie'] } })
    other.failures.set('movie', new Error('jellyfin list Movie: unexpected response'))
    service.cancel()

    const results = await service.syncAll([provider, other])

    expect(results.map((result) => [result.clientName, result.success])).toEqual([
      ['Home Plex', true],
      ['Jellyfin', false],
    ])
    expect(results[1].errors).toEqual(['movie: jellyfin list Movie: unexpected response'])
  })
})
