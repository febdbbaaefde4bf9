/**
 * MediaSyncService
 *
 * Pulls every supported media type from each configured server and
 * reconciles the items into the store. Servers are synced in parallel;
 * within one server, types go parents first so that list contents can be
 * resolved against items already stored.
 */

import type { ConcreteMediaType } from '../media/variants'
import { FeatureNotSupportedError } from '../providers/errors'
import type { MediaProvider } from '../providers/base/MediaProvider'
import { getErrorMessage } from './utils/errorUtils'
import { CancellableOperation, createProgress, type ProgressCallback } from './utils/ProgressTracker'
import type { MediaReconciler } from './MediaReconciler'
import { asListItem, type ListSyncService } from './ListSyncService'

export type SyncPhase = 'fetching' | 'reconciling' | 'complete'

export interface SyncResult {
  success: boolean
  clientId: number
  clientName: string
  itemsFetched: number
  itemsAdded: number
  itemsMerged: number
  // Raw items the converters rejected
  itemsSkipped: number
  // Types requested but not offered by the server
  unsupported: ConcreteMediaType[]
  errors: string[]
  durationMs: number
  cancelled?: boolean
}

export const SYNC_ORDER: readonly ConcreteMediaType[] = [
  'movie',
  'series',
  'season',
  'episode',
  'artist',
  'album',
  'track',
  'playlist',
  'collection',
]

export interface SyncOptions {
  types?: readonly ConcreteMediaType[]
  onProgress?: ProgressCallback<SyncPhase>
}

export class MediaSyncService extends CancellableOperation {
  constructor(
    private readonly reconciler: MediaReconciler,
    private readonly listSync?: ListSyncService
  ) {
    super()
  }

  /**
   * Sync one server. Failures of one media type are recorded and the
   * remaining types still run.
   */
  async syncProvider(provider: MediaProvider, options: SyncOptions = {}): Promise<SyncResult> {
    const startTime = Date.now()
    const requested = options.types ?? SYNC_ORDER
    const types = SYNC_ORDER.filter((type) => requested.includes(type))
    const result: SyncResult = {
      success: true,
      clientId: provider.clientId,
      clientName: provider.name,
      itemsFetched: 0,
      itemsAdded: 0,
      itemsMerged: 0,
      itemsSkipped: 0,
      unsupported: [],
      errors: [],
      durationMs: 0,
    }

    console.log(`[MediaSyncService] Syncing ${provider.name} (${provider.providerType}): ${types.join(', ')}`)

    for (const type of types) {
      if (this.isCancelled()) {
        result.cancelled = true
        result.success = false
        result.errors.push('Sync cancelled by user')
        console.log('[MediaSyncService] Sync cancelled by user')
        break
      }

      if (!provider.supports(type)) {
        result.unsupported.push(type)
        continue
      }

      try {
        await this.syncType(provider, type, result, options.onProgress)
      } catch (error) {
        if (error instanceof FeatureNotSupportedError) {
          result.unsupported.push(type)
          continue
        }
        const message = `${type}: ${getErrorMessage(error)}`
        result.errors.push(message)
        result.success = false
        console.error(`[MediaSyncService] Failed to sync ${type} from ${provider.name}:`, error)
      }
    }

    result.durationMs = Date.now() - startTime
    options.onProgress?.(createProgress(result.itemsFetched, result.itemsFetched, '', 'complete', result.itemsSkipped))
    console.log(
      `[MediaSyncService] ${provider.name}: ${result.itemsFetched} fetched, ${result.itemsAdded} added, ` +
        `${result.itemsMerged} merged, ${result.itemsSkipped} skipped, ${result.errors.length} error(s) in ${result.durationMs}ms`
    )
    return result
  }

  /**
   * Sync several servers in parallel. One server failing does not affect
   * the others.
   */
  async syncAll(providers: readonly MediaProvider[], options: SyncOptions = {}): Promise<SyncResult[]> {
    this.resetCancellation()
    const settled = await Promise.allSettled(providers.map((provider) => this.syncProvider(provider, options)))

    return settled.map((outcome, index) => {
      if (outcome.status === 'fulfilled') return outcome.value
      const provider = providers[index]
      console.error(`[MediaSyncService] Sync of ${provider.name} failed:`, outcome.reason)
      return {
        success: false,
        clientId: provider.clientId,
        clientName: provider.name,
        itemsFetched: 0,
        itemsAdded: 0,
        itemsMerged: 0,
        itemsSkipped: 0,
        unsupported: [],
        errors: [getErrorMessage(outcome.reason)],
        durationMs: 0,
      }
    })
  }

  private async syncType(
    provider: MediaProvider,
    type: ConcreteMediaType,
    result: SyncResult,
    onProgress?: ProgressCallback<SyncPhase>
  ): Promise<void> {
    onProgress?.(createProgress(0, 0, type, 'fetching'))
    const { items, skipped } = await provider.fetchItems(type)
    result.itemsFetched += items.length
    result.itemsSkipped += skipped

    for (const [index, item] of items.entries()) {
      const { item: stored, status } = this.reconciler.reconcile(item)
      if (status === 'added') {
        result.itemsAdded++
      } else {
        result.itemsMerged++
      }
      onProgress?.(createProgress(index + 1, items.length, stored.title, 'reconciling'))

      const list = this.listSync ? asListItem(stored) : null
      if (this.listSync && list) {
        await this.listSync.pullContents(provider, list)
      }
    }
  }
}
