/**
 * MediaBridge entry point
 *
 * Wires configuration, storage, providers and services together, and
 * re-exports the public API.
 *
 * Usage:
 *   const bridge = createMediaBridge(loadConfig('mediabridge.json'))
 *   const results = await bridge.syncAll()
 *   bridge.close()
 */

import type { AppConfig } from './config/AppConfig'
import { openDatabase, type SqliteDatabase } from './database/getDatabase'
import type { ConnectionTestResult, MediaProvider, ProviderOptions } from './providers/base/MediaProvider'
import type { ConversionRegistry } from './providers/base/ConversionRegistry'
import { createConversionRegistry, createProvider, getProviderDisplayName } from './providers/ProviderFactory'
import { MediaItemRepository } from './services/database/MediaItemRepository'
import { ListSyncService } from './services/ListSyncService'
import { MediaReconciler } from './services/MediaReconciler'
import { MediaSyncService, type SyncOptions, type SyncResult } from './services/MediaSyncService'
import { getLoggingService, type ClientInfo, type DiagnosticInfo, type ExportFormat } from './services/LoggingService'
import { getErrorMessage } from './services/utils/errorUtils'

export interface MediaBridgeOptions {
  // Use an already open database instead of config.database.path
  database?: SqliteDatabase
  // Extra provider options (custom HTTP transport)
  providerOptions?: Partial<ProviderOptions>
  // Leave console interception off (embedding in another app)
  interceptConsole?: boolean
}

export interface MediaBridge {
  readonly config: AppConfig
  readonly db: SqliteDatabase
  readonly registry: ConversionRegistry
  readonly repository: MediaItemRepository
  readonly providers: readonly MediaProvider[]
  readonly reconciler: MediaReconciler
  readonly listSync: ListSyncService
  readonly sync: MediaSyncService
  getProvider(clientId: number): MediaProvider | undefined
  testConnections(): Promise<Map<number, ConnectionTestResult>>
  syncAll(options?: SyncOptions): Promise<SyncResult[]>
  /** Write the log buffer with client and store diagnostics. */
  exportLogs(filePath: string, format?: ExportFormat): Promise<void>
  close(): Promise<void>
}

/**
 * Build the bridge. With `logging.fileLogging` set, entries are written under
 * `logging.logDir` from here on; `close()` flushes the last of them.
 */
export function createMediaBridge(config: AppConfig, options: MediaBridgeOptions = {}): MediaBridge {
  const logging = getLoggingService()
  if (options.interceptConsole !== false) {
    logging.initialize(config.logging)
  } else {
    logging.configure(config.logging)
  }

  const db = options.database ?? openDatabase(config.database.path)
  const repository = new MediaItemRepository(db)
  const registry = createConversionRegistry()
  const providerOptions: Partial<ProviderOptions> = {
    pageSize: config.sync.pageSize,
    requestTimeoutMs: config.sync.requestTimeoutMs,
    ...options.providerOptions,
  }
  const providers = config.clients.map((client) => createProvider(client, registry, providerOptions))
  const reconciler = new MediaReconciler(repository)
  const listSync = new ListSyncService(repository, reconciler)
  const sync = new MediaSyncService(reconciler, listSync)

  // Filled in by testConnections
  const serverVersions = new Map<number, string>()

  console.log(`[MediaBridge] Ready with ${providers.length} client(s), ${registry.size} converter(s)`)

  return {
    config,
    db,
    registry,
    repository,
    providers,
    reconciler,
    listSync,
    sync,

    getProvider(clientId: number): MediaProvider | undefined {
      return providers.find((provider) => provider.clientId === clientId)
    },

    async testConnections(): Promise<Map<number, ConnectionTestResult>> {
      const results = new Map<number, ConnectionTestResult>()
      const settled = await Promise.allSettled(providers.map((provider) => provider.testConnection()))
      settled.forEach((outcome, index) => {
        const provider = providers[index]
        const result: ConnectionTestResult =
          outcome.status === 'fulfilled' ? outcome.value : { success: false, error: getErrorMessage(outcome.reason) }
        if (result.serverVersion) serverVersions.set(provider.clientId, result.serverVersion)
        if (!result.success) {
          console.warn(`[MediaBridge] ${provider.name} (${getProviderDisplayName(provider.providerType)}) is not reachable: ${result.error}`)
        }
        results.set(provider.clientId, result)
      })
      return results
    },

    syncAll(syncOptions?: SyncOptions): Promise<SyncResult[]> {
      return sync.syncAll(providers, syncOptions)
    },

    async exportLogs(filePath: string, format: ExportFormat = 'json'): Promise<void> {
      const clients: ClientInfo[] = providers.map((provider) => ({
        name: provider.name,
        clientType: getProviderDisplayName(provider.providerType),
        serverVersion: serverVersions.get(provider.clientId) ?? null,
      }))
      const diagnostics: DiagnosticInfo = {
        database: { path: config.database.path, itemCount: repository.count() },
        itemCounts: repository.countByType(),
      }
      await logging.exportLogs(filePath, format, clients, diagnostics)
      console.log(`[MediaBridge] Exported logs to ${filePath}`)
    },

    async close(): Promise<void> {
      if (!options.database) db.close()
      await logging.shutdown()
      console.log('[MediaBridge] Closed')
    },
  }
}

// ============================================================================
// PUBLIC API
// ============================================================================

export * from './media/schemas'
export * from './media/identity'
export * from './media/MediaDetails'
export * from './media/video'
export * from './media/music'
export * from './media/lists'
export * from './media/ListSyncState'
export * from './media/MediaItem'
export * from './media/MediaItemList'
export * from './media/codecs'
export * from './media/variants'
export { AppConfigSchema, ConfigError, loadConfig, parseConfig } from './config/AppConfig'
export type { AppConfig, ClientConfig, LogLevel } from './config/AppConfig'
export { openDatabase } from './database/getDatabase'
export type { SqliteDatabase } from './database/getDatabase'
export * from './providers/errors'
export * from './providers/base/MediaProvider'
export * from './providers/base/ConversionRegistry'
export * from './providers/ProviderFactory'
export { PlexProvider } from './providers/plex/PlexProvider'
export { JellyfinProvider } from './providers/jellyfin-emby/JellyfinProvider'
export { EmbyProvider } from './providers/jellyfin-emby/EmbyProvider'
export { SubsonicProvider } from './providers/subsonic/SubsonicProvider'
export { MediaItemRepository } from './services/database/MediaItemRepository'
export { MediaReconciler, mergeMediaItems } from './services/MediaReconciler'
export type { ReconcileResult, ReconcileStatus } from './services/MediaReconciler'
export { MediaSyncService, SYNC_ORDER } from './services/MediaSyncService'
export type { SyncOptions, SyncPhase, SyncResult } from './services/MediaSyncService'
export { ListSyncService, asListItem } from './services/ListSyncService'
export type { ListMediaItem, PullResult, PushResult, TranslationResult } from './services/ListSyncService'
export { getLoggingService, renderTextExport } from './services/LoggingService'
export type { ClientInfo, DiagnosticInfo, ExportFormat, LogEntry, LogExport } from './services/LoggingService'
