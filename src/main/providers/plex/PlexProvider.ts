/**
 * PlexProvider
 *
 * Implements the MediaProvider interface for Plex Media Server.
 * Library items come from /library/all filtered by Plex's numeric type,
 * paged with the X-Plex-Container-* parameters.
 */

import type { ListType } from '../../media/lists'
import type { ConcreteMediaType } from '../../media/variants'
import type { PlexClientConfig } from '../../config/AppConfig'
import {
  PLEX_TYPE_IDS,
  PlexContainerSchema,
  PlexEntryKeySchema,
  PlexLibrarySectionSchema,
  PlexMetadataSchema,
  type PlexContainer,
  type PlexLibraryType,
} from '../../types/plex'
import { getErrorMessage } from '../../services/utils/errorUtils'
import { FeatureNotSupportedError, ProviderRequestError } from '../errors'
import {
  BaseMediaProvider,
  type ConnectionTestResult,
  type ProviderCapabilities,
  type ProviderOptions,
  type QueryOptions,
  type RawPage,
} from '../base/MediaProvider'
import type { ConversionRegistry } from '../base/ConversionRegistry'

const CLIENT_IDENTIFIER = 'mediabridge'
const PRODUCT_NAME = 'MediaBridge'

const RAW_TYPES: Record<ConcreteMediaType, string> = {
  movie: 'movie',
  series: 'show',
  season: 'season',
  episode: 'episode',
  artist: 'artist',
  album: 'album',
  track: 'track',
  playlist: 'playlist',
  collection: 'collection',
}

function isLibraryType(rawType: string): rawType is PlexLibraryType {
  return rawType in PLEX_TYPE_IDS
}

export class PlexProvider extends BaseMediaProvider {
  readonly providerType = 'plex' as const
  readonly capabilities: ProviderCapabilities = {
    mediaTypes: ['movie', 'series', 'season', 'episode', 'artist', 'album', 'track', 'playlist', 'collection'],
    createPlaylist: true,
    createCollection: true,
  }

  private machineIdentifier: string | null = null

  constructor(config: PlexClientConfig, registry: ConversionRegistry, options: Partial<ProviderOptions> = {}) {
    super(
      {
        id: config.id,
        name: config.name,
        serverUrl: config.serverUrl,
        headers: {
          'X-Plex-Token': config.token,
          'X-Plex-Client-Identifier': CLIENT_IDENTIFIER,
          'X-Plex-Product': PRODUCT_NAME,
          'X-Plex-Version': '1.0.0',
        },
      },
      registry,
      options
    )
  }

  // ============================================================================
  // CONNECTION TESTING
  // ============================================================================

  async testConnection(): Promise<ConnectionTestResult> {
    try {
      const startTime = Date.now()
      const container = await this.request('server info', () => this.getContainer('/', 'server info'))
      const latencyMs = Date.now() - startTime

      if (container.machineIdentifier) {
        this.machineIdentifier = container.machineIdentifier
      }
      return {
        success: true,
        serverName: container.friendlyName ?? this.name,
        serverVersion: container.version,
        latencyMs,
      }
    } catch (error: unknown) {
      return {
        success: false,
        error: getErrorMessage(error) || 'Connection failed',
      }
    }
  }

  // ============================================================================
  // ITEM ENUMERATION
  // ============================================================================

  protected rawTypeFor(type: ConcreteMediaType): string {
    return RAW_TYPES[type]
  }

  protected async fetchPage(
    type: ConcreteMediaType,
    offset: number,
    limit: number,
    options: QueryOptions
  ): Promise<RawPage> {
    const rawType = RAW_TYPES[type]

    if (rawType === 'collection') {
      const all = await this.getAllCollections()
      return { items: all.slice(offset, offset + limit), total: all.length }
    }

    const params: Record<string, string | number> = {
      'X-Plex-Container-Start': offset,
      'X-Plex-Container-Size': limit,
      includeGuids: 1,
    }
    if (options.query) {
      params.title = options.query
    }

    let path = '/playlists'
    if (isLibraryType(rawType)) {
      path = '/library/all'
      params.type = PLEX_TYPE_IDS[rawType]
    }

    const response = await this.api.get<unknown>(path, { params })
    const container = this.parseResponse(PlexContainerSchema, response.data, `list ${rawType}`).MediaContainer
    return { items: container.Metadata, total: container.totalSize }
  }

  protected async fetchRawItem(_type: ConcreteMediaType, itemKey: string): Promise<unknown> {
    const container = await this.getContainer(`/library/metadata/${encodeURIComponent(itemKey)}`, `item ${itemKey}`)
    return container.Metadata[0] ?? null
  }

  // Collections live per library section
  private async getAllCollections(): Promise<unknown[]> {
    const sections = await this.getContainer('/library/sections', 'library sections')
    const collections: unknown[] = []

    for (const entry of sections.Directory) {
      const section = PlexLibrarySectionSchema.safeParse(entry)
      if (!section.success) continue

      const container = await this.getContainer(
        `/library/sections/${section.data.key}/collections`,
        `collections of section ${section.data.key}`
      )
      collections.push(...container.Metadata)
    }
    return collections
  }

  // ============================================================================
  // LISTS
  // ============================================================================

  async getListItemIds(listType: ListType, clientListId: string): Promise<string[]> {
    const path =
      listType === 'playlist'
        ? `/playlists/${encodeURIComponent(clientListId)}/items`
        : `/library/collections/${encodeURIComponent(clientListId)}/children`

    const container = await this.request(`${listType} ${clientListId} items`, () =>
      this.getContainer(path, `${listType} items`)
    )
    return this.entryKeys(container.Metadata)
  }

  /**
   * Plex builds lists from a library URI, so at least one item is needed to
   * create one; the first item also decides the playlist or collection type.
   */
  async createList(listType: ListType, name: string, itemKeys: readonly string[]): Promise<string> {
    if (itemKeys.length === 0) {
      throw new FeatureNotSupportedError(this.providerType, `creating an empty ${listType}`)
    }

    return this.request(`create ${listType} ${name}`, async () => {
      const firstItem = await this.getContainer(`/library/metadata/${encodeURIComponent(itemKeys[0])}`, 'first list item')
      const first = this.parseResponse(PlexMetadataSchema, firstItem.Metadata[0], 'first list item')
      const uri = await this.libraryUri(itemKeys)

      const params: Record<string, string | number> = { title: name, smart: 0, uri }
      let path = '/playlists'
      if (listType === 'playlist') {
        params.type = first.type === 'track' ? 'audio' : 'video'
      } else {
        const rawType = first.type ?? ''
        if (!isLibraryType(rawType) || !first.librarySectionID) {
          throw new FeatureNotSupportedError(this.providerType, `collections of ${rawType || 'unknown'} items`)
        }
        path = '/library/collections'
        params.type = PLEX_TYPE_IDS[rawType]
        params.sectionId = first.librarySectionID
      }

      const response = await this.api.post<unknown>(path, null, { params })
      const container = this.parseResponse(PlexContainerSchema, response.data, `create ${listType}`).MediaContainer
      const [created] = this.entryKeys(container.Metadata)
      if (!created) {
        throw new ProviderRequestError('SERVICE_ERROR', `plex create ${listType}: server returned no key`)
      }

      console.log(`${this.logPrefix} Created ${listType} "${name}" (${created}) with ${itemKeys.length} item(s)`)
      return created
    })
  }

  async addItemsToList(listType: ListType, clientListId: string, itemKeys: readonly string[]): Promise<void> {
    if (itemKeys.length === 0) return

    const path =
      listType === 'playlist'
        ? `/playlists/${encodeURIComponent(clientListId)}/items`
        : `/library/collections/${encodeURIComponent(clientListId)}/items`

    await this.request(`add items to ${listType} ${clientListId}`, async () => {
      const uri = await this.libraryUri(itemKeys)
      await this.api.put(path, null, { params: { uri } })
    })
    console.log(`${this.logPrefix} Added ${itemKeys.length} item(s) to ${listType} ${clientListId}`)
  }

  // ============================================================================
  // PLEX-SPECIFIC HELPERS
  // ============================================================================

  private async getContainer(path: string, context: string): Promise<PlexContainer['MediaContainer']> {
    const response = await this.api.get<unknown>(path)
    return this.parseResponse(PlexContainerSchema, response.data, context).MediaContainer
  }

  private entryKeys(entries: readonly unknown[]): string[] {
    const keys: string[] = []
    for (const entry of entries) {
      const parsed = PlexEntryKeySchema.safeParse(entry)
      if (parsed.success) keys.push(parsed.data.ratingKey)
    }
    return keys
  }

  private async libraryUri(itemKeys: readonly string[]): Promise<string> {
    if (!this.machineIdentifier) {
      const identity = await this.getContainer('/identity', 'server identity')
      if (!identity.machineIdentifier) {
        throw new ProviderRequestError('SERVICE_ERROR', 'plex server identity: no machine identifier')
      }
      this.machineIdentifier = identity.machineIdentifier
    }
    return `server://${this.machineIdentifier}/com.plexapp.plugins.library/library/metadata/${itemKeys.join(',')}`
  }
}
