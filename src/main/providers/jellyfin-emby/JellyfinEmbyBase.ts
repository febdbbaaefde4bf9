/**
 * JellyfinEmbyBase
 *
 * Shared base class for Jellyfin and Emby providers.
 * Both servers share a very similar API since Jellyfin forked from Emby.
 */

import { z } from 'zod'
import type { ListType } from '../../media/lists'
import type { ConcreteMediaType } from '../../media/variants'
import type { EmbyClientConfig, JellyfinClientConfig } from '../../config/AppConfig'
import {
  JELLYFIN_ITEM_KINDS,
  JellyfinCreatedItemSchema,
  JellyfinItemsResponseSchema,
  JellyfinSystemInfoSchema,
} from '../../types/jellyfin'
import { getErrorMessage } from '../../services/utils/errorUtils'
import { ProviderRequestError } from '../errors'
import {
  BaseMediaProvider,
  type ConnectionTestResult,
  type ProviderCapabilities,
  type ProviderOptions,
  type QueryOptions,
  type RawPage,
} from '../base/MediaProvider'
import type { ConversionRegistry } from '../base/ConversionRegistry'

const CLIENT_NAME = 'MediaBridge'
const CLIENT_VERSION = '1.0.0'

// Fields the converters read that the servers leave out unless asked
const ITEM_FIELDS = [
  'ProviderIds',
  'Overview',
  'Genres',
  'Tags',
  'Studios',
  'People',
  'DateCreated',
  'PremiereDate',
  'MediaStreams',
  'RemoteTrailers',
  'ChildCount',
].join(',')

const UserSchema = z.object({
  Id: z.string(),
  Policy: z.object({ IsAdministrator: z.boolean().optional() }).optional(),
})

/**
 * How a server flavour authenticates and where its API lives.
 */
export interface JellyfinEmbyFlavor {
  apiPath: string
  authHeaderName: string
  authScheme: string
}

export abstract class JellyfinEmbyBase extends BaseMediaProvider {
  readonly capabilities: ProviderCapabilities = {
    mediaTypes: ['movie', 'series', 'season', 'episode', 'artist', 'album', 'track', 'playlist', 'collection'],
    createPlaylist: true,
    createCollection: true,
  }

  private userId: string | null

  constructor(
    config: JellyfinClientConfig | EmbyClientConfig,
    flavor: JellyfinEmbyFlavor,
    registry: ConversionRegistry,
    options: Partial<ProviderOptions> = {}
  ) {
    super(
      {
        id: config.id,
        name: config.name,
        serverUrl: config.serverUrl,
        apiPath: flavor.apiPath,
        headers: {
          'X-Emby-Token': config.apiKey,
          [flavor.authHeaderName]: JellyfinEmbyBase.buildAuthHeader(flavor.authScheme, config.id, config.apiKey),
        },
      },
      registry,
      options
    )
    this.userId = config.userId ?? null
  }

  static buildAuthHeader(scheme: string, clientId: number, token: string): string {
    const parts = [
      `${scheme} Client="${CLIENT_NAME}"`,
      `Device="${CLIENT_NAME}"`,
      `DeviceId="mediabridge-${clientId}"`,
      `Version="${CLIENT_VERSION}"`,
      `Token="${token}"`,
    ]
    return parts.join(', ')
  }

  // ============================================================================
  // CONNECTION TESTING
  // ============================================================================

  async testConnection(): Promise<ConnectionTestResult> {
    try {
      const startTime = Date.now()
      const response = await this.request('system info', () => this.api.get<unknown>('/System/Info'))
      const latencyMs = Date.now() - startTime
      const info = this.parseResponse(JellyfinSystemInfoSchema, response.data, 'system info')

      return {
        success: true,
        serverName: info.ServerName ?? this.name,
        serverVersion: info.Version,
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
    return JELLYFIN_ITEM_KINDS[type]
  }

  protected async fetchPage(
    type: ConcreteMediaType,
    offset: number,
    limit: number,
    options: QueryOptions
  ): Promise<RawPage> {
    const userId = await this.resolveUserId()
    const params: Record<string, string | number | boolean> = {
      UserId: userId,
      IncludeItemTypes: JELLYFIN_ITEM_KINDS[type],
      Recursive: true,
      Fields: ITEM_FIELDS,
      EnableTotalRecordCount: true,
      StartIndex: offset,
      Limit: limit,
    }
    if (options.query) params.SearchTerm = options.query
    if (options.favorites) params.IsFavorite = true

    const response = await this.api.get<unknown>('/Items', { params })
    const page = this.parseResponse(JellyfinItemsResponseSchema, response.data, `list ${params.IncludeItemTypes}`)
    return { items: page.Items, total: page.TotalRecordCount }
  }

  protected async fetchRawItem(_type: ConcreteMediaType, itemKey: string): Promise<unknown> {
    const userId = await this.resolveUserId()
    const response = await this.api.get<unknown>(
      `/Users/${encodeURIComponent(userId)}/Items/${encodeURIComponent(itemKey)}`
    )
    return response.data
  }

  /**
   * The configured user, or else the first administrator the API key can see.
   */
  protected async resolveUserId(): Promise<string> {
    if (this.userId) return this.userId

    const response = await this.api.get<unknown>('/Users')
    const users = this.parseResponse(z.array(UserSchema), response.data, 'users')
    const user = users.find((u) => u.Policy?.IsAdministrator) ?? users[0]
    if (!user) {
      throw new ProviderRequestError('REQUEST_ERROR', `${this.providerType} users: no user visible to this API key`)
    }

    console.log(`${this.logPrefix} Using user ${user.Id}`)
    this.userId = user.Id
    return user.Id
  }

  // ============================================================================
  // LISTS
  // ============================================================================

  async getListItemIds(listType: ListType, clientListId: string): Promise<string[]> {
    return this.request(`${listType} ${clientListId} items`, async () => {
      const userId = await this.resolveUserId()
      const response =
        listType === 'playlist'
          ? await this.api.get<unknown>(`/Playlists/${encodeURIComponent(clientListId)}/Items`, {
              params: { UserId: userId },
            })
          : await this.api.get<unknown>('/Items', { params: { UserId: userId, ParentId: clientListId } })

      const page = this.parseResponse(JellyfinItemsResponseSchema, response.data, `${listType} items`)
      const keys: string[] = []
      for (const entry of page.Items) {
        const parsed = JellyfinCreatedItemSchema.safeParse(entry)
        if (parsed.success) keys.push(parsed.data.Id)
      }
      return keys
    })
  }

  async createList(listType: ListType, name: string, itemKeys: readonly string[]): Promise<string> {
    return this.request(`create ${listType} ${name}`, async () => {
      const params: Record<string, string> = { Name: name, Ids: itemKeys.join(',') }
      let path = '/Collections'
      if (listType === 'playlist') {
        path = '/Playlists'
        params.UserId = await this.resolveUserId()
      }

      const response = await this.api.post<unknown>(path, null, { params })
      const created = this.parseResponse(JellyfinCreatedItemSchema, response.data, `create ${listType}`)
      console.log(`${this.logPrefix} Created ${listType} "${name}" (${created.Id}) with ${itemKeys.length} item(s)`)
      return created.Id
    })
  }

  async addItemsToList(listType: ListType, clientListId: string, itemKeys: readonly string[]): Promise<void> {
    if (itemKeys.length === 0) return

    await this.request(`add items to ${listType} ${clientListId}`, async () => {
      const params: Record<string, string> = { Ids: itemKeys.join(',') }
      let path = `/Collections/${encodeURIComponent(clientListId)}/Items`
      if (listType === 'playlist') {
        path = `/Playlists/${encodeURIComponent(clientListId)}/Items`
        params.UserId = await this.resolveUserId()
      }
      await this.api.post(path, null, { params })
    })
    console.log(`${this.logPrefix} Added ${itemKeys.length} item(s) to ${listType} ${clientListId}`)
  }
}
