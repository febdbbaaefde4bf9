/**
 * SubsonicProvider
 *
 * Implements the MediaProvider interface for Subsonic-compatible music
 * servers (Navidrome, Airsonic, Gonic). Music and playlists only.
 *
 * Every request carries token authentication: t = md5(password + salt)
 * with a fresh salt per request.
 */

import { createHash, randomBytes } from 'node:crypto'
import type { ListType } from '../../media/lists'
import type { ConcreteMediaType } from '../../media/variants'
import type { SubsonicClientConfig } from '../../config/AppConfig'
import { SubsonicPlaylistSchema, SubsonicResponseSchema, type SubsonicBody } from '../../types/subsonic'
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

const API_VERSION = '1.16.1'
const CLIENT_NAME = 'mediabridge'

type SubsonicParams = Record<string, string | number | readonly string[]>

const RAW_TYPES: Partial<Record<ConcreteMediaType, string>> = {
  artist: 'artist',
  album: 'album',
  track: 'song',
  playlist: 'playlist',
}

// Endpoint and response key for reading one item
const ITEM_ENDPOINTS: Partial<Record<ConcreteMediaType, { endpoint: string; key: keyof SubsonicBody }>> = {
  artist: { endpoint: 'getArtist', key: 'artist' },
  album: { endpoint: 'getAlbum', key: 'album' },
  track: { endpoint: 'getSong', key: 'song' },
  playlist: { endpoint: 'getPlaylist', key: 'playlist' },
}

export class SubsonicProvider extends BaseMediaProvider {
  readonly providerType = 'subsonic' as const
  readonly capabilities: ProviderCapabilities = {
    mediaTypes: ['artist', 'album', 'track', 'playlist'],
    createPlaylist: true,
    createCollection: false,
  }

  private readonly username: string
  private readonly password: string

  constructor(config: SubsonicClientConfig, registry: ConversionRegistry, options: Partial<ProviderOptions> = {}) {
    super({ id: config.id, name: config.name, serverUrl: config.serverUrl }, registry, options)
    this.username = config.username
    this.password = config.password
  }

  // ============================================================================
  // CONNECTION TESTING
  // ============================================================================

  async testConnection(): Promise<ConnectionTestResult> {
    try {
      const startTime = Date.now()
      const body = await this.request('ping', () => this.call('ping', {}, 'ping'))
      const latencyMs = Date.now() - startTime

      return {
        success: true,
        serverName: this.name,
        serverVersion: body.version,
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

  protected rawTypeFor(type: ConcreteMediaType): string | null {
    return RAW_TYPES[type] ?? null
  }

  protected async fetchPage(
    type: ConcreteMediaType,
    offset: number,
    limit: number,
    options: QueryOptions
  ): Promise<RawPage> {
    switch (type) {
      case 'artist': {
        // getArtists is not paged; it returns the whole index
        const body = await this.call('getArtists', {}, 'list artists')
        const all = (body.artists?.index ?? []).flatMap((index) => index.artist)
        return { items: all.slice(offset, offset + limit), total: all.length }
      }

      case 'album': {
        const body = await this.call(
          'getAlbumList2',
          { type: options.favorites ? 'starred' : 'alphabeticalByName', size: limit, offset },
          'list albums'
        )
        return { items: body.albumList2?.album ?? [] }
      }

      case 'track': {
        const body = await this.call(
          'search3',
          { query: options.query ?? '', songCount: limit, songOffset: offset, artistCount: 0, albumCount: 0 },
          'list songs'
        )
        return { items: body.searchResult3?.song ?? [] }
      }

      case 'playlist': {
        const body = await this.call('getPlaylists', {}, 'list playlists')
        const all = body.playlists?.playlist ?? []
        return { items: all.slice(offset, offset + limit), total: all.length }
      }

      default:
        throw new FeatureNotSupportedError(this.providerType, `${type} items`)
    }
  }

  protected async fetchRawItem(type: ConcreteMediaType, itemKey: string): Promise<unknown> {
    const target = ITEM_ENDPOINTS[type]
    if (!target) {
      throw new FeatureNotSupportedError(this.providerType, `${type} items`)
    }
    const body = await this.call(target.endpoint, { id: itemKey }, `${type} ${itemKey}`)
    return body[target.key] ?? null
  }

  // ============================================================================
  // LISTS
  // ============================================================================

  async getListItemIds(listType: ListType, clientListId: string): Promise<string[]> {
    this.requirePlaylist(listType)

    const body = await this.request(`playlist ${clientListId} items`, () =>
      this.call('getPlaylist', { id: clientListId }, `playlist ${clientListId}`)
    )
    const playlist = this.parseResponse(SubsonicPlaylistSchema, body.playlist, `playlist ${clientListId}`)
    const keys: string[] = []
    for (const entry of playlist.entry) {
      const id = this.entryId(entry)
      if (id) keys.push(id)
    }
    return keys
  }

  async createList(listType: ListType, name: string, itemKeys: readonly string[]): Promise<string> {
    this.requirePlaylist(listType)

    return this.request(`create playlist ${name}`, async () => {
      const body = await this.call('createPlaylist', { name, songId: itemKeys }, `create playlist ${name}`)
      // Servers before API 1.14 return an empty body here
      if (body.playlist === undefined) {
        throw new ProviderRequestError('SERVICE_ERROR', `subsonic create playlist ${name}: server returned no playlist`)
      }
      const created = this.parseResponse(SubsonicPlaylistSchema, body.playlist, 'create playlist')
      console.log(`${this.logPrefix} Created playlist "${name}" (${created.id}) with ${itemKeys.length} item(s)`)
      return created.id
    })
  }

  async addItemsToList(listType: ListType, clientListId: string, itemKeys: readonly string[]): Promise<void> {
    this.requirePlaylist(listType)
    if (itemKeys.length === 0) return

    await this.request(`add items to playlist ${clientListId}`, () =>
      this.call('updatePlaylist', { playlistId: clientListId, songIdToAdd: itemKeys }, `update playlist ${clientListId}`)
    )
    console.log(`${this.logPrefix} Added ${itemKeys.length} item(s) to playlist ${clientListId}`)
  }

  // ============================================================================
  // SUBSONIC-SPECIFIC HELPERS
  // ============================================================================

  private requirePlaylist(listType: ListType): void {
    if (listType !== 'playlist') {
      throw new FeatureNotSupportedError(this.providerType, `${listType}s`)
    }
  }

  private entryId(entry: unknown): string | null {
    const parsed = SubsonicPlaylistSchema.pick({ id: true }).safeParse(entry)
    return parsed.success ? parsed.data.id : null
  }

  private authParams(): Record<string, string> {
    const salt = randomBytes(6).toString('hex')
    const token = createHash('md5')
      .update(this.password + salt)
      .digest('hex')
    return { u: this.username, t: token, s: salt, v: API_VERSION, c: CLIENT_NAME, f: 'json' }
  }

  /**
   * Call one REST endpoint and unwrap `subsonic-response`.
   *
   * @throws ProviderRequestError when the server answers with status "failed"
   */
  private async call(endpoint: string, params: SubsonicParams, context: string): Promise<SubsonicBody> {
    const response = await this.api.get<unknown>(`/rest/${endpoint}.view`, {
      params: { ...params, ...this.authParams() },
      // Repeated keys (songId=1&songId=2), not songId[]=1
      paramsSerializer: { indexes: null },
    })
    const body = this.parseResponse(SubsonicResponseSchema, response.data, context)['subsonic-response']

    if (body.status === 'failed') {
      const code = body.error?.code ?? 0
      const message = `subsonic ${context}: ${body.error?.message || 'request failed'} (code ${code})`
      // 40/41: bad credentials or token auth unsupported, 50: not permitted, 70: not found
      if (code === 40 || code === 41 || code === 50) {
        throw new ProviderRequestError('AUTH_FAILED', message)
      }
      if (code === 70) {
        throw new ProviderRequestError('REQUEST_ERROR', message, 404)
      }
      throw new ProviderRequestError('REQUEST_ERROR', message)
    }
    return body
  }
}
