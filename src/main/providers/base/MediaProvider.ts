/**
 * MediaProvider Interface
 *
 * Common interface for all media server providers (Plex, Jellyfin, Emby,
 * Subsonic), plus the base class holding the shared fetch, pagination and
 * conversion plumbing.
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios'
import { createMediaItem, type MediaItem } from '../../media/MediaItem'
import type { ListType } from '../../media/lists'
import type { ClientType } from '../../media/schemas'
import type { ConcreteMediaType, MediaDataByType } from '../../media/variants'
import { getErrorMessage } from '../../services/utils/errorUtils'
import { getLoggingService } from '../../services/LoggingService'
import { ConversionError, FeatureNotSupportedError, ProviderRequestError, classifyRequestError } from '../errors'
import type { z } from 'zod'
import { describeSchemaError, type ConversionContext, type ConversionRegistry } from './ConversionRegistry'

// Provider types supported by the application
export type ProviderType = ClientType

export interface ConnectionTestResult {
  success: boolean
  serverName?: string
  serverVersion?: string
  latencyMs?: number
  error?: string
}

export interface ProviderCapabilities {
  mediaTypes: readonly ConcreteMediaType[]
  createPlaylist: boolean
  createCollection: boolean
}

/**
 * Item query options. `limit` caps the total number of raw items read;
 * `offset` is where reading starts.
 */
export interface QueryOptions {
  limit?: number
  offset?: number
  query?: string
  favorites?: boolean
}

export interface FetchResult<K extends ConcreteMediaType> {
  items: MediaItem<MediaDataByType[K]>[]
  // Raw items dropped because they could not be converted
  skipped: number
}

// One page as read from the server; `total` when the server reports it
export interface RawPage {
  items: unknown[]
  total?: number
}

export interface ProviderOptions {
  pageSize: number
  requestTimeoutMs: number
  // Custom axios transport (in-process servers, proxies)
  httpAdapter?: AxiosAdapter
}

/**
 * Where and how to reach a server. `apiPath` is appended to `serverUrl` for
 * every request (Emby serves its API under /emby).
 */
export interface ProviderConnection {
  id: number
  name: string
  serverUrl: string
  apiPath?: string
  headers?: Record<string, string>
}

export const DEFAULT_PROVIDER_OPTIONS: ProviderOptions = {
  pageSize: 100,
  requestTimeoutMs: 30000,
}

export interface MediaProvider {
  readonly providerType: ProviderType
  readonly clientId: number
  readonly name: string
  readonly capabilities: ProviderCapabilities

  testConnection(): Promise<ConnectionTestResult>
  supports(type: ConcreteMediaType): boolean

  /** Every item of one media type, converted and tagged with this client's key. */
  fetchItems<K extends ConcreteMediaType>(type: K, options?: QueryOptions): Promise<FetchResult<K>>
  /** One item by its key on this server; null when the server does not know it. */
  getItem<K extends ConcreteMediaType>(type: K, itemKey: string): Promise<MediaItem<MediaDataByType[K]> | null>

  /** Server item keys of a playlist or collection, in list order. */
  getListItemIds(listType: ListType, clientListId: string): Promise<string[]>
  /** Create a list on the server and return its key there. */
  createList(listType: ListType, name: string, itemKeys: readonly string[]): Promise<string>
  addItemsToList(listType: ListType, clientListId: string, itemKeys: readonly string[]): Promise<void>
}

// ============================================================================
// BASE PROVIDER
// ============================================================================

/**
 * Base class for providers with common functionality
 */
export abstract class BaseMediaProvider implements MediaProvider {
  abstract readonly providerType: ProviderType
  abstract readonly capabilities: ProviderCapabilities

  readonly clientId: number
  readonly name: string
  protected readonly serverUrl: string
  // serverUrl plus the API path; request paths are relative to it
  protected readonly baseUrl: string
  protected readonly api: AxiosInstance
  protected readonly options: ProviderOptions

  constructor(
    connection: ProviderConnection,
    protected readonly registry: ConversionRegistry,
    options: Partial<ProviderOptions> = {}
  ) {
    this.clientId = connection.id
    this.name = connection.name
    this.serverUrl = connection.serverUrl.replace(/\/$/, '')
    this.baseUrl = `${this.serverUrl}${connection.apiPath ?? ''}`
    this.options = { ...DEFAULT_PROVIDER_OPTIONS, ...options }

    this.api = axios.create({
      baseURL: this.baseUrl,
      timeout: this.options.requestTimeoutMs,
      adapter: this.options.httpAdapter,
      headers: {
        Accept: 'application/json',
        ...connection.headers,
      },
    })
  }

  abstract testConnection(): Promise<ConnectionTestResult>
  abstract getListItemIds(listType: ListType, clientListId: string): Promise<string[]>
  abstract createList(listType: ListType, name: string, itemKeys: readonly string[]): Promise<string>
  abstract addItemsToList(listType: ListType, clientListId: string, itemKeys: readonly string[]): Promise<void>

  /** Server-side object type for a media type; null when unsupported. */
  protected abstract rawTypeFor(type: ConcreteMediaType): string | null
  protected abstract fetchPage(
    type: ConcreteMediaType,
    offset: number,
    limit: number,
    options: QueryOptions
  ): Promise<RawPage>
  /** Raw object for one item key; null when the server has no such item. */
  protected abstract fetchRawItem(type: ConcreteMediaType, itemKey: string): Promise<unknown>

  protected get logPrefix(): string {
    return `[${this.providerType}Provider ${this.clientId}]`
  }

  supports(type: ConcreteMediaType): boolean {
    return this.capabilities.mediaTypes.includes(type)
  }

  protected conversionContext(): ConversionContext {
    return { clientId: this.clientId, clientType: this.providerType, baseUrl: this.baseUrl }
  }

  protected requireRawType(type: ConcreteMediaType): string {
    const rawType = this.supports(type) ? this.rawTypeFor(type) : null
    if (!rawType) {
      throw new FeatureNotSupportedError(this.providerType, `${type} items`)
    }
    return rawType
  }

  async fetchItems<K extends ConcreteMediaType>(type: K, options: QueryOptions = {}): Promise<FetchResult<K>> {
    const rawType = this.requireRawType(type)
    const items: MediaItem<MediaDataByType[K]>[] = []
    let skipped = 0

    await this.fetchAllPages(
      (offset, limit) => this.fetchPage(type, offset, limit, options),
      (raw) => {
        try {
          items.push(this.toMediaItem(type, rawType, raw))
        } catch (error) {
          if (!(error instanceof ConversionError)) throw error
          skipped++
          console.warn(`${this.logPrefix} Skipping ${rawType}: ${error.message}`)
        }
      },
      options
    )

    console.log(`${this.logPrefix} Fetched ${items.length} ${type} item(s)${skipped ? `, skipped ${skipped}` : ''}`)
    return { items, skipped }
  }

  async getItem<K extends ConcreteMediaType>(type: K, itemKey: string): Promise<MediaItem<MediaDataByType[K]> | null> {
    const rawType = this.requireRawType(type)
    let raw: unknown
    try {
      raw = await this.request(`get ${type} ${itemKey}`, () => this.fetchRawItem(type, itemKey))
    } catch (error) {
      if (error instanceof ProviderRequestError && error.status === 404) return null
      throw error
    }
    return raw === null || raw === undefined ? null : this.toMediaItem(type, rawType, raw)
  }

  /**
   * Read pages until the server reports no more. Pagination stops at the
   * reported total when there is one, otherwise at the first short page,
   * and also when a page starts with the same item as the page before it
   * (a server that ignores the offset). Errors from `fetchPage` end the
   * enumeration.
   */
  protected async fetchAllPages(
    fetchPage: (offset: number, limit: number) => Promise<RawPage>,
    onItem: (raw: unknown) => void,
    options: QueryOptions = {}
  ): Promise<number> {
    let offset = options.offset ?? 0
    let read = 0
    let previousFirst: string | null = null

    while (true) {
      const remaining = options.limit !== undefined ? options.limit - read : this.options.pageSize
      const limit = Math.min(this.options.pageSize, remaining)
      if (limit <= 0) break

      const page = await this.request(`fetch page at ${offset}`, () => fetchPage(offset, limit))
      const pageItems = page.items.slice(0, limit)

      const first = pageItems.length > 0 ? JSON.stringify(pageItems[0]) : null
      if (first !== null && first === previousFirst) {
        console.warn(`${this.logPrefix} Page at ${offset} repeats the previous page; stopping`)
        break
      }
      previousFirst = first

      for (const raw of pageItems) {
        onItem(raw)
      }

      read += pageItems.length
      offset += pageItems.length

      if (pageItems.length === 0) break
      if (page.total !== undefined ? offset >= page.total : pageItems.length < limit) break
    }

    return read
  }

  /**
   * Convert one raw object and wrap it in a new media item carrying this
   * client's key for it.
   *
   * @throws ConversionError when the converter does not yield a client key
   */
  protected toMediaItem<K extends ConcreteMediaType>(
    type: K,
    rawType: string,
    raw: unknown
  ): MediaItem<MediaDataByType[K]> {
    const data = this.registry.convert(this.conversionContext(), rawType, type, raw)
    const details = data.getDetails()
    const itemKey = details.externalIds.getID(this.providerType)
    if (!itemKey) {
      throw new ConversionError(this.providerType, rawType, 'converted item has no server key')
    }

    const item = createMediaItem(type, data)
    item.setClientInfo(this.clientId, this.providerType, itemKey)
    for (const id of details.externalIds.toArray()) {
      item.addExternalID(id.source, id.id)
    }
    return item
  }

  /**
   * Validate a response body.
   *
   * @throws ProviderRequestError (SERVICE_ERROR) when the body does not match
   */
  protected parseResponse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, context: string): T {
    const parsed = schema.safeParse(data)
    if (!parsed.success) {
      throw new ProviderRequestError(
        'SERVICE_ERROR',
        `${this.providerType} ${context}: unexpected response (${describeSchemaError(parsed.error)})`,
        undefined,
        parsed.error
      )
    }
    return parsed.data
  }

  /**
   * Run one request, turning transport failures into ProviderRequestError.
   * Errors raised by this codebase (unsupported feature, conversion) pass through.
   */
  protected async request<T>(context: string, run: () => Promise<T>): Promise<T> {
    getLoggingService().verbose(this.logPrefix, `Request ${this.providerType} ${context}`)
    try {
      return await run()
    } catch (error) {
      if (error instanceof FeatureNotSupportedError || error instanceof ConversionError) throw error
      const wrapped = classifyRequestError(error, `${this.providerType} ${context}`)
      console.error(`${this.logPrefix} ${wrapped.message}`, getErrorMessage(error))
      throw wrapped
    }
  }
}
