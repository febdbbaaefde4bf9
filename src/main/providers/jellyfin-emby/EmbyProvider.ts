/**
 * EmbyProvider
 *
 * Implements the MediaProvider interface for Emby Media Server.
 * Extends JellyfinEmbyBase since Jellyfin forked from Emby and shares a similar API.
 *
 * Note: The main differences from Jellyfin are:
 * - The API is served under /emby
 * - The auth header is X-Emby-Authorization with the "Emby" scheme
 */

import { JellyfinEmbyBase } from './JellyfinEmbyBase'
import type { EmbyClientConfig } from '../../config/AppConfig'
import type { ConversionRegistry } from '../base/ConversionRegistry'
import type { ProviderOptions } from '../base/MediaProvider'

export class EmbyProvider extends JellyfinEmbyBase {
  readonly providerType = 'emby' as const

  constructor(config: EmbyClientConfig, registry: ConversionRegistry, options: Partial<ProviderOptions> = {}) {
    super(config, { apiPath: '/emby', authHeaderName: 'X-Emby-Authorization', authScheme: 'Emby' }, registry, options)
  }
}
