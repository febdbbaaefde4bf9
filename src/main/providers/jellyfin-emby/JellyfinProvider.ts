/**
 * JellyfinProvider
 *
 * Implements the MediaProvider interface for Jellyfin Media Server.
 * Extends JellyfinEmbyBase since Jellyfin forked from Emby and shares a similar API.
 */

import { JellyfinEmbyBase } from './JellyfinEmbyBase'
import type { JellyfinClientConfig } from '../../config/AppConfig'
import type { ConversionRegistry } from '../base/ConversionRegistry'
import type { ProviderOptions } from '../base/MediaProvider'

export class JellyfinProvider extends JellyfinEmbyBase {
  readonly providerType = 'jellyfin' as const

  constructor(config: JellyfinClientConfig, registry: ConversionRegistry, options: Partial<ProviderOptions> = {}) {
    // Jellyfin uses the standard Authorization header (X-Emby-Authorization is for Emby)
    super(config, { apiPath: '', authHeaderName: 'Authorization', authScheme: 'MediaBrowser' }, registry, options)
  }
}
