/**
 * ProviderFactory
 *
 * Factory for creating MediaProvider instances from client configuration,
 * and for the conversion registry they share.
 */

import type { ClientConfig } from '../config/AppConfig'
import type { MediaProvider, ProviderOptions, ProviderType } from './base/MediaProvider'
import { ConversionRegistry } from './base/ConversionRegistry'
import { PlexProvider } from './plex/PlexProvider'
import { registerPlexConverters } from './plex/plexConverters'
import { JellyfinProvider } from './jellyfin-emby/JellyfinProvider'
import { EmbyProvider } from './jellyfin-emby/EmbyProvider'
import { registerJellyfinEmbyConverters } from './jellyfin-emby/jellyfinConverters'
import { SubsonicProvider } from './subsonic/SubsonicProvider'
import { registerSubsonicConverters } from './subsonic/subsonicConverters'

/**
 * A registry holding the converters of every supported backend.
 */
export function createConversionRegistry(): ConversionRegistry {
  const registry = new ConversionRegistry()
  registerPlexConverters(registry)
  registerJellyfinEmbyConverters(registry)
  registerSubsonicConverters(registry)
  return registry
}

/**
 * Create a MediaProvider instance based on the client type
 */
export function createProvider(
  config: ClientConfig,
  registry: ConversionRegistry,
  options: Partial<ProviderOptions> = {}
): MediaProvider {
  switch (config.type) {
    case 'plex':
      return new PlexProvider(config, registry, options)

    case 'jellyfin':
      return new JellyfinProvider(config, registry, options)

    case 'emby':
      return new EmbyProvider(config, registry, options)

    case 'subsonic':
      return new SubsonicProvider(config, registry, options)
  }
}

/**
 * Get display name for a provider type
 */
export function getProviderDisplayName(type: ProviderType): string {
  const names: Record<ProviderType, string> = {
    plex: 'Plex',
    jellyfin: 'Jellyfin',
    emby: 'Emby',
    subsonic: 'Subsonic',
  }
  return names[type]
}
