/**
 * ProviderUtils
 *
 * Small value conversions shared by the per-server converters.
 */

import type { Credit } from '../../media/schemas'

// ============================================================================
// DATES & DURATIONS
// ============================================================================

/** Parse an ISO date string; undefined when missing or unparseable. */
export function parseDate(value: string | null | undefined): Date | undefined {
  if (!value) return undefined
  const date = new Date(value)
  return Number.isNaN(date.getTime()) ? undefined : date
}

export function unixSecondsToDate(seconds: number | null | undefined): Date | undefined {
  if (!seconds || seconds <= 0) return undefined
  return new Date(seconds * 1000)
}

/** Jellyfin/Emby RunTimeTicks (100ns units) to whole seconds. */
export function ticksToSeconds(ticks: number | null | undefined): number {
  if (!ticks || ticks <= 0) return 0
  return Math.round(ticks / 10_000_000)
}

export function millisecondsToSeconds(ms: number | null | undefined): number {
  if (!ms || ms <= 0) return 0
  return Math.round(ms / 1000)
}

/** The reported year, else the year of the release date, else 0. */
export function releaseYearOf(year: number | null | undefined, releaseDate: Date | undefined): number {
  if (year && year > 0) return year
  return releaseDate ? releaseDate.getUTCFullYear() : 0
}

// ============================================================================
// STREAM INFO
// ============================================================================

/**
 * Resolution label from frame dimensions
 */
export function normalizeResolution(width: number | null | undefined, height: number | null | undefined): string {
  const w = width || 0
  const h = height || 0

  // Height first, width as secondary
  if (h >= 2160 || w >= 3840) return '4K'
  if (h >= 1080 || w >= 1920) return '1080p'
  if (h >= 720 || w >= 1280) return '720p'
  if (h >= 480 || w >= 720) return '480p'
  if (h > 0 || w > 0) return 'SD'
  return ''
}

/**
 * Resolution label from a server's own resolution string ("1080", "4k", "sd")
 */
export function normalizeResolutionLabel(label: string | null | undefined): string {
  if (!label) return ''
  const lower = label.toLowerCase().trim()
  if (lower === '4k' || lower === '2160' || lower === '2160p') return '4K'
  if (lower === 'sd') return 'SD'
  const height = parseInt(lower, 10)
  return Number.isNaN(height) ? label : normalizeResolution(0, height)
}

export function normalizeVideoCodec(codec: string | null | undefined): string {
  if (!codec) return ''
  const lower = codec.toLowerCase().trim()

  if (lower === 'h265' || lower === 'x265' || lower.includes('hevc')) return 'HEVC'
  if (lower === 'x264' || lower.includes('avc') || lower.includes('h264')) return 'H.264'
  if (lower === 'av1' || lower.includes('av01')) return 'AV1'
  if (lower.includes('vp9')) return 'VP9'
  if (lower.includes('mpeg2')) return 'MPEG-2'
  return codec.toUpperCase()
}

export function normalizeAudioCodec(codec: string | null | undefined): string {
  if (!codec) return ''
  const lower = codec.toLowerCase().trim()

  if (lower === 'truehd') return 'TrueHD'
  if (lower === 'eac3') return 'EAC3'
  if (lower === 'ac3') return 'AC3'
  if (lower.startsWith('dts')) return 'DTS'
  if (lower === 'flac') return 'FLAC'
  if (lower === 'aac') return 'AAC'
  if (lower === 'mp3') return 'MP3'
  if (lower === 'opus') return 'Opus'
  return codec.toUpperCase()
}

// ============================================================================
// IDENTIFIERS & PEOPLE
// ============================================================================

/**
 * Split a metadata agent GUID ("tmdb://603", "imdb://tt0133093") into
 * source and ID. Legacy agent GUIDs ("com.plexapp.agents.imdb://tt01?lang=en")
 * are understood too, and MusicBrainz GUIDs ("mbid://...") come back as
 * musicbrainz.
 */
export function parseAgentGuid(guid: string): { source: string; id: string } | null {
  const match = /^([a-z0-9.]+):\/\/([^?]+)/i.exec(guid)
  if (!match) return null

  let source = match[1].toLowerCase()
  if (source.startsWith('com.plexapp.agents.')) {
    source = source.slice('com.plexapp.agents.'.length)
  }
  if (source === 'themoviedb') source = 'tmdb'
  if (source === 'thetvdb') source = 'tvdb'
  if (source === 'mbid') source = 'musicbrainz'

  const id = match[2].split('/')[0]
  if (!id || source === 'plex' || source === 'local') return null
  return { source, id }
}

/** Credit with the optional fields filled in. */
export function makeCredit(name: string, role: string, character = '', department = ''): Credit {
  return { name, role, character, department }
}

/** Non-empty, trimmed, de-duplicated strings. */
export function cleanStrings(values: readonly (string | null | undefined)[]): string[] {
  const result: string[] = []
  for (const value of values) {
    const trimmed = value?.trim()
    if (trimmed && !result.includes(trimmed)) result.push(trimmed)
  }
  return result
}
