/**
 * ConversionRegistry
 *
 * Explicit table of converters keyed by (client type, raw type, media type).
 * A converter validates one raw server object with its zod schema and builds
 * the matching media payload. The table is filled once at startup by
 * `createConversionRegistry()` and handed to every provider.
 */

import type { z } from 'zod'
import type { ClientType } from '../../media/schemas'
import { isMediaDataOfType, type ConcreteMediaType, type MediaDataByType } from '../../media/variants'
import type { MediaData } from '../../media/MediaDetails'
import { ConversionError, FeatureNotSupportedError } from '../errors'

/**
 * What a converter knows about the server an object came from.
 * `baseUrl` is the API root artwork URLs are built against.
 */
export interface ConversionContext {
  clientId: number
  clientType: ClientType
  baseUrl: string
}

export type Converter<Raw, K extends ConcreteMediaType> = (ctx: ConversionContext, raw: Raw) => MediaDataByType[K]

interface RegistryEntry {
  convert(ctx: ConversionContext, raw: unknown): MediaData
}

export function conversionKey(clientType: ClientType, rawType: string, mediaType: ConcreteMediaType): string {
  return `${clientType}:${rawType}:${mediaType}`
}

/**
 * Describe a failed schema check the way logs read best: a missing field by
 * name, anything else with its path and zod's message.
 */
export function describeSchemaError(error: z.ZodError): string {
  const issue = error.issues[0]
  if (!issue) return 'invalid object'

  const path = issue.path.join('.') || '(root)'
  if (isMissingValue(issue)) {
    return `missing required field (${path})`
  }
  return `invalid field (${path}): ${issue.message}`
}

// Absent, or an empty string where one is required. Server keys accept a
// string or a number, so an absent key fails every member of the union.
function isMissingValue(issue: z.ZodIssue): boolean {
  switch (issue.code) {
    case 'invalid_type':
      return issue.received === 'undefined'
    case 'too_small':
      return issue.type === 'string' && issue.minimum === 1
    case 'invalid_union':
      return issue.unionErrors.every((unionError) => unionError.issues.some(isMissingValue))
    default:
      return false
  }
}

export class ConversionRegistry {
  private entries = new Map<string, RegistryEntry>()

  /**
   * Register a converter. Registering the same key again replaces the
   * earlier converter.
   */
  register<Raw, K extends ConcreteMediaType>(
    clientType: ClientType,
    rawType: string,
    mediaType: K,
    schema: z.ZodType<Raw, z.ZodTypeDef, unknown>,
    convert: Converter<Raw, K>
  ): this {
    this.entries.set(conversionKey(clientType, rawType, mediaType), {
      convert: (ctx, raw) => {
        const parsed = schema.safeParse(raw)
        if (!parsed.success) {
          throw new ConversionError(clientType, rawType, describeSchemaError(parsed.error), parsed.error)
        }
        return convert(ctx, parsed.data)
      },
    })
    return this
  }

  has(clientType: ClientType, rawType: string, mediaType: ConcreteMediaType): boolean {
    return this.entries.has(conversionKey(clientType, rawType, mediaType))
  }

  get size(): number {
    return this.entries.size
  }

  keys(): string[] {
    return [...this.entries.keys()]
  }

  /**
   * Convert one raw object.
   *
   * @throws FeatureNotSupportedError when no converter is registered
   * @throws ConversionError when the object fails validation or conversion
   */
  convert<K extends ConcreteMediaType>(
    ctx: ConversionContext,
    rawType: string,
    mediaType: K,
    raw: unknown
  ): MediaDataByType[K] {
    const entry = this.entries.get(conversionKey(ctx.clientType, rawType, mediaType))
    if (!entry) {
      throw new FeatureNotSupportedError(ctx.clientType, `convert ${rawType} to ${mediaType}`)
    }

    let data: MediaData
    try {
      data = entry.convert(ctx, raw)
    } catch (error) {
      if (error instanceof ConversionError) throw error
      throw new ConversionError(ctx.clientType, rawType, `conversion to ${mediaType} failed`, error)
    }

    if (!isMediaDataOfType(data, mediaType)) {
      throw new ConversionError(ctx.clientType, rawType, `converter produced ${data.mediaType}, expected ${mediaType}`)
    }
    return data
  }
}
