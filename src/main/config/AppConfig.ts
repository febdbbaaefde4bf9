/**
 * Application Configuration
 *
 * Loaded from a JSON file and validated with zod. A few settings can be
 * overridden from the environment:
 *
 *   MEDIABRIDGE_DB_PATH    database file (":memory:" for a throwaway store)
 *   MEDIABRIDGE_LOG_LEVEL  minimum level written to the log file
 *   MEDIABRIDGE_PAGE_SIZE  items requested per page from media servers
 */

import * as fs from 'fs'
import { z } from 'zod'
import { getErrorMessage } from '../services/utils/errorUtils'

// ============================================================================
// SCHEMAS
// ============================================================================

export const LogLevelSchema = z.enum(['verbose', 'debug', 'info', 'warn', 'error'])

const ClientIdSchema = z.number().int().positive()
const ServerUrlSchema = z.string().url().transform((url) => url.replace(/\/$/, ''))

export const PlexClientConfigSchema = z.object({
  type: z.literal('plex'),
  id: ClientIdSchema,
  name: z.string().default('Plex'),
  serverUrl: ServerUrlSchema,
  token: z.string().min(1),
})

export const JellyfinClientConfigSchema = z.object({
  type: z.literal('jellyfin'),
  id: ClientIdSchema,
  name: z.string().default('Jellyfin'),
  serverUrl: ServerUrlSchema,
  apiKey: z.string().min(1),
  userId: z.string().optional(),
})

export const EmbyClientConfigSchema = z.object({
  type: z.literal('emby'),
  id: ClientIdSchema,
  name: z.string().default('Emby'),
  serverUrl: ServerUrlSchema,
  apiKey: z.string().min(1),
  userId: z.string().optional(),
})

export const SubsonicClientConfigSchema = z.object({
  type: z.literal('subsonic'),
  id: ClientIdSchema,
  name: z.string().default('Subsonic'),
  serverUrl: ServerUrlSchema,
  username: z.string().min(1),
  password: z.string().min(1),
})

export const ClientConfigSchema = z.discriminatedUnion('type', [
  PlexClientConfigSchema,
  JellyfinClientConfigSchema,
  EmbyClientConfigSchema,
  SubsonicClientConfigSchema,
])

export const AppConfigSchema = z
  .object({
    database: z
      .object({
        path: z.string().min(1).default('mediabridge.db'),
      })
      .default({}),
    logging: z
      .object({
        fileLogging: z.boolean().default(false),
        logDir: z.string().default('logs'),
        minLevel: LogLevelSchema.default('info'),
        retentionDays: z.number().int().positive().default(7),
        verbose: z.boolean().default(false),
      })
      .default({}),
    sync: z
      .object({
        pageSize: z.number().int().min(1).max(1000).default(100),
        requestTimeoutMs: z.number().int().positive().default(30000),
      })
      .default({}),
    clients: z.array(ClientConfigSchema).default([]),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<number>()
    config.clients.forEach((client, index) => {
      if (seen.has(client.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate client id ${client.id}`,
          path: ['clients', index, 'id'],
        })
      }
      seen.add(client.id)
    })
  })

export type LogLevel = z.infer<typeof LogLevelSchema>
export type PlexClientConfig = z.infer<typeof PlexClientConfigSchema>
export type JellyfinClientConfig = z.infer<typeof JellyfinClientConfigSchema>
export type EmbyClientConfig = z.infer<typeof EmbyClientConfigSchema>
export type SubsonicClientConfig = z.infer<typeof SubsonicClientConfigSchema>
export type ClientConfig = z.infer<typeof ClientConfigSchema>
export type AppConfig = z.infer<typeof AppConfigSchema>

// ============================================================================
// LOADING
// ============================================================================

export class ConfigError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause })
    this.name = 'ConfigError'
  }
}

/**
 * Validate a config object. Errors list every offending path.
 */
export function parseConfig(raw: unknown): AppConfig {
  const result = AppConfigSchema.safeParse(raw)
  if (!result.success) {
    const details = result.error.errors
      .map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`)
      .join('; ')
    throw new ConfigError(`Invalid configuration: ${details}`, result.error)
  }
  return result.data
}

/**
 * Apply MEDIABRIDGE_* overrides on top of a raw (unvalidated) config object.
 */
export function applyEnvOverrides(raw: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const result: Record<string, unknown> = { ...raw }

  const section = (key: string): Record<string, unknown> => {
    const value = result[key]
    const copy: Record<string, unknown> = isRecord(value) ? { ...value } : {}
    result[key] = copy
    return copy
  }

  if (env.MEDIABRIDGE_DB_PATH) {
    section('database').path = env.MEDIABRIDGE_DB_PATH
  }
  if (env.MEDIABRIDGE_LOG_LEVEL) {
    section('logging').minLevel = env.MEDIABRIDGE_LOG_LEVEL
  }
  if (env.MEDIABRIDGE_PAGE_SIZE) {
    section('sync').pageSize = parseInt(env.MEDIABRIDGE_PAGE_SIZE, 10)
  }

  return result
}

/**
 * Load configuration from `filePath` (optional) plus environment overrides.
 * A missing file path yields the defaults.
 */
export function loadConfig(filePath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  let raw: Record<string, unknown> = {}

  if (filePath) {
    let text: string
    try {
      text = fs.readFileSync(filePath, 'utf-8')
    } catch (error) {
      throw new ConfigError(`Cannot read config file ${filePath}: ${getErrorMessage(error)}`, error)
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(text)
    } catch (error) {
      throw new ConfigError(`Config file ${filePath} is not valid JSON: ${getErrorMessage(error)}`, error)
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config file ${filePath} must contain a JSON object`)
    }
    raw = parsed
  }

  const config = parseConfig(applyEnvOverrides(raw, env))
  console.log(`[AppConfig] Loaded configuration with ${config.clients.length} client(s), database: ${config.database.path}`)
  return config
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
