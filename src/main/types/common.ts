// Shared pieces of the media server wire schemas

import { z } from 'zod'

/**
 * Server-side item key. Servers send these as strings or numbers; either way
 * it is kept as a non-empty string.
 */
export const RawIdSchema = z.union([z.string(), z.number()]).transform(String).pipe(z.string().min(1))

// Optional counterpart: missing, null and '' all read as undefined
export const OptionalRawIdSchema = z
  .union([z.string(), z.number(), z.null()])
  .optional()
  .transform((value) => (value === null || value === undefined || value === '' ? undefined : String(value)))

// Numbers some servers send as strings ("2019", "7.5")
export const LooseNumberSchema = z
  .union([z.number(), z.string()])
  .optional()
  .transform((value) => {
    if (value === undefined || value === '') return undefined
    const parsed = typeof value === 'number' ? value : Number(value)
    return Number.isFinite(parsed) ? parsed : undefined
  })
