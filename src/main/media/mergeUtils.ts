/**
 * Collection merge helpers shared by the media model.
 *
 * Scalars follow fill-gaps (the receiver keeps any non-empty value); these
 * helpers cover list fields, which are unioned in place.
 */

import type { Credit } from './schemas'

/**
 * Append values of `incoming` not already present in `target`.
 * Order of `target` is preserved; new values keep their incoming order.
 */
export function mergeUnique<T extends string | number>(target: T[], incoming: readonly T[]): void {
  const seen = new Set<T>(target)
  for (const value of incoming) {
    if (value === '' || seen.has(value)) continue
    seen.add(value)
    target.push(value)
  }
}

function creditKey(credit: Credit): string {
  return `${credit.name}\u0000${credit.role}\u0000${credit.character}`
}

export function mergeCredits(target: Credit[], incoming: readonly Credit[]): void {
  const byKey = new Map(target.map((c) => [creditKey(c), c]))
  for (const credit of incoming) {
    const existing = byKey.get(creditKey(credit))
    if (existing) {
      if (!existing.department) existing.department = credit.department
      continue
    }
    const copy = { ...credit }
    byKey.set(creditKey(copy), copy)
    target.push(copy)
  }
}

export function cloneCredits(credits: readonly Credit[] | undefined): Credit[] {
  return (credits ?? []).map((c) => ({ ...c }))
}
