/**
 * Provider Error Types
 *
 * - ConversionError: one raw item could not be turned into a media payload.
 *   Enumerations log it and move on to the next item.
 * - FeatureNotSupportedError: the media server cannot do what was asked.
 * - ProviderRequestError: the request itself failed. Not retried; it ends
 *   the operation that issued it.
 */

import { getAxiosErrorDetails, getErrorCode } from '../services/utils/errorUtils'
import type { ClientType } from '../media/schemas'

export const FEATURE_NOT_SUPPORTED_MESSAGE = 'feature not supported by this media client'

export class ConversionError extends Error {
  constructor(
    readonly clientType: ClientType,
    readonly rawType: string,
    message: string,
    cause?: unknown
  ) {
    super(`${clientType} ${rawType}: ${message}`, { cause })
    this.name = 'ConversionError'
  }
}

export class FeatureNotSupportedError extends Error {
  constructor(
    readonly clientType: ClientType,
    readonly feature: string
  ) {
    super(`${FEATURE_NOT_SUPPORTED_MESSAGE} (${clientType}: ${feature})`)
    this.name = 'FeatureNotSupportedError'
  }
}

// ============================================================================
// REQUEST ERRORS
// ============================================================================

export type ProviderErrorCode =
  | 'AUTH_FAILED' // 401/403
  | 'SERVICE_UNREACHABLE' // ECONNREFUSED, ETIMEDOUT
  | 'SERVICE_ERROR' // 5xx
  | 'REQUEST_ERROR' // other HTTP errors
  | 'NETWORK_ERROR' // DNS, TLS, anything without a response

export class ProviderRequestError extends Error {
  constructor(
    readonly code: ProviderErrorCode,
    message: string,
    readonly status?: number,
    cause?: unknown
  ) {
    super(message, { cause })
    this.name = 'ProviderRequestError'
  }
}

const UNREACHABLE_CODES = new Set(['ECONNREFUSED', 'ETIMEDOUT', 'ECONNABORTED', 'ECONNRESET'])

/**
 * Wrap a failed request with the operation that issued it.
 */
export function classifyRequestError(error: unknown, context: string): ProviderRequestError {
  if (error instanceof ProviderRequestError) {
    return error
  }

  const { status, message } = getAxiosErrorDetails(error)
  // Sockets fail with Node system errors too
  const code = getErrorCode(error)

  if (status !== undefined) {
    if (status === 401 || status === 403) {
      return new ProviderRequestError('AUTH_FAILED', `${context}: authentication failed (HTTP ${status})`, status, error)
    }
    if (status >= 500) {
      return new ProviderRequestError('SERVICE_ERROR', `${context}: server error (HTTP ${status})`, status, error)
    }
    return new ProviderRequestError('REQUEST_ERROR', `${context}: request failed (HTTP ${status})`, status, error)
  }

  if (code && UNREACHABLE_CODES.has(code)) {
    return new ProviderRequestError('SERVICE_UNREACHABLE', `${context}: cannot reach server (${code})`, undefined, error)
  }

  return new ProviderRequestError('NETWORK_ERROR', `${context}: ${message}`, undefined, error)
}
