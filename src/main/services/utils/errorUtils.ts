/**
 * Error Handling Utilities
 *
 * Type-safe error helpers shared by services and providers.
 */

import { isAxiosError as isAxiosErrorBase } from 'axios'

/**
 * Get a consistent error message from any error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}

/**
 * Type guard for Node.js system errors (with code property)
 */
export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error
}

/**
 * Type guard for errors thrown by axios requests
 */
export function isAxiosError(error: unknown): error is { response?: { status: number; data?: unknown }; code?: string; message: string } {
  return isAxiosErrorBase(error)
}

/**
 * Status, body and code of a failed request, when there was one
 */
export function getAxiosErrorDetails(error: unknown): { status?: number; data?: unknown; code?: string; message: string } {
  if (isAxiosError(error)) {
    return {
      status: error.response?.status,
      data: error.response?.data,
      code: error.code,
      message: error.message,
    }
  }
  return { message: getErrorMessage(error) }
}

/**
 * Get error code for Node.js and axios errors (ENOENT, ECONNREFUSED, etc.)
 */
export function getErrorCode(error: unknown): string | undefined {
  if (isAxiosError(error)) {
    return error.code
  }
  if (isNodeError(error)) {
    return error.code
  }
  return undefined
}
