/**
 * Vitest Global Setup
 *
 * This file runs before each test file.
 * Use it to set up global test utilities.
 */

import { afterEach, vi } from 'vitest'

// Keep provider and service logging out of the test output
vi.spyOn(console, 'log').mockImplementation(() => {})
vi.spyOn(console, 'info').mockImplementation(() => {})
vi.spyOn(console, 'warn').mockImplementation(() => {})
vi.spyOn(console, 'error').mockImplementation(() => {})
vi.spyOn(console, 'debug').mockImplementation(() => {})

afterEach(() => {
  vi.clearAllMocks()
})

// Global test utilities
declare global {
  var __TEST__: boolean
}
globalThis.__TEST__ = true
