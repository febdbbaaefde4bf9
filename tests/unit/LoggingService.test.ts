/**
 * LoggingService Unit Tests
 */

import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import {
  LogFileWriter,
  LoggingService,
  formatFileLine,
  renderTextExport,
  type LogEntry,
  type LogExport,
} from '../../src/main/services/LoggingService'

const SETTINGS = { fileLogging: false, logDir: 'logs', minLevel: 'info' as const, retentionDays: 7, verbose: false }

function todaysFile(dir: string): string {
  return path.join(dir, `mediabridge-${new Date().toISOString().slice(0, 10)}.log`)
}

describe('LoggingService', () => {
  let service: LoggingService
  let dir: string

  beforeEach(() => {
    service = new LoggingService('/home/tester')
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mediabridge-logs-'))
  })

  afterEach(async () => {
    await service.shutdown()
    fs.rmSync(dir, { recursive: true, force: true })
  })

  describe('console capture', () => {
    beforeEach(() => {
      service.initialize(SETTINGS)
    })

    it('takes the source from the bracketed prefix', () => {
      console.log('[MediaSyncService] Synced 3 item(s)')
      console.warn('no prefix here')

      const [initialized, synced, plain] = service.getLogs()
      expect(initialized).toMatchObject({ level: 'info', source: '[LoggingService]', message: 'Logging service initialized' })
      expect(synced).toMatchObject({ level: 'info', source: '[MediaSyncService]', message: 'Synced 3 item(s)' })
      expect(plain).toMatchObject({ level: 'warn', source: '[App]', message: 'no prefix here' })
    })

    it('keeps error details with the stack', () => {
      console.error('[plexProvider 1] Request failed', new Error('boom'))

      const entry = service.getLogs(1)[0]
      expect(entry.level).toBe('error')
      expect(entry.details).toMatch(/^Error: boom\n/)
    })

    it('stringifies object details', () => {
      console.info('[Database] Integrity check failed:', { ok: false })

      expect(service.getLogs(1)[0].details).toBe('{\n  "ok": false\n}')
    })

    it('hides the home directory with either separator', () => {
      console.log('[AppConfig] Reading /home/tester/mediabridge.json')
      console.log('[AppConfig] Reading \\home\\tester\\other.json')

      expect(service.getLogs(2).map((entry) => entry.message)).toEqual([
        'Reading ~/mediabridge.json',
        'Reading ~\\other.json',
      ])
    })

    it('keeps at most 2000 routine entries', () => {
      for (let i = 0; i < 2100; i++) console.debug(`[Test] entry ${i}`)

      const logs = service.getLogs()
      expect(logs).toHaveLength(2000)
      expect(logs[logs.length - 1].message).toBe('entry 2099')
    })

    it('keeps warnings apart from routine churn', () => {
      console.warn('[Test] disk almost full')
      for (let i = 0; i < 2100; i++) console.debug(`[Test] entry ${i}`)

      expect(service.getLogs().filter((entry) => entry.level === 'warn')).toHaveLength(1)
    })

    it('notifies subscribers until they unsubscribe', () => {
      const received: LogEntry[] = []
      const unsubscribe = service.subscribe((entry) => received.push(entry))

      console.log('[Test] first')
      unsubscribe()
      console.log('[Test] second')

      expect(received.map((entry) => entry.message)).toEqual(['first'])
    })

    it('records verbose entries only when configured', () => {
      service.verbose('[Test]', 'hidden')
      service.configure({ ...SETTINGS, verbose: true })
      service.verbose('[Test]', 'shown')

      const messages = service.getLogs().map((entry) => entry.message)
      expect(messages).not.toContain('hidden')
      expect(service.getLogs(1)[0]).toMatchObject({ level: 'verbose', message: 'shown' })
    })

    it('clears the buffers', () => {
      console.log('[Test] noise')
      service.clearLogs()

      expect(service.getLogs().map((entry) => entry.message)).toEqual(['Logs cleared'])
    })

    it('puts the console back on shutdown', async () => {
      const intercepted = console.log
      await service.shutdown()

      expect(console.log).not.toBe(intercepted)
      console.log('[Test] after shutdown')
      expect(service.getLogs().map((entry) => entry.message)).not.toContain('after shutdown')
    })
  })

  describe('file logging', () => {
    it('creates the directory and writes entries at or above the minimum level', async () => {
      const logDir = path.join(dir, 'nested', 'logs')
      service.initialize({ ...SETTINGS, fileLogging: true, logDir, minLevel: 'warn' })

      console.log('[Test] skipped')
      console.warn('[Test] kept')
      await service.flush()

      expect(service.logDir).toBe(logDir)
      const lines = fs.readFileSync(todaysFile(logDir), 'utf-8').split('\n').filter(Boolean)
      expect(lines).toHaveLength(1)
      expect(lines[0]).toMatch(/ \[WARN {3}\] \[Test\] kept$/)
    })

    it('writes what is still buffered on shutdown', async () => {
      service.initialize({ ...SETTINGS, fileLogging: true, logDir: dir })
      console.error('[Test] last words')

      await service.shutdown()

      expect(service.logDir).toBeNull()
      expect(fs.readFileSync(todaysFile(dir), 'utf-8')).toContain('[ERROR  ] [Test] last words\n')
    })

    it('stops writing when file logging is turned off', async () => {
      service.initialize({ ...SETTINGS, fileLogging: true, logDir: dir })
      service.configure(SETTINGS)
      console.log('[Test] not on disk')
      await service.flush()

      expect(service.logDir).toBeNull()
      expect(fs.readFileSync(todaysFile(dir), 'utf-8')).not.toContain('not on disk')
    })
  })

  describe('export', () => {
    beforeEach(() => {
      service.initialize(SETTINGS)
      console.warn('[Test] careful')
      console.error('[Test] broken')
    })

    it('writes JSON with per-level counts and diagnostics', async () => {
      const file = path.join(dir, 'export.json')

      await service.exportLogs(file, 'json', [{ name: 'Home Plex', clientType: 'Plex', serverVersion: '1.40.0' }], {
        database: { path: '/data/mediabridge.db', itemCount: 3 },
        itemCounts: [{ mediaType: 'movie', count: 3 }],
      })

      const exported: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'))
      expect(exported).toMatchObject({
        clients: [{ name: 'Home Plex', clientType: 'Plex', serverVersion: '1.40.0' }],
        diagnostics: { database: { itemCount: 3 } },
        counts: { verbose: 0, debug: 0, info: 1, warn: 1, error: 1 },
      })
    })

    it('writes a readable text report', async () => {
      const file = path.join(dir, 'export.txt')

      await service.exportLogs(file, 'text', [], {
        database: { path: '/data/mediabridge.db', itemCount: 3 },
        itemCounts: [
          { mediaType: 'movie', count: 2 },
          { mediaType: 'playlist', count: 1 },
        ],
      })

      const lines = fs.readFileSync(file, 'utf-8').split('\n')
      expect(lines[0]).toBe('MediaBridge Log Export')
      expect(lines).toContain('Entries: 3 (1 errors, 1 warnings)')
      expect(lines).toContain('Clients: none')
      expect(lines).toContain('Database: mediabridge.db (3 items)')
      expect(lines).toContain('Items: movie 2, playlist 1')
    })
  })
})

describe('LogFileWriter', () => {
  let dir: string

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mediabridge-writer-'))
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it('deletes dated log files past retention', async () => {
    const writer = new LogFileWriter(dir, 'info', 7, () => {})
    for (const name of ['mediabridge-2026-02-01.log', 'mediabridge-2026-02-28.log', 'mediabridge-notes.log', 'other.txt']) {
      fs.writeFileSync(path.join(dir, name), '')
    }

    const deleted = await writer.rotate(new Date('2026-03-01T12:00:00Z'))

    expect(deleted).toEqual(['mediabridge-2026-02-01.log'])
    expect(fs.readdirSync(dir).sort()).toEqual(['mediabridge-2026-02-28.log', 'mediabridge-notes.log', 'other.txt'])
  })

  it('reports a directory it cannot create instead of rejecting', async () => {
    const blocker = path.join(dir, 'blocker')
    fs.writeFileSync(blocker, '')
    const failures: string[] = []
    const writer = new LogFileWriter(path.join(blocker, 'logs'), 'info', 7, (message) => failures.push(message))

    writer.write({ id: '1', timestamp: '2026-03-01T12:00:00.000Z', level: 'info', source: '[Test]', message: 'lost' })
    await writer.flush()

    expect(failures).toEqual(['[LoggingService] Failed to write log file:'])
  })
})

describe('formatFileLine', () => {
  it('indents details under the entry', () => {
    const entry: LogEntry = {
      id: '1',
      timestamp: '2026-03-01T12:00:00.000Z',
      level: 'warn',
      source: '[Test]',
      message: 'slow response',
      details: 'first\nsecond',
    }

    expect(formatFileLine(entry)).toBe('2026-03-01T12:00:00.000Z [WARN   ] [Test] slow response\n  first\n  second\n')
  })
})

describe('renderTextExport', () => {
  it('lists clients and indents entry details', () => {
    const data: LogExport = {
      exportedAt: '2026-03-01T12:00:00.000Z',
      startedAt: '2026-03-01T11:00:00.000Z',
      platform: 'linux 6.1 (x64)',
      nodeVersion: '20.11.0',
      clients: [{ name: 'Home Plex', clientType: 'Plex', serverVersion: '1.40.0' }],
      diagnostics: null,
      counts: { verbose: 0, debug: 0, info: 0, warn: 1, error: 0 },
      logs: [
        {
          id: '1',
          timestamp: '2026-03-01T12:00:00.000Z',
          level: 'warn',
          source: '[Test]',
          message: 'slow response',
          details: 'first\nsecond',
        },
      ],
    }

    expect(renderTextExport(data).split('\n')).toEqual([
      'MediaBridge Log Export',
      'Exported: 2026-03-01T12:00:00.000Z',
      'Started: 2026-03-01T11:00:00.000Z',
      'Platform: linux 6.1 (x64), Node 20.11.0',
      'Entries: 1 (0 errors, 1 warnings)',
      'Clients:',
      '  - Home Plex (Plex v1.40.0)',
      '-'.repeat(80),
      '2026-03-01 12:00:00.000 WARN    [Test] slow response',
      '    first',
      '    second',
      '',
    ])
  })
})
