/**
 * LoggingService
 *
 * Captures console output from every component into bounded in-memory
 * buffers, forwards entries to subscribers and, when the configuration asks
 * for it, to a daily log file. The buffers can be exported together with a
 * snapshot of the connected clients and the store.
 */

import * as fs from 'fs/promises'
import * as path from 'path'
import * as os from 'os'
import type { AppConfig, LogLevel } from '../config/AppConfig'

export type { LogLevel }

export type LoggingSettings = AppConfig['logging']

export interface ClientInfo {
  name: string
  clientType: string
  serverVersion: string | null
}

export interface DiagnosticInfo {
  database: { path: string; itemCount: number }
  itemCounts: { mediaType: string; count: number }[]
}

export interface LogEntry {
  id: string
  timestamp: string
  level: LogLevel
  source: string // e.g. "[MediaSyncService]"
  message: string
  details?: string
}

export type LogListener = (entry: LogEntry) => void

export type ExportFormat = 'json' | 'text'

export interface LogExport {
  exportedAt: string
  startedAt: string
  platform: string
  nodeVersion: string
  clients: ClientInfo[]
  diagnostics: DiagnosticInfo | null
  counts: Record<LogLevel, number>
  logs: LogEntry[]
}

const LEVEL_PRIORITY: Record<LogLevel, number> = { verbose: 0, debug: 1, info: 2, warn: 3, error: 4 }
const LOG_FILE_PREFIX = 'mediabridge-'

let nextEntryId = 0

function dayOf(date: Date): string {
  return date.toISOString().slice(0, 10)
}

export function logFileName(day: string): string {
  return `${LOG_FILE_PREFIX}${day}.log`
}

// ============================================================================
// ENTRY BUFFER
// ============================================================================

/** Keeps the newest `capacity` entries. */
class EntryBuffer {
  private entries: LogEntry[] = []

  constructor(private readonly capacity: number) {}

  push(entry: LogEntry): void {
    this.entries.push(entry)
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity)
    }
  }

  toArray(): LogEntry[] {
    return [...this.entries]
  }

  clear(): void {
    this.entries = []
  }
}

// ============================================================================
// FILE SINK
// ============================================================================

type ErrorReporter = (message: string, error: unknown) => void

/**
 * Appends formatted entries to `<dir>/mediabridge-YYYY-MM-DD.log`. The
 * directory is created on the first write; files older than the retention
 * period are removed whenever the day changes. Writes are queued, so
 * `flush()` resolves once every entry handed in so far is on disk.
 */
export class LogFileWriter {
  static readonly FLUSH_INTERVAL_MS = 5000
  static readonly FLUSH_BATCH = 50

  private pending: string[] = []
  private queue: Promise<void> = Promise.resolve()
  private timer: NodeJS.Timeout | null = null
  private dirReady = false
  private currentDay = ''

  constructor(
    readonly dir: string,
    private readonly minLevel: LogLevel,
    private readonly retentionDays: number,
    private readonly reportError: ErrorReporter
  ) {}

  start(): void {
    if (this.timer) return
    this.timer = setInterval(() => void this.flush(), LogFileWriter.FLUSH_INTERVAL_MS)
    this.timer.unref()
  }

  write(entry: LogEntry): void {
    if (LEVEL_PRIORITY[entry.level] < LEVEL_PRIORITY[this.minLevel]) return
    this.pending.push(formatFileLine(entry))
    if (this.pending.length >= LogFileWriter.FLUSH_BATCH) void this.flush()
  }

  // Never rejects; failures go to the error reporter
  flush(): Promise<void> {
    this.queue = this.queue.then(() => this.writePending())
    return this.queue
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }
    await this.flush()
  }

  /**
   * Delete this writer's log files dated before the retention window.
   * Returns the deleted file names. Never rejects.
   */
  async rotate(now: Date = new Date()): Promise<string[]> {
    const cutoff = new Date(now)
    cutoff.setDate(cutoff.getDate() - this.retentionDays)

    const deleted: string[] = []
    try {
      for (const file of await fs.readdir(this.dir)) {
        const match = /^mediabridge-(\d{4}-\d{2}-\d{2})\.log$/.exec(file)
        if (!match) continue
        if (new Date(`${match[1]}T00:00:00Z`) >= cutoff) continue
        await fs.unlink(path.join(this.dir, file))
        deleted.push(file)
      }
    } catch (error) {
      this.reportError('[LoggingService] Failed to rotate log files:', error)
    }
    return deleted
  }

  private async writePending(): Promise<void> {
    if (this.pending.length === 0) return
    const lines = this.pending.splice(0)
    const day = dayOf(new Date())

    try {
      if (!this.dirReady) {
        await fs.mkdir(this.dir, { recursive: true })
        this.dirReady = true
      }
      if (day !== this.currentDay) {
        this.currentDay = day
        await this.rotate()
      }
      await fs.appendFile(path.join(this.dir, logFileName(day)), lines.join(''), 'utf-8')
    } catch (error) {
      this.reportError('[LoggingService] Failed to write log file:', error)
    }
  }
}

export function formatFileLine(entry: LogEntry): string {
  const level = entry.level.toUpperCase().padEnd(7)
  let line = `${entry.timestamp} [${level}] ${entry.source} ${entry.message}`
  if (entry.details) {
    line += `\n  ${entry.details.replace(/\n/g, '\n  ')}`
  }
  return line + '\n'
}

// ============================================================================
// CAPTURE HELPERS
// ============================================================================

function splitSource(message: string): { source: string; message: string } {
  const match = /^\[([^\]]+)\]/.exec(message)
  if (!match) return { source: '[App]', message }
  return { source: match[0], message: message.slice(match[0].length).trim() }
}

function describeArgument(arg: unknown): string {
  if (arg instanceof Error) {
    return `${arg.name}: ${arg.message}\n${arg.stack ?? 'No stack trace'}`
  }
  if (typeof arg !== 'object' || arg === null) return String(arg)
  try {
    return JSON.stringify(arg, null, 2)
  } catch {
    // Circular structures
    return String(arg)
  }
}

type ConsoleMethod = 'log' | 'info' | 'warn' | 'error' | 'debug'

const CONSOLE_LEVELS: Record<ConsoleMethod, LogLevel> = {
  log: 'info',
  info: 'info',
  warn: 'warn',
  error: 'error',
  debug: 'debug',
}

// ============================================================================
// SERVICE
// ============================================================================

export class LoggingService {
  static readonly MAX_INFO_ENTRIES = 2000
  static readonly MAX_IMPORTANT_ENTRIES = 500

  // info/debug/verbose churn fast; warn/error get their own smaller buffer
  private readonly routine = new EntryBuffer(LoggingService.MAX_INFO_ENTRIES)
  private readonly important = new EntryBuffer(LoggingService.MAX_IMPORTANT_ENTRIES)
  private readonly listeners = new Set<LogListener>()
  private readonly startedAt = new Date()
  private readonly homePattern: RegExp | null
  private readonly original: Record<ConsoleMethod, (...args: unknown[]) => void>
  private intercepting = false
  private verboseEnabled = false
  private fileWriter: LogFileWriter | null = null
  // Final flushes of writers replaced by configure()
  private retired: Promise<void> = Promise.resolve()

  constructor(homeDir: string = os.homedir()) {
    // Node's console methods are already bound
    this.original = {
      log: console.log,
      info: console.info,
      warn: console.warn,
      error: console.error,
      debug: console.debug,
    }
    this.homePattern = homeDir.length > 1 ? LoggingService.pathPattern(homeDir) : null
  }

  // Matches the path with either separator style
  private static pathPattern(dir: string): RegExp {
    const escaped = dir
      .split(/[/\\]/)
      .map((part) => part.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'))
      .join('[/\\\\]')
    return new RegExp(escaped, 'gi')
  }

  /** Apply the settings and start capturing console output. */
  initialize(settings: LoggingSettings): void {
    this.configure(settings)
    this.interceptConsole()
    this.record('info', '[LoggingService]', 'Logging service initialized')
  }

  /**
   * Apply the logging section of the configuration. Enabling file logging
   * starts a writer for `logDir`; a writer for a previous directory is
   * flushed and stopped.
   */
  configure(settings: LoggingSettings): void {
    this.verboseEnabled = settings.verbose

    const previous = this.fileWriter
    this.fileWriter = null
    if (previous) this.retired = this.retired.then(() => previous.stop())

    if (settings.fileLogging) {
      const writer = new LogFileWriter(
        path.resolve(settings.logDir),
        settings.minLevel,
        settings.retentionDays,
        (message, error) => this.original.error(message, error)
      )
      writer.start()
      this.fileWriter = writer
    }
  }

  get logDir(): string | null {
    return this.fileWriter?.dir ?? null
  }

  subscribe(listener: LogListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  verbose(source: string, message: string, details?: string): void {
    if (this.verboseEnabled) this.record('verbose', source, message, details)
  }

  getLogs(limit?: number): LogEntry[] {
    // IDs are assigned in arrival order
    const all = [...this.routine.toArray(), ...this.important.toArray()].sort((a, b) => Number(a.id) - Number(b.id))
    return limit ? all.slice(-limit) : all
  }

  clearLogs(): void {
    this.routine.clear()
    this.important.clear()
    this.record('info', '[LoggingService]', 'Logs cleared')
  }

  /** Write everything buffered for the log file. */
  async flush(): Promise<void> {
    await this.retired
    await this.fileWriter?.flush()
  }

  /** Stop file logging after a final flush and restore the console. */
  async shutdown(): Promise<void> {
    const writer = this.fileWriter
    this.fileWriter = null
    await this.retired
    await writer?.stop()
    this.restoreConsole()
  }

  // ============================================================================
  // EXPORT
  // ============================================================================

  buildExport(clients: ClientInfo[] = [], diagnostics: DiagnosticInfo | null = null): LogExport {
    const logs = this.getLogs()
    const counts: Record<LogLevel, number> = { verbose: 0, debug: 0, info: 0, warn: 0, error: 0 }
    for (const entry of logs) counts[entry.level]++

    return {
      exportedAt: new Date().toISOString(),
      startedAt: this.startedAt.toISOString(),
      platform: `${process.platform} ${os.release()} (${os.arch()})`,
      nodeVersion: process.versions.node,
      clients,
      diagnostics,
      counts,
      logs,
    }
  }

  async exportLogs(
    filePath: string,
    format: ExportFormat = 'json',
    clients: ClientInfo[] = [],
    diagnostics: DiagnosticInfo | null = null
  ): Promise<void> {
    const data = this.buildExport(clients, diagnostics)
    const body = format === 'text' ? renderTextExport(data) : JSON.stringify(data, null, 2)
    await fs.writeFile(filePath, body, 'utf-8')
  }

  // ============================================================================
  // CAPTURE
  // ============================================================================

  private interceptConsole(): void {
    if (this.intercepting) return
    this.intercepting = true

    for (const method of Object.keys(CONSOLE_LEVELS)) {
      if (!isConsoleMethod(method)) continue
      const write = this.original[method]
      console[method] = (...args: unknown[]) => {
        write(...args)
        this.capture(CONSOLE_LEVELS[method], args)
      }
    }
  }

  private restoreConsole(): void {
    if (!this.intercepting) return
    console.log = this.original.log
    console.info = this.original.info
    console.warn = this.original.warn
    console.error = this.original.error
    console.debug = this.original.debug
    this.intercepting = false
  }

  private capture(level: LogLevel, args: unknown[]): void {
    const { source, message } = splitSource(String(args[0] ?? ''))
    const details = args.length > 1 ? args.slice(1).map(describeArgument).join('\n\n') : undefined
    this.record(level, source, message, details)
  }

  private redact(text: string): string {
    return this.homePattern ? text.replace(this.homePattern, '~') : text
  }

  private record(level: LogLevel, source: string, message: string, details?: string): void {
    const entry: LogEntry = {
      id: String(++nextEntryId),
      timestamp: new Date().toISOString(),
      level,
      source,
      message: this.redact(message),
      details: details === undefined ? undefined : this.redact(details),
    }

    if (level === 'warn' || level === 'error') {
      this.important.push(entry)
    } else {
      this.routine.push(entry)
    }
    for (const listener of this.listeners) listener(entry)
    this.fileWriter?.write(entry)
  }
}

function isConsoleMethod(name: string): name is ConsoleMethod {
  return name in CONSOLE_LEVELS
}

/** Human-readable export: a short header, then one line per entry. */
export function renderTextExport(data: LogExport): string {
  const header = [
    'MediaBridge Log Export',
    `Exported: ${data.exportedAt}`,
    `Started: ${data.startedAt}`,
    `Platform: ${data.platform}, Node ${data.nodeVersion}`,
    `Entries: ${data.logs.length} (${data.counts.error} errors, ${data.counts.warn} warnings)`,
  ]

  if (data.clients.length === 0) {
    header.push('Clients: none')
  } else {
    header.push('Clients:')
    for (const client of data.clients) {
      const version = client.serverVersion ? ` v${client.serverVersion}` : ''
      header.push(`  - ${client.name} (${client.clientType}${version})`)
    }
  }

  if (data.diagnostics) {
    const { database, itemCounts } = data.diagnostics
    header.push(`Database: ${path.basename(database.path)} (${database.itemCount} items)`)
    if (itemCounts.length > 0) {
      header.push(`Items: ${itemCounts.map((c) => `${c.mediaType} ${c.count}`).join(', ')}`)
    }
  }

  const lines = data.logs.map((entry) => {
    const line = `${entry.timestamp.replace('T', ' ').replace('Z', '')} ${entry.level.toUpperCase().padEnd(7)} ${entry.source} ${entry.message}`
    return entry.details ? `${line}\n    ${entry.details.replace(/\n/g, '\n    ')}` : line
  })

  return [...header, '-'.repeat(80), ...lines].join('\n') + '\n'
}

// Singleton
let loggingService: LoggingService | null = null

export function getLoggingService(): LoggingService {
  if (!loggingService) {
    loggingService = new LoggingService()
  }
  return loggingService
}
