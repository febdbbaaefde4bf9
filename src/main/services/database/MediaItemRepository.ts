/**
 * MediaItemRepository
 *
 * Stores media items of every type in the media_items table. The whole item
 * is kept as a JSON blob; lookups by client key or external ID go through
 * SQLite's json_each over that blob.
 */

import { z } from 'zod'
import type { SqliteDatabase } from '../../database/getDatabase'
import type { MediaData } from '../../media/MediaDetails'
import {
  MediaItemDecodeError,
  deserializeAnyMediaItem,
  deserializeMediaItem,
  serializeMediaItem,
  type MediaItem,
} from '../../media/MediaItem'
import type { MediaDataCodec } from '../../media/codecs'
import type { MediaType } from '../../media/schemas'

export interface ListOptions {
  limit?: number
  offset?: number
}

const ItemRowSchema = z.object({
  id: z.number(),
  data: z.string(),
})

const CountRowSchema = z.object({ count: z.number() })

const TypeCountRowSchema = z.object({ type: z.string(), count: z.number() })

type ItemRow = z.infer<typeof ItemRowSchema>

export class MediaItemRepository {
  constructor(private readonly db: SqliteDatabase) {}

  // ============================================================================
  // WRITES
  // ============================================================================

  /**
   * Insert a new item and assign its database ID.
   */
  insert(item: MediaItem): number {
    const now = new Date()
    item.createdAt ??= now
    item.updatedAt = now
    item.syncDenormalizedFields()

    const result = this.db
      .prepare(
        `INSERT INTO media_items (uuid, type, title, release_year, owner_id, data, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        item.uuid,
        item.type,
        item.title,
        item.releaseYear,
        item.ownerId,
        serializeMediaItem(item),
        item.createdAt.toISOString(),
        item.updatedAt.toISOString()
      )

    item.id = Number(result.lastInsertRowid)
    // Store again so the blob carries its own ID
    this.writeBlob(item)
    return item.id
  }

  /**
   * Update a stored item.
   *
   * @throws Error when the item was never stored
   */
  update(item: MediaItem): void {
    if (!item.id) {
      throw new Error(`Cannot update unsaved media item ${item.uuid}`)
    }
    item.updatedAt = new Date()
    item.syncDenormalizedFields()

    const changes = this.writeBlob(item)
    if (changes === 0) {
      throw new Error(`Media item ${item.id} not found`)
    }
  }

  /** Insert when the item has no ID yet, otherwise update. */
  save(item: MediaItem): number {
    if (item.id) {
      this.update(item)
      return item.id
    }
    return this.insert(item)
  }

  /** Save several items in one transaction. */
  saveAll(items: readonly MediaItem[]): void {
    const run = this.db.transaction((batch: readonly MediaItem[]) => {
      for (const item of batch) this.save(item)
    })
    run(items)
  }

  delete(id: number): boolean {
    const result = this.db.prepare('DELETE FROM media_items WHERE id = ?').run(id)
    return result.changes > 0
  }

  private writeBlob(item: MediaItem): number {
    const result = this.db
      .prepare(
        `UPDATE media_items
         SET type = ?, title = ?, release_year = ?, owner_id = ?, data = ?, updated_at = ?
         WHERE id = ?`
      )
      .run(
        item.type,
        item.title,
        item.releaseYear,
        item.ownerId,
        serializeMediaItem(item),
        (item.updatedAt ?? new Date()).toISOString(),
        item.id
      )
    return result.changes
  }

  // ============================================================================
  // READS
  // ============================================================================

  getById(id: number): MediaItem | null {
    const row = this.db.prepare('SELECT id, data FROM media_items WHERE id = ?').get(id)
    return row === undefined ? null : this.toItem(row)
  }

  getByUUID(uuid: string): MediaItem | null {
    const row = this.db.prepare('SELECT id, data FROM media_items WHERE uuid = ?').get(uuid)
    return row === undefined ? null : this.toItem(row)
  }

  /**
   * Read an item whose type is known up front.
   *
   * @throws MediaItemDecodeError when the stored item has a different type
   */
  getByIdTyped<T extends MediaData>(id: number, codec: MediaDataCodec<T>): MediaItem<T> | null {
    const row = this.db.prepare('SELECT id, data FROM media_items WHERE id = ?').get(id)
    if (row === undefined) return null

    const { id: rowId, data } = this.parseRow(row)
    const item = deserializeMediaItem(data, codec)
    item.id = rowId
    return item
  }

  /**
   * The item a media server knows under `itemKey`. When `type` is given,
   * only items of that type match.
   */
  findByClientItemID(clientId: number, itemKey: string, type?: MediaType): MediaItem | null {
    const row = this.db
      .prepare(
        `SELECT m.id, m.data
         FROM media_items m, json_each(m.data, '$.syncClients') sc
         WHERE json_extract(sc.value, '$.clientId') = ?
           AND json_extract(sc.value, '$.itemId') = ?
           AND (? IS NULL OR m.type = ?)
         ORDER BY m.id
         LIMIT 1`
      )
      .get(clientId, itemKey, type ?? null, type ?? null)
    return row === undefined ? null : this.toItem(row)
  }

  findByExternalID(type: MediaType, source: string, id: string): MediaItem | null {
    if (!id) return null

    const row = this.db
      .prepare(
        `SELECT m.id, m.data
         FROM media_items m, json_each(m.data, '$.externalIds') ext
         WHERE m.type = ?
           AND json_extract(ext.value, '$.source') = ?
           AND json_extract(ext.value, '$.id') = ?
         ORDER BY m.id
         LIMIT 1`
      )
      .get(type, source, id)
    return row === undefined ? null : this.toItem(row)
  }

  /** Items of one type ordered by title. */
  list(type: MediaType, options: ListOptions = {}): MediaItem[] {
    const rows = this.db
      .prepare('SELECT id, data FROM media_items WHERE type = ? ORDER BY title COLLATE NOCASE, id LIMIT ? OFFSET ?')
      .all(type, options.limit ?? -1, options.offset ?? 0)
    return rows.map((row) => this.toItem(row))
  }

  count(type?: MediaType): number {
    const row = type
      ? this.db.prepare('SELECT COUNT(*) AS count FROM media_items WHERE type = ?').get(type)
      : this.db.prepare('SELECT COUNT(*) AS count FROM media_items').get()
    return CountRowSchema.parse(row).count
  }

  countByType(): { mediaType: string; count: number }[] {
    const rows = this.db.prepare('SELECT type, COUNT(*) AS count FROM media_items GROUP BY type ORDER BY type').all()
    return rows.map((row) => {
      const { type, count } = TypeCountRowSchema.parse(row)
      return { mediaType: type, count }
    })
  }

  // ============================================================================
  // HELPERS
  // ============================================================================

  private parseRow(row: unknown): ItemRow {
    const parsed = ItemRowSchema.safeParse(row)
    if (!parsed.success) {
      throw new MediaItemDecodeError('Unexpected media_items row shape', parsed.error)
    }
    return parsed.data
  }

  private toItem(row: unknown): MediaItem {
    const { id, data } = this.parseRow(row)
    const item = deserializeAnyMediaItem(data)
    item.id = id
    return item
  }
}
