/**
 * MediaItemList
 *
 * Mixed-type result set keyed by item UUID, with an optional display order.
 * Used when a playlist or collection is expanded into the items it holds.
 */

import type { ListType } from './lists'
import { isMediaItemOfType, type MediaItem } from './MediaItem'
import type { ConcreteMediaType, MediaDataByType } from './variants'

export interface OrderEntry {
  itemUuid: string
  position: number
  lastChanged: Date
}

export class MediaItemList {
  readonly listType: ListType | 'unknown'
  readonly listOriginId: number // 0 = internal store
  readonly ownerId: number
  order: OrderEntry[] = []
  private items = new Map<string, MediaItem>()

  constructor(options: { listType?: ListType; listOriginId?: number; ownerId?: number } = {}) {
    this.listType = options.listType ?? 'unknown'
    this.listOriginId = options.listOriginId ?? 0
    this.ownerId = options.ownerId ?? 0
  }

  /** Add (or replace) an item; with `position` it is also placed in the order. */
  add(item: MediaItem, position?: number): void {
    this.items.set(item.uuid, item)
    if (position !== undefined) {
      this.addListItem(item.uuid, position)
    }
  }

  addListItem(itemUuid: string, position: number): void {
    this.order.push({ itemUuid, position, lastChanged: new Date() })
  }

  getByUUID(uuid: string): MediaItem | undefined {
    return this.items.get(uuid)
  }

  getItemsOfType<K extends ConcreteMediaType>(type: K): MediaItem<MediaDataByType[K]>[] {
    const result: MediaItem<MediaDataByType[K]>[] = []
    for (const item of this.items.values()) {
      if (isMediaItemOfType(item, type)) result.push(item)
    }
    return result
  }

  getTotalItems(): number {
    return this.items.size
  }

  /** Items following `order`; entries whose UUID is not loaded are skipped. */
  getOrdered(): MediaItem[] {
    return [...this.order]
      .sort((a, b) => a.position - b.position)
      .map((entry) => this.items.get(entry.itemUuid))
      .filter((item): item is MediaItem => item !== undefined)
  }

  forEach(callback: (item: MediaItem) => void): void {
    for (const item of this.items.values()) callback(item)
  }
}
