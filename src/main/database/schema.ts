// Database schema as a TypeScript constant

export const DATABASE_SCHEMA = `
-- MediaBridge Database Schema
-- One row per media item; the full item is stored as a JSON blob and the
-- columns below are denormalized copies for lookups and listing.

CREATE TABLE IF NOT EXISTS media_items (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  uuid TEXT NOT NULL UNIQUE,
  type TEXT NOT NULL CHECK(type IN ('movie', 'series', 'season', 'episode', 'artist', 'album', 'track', 'playlist', 'collection', 'unknown')),
  title TEXT NOT NULL DEFAULT '',
  release_year INTEGER NOT NULL DEFAULT 0,
  owner_id INTEGER NOT NULL DEFAULT 0,

  -- Serialized MediaItem (envelope + payload)
  data TEXT NOT NULL,

  -- Timestamps
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE INDEX IF NOT EXISTS idx_media_items_type ON media_items(type);
CREATE INDEX IF NOT EXISTS idx_media_items_type_title ON media_items(type, title);
`
