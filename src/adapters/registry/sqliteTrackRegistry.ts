import Database from 'better-sqlite3';
import path from 'node:path';
import { StorageError, errorMessage } from '@/domain/errors';
import type { ContentRef, TrackRecord } from '@/domain/track/types';
import type { TrackListOptions, TrackPage, TrackRegistryPort } from '@/ports/TrackRegistryPort';
import { createLogger } from '@/shared/logging/logger';
import { ensureDir } from '@/shared/utils/file';

interface TrackRow {
  card_id: string;
  content_ref: string | null;
  source_ref: string | null;
  created_at: number;
  last_played_at: number | null;
}

const MEMORY_DATABASE = ':memory:';

/**
 * Card → content bindings in SQLite. The driver is synchronous, so every
 * statement below runs to completion before another request gets the loop.
 */
export class SqliteTrackRegistry implements TrackRegistryPort {
  private readonly log = createLogger('Storage', 'Registry');
  private db: Database.Database | null = null;

  constructor(
    private readonly dbPath: string,
    private readonly now: () => number = Date.now,
  ) {}

  public async init(): Promise<void> {
    if (this.db) {
      return;
    }
    if (this.dbPath !== MEMORY_DATABASE) {
      await ensureDir(path.dirname(this.dbPath));
    }
    try {
      const db = new Database(this.dbPath);
      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = FULL');
      this.db = db;
      this.migrate();
    } catch (error) {
      this.close();
      throw new StorageError(`failed to open track registry: ${errorMessage(error)}`, { cause: error });
    }
    this.log.info('track registry ready', { dbPath: this.dbPath });
  }

  public close(): void {
    if (!this.db) {
      return;
    }
    this.db.close();
    this.db = null;
  }

  public async lookup(cardId: string): Promise<TrackRecord | null> {
    return this.run('lookup', (db) => {
      const row = db.prepare('SELECT * FROM tracks WHERE card_id = ?').get(cardId) as TrackRow | undefined;
      return row ? toRecord(row) : null;
    });
  }

  public async upsert(cardId: string, contentRef: ContentRef, sourceRef?: string | null): Promise<void> {
    this.run('upsert', (db) => {
      db.prepare(
        `
        INSERT INTO tracks (card_id, content_ref, source_ref, created_at, last_played_at)
        VALUES (@cardId, @contentRef, @sourceRef, @createdAt, NULL)
        ON CONFLICT(card_id) DO UPDATE SET
          content_ref = excluded.content_ref,
          source_ref = COALESCE(excluded.source_ref, tracks.source_ref)
      `,
      ).run({ cardId, contentRef, sourceRef: sourceRef ?? null, createdAt: this.now() });
    });
    this.log.debug('track bound', { cardId, contentRef, sourceRef });
  }

  public async touch(cardId: string): Promise<void> {
    this.run('touch', (db) => {
      db.prepare('UPDATE tracks SET last_played_at = ? WHERE card_id = ?').run(this.now(), cardId);
    });
  }

  public async countReferences(contentRef: ContentRef): Promise<number> {
    return this.run('countReferences', (db) => {
      const row = db
        .prepare('SELECT COUNT(*) AS count FROM tracks WHERE content_ref = ?')
        .get(contentRef) as { count: number };
      return row.count;
    });
  }

  public async list(options: TrackListOptions): Promise<TrackPage> {
    const limit = Math.max(0, Math.floor(options.limit));
    const offset = Math.max(0, Math.floor(options.offset));
    return this.run('list', (db) => {
      const total = db.prepare('SELECT COUNT(*) AS count FROM tracks').get() as { count: number };
      const rows = db
        .prepare(
          `
          SELECT * FROM tracks
          ORDER BY last_played_at IS NULL, last_played_at DESC, created_at DESC, card_id
          LIMIT ? OFFSET ?
        `,
        )
        .all(limit, offset) as TrackRow[];
      return { total: total.count, items: rows.map(toRecord) };
    });
  }

  private run<T>(operation: string, fn: (db: Database.Database) => T): T {
    const db = this.requireDb();
    try {
      return fn(db);
    } catch (error) {
      throw new StorageError(`track registry ${operation} failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  private migrate(): void {
    const db = this.requireDb();
    db.exec(`
      CREATE TABLE IF NOT EXISTS tracks (
        card_id TEXT PRIMARY KEY,
        content_ref TEXT,
        source_ref TEXT,
        created_at INTEGER NOT NULL,
        last_played_at INTEGER
      );
      CREATE INDEX IF NOT EXISTS idx_tracks_content_ref ON tracks(content_ref);
    `);
  }

  private requireDb(): Database.Database {
    if (!this.db) {
      throw new StorageError('track registry not initialized');
    }
    return this.db;
  }
}

function toRecord(row: TrackRow): TrackRecord {
  return {
    cardId: row.card_id,
    contentRef: row.content_ref,
    sourceRef: row.source_ref,
    createdAt: row.created_at,
    lastPlayedAt: row.last_played_at,
  };
}
