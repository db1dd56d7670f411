import Database from 'better-sqlite3';
import { PendingConfirmation } from './types.js';

export interface ConfirmationStore {
  get(token: string): PendingConfirmation | null;
  put(record: PendingConfirmation): void;
  delete(token: string): void;
  list(): PendingConfirmation[];
  /** Removes entries whose expiry lies strictly before `cutoff`. */
  purgeExpired(cutoff: Date): number;
  clear(): void;
  /** Runs `fn` as one critical section: no other store mutation interleaves with it. */
  transaction<T>(fn: () => T): T;
  close(): void;
}

type DbRow = {
  token: string;
  path: string;
  recursive: number;
  expires_at: string;
};

export class SqliteConfirmationStore implements ConfirmationStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.ensureSchema();
    // Tokens never outlive the process that issued them.
    this.clear();
  }

  ensureSchema() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS pending_confirmations (
        token TEXT PRIMARY KEY,
        path TEXT NOT NULL,
        recursive INTEGER NOT NULL,
        expires_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS pending_confirmations_expires_idx ON pending_confirmations(expires_at);
    `);
  }

  get(token: string): PendingConfirmation | null {
    const stmt = this.db.prepare('SELECT * FROM pending_confirmations WHERE token = ?');
    const row = stmt.get(token) as DbRow | undefined;
    return row ? this.fromDbRow(row) : null;
  }

  put(record: PendingConfirmation) {
    this.db
      .prepare(
        `INSERT OR REPLACE INTO pending_confirmations (token, path, recursive, expires_at)
         VALUES (@token, @path, @recursive, @expires_at)`
      )
      .run({
        token: record.token,
        path: record.path,
        recursive: record.recursive ? 1 : 0,
        expires_at: record.expiresAt,
      });
  }

  delete(token: string) {
    this.db.prepare('DELETE FROM pending_confirmations WHERE token = ?').run(token);
  }

  list(): PendingConfirmation[] {
    const rows = this.db
      .prepare('SELECT * FROM pending_confirmations ORDER BY expires_at ASC')
      .all() as DbRow[];
    return rows.map((row) => this.fromDbRow(row));
  }

  purgeExpired(cutoff: Date): number {
    // ISO-8601 UTC strings sort chronologically.
    const info = this.db
      .prepare('DELETE FROM pending_confirmations WHERE expires_at < ?')
      .run(cutoff.toISOString());
    return info.changes;
  }

  clear() {
    this.db.exec('DELETE FROM pending_confirmations');
  }

  transaction<T>(fn: () => T): T {
    if (this.db.inTransaction) return fn();
    return this.db.transaction(fn).immediate();
  }

  close() {
    this.db.close();
  }

  private fromDbRow(row: DbRow): PendingConfirmation {
    return {
      token: row.token,
      path: row.path,
      recursive: row.recursive === 1,
      expiresAt: row.expires_at,
    };
  }
}

export class MemoryConfirmationStore implements ConfirmationStore {
  private entries = new Map<string, PendingConfirmation>();
  private locked = false;

  get(token: string): PendingConfirmation | null {
    const entry = this.entries.get(token);
    return entry ? { ...entry } : null;
  }

  put(record: PendingConfirmation) {
    this.entries.set(record.token, { ...record });
  }

  delete(token: string) {
    this.entries.delete(token);
  }

  list(): PendingConfirmation[] {
    return Array.from(this.entries.values())
      .map((entry) => ({ ...entry }))
      .sort((a, b) => a.expiresAt.localeCompare(b.expiresAt));
  }

  purgeExpired(cutoff: Date): number {
    let removed = 0;
    for (const [token, entry] of this.entries) {
      if (Date.parse(entry.expiresAt) < cutoff.getTime()) {
        this.entries.delete(token);
        removed += 1;
      }
    }
    return removed;
  }

  clear() {
    this.entries.clear();
  }

  transaction<T>(fn: () => T): T {
    if (this.locked) return fn();
    this.locked = true;
    try {
      return fn();
    } finally {
      this.locked = false;
    }
  }

  close() {
    this.entries.clear();
  }
}
