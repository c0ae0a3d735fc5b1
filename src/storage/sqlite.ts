/**
 * SQLite claim store using better-sqlite3.
 */

import Database from 'better-sqlite3';
import type { ClaimRecord, ClaimStore, Fingerprint } from '../core/types.js';
import { blake2128Concat } from '../core/crypto.js';

interface ClaimRow {
  owner: string;
  registered_at: number;
}

export class SqliteClaimStore implements ClaimStore {
  private db: Database.Database;
  private selectStmt: Database.Statement<[Buffer], ClaimRow>;
  private existsStmt: Database.Statement<[Buffer], { found: number }>;
  private upsertStmt: Database.Statement<[Buffer, Buffer, string, number]>;
  private deleteStmt: Database.Statement<[Buffer]>;

  constructor(dbPath: string = ':memory:') {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.createTables();

    this.selectStmt = this.db.prepare<[Buffer], ClaimRow>(
      'SELECT owner, registered_at FROM claims WHERE storage_key = ?',
    );
    this.existsStmt = this.db.prepare<[Buffer], { found: number }>(
      'SELECT 1 AS found FROM claims WHERE storage_key = ?',
    );
    this.upsertStmt = this.db.prepare<[Buffer, Buffer, string, number]>(`
      INSERT OR REPLACE INTO claims (storage_key, fingerprint, owner, registered_at)
      VALUES (?, ?, ?, ?)
    `);
    this.deleteStmt = this.db.prepare<[Buffer]>('DELETE FROM claims WHERE storage_key = ?');
  }

  private createTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS claims (
        storage_key BLOB PRIMARY KEY,
        fingerprint BLOB NOT NULL,
        owner TEXT NOT NULL,
        registered_at INTEGER NOT NULL
      );
    `);
  }

  get(proof: Fingerprint): ClaimRecord | null {
    const row = this.selectStmt.get(keyOf(proof));
    return row ? { owner: row.owner, registeredAt: row.registered_at } : null;
  }

  contains(proof: Fingerprint): boolean {
    return this.existsStmt.get(keyOf(proof)) !== undefined;
  }

  insert(proof: Fingerprint, record: ClaimRecord): void {
    this.upsertStmt.run(keyOf(proof), Buffer.from(proof), record.owner, record.registeredAt);
  }

  remove(proof: Fingerprint): void {
    this.deleteStmt.run(keyOf(proof));
  }

  /** Nested calls become savepoints inside the outer transaction. */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  count(): number {
    const row = this.db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM claims').get();
    return row?.n ?? 0;
  }

  close(): void {
    this.db.close();
  }
}

function keyOf(proof: Fingerprint): Buffer {
  return Buffer.from(blake2128Concat(proof));
}
