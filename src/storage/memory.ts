/**
 * In-memory claim store for tests and simple use.
 */

import type { ClaimRecord, ClaimStore, Fingerprint } from '../core/types.js';
import { blake2128Concat, toHex } from '../core/crypto.js';

type UndoEntry = [key: string, previous: ClaimRecord | undefined];

export class MemoryClaimStore implements ClaimStore {
  private records = new Map<string, ClaimRecord>();
  /** One undo log per open transaction, innermost last */
  private undoLogs: UndoEntry[][] = [];

  get(proof: Fingerprint): ClaimRecord | null {
    const record = this.records.get(storageKey(proof));
    return record ? { ...record } : null;
  }

  contains(proof: Fingerprint): boolean {
    return this.records.has(storageKey(proof));
  }

  insert(proof: Fingerprint, record: ClaimRecord): void {
    const key = storageKey(proof);
    this.recordUndo(key);
    this.records.set(key, { owner: record.owner, registeredAt: record.registeredAt });
  }

  remove(proof: Fingerprint): void {
    const key = storageKey(proof);
    if (!this.records.has(key)) return;
    this.recordUndo(key);
    this.records.delete(key);
  }

  /**
   * Runs `fn`; undoes its writes if it throws. Nested calls roll back only their
   * own writes, and a committed inner call is still undone if the outer one throws.
   */
  transaction<T>(fn: () => T): T {
    const log: UndoEntry[] = [];
    this.undoLogs.push(log);
    let value: T;
    try {
      value = fn();
    } catch (err) {
      this.undoLogs.pop();
      for (let i = log.length - 1; i >= 0; i--) {
        const [key, previous] = log[i];
        if (previous === undefined) this.records.delete(key);
        else this.records.set(key, previous);
      }
      throw err;
    }
    this.undoLogs.pop();
    const parent = this.undoLogs[this.undoLogs.length - 1];
    if (parent) {
      for (const entry of log) parent.push(entry);
    }
    return value;
  }

  get size(): number {
    return this.records.size;
  }

  private recordUndo(key: string): void {
    const log = this.undoLogs[this.undoLogs.length - 1];
    if (log) log.push([key, this.records.get(key)]);
  }
}

function storageKey(proof: Fingerprint): string {
  return toHex(blake2128Concat(proof));
}
