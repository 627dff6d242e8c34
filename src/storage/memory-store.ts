/**
 * In-memory transfer store.
 *
 * Records live for the lifetime of the process, up to a cap on finished
 * transfers: once more than `historyLimit` are completed or failed, the
 * oldest finished ones are dropped. Pending and running transfers are
 * never evicted. Reads and writes go through structuredClone so callers
 * never alias stored state.
 */

import { TransferRecord, WorkflowRunRef } from '../domain/transfer';
import { isTerminalTransferStatus } from '../engine/state-machine';
import { ListOptions, TransferStore } from './store';

/** Finished transfers kept by default. */
export const DEFAULT_HISTORY_LIMIT = 1000;

export interface MemoryStoreOptions {
  historyLimit?: number;
}

function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? 100;
  return items.slice(offset, offset + limit);
}

function newestFirst(a: TransferRecord, b: TransferRecord): number {
  return b.createdAt.localeCompare(a.createdAt);
}

class MemoryTransferStore implements TransferStore {
  private records = new Map<string, TransferRecord>();
  /** Ids of finished records, oldest finish first. */
  private finished: string[] = [];

  constructor(private readonly historyLimit: number) {}

  async create(record: TransferRecord): Promise<TransferRecord> {
    this.records.set(record.id, structuredClone(record));
    this.track(record);
    return structuredClone(record);
  }

  async getById(id: string): Promise<TransferRecord | null> {
    const record = this.records.get(id);
    return record ? structuredClone(record) : null;
  }

  async update(id: string, updates: Partial<TransferRecord>): Promise<TransferRecord | null> {
    const existing = this.records.get(id);
    if (!existing) return null;
    const updated: TransferRecord = { ...existing, ...structuredClone(updates), id: existing.id };
    this.records.set(id, updated);
    if (!isTerminalTransferStatus(existing.status)) {
      this.track(updated);
    }
    return structuredClone(updated);
  }

  async list(options?: ListOptions): Promise<TransferRecord[]> {
    // Map preserves insertion order; reverse it so equal timestamps stay newest first
    const all = [...this.records.values()].reverse().sort(newestFirst);
    return applyListOptions(all, options).map((record) => structuredClone(record));
  }

  async listByRun(run: WorkflowRunRef): Promise<TransferRecord[]> {
    return [...this.records.values()]
      .filter((record) => record.run.namespace === run.namespace && record.run.name === run.name)
      .reverse()
      .sort(newestFirst)
      .map((record) => structuredClone(record));
  }

  private track(record: TransferRecord): void {
    if (!isTerminalTransferStatus(record.status)) return;
    this.finished.push(record.id);
    while (this.finished.length > this.historyLimit) {
      const evicted = this.finished.shift();
      if (evicted !== undefined) this.records.delete(evicted);
    }
  }
}

export function createMemoryStore(options: MemoryStoreOptions = {}): TransferStore {
  return new MemoryTransferStore(options.historyLimit ?? DEFAULT_HISTORY_LIMIT);
}
