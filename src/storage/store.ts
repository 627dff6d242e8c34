/**
 * Storage layer interfaces.
 *
 * Transfer records are kept for status queries and duplicate detection.
 * The in-memory backend is the only one shipped; the interface keeps the
 * queue and routes independent of it.
 */

import { TransferRecord, WorkflowRunRef } from '../domain/transfer';

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/** Store interface for transfer records. */
export interface TransferStore {
  create(record: TransferRecord): Promise<TransferRecord>;
  getById(id: string): Promise<TransferRecord | null>;
  update(id: string, updates: Partial<TransferRecord>): Promise<TransferRecord | null>;
  /** Newest first. */
  list(options?: ListOptions): Promise<TransferRecord[]>;
  /** Newest first. */
  listByRun(run: WorkflowRunRef): Promise<TransferRecord[]>;
}
