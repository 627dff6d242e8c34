/**
 * Transfer Queue: background execution of transfers.
 *
 * `submit` records a pending transfer and returns at once; a fixed number
 * of workers pick transfers up in FIFO order and await the runner. Each
 * transfer walks the state machine:
 *
 *   pending -> in_progress -> completed   artifacts were listed and processed
 *   pending -> failed                     the run could not be resolved
 */

import { v4 as uuid } from 'uuid';
import { TransferError, toTypedError } from '../domain/errors';
import { TransferRecord, TransferStatus, WorkflowRunRef, runKey } from '../domain/transfer';
import { Logger, logger as rootLogger } from '../logger';
import { TransferStore } from '../storage/store';
import { TransferRunner } from './orchestrator';
import { transitionTransferStatus } from './state-machine';

export interface TransferQueueConfig {
  /** Maximum transfers running at once. */
  concurrency: number;
}

export class TransferQueue {
  private readonly waiting: TransferRecord[] = [];
  private active = 0;
  private idleWaiters: Array<() => void> = [];
  private readonly logger: Logger;

  constructor(
    private readonly store: TransferStore,
    private readonly runner: TransferRunner,
    private readonly config: TransferQueueConfig,
    logger?: Logger,
  ) {
    if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
      throw new Error(`Transfer concurrency must be a positive integer, got ${config.concurrency}`);
    }
    this.logger = (logger ?? rootLogger).child({ component: 'transfer-queue' });
  }

  /** Record a pending transfer for the run and schedule it. Resolves before any copying starts. */
  async submit(run: WorkflowRunRef): Promise<TransferRecord> {
    const now = new Date().toISOString();
    const record: TransferRecord = {
      id: `trf_${uuid()}`,
      run: { namespace: run.namespace, name: run.name },
      status: TransferStatus.Pending,
      createdAt: now,
      updatedAt: now,
    };

    const accepted = await this.store.create(record);
    this.waiting.push(record);
    this.logger.info('Transfer queued', { transferId: record.id, run: runKey(run), waiting: this.waiting.length });
    this.pump();
    return accepted;
  }

  /** Number of transfers running or waiting. */
  get size(): number {
    return this.active + this.waiting.length;
  }

  /** Resolves once no transfer is running or waiting. */
  onIdle(): Promise<void> {
    if (this.size === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private pump(): void {
    while (this.active < this.config.concurrency && this.waiting.length > 0) {
      const record = this.waiting.shift();
      if (!record) break;
      this.active += 1;
      void this.process(record)
        .catch((err) => {
          this.logger.error('Transfer worker crashed', { transferId: record.id, error: toTypedError(err).message });
        })
        .finally(() => {
          this.active -= 1;
          this.pump();
          this.notifyIdle();
        });
    }
  }

  private notifyIdle(): void {
    if (this.size > 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private async process(record: TransferRecord): Promise<void> {
    const log = this.logger.child({ transferId: record.id, namespace: record.run.namespace, workflow: record.run.name });
    let status = record.status;

    try {
      const summary = await this.runner.run(record.run, {
        logger: log,
        onListed: async () => {
          status = await this.transition(record.id, status, TransferStatus.InProgress, {
            startedAt: new Date().toISOString(),
          });
        },
      });
      status = await this.transition(record.id, status, TransferStatus.Completed, {
        summary,
        completedAt: summary.completedAt,
      });
    } catch (err) {
      const error = toTypedError(err, runKey(record.run));
      log.error('Transfer failed', { code: error.code, error: error.message });
      status = await this.transition(record.id, status, TransferStatus.Failed, {
        error,
        completedAt: new Date().toISOString(),
      });
    }
  }

  private async transition(
    id: string,
    current: TransferStatus,
    target: TransferStatus,
    updates: Partial<TransferRecord>,
  ): Promise<TransferStatus> {
    const result = transitionTransferStatus(current, target);
    if (!result.success || !result.newStatus || result.error) {
      throw new TransferError(result.error ?? toTypedError(new Error(`Cannot move transfer ${id} to ${target}`)));
    }
    await this.store.update(id, { ...updates, status: result.newStatus, updatedAt: new Date().toISOString() });
    return result.newStatus;
  }
}
