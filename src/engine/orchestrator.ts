/**
 * Transfer Orchestrator.
 *
 * Copies the artifacts of one workflow run from the source into the sink.
 * Artifacts are handled one at a time in source order, so at most one
 * artifact's bytes are held in memory. A failing artifact is recorded and
 * the loop moves on; only a failure to resolve the run itself fails the
 * whole transfer. Every listed artifact ends with at least one outcome.
 */

import {
  TransferError,
  TypedError,
  createTypedError,
  emptyArtifactError,
  isTransferError,
  listingAbortedError,
  toTypedError,
} from '../domain/errors';
import { BoundedReadResult, allowSize, readWithinLimit } from '../domain/size-filter';
import {
  Artifact,
  ArtifactRef,
  ArtifactSummary,
  RunSummary,
  TransferOutcome,
  WorkflowRunRef,
  artifactKey,
  artifactPath,
  countOutcomes,
  runKey,
} from '../domain/transfer';
import { Logger, logger as rootLogger } from '../logger';
import { ObjectSink } from '../sink/sink';
import { ArtifactListing, ArtifactSource } from '../source/source';
import { packageDataset } from './dataset';

export interface OrchestratorConfig {
  maxFileSizeBytes: number;
  /** Group stored files under a Dataset object after the loop. */
  createDataset: boolean;
}

export interface RunOptions {
  logger?: Logger;
  /** Called once the artifact list is known, before the first artifact is processed. */
  onListed?: (refs: ArtifactRef[]) => void | Promise<void>;
}

/** Anything that can execute a transfer for a run. */
export interface TransferRunner {
  run(run: WorkflowRunRef, options?: RunOptions): Promise<RunSummary>;
}

function summarize(artifact: Artifact): ArtifactSummary {
  return { name: artifact.name, nodeId: artifact.nodeId, artifactName: artifact.artifactName };
}

export class TransferOrchestrator implements TransferRunner {
  private readonly logger: Logger;

  constructor(
    private readonly source: ArtifactSource,
    private readonly sink: ObjectSink,
    private readonly config: OrchestratorConfig,
    logger?: Logger,
  ) {
    this.logger = logger ?? rootLogger;
  }

  /**
   * Transfer every artifact of a run and summarize the outcomes.
   * Rejects with a TransferError (SOURCE.*) when the run cannot be listed.
   */
  async run(run: WorkflowRunRef, options: RunOptions = {}): Promise<RunSummary> {
    const log = (options.logger ?? this.logger).child({ namespace: run.namespace, workflow: run.name });
    const startedAt = new Date().toISOString();

    let listing: ArtifactListing;
    try {
      listing = await this.source.readArtifacts(run);
    } catch (err) {
      const error = toTypedError(err, runKey(run));
      log.error('Failed to list workflow artifacts', { code: error.code, error: error.message });
      throw err instanceof TransferError ? err : new TransferError(error);
    }

    log.info('Transferring workflow artifacts', { listed: listing.refs.length });
    await options.onListed?.(listing.refs);

    const outcomes: TransferOutcome[] = [];
    let aborted: TypedError | undefined;
    try {
      for await (const entry of listing.entries) {
        const outcome: TransferOutcome =
          entry.kind === 'error'
            ? { status: 'failed', artifact: entry.artifact, error: entry.error }
            : await this.transferArtifact(entry.artifact, log);
        outcomes.push(outcome);
        this.logOutcome(log, outcome);
      }
    } catch (err) {
      aborted = isTransferError(err) ? err.typedError : listingAbortedError(toTypedError(err).message, runKey(run));
      log.error('Artifact listing stopped early', { code: aborted.code, error: aborted.message });
    }

    for (const outcome of this.unaccounted(run, listing.refs, outcomes, aborted)) {
      outcomes.push(outcome);
      this.logOutcome(log, outcome);
    }

    const summary: RunSummary = {
      run: { namespace: run.namespace, name: run.name },
      outcomes,
      counts: countOutcomes(outcomes),
      startedAt,
      completedAt: startedAt,
    };

    if (this.config.createDataset && summary.counts.stored > 0) {
      const fileIds = outcomes.flatMap((o) => (o.status === 'stored' ? [o.objectId] : []));
      try {
        const packaged = await packageDataset(this.sink, run, fileIds, {
          definition: listing.definition,
          startTime: startedAt,
          endTime: new Date().toISOString(),
        });
        summary.datasetId = packaged.datasetId;
        summary.actionId = packaged.actionId;
        log.info('Created dataset', { datasetId: packaged.datasetId, actionId: packaged.actionId, files: fileIds.length });
      } catch (err) {
        summary.datasetError = toTypedError(err, runKey(run));
        log.error('Dataset packaging failed', { code: summary.datasetError.code, error: summary.datasetError.message });
      }
    }

    summary.completedAt = new Date().toISOString();
    log.info('Transfer completed', { ...summary.counts, datasetId: summary.datasetId });
    return summary;
  }

  /**
   * Failed outcomes for listed artifacts that produced none, so the summary
   * always accounts for every ref. When the listing stopped early and every
   * ref already has an outcome, the interruption is recorded against the
   * last one.
   */
  private unaccounted(
    run: WorkflowRunRef,
    refs: ArtifactRef[],
    outcomes: TransferOutcome[],
    aborted: TypedError | undefined,
  ): TransferOutcome[] {
    const seen = new Set<string>();
    for (const { artifact } of outcomes) {
      if (artifact.nodeId !== undefined && artifact.artifactName !== undefined) {
        seen.add(artifactKey({ nodeId: artifact.nodeId, artifactName: artifact.artifactName }));
      }
    }

    const missing: TransferOutcome[] = refs
      .filter((ref) => !seen.has(artifactKey(ref)))
      .map((ref): TransferOutcome => {
        const name = artifactPath(ref);
        return {
          status: 'failed',
          artifact: { name, nodeId: ref.nodeId, artifactName: ref.artifactName },
          error: aborted ?? emptyArtifactError(name, runKey(run)),
        };
      });

    if (aborted && missing.length === 0 && refs.length > 0) {
      const last = refs[refs.length - 1];
      missing.push({
        status: 'failed',
        artifact: { name: artifactPath(last), nodeId: last.nodeId, artifactName: last.artifactName },
        error: aborted,
      });
    }
    return missing;
  }

  /** Move one artifact through the size filter and into the sink. Never throws. */
  private async transferArtifact(artifact: Artifact, log: Logger): Promise<TransferOutcome> {
    const ref = summarize(artifact);
    const max = this.config.maxFileSizeBytes;

    if (!allowSize(artifact.sizeBytes, max)) {
      try {
        await artifact.discard();
      } catch (err) {
        log.warn('Failed to release skipped artifact', { artifact: artifact.name, error: toTypedError(err).message });
      }
      return { status: 'skipped', artifact: ref, reason: 'size-exceeded', sizeBytes: artifact.sizeBytes, maxSizeBytes: max };
    }

    let read: BoundedReadResult;
    try {
      read = await readWithinLimit(artifact.content, max);
    } catch (err) {
      return {
        status: 'failed',
        artifact: ref,
        error: createTypedError({
          code: 'SOURCE.UNAVAILABLE',
          message: `Failed to download artifact ${artifact.name}: ${toTypedError(err).message}`,
          retryable: true,
        }),
      };
    }

    if (read.exceeded) {
      return { status: 'skipped', artifact: ref, reason: 'size-exceeded', sizeBytes: read.bytesRead, maxSizeBytes: max };
    }

    try {
      const objectId = await this.sink.storeArtifact({
        name: artifact.name,
        contentType: artifact.contentType,
        sizeBytes: read.sizeBytes,
        data: read.data,
      });
      return { status: 'stored', artifact: ref, objectId, sizeBytes: read.sizeBytes };
    } catch (err) {
      return { status: 'failed', artifact: ref, error: toTypedError(err) };
    }
  }

  private logOutcome(log: Logger, outcome: TransferOutcome): void {
    switch (outcome.status) {
      case 'stored':
        log.info('Artifact stored', { artifact: outcome.artifact.name, objectId: outcome.objectId, sizeBytes: outcome.sizeBytes });
        break;
      case 'skipped':
        log.warn('Artifact skipped', {
          artifact: outcome.artifact.name,
          reason: outcome.reason,
          sizeBytes: outcome.sizeBytes,
          maxSizeBytes: outcome.maxSizeBytes,
        });
        break;
      case 'failed':
        log.error('Artifact transfer failed', { artifact: outcome.artifact.name, code: outcome.error.code, error: outcome.error.message });
        break;
    }
  }
}
