/**
 * Artifact source contract.
 *
 * The orchestrator reads a run's artifacts through this interface; the Argo
 * client implements it and tests substitute in-memory fakes.
 */

import { ArtifactEntry, ArtifactRef, WorkflowRunRef } from '../domain/transfer';
import { WorkflowDefinition } from './artifact-list';

export interface ArtifactListing {
  /** Artifacts listed in the workflow status. */
  refs: ArtifactRef[];
  /**
   * Lazy, single-pass sequence of downloadable files. A listed artifact may
   * expand into several files (directories) or into an error entry when its
   * download fails.
   */
  entries: AsyncIterable<ArtifactEntry>;
  /** Manifest the run was started from, recorded as the instrument of its results. */
  definition?: WorkflowDefinition;
}

export interface HealthStatus {
  ok: boolean;
  message?: string;
}

export interface ArtifactSource {
  /**
   * Resolve the run and list its artifacts. Rejects with a TransferError
   * carrying SOURCE.RUN_NOT_FOUND or SOURCE.UNAVAILABLE before any entry
   * is produced.
   */
  readArtifacts(run: WorkflowRunRef): Promise<ArtifactListing>;
  checkHealth(): Promise<HealthStatus>;
}
