/**
 * Transfer domain model.
 *
 * A transfer copies the output artifacts of one finished workflow run into
 * the object repository. Each artifact ends in exactly one outcome; the
 * outcomes of a run are tallied into a RunSummary.
 */

import { posix } from 'path';
import { TypedError } from './errors';

/** Identifies a completed workflow run on the engine. */
export interface WorkflowRunRef {
  readonly namespace: string;
  readonly name: string;
}

/** Stable `namespace/name` key for a run. */
export function runKey(run: WorkflowRunRef): string {
  return `${run.namespace}/${run.name}`;
}

/** An output artifact as listed in the workflow status, before any download. */
export interface ArtifactRef {
  nodeId: string;
  artifactName: string;
  /** Path declared by the template, relative to the node. */
  path: string;
}

/** Relative path `<nodeId>/<path>` under which a listed artifact is stored. */
export function artifactPath(ref: ArtifactRef): string {
  return posix.join(ref.nodeId, ref.path.replace(/^\/+/, ''));
}

/** Key that ties files and failures back to the listed artifact they came from. */
export function artifactKey(ref: { nodeId: string; artifactName: string }): string {
  return `${ref.nodeId}/${ref.artifactName}`;
}

/** A downloadable file produced by a run. */
export interface Artifact {
  /** Relative path `<nodeId>/<path>`; doubles as the object's content URL. */
  name: string;
  nodeId: string;
  artifactName: string;
  /** Byte size announced ahead of the download, if the transport reports one. */
  sizeBytes?: number;
  contentType: string;
  /** Single-pass byte sequence. */
  content: AsyncIterable<Uint8Array>;
  /** Release the content without reading it. */
  discard(): Promise<void>;
}

/** Reference to an artifact kept on its outcome. */
export interface ArtifactSummary {
  name: string;
  nodeId?: string;
  artifactName?: string;
}

/** One entry of a run's artifact sequence. */
export type ArtifactEntry =
  | { kind: 'artifact'; artifact: Artifact }
  | { kind: 'error'; artifact: ArtifactSummary; error: TypedError };

export type TransferOutcome =
  | { status: 'stored'; artifact: ArtifactSummary; objectId: string; sizeBytes: number }
  | {
      status: 'skipped';
      artifact: ArtifactSummary;
      reason: 'size-exceeded';
      /** Announced size, or the bytes read before the limit was passed. */
      sizeBytes?: number;
      maxSizeBytes: number;
    }
  | { status: 'failed'; artifact: ArtifactSummary; error: TypedError };

export type OutcomeStatus = TransferOutcome['status'];

export interface OutcomeCounts {
  stored: number;
  skipped: number;
  failed: number;
}

/** Aggregate result of transferring all artifacts of one run. */
export interface RunSummary {
  run: WorkflowRunRef;
  outcomes: TransferOutcome[];
  counts: OutcomeCounts;
  /** Dataset object grouping the stored files, when packaging ran. */
  datasetId?: string;
  /** CreateAction recording how the stored files were produced. */
  actionId?: string;
  datasetError?: TypedError;
  startedAt: string;
  completedAt: string;
}

export function countOutcomes(outcomes: readonly TransferOutcome[]): OutcomeCounts {
  const counts: OutcomeCounts = { stored: 0, skipped: 0, failed: 0 };
  for (const outcome of outcomes) {
    counts[outcome.status] += 1;
  }
  return counts;
}

/** Transfer lifecycle states. */
export enum TransferStatus {
  Pending = 'pending',
  InProgress = 'in_progress',
  Completed = 'completed',
  Failed = 'failed',
}

/** Valid transfer state transitions. */
export const VALID_TRANSFER_TRANSITIONS: Record<TransferStatus, TransferStatus[]> = {
  [TransferStatus.Pending]: [TransferStatus.InProgress, TransferStatus.Failed],
  [TransferStatus.InProgress]: [TransferStatus.Completed, TransferStatus.Failed],
  [TransferStatus.Completed]: [],
  [TransferStatus.Failed]: [],
};

/** One accepted notification and the background copy it triggered. */
export interface TransferRecord {
  id: string;
  run: WorkflowRunRef;
  status: TransferStatus;
  createdAt: string;
  updatedAt: string;
  startedAt?: string;
  completedAt?: string;
  summary?: RunSummary;
  /** Whole-run failure, set only in the failed state. */
  error?: TypedError;
}
