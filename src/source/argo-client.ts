/**
 * Argo Workflows client.
 *
 * Talks to the Argo server REST API with a bearer token:
 *   GET /api/v1/workflows/{namespace}/{name}   workflow status
 *   GET /api/v1/workflows/{namespace}          health check
 *   GET /artifact-files/{namespace}/workflows/{name}/{nodeId}/outputs/{artifact}
 *
 * The artifact-files route answers a file with a download and a directory
 * with an HTML index, so directories are walked link by link.
 */

import { posix } from 'path';
import { fetch } from 'undici';
import type { Dispatcher, Response } from 'undici';
import {
  TransferError,
  emptyArtifactError,
  maskSecretsInMessage,
  runNotFoundError,
  sourceUnavailableError,
  toTypedError,
} from '../domain/errors';
import {
  ArtifactEntry,
  ArtifactRef,
  ArtifactSummary,
  WorkflowRunRef,
  artifactPath,
  runKey,
} from '../domain/transfer';
import { Logger, logger as rootLogger } from '../logger';
import { ArgoWorkflow, argoWorkflowSchema, parseArtifactList, reconstructWorkflow } from './artifact-list';
import {
  parseContentLength,
  parseDirectoryListing,
  parseDispositionFileName,
} from './http-listing';
import { ArtifactListing, ArtifactSource, HealthStatus } from './source';

export interface ArgoClientOptions {
  baseUrl: string;
  token: string;
  defaultNamespace: string;
  /** undici dispatcher; carries TLS settings, or a MockAgent in tests. */
  dispatcher?: Dispatcher;
  logger?: Logger;
}

const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

async function* emptyContent(): AsyncGenerator<Uint8Array> {
  // no bytes
}

export class ArgoClient implements ArtifactSource {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly defaultNamespace: string;
  private readonly dispatcher?: Dispatcher;
  private readonly logger: Logger;

  constructor(options: ArgoClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.token = options.token;
    this.defaultNamespace = options.defaultNamespace;
    this.dispatcher = options.dispatcher;
    this.logger = (options.logger ?? rootLogger).child({ client: 'argo' });
  }

  /** Fetch the workflow object of a run. */
  async getWorkflow(run: WorkflowRunRef): Promise<ArgoWorkflow> {
    const url = `${this.baseUrl}/api/v1/workflows/${encodeURIComponent(run.namespace)}/${encodeURIComponent(run.name)}`;
    const res = await this.send(url, runKey(run));

    if (res.status === 404) {
      await discardBody(res);
      throw new TransferError(runNotFoundError(runKey(run)));
    }
    if (!res.ok) {
      const text = await res.text().catch(() => '');
      throw new TransferError(
        sourceUnavailableError(
          this.mask(`Argo returned HTTP ${res.status} for workflow ${runKey(run)}: ${text.slice(0, 200)}`),
          { statusCode: res.status },
          runKey(run),
        ),
      );
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch {
      throw new TransferError(
        sourceUnavailableError(`Argo returned a non-JSON workflow for ${runKey(run)}`, undefined, runKey(run)),
      );
    }

    const parsed = argoWorkflowSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransferError(
        sourceUnavailableError(`Argo returned an unexpected workflow shape for ${runKey(run)}`, {
          issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        }, runKey(run)),
      );
    }
    return parsed.data;
  }

  async readArtifacts(run: WorkflowRunRef): Promise<ArtifactListing> {
    const workflow = await this.getWorkflow(run);
    const refs = parseArtifactList(workflow);
    this.logger.debug('Listed workflow artifacts', { run: runKey(run), count: refs.length });
    return { refs, entries: this.openAll(run, refs), definition: reconstructWorkflow(workflow) };
  }

  async checkHealth(): Promise<HealthStatus> {
    const url = `${this.baseUrl}/api/v1/workflows/${encodeURIComponent(this.defaultNamespace)}?listOptions.limit=1`;
    try {
      const res = await this.send(url);
      await discardBody(res);
      if (!res.ok) {
        return { ok: false, message: `Argo returned HTTP ${res.status}` };
      }
      return { ok: true };
    } catch (err) {
      return { ok: false, message: toTypedError(err).message };
    }
  }

  private async *openAll(run: WorkflowRunRef, refs: ArtifactRef[]): AsyncGenerator<ArtifactEntry> {
    for (const ref of refs) {
      const url =
        `${this.baseUrl}/artifact-files/${encodeURIComponent(run.namespace)}/workflows/` +
        `${encodeURIComponent(run.name)}/${encodeURIComponent(ref.nodeId)}/outputs/${encodeURIComponent(ref.artifactName)}`;
      const path = artifactPath(ref);

      let produced = 0;
      for await (const entry of this.walk(run, ref, url, path, `${url}/`)) {
        produced += 1;
        yield entry;
      }
      if (produced === 0) {
        this.logger.warn('Artifact directory is empty', { run: runKey(run), artifact: path });
        yield { kind: 'error', artifact: refSummary(ref, path), error: emptyArtifactError(path, runKey(run)) };
      }
    }
  }

  /**
   * Yield the file at `url`, or every file below it when the server answers
   * with a directory index. Child URLs never leave `root`.
   */
  private async *walk(
    run: WorkflowRunRef,
    ref: ArtifactRef,
    url: string,
    path: string,
    root: string,
  ): AsyncGenerator<ArtifactEntry> {
    let res: Response;
    try {
      res = await this.send(url, runKey(run));
      if (!res.ok) {
        await discardBody(res);
        throw new TransferError(
          sourceUnavailableError(`Argo returned HTTP ${res.status} for artifact ${path}`, { statusCode: res.status }, runKey(run)),
        );
      }
    } catch (err) {
      yield { kind: 'error', artifact: refSummary(ref, path), error: toTypedError(err, runKey(run)) };
      return;
    }

    const disposition = res.headers.get('content-disposition');
    if (disposition !== null) {
      // Argo may hand out an archive instead of the declared file name
      const fileName = parseDispositionFileName(disposition);
      const name = fileName ? posix.join(posix.dirname(path), posix.basename(fileName)) : path;
      const body = res.body;
      this.logger.debug('Opening artifact download', { run: runKey(run), artifact: name });
      yield {
        kind: 'artifact',
        artifact: {
          name,
          nodeId: ref.nodeId,
          artifactName: ref.artifactName,
          sizeBytes: parseContentLength(res.headers.get('content-length')),
          contentType: res.headers.get('content-type')?.split(';')[0].trim() || DEFAULT_CONTENT_TYPE,
          content: body ?? emptyContent(),
          discard: () => discardBody(res),
        },
      };
      return;
    }

    let html: string;
    try {
      html = await res.text();
    } catch (err) {
      yield {
        kind: 'error',
        artifact: refSummary(ref, path),
        error: sourceUnavailableError(`Failed to read directory listing for ${path}: ${toTypedError(err).message}`, undefined, runKey(run)),
      };
      return;
    }

    this.logger.debug('Expanding artifact directory', { run: runKey(run), artifact: path });
    const base = url.endsWith('/') ? url : `${url}/`;
    for (const child of parseDirectoryListing(html)) {
      const childPath = posix.join(path, child.name);
      const childUrl = `${base}${encodeURIComponent(child.name)}${child.isDirectory ? '/' : ''}`;
      if (!isWithin(childUrl, root)) {
        yield {
          kind: 'error',
          artifact: refSummary(ref, childPath),
          error: sourceUnavailableError(`Directory entry ${childPath} points outside the artifact`, { url: childUrl }, runKey(run)),
        };
        continue;
      }
      yield* this.walk(run, ref, childUrl, childPath, root);
    }
  }

  private async send(url: string, runId?: string): Promise<Response> {
    try {
      return await fetch(url, {
        method: 'GET',
        headers: { Authorization: `Bearer ${this.token}` },
        dispatcher: this.dispatcher,
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : 'unknown error';
      throw new TransferError(
        sourceUnavailableError(this.mask(`Argo connection failed (${this.baseUrl}): ${reason}`), undefined, runId),
      );
    }
  }

  private mask(message: string): string {
    return maskSecretsInMessage(message, [this.token]);
  }
}

function refSummary(ref: ArtifactRef, name: string): ArtifactSummary {
  return { name, nodeId: ref.nodeId, artifactName: ref.artifactName };
}

/** True when `url` parses and, once normalized, still lies below `root`. */
function isWithin(url: string, root: string): boolean {
  try {
    return new URL(url).href.startsWith(new URL(root).href);
  } catch {
    return false;
  }
}

async function discardBody(res: Response): Promise<void> {
  if (res.body && !res.bodyUsed) {
    await res.body.cancel();
  }
}
