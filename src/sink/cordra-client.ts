/**
 * Cordra REST client.
 *
 *   POST /objects?type={type}    create (JSON, or multipart with payloads)
 *   GET  /objects/{id}           read content
 *   PUT  /objects/{id}           replace content
 *   GET  /check-credentials      health check
 *
 * Requests authenticate with HTTP Basic. Multipart creates send the JSON
 * content in a part named `content`; every other part carrying a file name
 * becomes a payload named after the part.
 */

import { posix } from 'path';
import { Blob } from 'buffer';
import { z } from 'zod';
import { fetch, FormData, Headers } from 'undici';
import type { BodyInit, Dispatcher, Response } from 'undici';
import {
  TransferError,
  maskSecretsInMessage,
  sinkAuthError,
  sinkRejectedError,
  sinkUnavailableError,
  toTypedError,
} from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';
import { HealthStatus } from '../source/source';
import { ObjectContent, ObjectSink, StoreArtifactInput } from './sink';

export interface CordraClientOptions {
  baseUrl: string;
  username: string;
  password: string;
  dispatcher?: Dispatcher;
  logger?: Logger;
}

export const FILE_OBJECT_TYPE = 'FileObject';

const REJECTED_STATUSES = new Set([400, 409, 413, 422]);

const objectContentSchema = z.record(z.unknown());

interface CordraRequest {
  method: 'GET' | 'POST' | 'PUT';
  body?: BodyInit;
  contentType?: string;
}

const credentialsSchema = z.object({
  active: z.boolean(),
  username: z.string().optional(),
});

/** Object id from a create response; Cordra echoes it as `@id` for schema.org types. */
function extractObjectId(content: ObjectContent): string | undefined {
  for (const key of ['@id', 'id']) {
    const value = content[key];
    if (typeof value === 'string' && value.length > 0) return value;
  }
  return undefined;
}

function objectPath(id: string): string {
  return id.split('/').map(encodeURIComponent).join('/');
}

export class CordraClient implements ObjectSink {
  private readonly baseUrl: string;
  private readonly username: string;
  private readonly password: string;
  private readonly dispatcher?: Dispatcher;
  private readonly logger: Logger;

  constructor(options: CordraClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.username = options.username;
    this.password = options.password;
    this.dispatcher = options.dispatcher;
    this.logger = (options.logger ?? rootLogger).child({ client: 'cordra' });
  }

  async storeArtifact(input: StoreArtifactInput): Promise<string> {
    const content: ObjectContent = {
      name: posix.basename(input.name),
      contentSize: input.sizeBytes,
      encodingFormat: input.contentType,
      contentUrl: input.name,
    };

    const form = new FormData();
    form.set('content', JSON.stringify(content));
    form.append(input.name, new Blob([input.data], { type: input.contentType }), input.name);

    const id = await this.create(FILE_OBJECT_TYPE, { body: form });
    this.logger.debug('Created file object', { objectId: id, artifact: input.name, sizeBytes: input.sizeBytes });
    return id;
  }

  async createObject(type: string, content: ObjectContent): Promise<string> {
    return this.create(type, { body: JSON.stringify(content), contentType: 'application/json' });
  }

  async readObject(id: string): Promise<ObjectContent> {
    const res = await this.request(`/objects/${objectPath(id)}`, { method: 'GET' });
    return this.parseContent(res, `read of ${id}`);
  }

  async updateObject(id: string, content: ObjectContent): Promise<void> {
    const res = await this.request(`/objects/${objectPath(id)}`, {
      method: 'PUT',
      body: JSON.stringify(content),
      contentType: 'application/json',
    });
    await res.body?.cancel();
  }

  async checkHealth(): Promise<HealthStatus> {
    try {
      const res = await this.request('/check-credentials', { method: 'GET' });
      const parsed = credentialsSchema.safeParse(await res.json());
      if (!parsed.success) {
        return { ok: false, message: 'Cordra returned an unexpected credentials response' };
      }
      if (!parsed.data.active) {
        return { ok: false, message: 'Cordra does not accept the configured credentials' };
      }
      return { ok: true };
    } catch (err) {
      return { ok: false, message: toTypedError(err).message };
    }
  }

  private async create(type: string, init: Omit<CordraRequest, 'method'>): Promise<string> {
    const res = await this.request(`/objects?type=${encodeURIComponent(type)}`, { method: 'POST', ...init });
    const content = await this.parseContent(res, `create of ${type}`);
    const id = extractObjectId(content);
    if (!id) {
      throw new TransferError(sinkRejectedError(`Cordra created a ${type} without returning its id`));
    }
    return id;
  }

  private async parseContent(res: Response, operation: string): Promise<ObjectContent> {
    let body: unknown;
    try {
      body = await res.json();
    } catch {
      throw new TransferError(sinkUnavailableError(`Cordra returned a non-JSON response to ${operation}`));
    }
    const parsed = objectContentSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransferError(sinkUnavailableError(`Cordra returned an unexpected response to ${operation}`));
    }
    return parsed.data;
  }

  /** Send an authenticated request; any non-2xx answer becomes a typed sink error. */
  private async request(path: string, init: CordraRequest): Promise<Response> {
    const credentials = Buffer.from(`${this.username}:${this.password}`).toString('base64');
    const headers = new Headers();
    headers.set('Authorization', `Basic ${credentials}`);
    headers.set('Accept', 'application/json');
    // multipart bodies set their own boundary header
    if (init.contentType) headers.set('Content-Type', init.contentType);

    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}${path}`, {
        method: init.method,
        body: init.body,
        headers,
        dispatcher: this.dispatcher,
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : 'unknown error';
      throw new TransferError(sinkUnavailableError(this.mask(`Cordra connection failed (${this.baseUrl}): ${reason}`)));
    }

    if (res.ok) return res;

    const text = this.mask((await res.text().catch(() => '')).slice(0, 200));
    const message = `Cordra returned HTTP ${res.status} for ${init.method} ${path}${text ? `: ${text}` : ''}`;
    if (res.status === 401 || res.status === 403) {
      throw new TransferError(sinkAuthError(message, res.status));
    }
    if (REJECTED_STATUSES.has(res.status)) {
      throw new TransferError(sinkRejectedError(message, { statusCode: res.status }));
    }
    throw new TransferError(sinkUnavailableError(message, { statusCode: res.status }));
  }

  private mask(message: string): string {
    return maskSecretsInMessage(message, [this.password]);
  }
}
