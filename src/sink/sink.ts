/**
 * Object sink contract.
 *
 * Implemented by the Cordra client. Every call is independent and rejects
 * with a TransferError carrying SINK.AUTH, SINK.UNAVAILABLE or
 * SINK.REJECTED.
 */

import { HealthStatus } from '../source/source';

export interface StoreArtifactInput {
  /** Relative artifact path; names the payload and becomes the content URL. */
  name: string;
  contentType: string;
  sizeBytes: number;
  data: Buffer;
}

/** JSON content of a digital object. */
export type ObjectContent = Record<string, unknown>;

export interface ObjectSink {
  /** Create a FileObject carrying the bytes as payload; resolves to its id. */
  storeArtifact(input: StoreArtifactInput): Promise<string>;
  /** Create an object of the given type; resolves to its id. */
  createObject(type: string, content: ObjectContent): Promise<string>;
  readObject(id: string): Promise<ObjectContent>;
  updateObject(id: string, content: ObjectContent): Promise<void>;
  checkHealth(): Promise<HealthStatus>;
}
