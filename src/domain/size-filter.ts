/**
 * Artifact size policy.
 *
 * A size announced ahead of the download is checked before any byte is
 * read. An artifact without an announced size is allowed, and its body is
 * then read through `readWithinLimit`, which stops as soon as the running
 * count passes the limit. Either check failing makes the artifact a
 * skipped outcome; nothing is ever truncated.
 */

/** Default maximum artifact size: 100 MiB. */
export const DEFAULT_MAX_ARTIFACT_BYTES = 104_857_600;

/** Whether an artifact of the given size may be transferred. */
export function allowSize(sizeBytes: number | undefined, maxSizeBytes: number): boolean {
  if (sizeBytes === undefined) return true;
  return sizeBytes <= maxSizeBytes;
}

export type BoundedReadResult =
  | { exceeded: false; data: Buffer; sizeBytes: number }
  | { exceeded: true; bytesRead: number };

/**
 * Collect a byte sequence into memory, giving up once more than
 * `maxSizeBytes` have arrived. Leaving the loop early closes the source.
 */
export async function readWithinLimit(
  content: AsyncIterable<Uint8Array>,
  maxSizeBytes: number,
): Promise<BoundedReadResult> {
  const chunks: Buffer[] = [];
  let bytesRead = 0;

  for await (const chunk of content) {
    bytesRead += chunk.byteLength;
    if (!allowSize(bytesRead, maxSizeBytes)) {
      return { exceeded: true, bytesRead };
    }
    // wrap, don't copy: Buffer.concat copies once at the end
    chunks.push(Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength));
  }

  return { exceeded: false, data: Buffer.concat(chunks), sizeBytes: bytesRead };
}
