import { DEFAULT_MAX_ARTIFACT_BYTES, allowSize, readWithinLimit } from '../../src/domain/size-filter';
import { makeArtifact } from '../helpers/fakes';

describe('allowSize', () => {
  test('default limit is 100 MiB', () => {
    expect(DEFAULT_MAX_ARTIFACT_BYTES).toBe(100 * 1024 * 1024);
  });

  test('allows sizes up to and including the limit', () => {
    expect(allowSize(0, 1024)).toBe(true);
    expect(allowSize(1024, 1024)).toBe(true);
    expect(allowSize(1025, 1024)).toBe(false);
  });

  test('allows an unknown size', () => {
    expect(allowSize(undefined, 1)).toBe(true);
  });

  test('documented example sizes', () => {
    expect(allowSize(1000, DEFAULT_MAX_ARTIFACT_BYTES)).toBe(true);
    expect(allowSize(200_000_000, DEFAULT_MAX_ARTIFACT_BYTES)).toBe(false);
  });
});

describe('readWithinLimit', () => {
  test('collects the whole body when it fits', async () => {
    const artifact = makeArtifact({ name: 'a.txt', data: 'hello world' });
    const result = await readWithinLimit(artifact.content, 1024);
    expect(result.exceeded).toBe(false);
    if (!result.exceeded) {
      expect(result.data.toString()).toBe('hello world');
      expect(result.sizeBytes).toBe(11);
    }
  });

  test('a body exactly at the limit fits', async () => {
    const artifact = makeArtifact({ name: 'a.bin', size: 1024 });
    const result = await readWithinLimit(artifact.content, 1024);
    expect(result).toMatchObject({ exceeded: false, sizeBytes: 1024 });
  });

  test('stops reading once the limit is passed', async () => {
    const artifact = makeArtifact({ name: 'big.bin', size: 10_000 });
    const result = await readWithinLimit(artifact.content, 1024);
    // 512-byte chunks: the third chunk passes 1024
    expect(result).toEqual({ exceeded: true, bytesRead: 1536 });
    expect(artifact.state.bytesRead).toBe(1536);
  });

  test('keeps only the bytes each chunk views', async () => {
    const backing = Buffer.from('--hello--world--');
    async function* views(): AsyncGenerator<Uint8Array> {
      yield new Uint8Array(backing.buffer, backing.byteOffset + 2, 5);
      yield new Uint8Array(backing.buffer, backing.byteOffset + 9, 5);
    }

    const result = await readWithinLimit(views(), 1024);

    expect(result).toMatchObject({ exceeded: false, sizeBytes: 10 });
    if (!result.exceeded) {
      expect(result.data.toString()).toBe('helloworld');
    }
  });

  test('propagates read errors', async () => {
    const artifact = makeArtifact({ name: 'broken.bin', size: 2048, failRead: true });
    await expect(readWithinLimit(artifact.content, 4096)).rejects.toThrow('connection reset');
  });
});
