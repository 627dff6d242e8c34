import { MockAgent } from 'undici';
import { TransferError } from '../../src/domain/errors';
import { readWithinLimit } from '../../src/domain/size-filter';
import { ArtifactEntry } from '../../src/domain/transfer';
import { ArgoClient } from '../../src/source/argo-client';
import { setLogHandler } from '../../src/logger';

const ORIGIN = 'https://argo.example.test';
const RUN = { namespace: 'argo', name: 'wf-42' };
const ARTIFACTS = '/artifact-files/argo/workflows/wf-42';

function workflowBody(artifacts: Array<Record<string, unknown>>) {
  return {
    metadata: { name: 'wf-42', namespace: 'argo' },
    status: { phase: 'Succeeded', nodes: { 'wf-42-1': { id: 'wf-42-1', outputs: { artifacts } } } },
  };
}

async function collect(entries: AsyncIterable<ArtifactEntry>) {
  const seen: Array<{ name: string; code?: string; data?: string; sizeBytes?: number; contentType?: string }> = [];
  for await (const entry of entries) {
    if (entry.kind === 'error') {
      seen.push({ name: entry.artifact.name, code: entry.error.code });
      continue;
    }
    const read = await readWithinLimit(entry.artifact.content, 1024);
    seen.push({
      name: entry.artifact.name,
      data: read.exceeded ? undefined : read.data.toString(),
      sizeBytes: entry.artifact.sizeBytes,
      contentType: entry.artifact.contentType,
    });
  }
  return seen;
}

describe('ArgoClient', () => {
  let agent: MockAgent;
  let client: ArgoClient;

  beforeAll(() => setLogHandler(() => {}));
  afterAll(() => setLogHandler());

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    client = new ArgoClient({ baseUrl: `${ORIGIN}/`, token: 'test-token-value', defaultNamespace: 'argo', dispatcher: agent });
  });

  afterEach(async () => {
    await agent.close();
  });

  test('downloads file artifacts with their announced size and type', async () => {
    const pool = agent.get(ORIGIN);
    pool
      .intercept({ path: '/api/v1/workflows/argo/wf-42', method: 'GET', headers: { authorization: 'Bearer test-token-value' } })
      .reply(200, workflowBody([{ name: 'report', path: '/tmp/report.csv', s3: { key: 'wf-42/wf-42-1/report.tgz' } }]));
    pool.intercept({ path: `${ARTIFACTS}/wf-42-1/outputs/report`, method: 'GET' }).reply(200, 'a,b\n1,2\n', {
      headers: {
        'content-disposition': 'attachment; filename="report.csv"',
        'content-length': '8',
        'content-type': 'text/csv; charset=utf-8',
      },
    });

    const listing = await client.readArtifacts(RUN);
    expect(listing.refs).toEqual([{ nodeId: 'wf-42-1', artifactName: 'report', path: '/tmp/report.csv' }]);
    expect(await collect(listing.entries)).toEqual([
      { name: 'wf-42-1/tmp/report.csv', data: 'a,b\n1,2\n', sizeBytes: 8, contentType: 'text/csv' },
    ]);
  });

  test('names a download after the file the server hands out', async () => {
    const pool = agent.get(ORIGIN);
    pool
      .intercept({ path: '/api/v1/workflows/argo/wf-42', method: 'GET' })
      .reply(200, workflowBody([{ name: 'main-logs', s3: { key: 'wf-42/wf-42-1/main.log' } }]));
    pool.intercept({ path: `${ARTIFACTS}/wf-42-1/outputs/main-logs`, method: 'GET' }).reply(200, 'started\n', {
      headers: { 'content-disposition': 'attachment; filename="main.log.gz"' },
    });

    const listing = await client.readArtifacts(RUN);
    const [entry] = await collect(listing.entries);
    expect(entry.name).toBe('wf-42-1/main.log.gz');
    expect(entry.contentType).toBe('application/octet-stream');
  });

  test('walks directory listings recursively', async () => {
    const pool = agent.get(ORIGIN);
    const base = `${ARTIFACTS}/wf-42-1/outputs/results`;
    pool
      .intercept({ path: '/api/v1/workflows/argo/wf-42', method: 'GET' })
      .reply(200, workflowBody([{ name: 'results', path: '/out', s3: { key: 'wf-42/wf-42-1/results.tgz' } }]));
    pool
      .intercept({ path: base, method: 'GET' })
      .reply(200, '<a href="../">../</a><a href="a.txt">a.txt</a><a href="sub/">sub/</a>', {
        headers: { 'content-type': 'text/html' },
      });
    pool
      .intercept({ path: `${base}/a.txt`, method: 'GET' })
      .reply(200, 'A', { headers: { 'content-disposition': 'attachment; filename="a.txt"' } });
    pool
      .intercept({ path: `${base}/sub/`, method: 'GET' })
      .reply(200, '<a href="b.txt">b.txt</a>', { headers: { 'content-type': 'text/html' } });
    pool
      .intercept({ path: `${base}/sub/b.txt`, method: 'GET' })
      .reply(200, 'B', { headers: { 'content-disposition': 'attachment; filename="b.txt"' } });

    const listing = await client.readArtifacts(RUN);
    const entries = await collect(listing.entries);
    expect(entries.map((entry) => [entry.name, entry.data])).toEqual([
      ['wf-42-1/out/a.txt', 'A'],
      ['wf-42-1/out/sub/b.txt', 'B'],
    ]);
  });

  test('a failing download becomes an error entry and the walk continues', async () => {
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: '/api/v1/workflows/argo/wf-42', method: 'GET' }).reply(
      200,
      workflowBody([
        { name: 'lost', path: '/tmp/lost.txt', s3: { key: 'wf-42/lost' } },
        { name: 'kept', path: '/tmp/kept.txt', s3: { key: 'wf-42/kept' } },
      ]),
    );
    pool.intercept({ path: `${ARTIFACTS}/wf-42-1/outputs/lost`, method: 'GET' }).reply(404, 'not found');
    pool
      .intercept({ path: `${ARTIFACTS}/wf-42-1/outputs/kept`, method: 'GET' })
      .reply(200, 'ok', { headers: { 'content-disposition': 'attachment; filename="kept.txt"' } });

    const listing = await client.readArtifacts(RUN);
    const entries = await collect(listing.entries);
    expect(entries.map((entry) => [entry.name, entry.code ?? entry.data])).toEqual([
      ['wf-42-1/tmp/lost.txt', 'SOURCE.UNAVAILABLE'],
      ['wf-42-1/tmp/kept.txt', 'ok'],
    ]);
  });

  test('a directory without files becomes one error entry', async () => {
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: '/api/v1/workflows/argo/wf-42', method: 'GET' }).reply(
      200,
      workflowBody([
        { name: 'a', path: '/a', s3: { key: 'wf-42/a' } },
        { name: 'dir', path: '/dir', s3: { key: 'wf-42/dir.tgz' } },
      ]),
    );
    pool
      .intercept({ path: `${ARTIFACTS}/wf-42-1/outputs/a`, method: 'GET' })
      .reply(200, 'A', { headers: { 'content-disposition': 'attachment; filename="a"' } });
    pool
      .intercept({ path: `${ARTIFACTS}/wf-42-1/outputs/dir`, method: 'GET' })
      .reply(200, '<a href="../">../</a><a href="http:">http:</a>', { headers: { 'content-type': 'text/html' } });

    const listing = await client.readArtifacts(RUN);
    const entries = await collect(listing.entries);
    expect(entries.map((entry) => [entry.name, entry.code ?? entry.data])).toEqual([
      ['wf-42-1/a', 'A'],
      ['wf-42-1/dir', 'SOURCE.EMPTY_ARTIFACT'],
    ]);
  });

  test('only plain child names of a listing are followed, and they are escaped', async () => {
    const pool = agent.get(ORIGIN);
    const base = `${ARTIFACTS}/wf-42-1/outputs/results`;
    pool
      .intercept({ path: '/api/v1/workflows/argo/wf-42', method: 'GET' })
      .reply(200, workflowBody([{ name: 'results', path: '/out', s3: { key: 'wf-42/wf-42-1/results.tgz' } }]));
    pool.intercept({ path: base, method: 'GET' }).reply(
      200,
      [
        '<a href="http:">http:</a>',
        '<a href="https:">https:</a>',
        '<a href=".">.</a>',
        '<a href="./">./</a>',
        '<a href="/etc/">etc</a>',
        '<a href="?C=N;O=D">Name</a>',
        '<a href="a#b">a#b</a>',
      ].join(''),
      { headers: { 'content-type': 'text/html' } },
    );
    pool
      .intercept({ path: `${base}/a%23b`, method: 'GET' })
      .reply(200, 'X', { headers: { 'content-disposition': 'attachment; filename="a#b"' } });

    const listing = await client.readArtifacts(RUN);
    const entries = await collect(listing.entries);
    expect(entries.map((entry) => [entry.name, entry.code ?? entry.data])).toEqual([['wf-42-1/out/a#b', 'X']]);
  });

  test('the listing carries the manifest the run was started from', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/api/v1/workflows/argo/wf-42', method: 'GET' })
      .reply(200, {
        ...workflowBody([]),
        metadata: { name: 'wf-42', namespace: 'argo', annotations: { owner: 'team-a' } },
        spec: { entrypoint: 'main', arguments: { parameters: [{ name: 'species', value: 'oak' }] } },
      });

    const listing = await client.readArtifacts(RUN);
    expect(listing.definition).toEqual({
      kind: 'Workflow',
      metadata: { annotations: { owner: 'team-a' } },
      spec: { entrypoint: 'main', arguments: { parameters: [{ name: 'species', value: 'oak' }] } },
    });
  });

  test('an unknown run is RUN_NOT_FOUND', async () => {
    agent.get(ORIGIN).intercept({ path: '/api/v1/workflows/argo/wf-99', method: 'GET' }).reply(404, { message: 'not found' });

    const err = await client.readArtifacts({ namespace: 'argo', name: 'wf-99' }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransferError);
    if (err instanceof TransferError) {
      expect(err.typedError.code).toBe('SOURCE.RUN_NOT_FOUND');
      expect(err.typedError.runId).toBe('argo/wf-99');
    }
  });

  test('server errors are SOURCE.UNAVAILABLE with the token masked', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/api/v1/workflows/argo/wf-42', method: 'GET' })
      .reply(500, 'bad token test-token-value');

    const err = await client.readArtifacts(RUN).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransferError);
    if (err instanceof TransferError) {
      expect(err.typedError.code).toBe('SOURCE.UNAVAILABLE');
      expect(err.typedError.retryable).toBe(true);
      expect(err.typedError.message).toBe('Argo returned HTTP 500 for workflow argo/wf-42: bad token ************alue');
    }
  });

  test('an unreachable server is SOURCE.UNAVAILABLE', async () => {
    const err = await client.readArtifacts(RUN).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransferError);
    if (err instanceof TransferError) {
      expect(err.typedError.code).toBe('SOURCE.UNAVAILABLE');
    }
  });

  test('checkHealth queries the default namespace', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/api/v1/workflows/argo?listOptions.limit=1', method: 'GET' })
      .reply(200, { items: [] });
    expect(await client.checkHealth()).toEqual({ ok: true });
  });

  test('checkHealth reports a failing server', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/api/v1/workflows/argo?listOptions.limit=1', method: 'GET' })
      .reply(403, 'forbidden');
    expect(await client.checkHealth()).toEqual({ ok: false, message: 'Argo returned HTTP 403' });
  });
});
