import { ConfigError, loadConfig } from '../src/config';
import { LogLevel } from '../src/logger';
import { BASE_ENV } from './helpers/fakes';

function issuesFor(env: NodeJS.ProcessEnv): string[] {
  try {
    loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigError) return err.issues;
    throw err;
  }
  throw new Error('expected loadConfig to fail');
}

describe('loadConfig', () => {
  test('applies defaults', () => {
    const config = loadConfig(BASE_ENV);

    expect(config).toEqual({
      argo: { url: 'https://argo.example.test', token: 'test-token', defaultNamespace: 'argo', verifyCert: true },
      cordra: {
        url: 'https://cordra.example.test',
        username: 'admin',
        password: 'test-secret',
        verifyCert: true,
        maxFileSizeBytes: 104_857_600,
        createDataset: true,
      },
      server: { host: '0.0.0.0', port: 8000, rootPath: '', basicAuth: undefined },
      transfers: { concurrency: 2, duplicatePolicy: 'reprocess', historyLimit: 1000 },
      logLevel: LogLevel.Info,
    });
  });

  test('reads every setting from the environment', () => {
    const config = loadConfig({
      ...BASE_ENV,
      ARGO_URL: 'https://argo.example.test/',
      ARGO_DEFAULT_NAMESPACE: 'workflows',
      ARGO_VERIFY_CERT: 'false',
      CORDRA_VERIFY_CERT: '0',
      CORDRA_MAX_FILE_SIZE: '2048',
      CORDRA_CREATE_DATASET: 'no',
      USER_NAME: 'operator',
      USER_PASSWORD: 'test-password',
      ROOT_PATH: '/connector/',
      HOST: '127.0.0.1',
      PORT: '9000',
      LOG_LEVEL: 'DEBUG',
      TRANSFER_CONCURRENCY: '4',
      DUPLICATE_NOTIFICATION_POLICY: 'Skip',
      TRANSFER_HISTORY_LIMIT: '50',
    });

    expect(config.argo).toEqual({
      url: 'https://argo.example.test',
      token: 'test-token',
      defaultNamespace: 'workflows',
      verifyCert: false,
    });
    expect(config.cordra).toMatchObject({ verifyCert: false, maxFileSizeBytes: 2048, createDataset: false });
    expect(config.server).toEqual({
      host: '127.0.0.1',
      port: 9000,
      rootPath: '/connector',
      basicAuth: { username: 'operator', password: 'test-password' },
    });
    expect(config.transfers).toEqual({ concurrency: 4, duplicatePolicy: 'skip', historyLimit: 50 });
    expect(config.logLevel).toBe(LogLevel.Debug);
  });

  test('the result is frozen', () => {
    const config = loadConfig(BASE_ENV);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.cordra)).toBe(true);
  });

  test('reports missing connection settings by variable name', () => {
    const issues = issuesFor({});
    const variables = issues.map((issue) => issue.split(':')[0]);
    expect(variables).toEqual(['ARGO_URL', 'ARGO_TOKEN', 'CORDRA_URL', 'CORDRA_USER', 'CORDRA_PASSWORD']);
  });

  test('rejects malformed numbers and levels', () => {
    const issues = issuesFor({ ...BASE_ENV, PORT: 'http', CORDRA_MAX_FILE_SIZE: '-5', LOG_LEVEL: 'verbose' });
    expect(issues.map((issue) => issue.split(':')[0])).toEqual(['CORDRA_MAX_FILE_SIZE', 'PORT', 'LOG_LEVEL']);
  });

  test('requires USER_NAME and USER_PASSWORD together', () => {
    expect(issuesFor({ ...BASE_ENV, USER_NAME: 'operator' })).toEqual(['USER_NAME and USER_PASSWORD must be set together']);
  });

  test('rejects an unknown duplicate policy', () => {
    const issues = issuesFor({ ...BASE_ENV, DUPLICATE_NOTIFICATION_POLICY: 'ignore' });
    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith('DUPLICATE_NOTIFICATION_POLICY:')).toBe(true);
  });

  test('the error message lists every issue', () => {
    expect(() => loadConfig({ ...BASE_ENV, USER_PASSWORD: 'test-password' })).toThrow(
      'Invalid configuration:\n  - USER_NAME and USER_PASSWORD must be set together',
    );
  });
});
