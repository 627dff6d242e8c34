/**
 * Service configuration.
 *
 * Read once from the environment at startup, validated, frozen, and passed
 * explicitly to every client and service that needs it. Nothing mutates it
 * afterwards.
 */

import { z } from 'zod';
import { LogLevel, parseLogLevel } from './logger';
import { DEFAULT_MAX_ARTIFACT_BYTES } from './domain/size-filter';
import { DEFAULT_HISTORY_LIMIT } from './storage/memory-store';

export type DuplicatePolicy = 'reprocess' | 'skip';

const K8S_NAMESPACE = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;

const configSchema = z.object({
  argo: z.object({
    url: z.string().url(),
    token: z.string().min(1),
    defaultNamespace: z.string().max(63).regex(K8S_NAMESPACE),
    verifyCert: z.boolean(),
  }),
  cordra: z.object({
    url: z.string().url(),
    username: z.string().min(1),
    password: z.string().min(1),
    verifyCert: z.boolean(),
    maxFileSizeBytes: z.number().int().positive(),
    createDataset: z.boolean(),
  }),
  server: z.object({
    host: z.string().min(1),
    port: z.number().int().nonnegative().max(65535),
    rootPath: z.string().regex(/^(\/[^/\s]+)*$/, 'must be empty or start with "/" and have no trailing slash'),
    basicAuth: z
      .object({
        username: z.string().min(1),
        password: z.string().min(1),
      })
      .optional(),
  }),
  transfers: z.object({
    concurrency: z.number().int().positive(),
    duplicatePolicy: z.union([z.literal('reprocess'), z.literal('skip')]),
    historyLimit: z.number().int().positive(),
  }),
  logLevel: z.nativeEnum(LogLevel),
});

export type ServiceConfig = z.infer<typeof configSchema>;

/** Thrown when the environment does not describe a usable configuration. */
export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
    this.name = 'ConfigError';
  }
}

// Config paths back to the variables that feed them, for error messages.
const ENV_NAMES: Record<string, string> = {
  'argo.url': 'ARGO_URL',
  'argo.token': 'ARGO_TOKEN',
  'argo.defaultNamespace': 'ARGO_DEFAULT_NAMESPACE',
  'argo.verifyCert': 'ARGO_VERIFY_CERT',
  'cordra.url': 'CORDRA_URL',
  'cordra.username': 'CORDRA_USER',
  'cordra.password': 'CORDRA_PASSWORD',
  'cordra.verifyCert': 'CORDRA_VERIFY_CERT',
  'cordra.maxFileSizeBytes': 'CORDRA_MAX_FILE_SIZE',
  'cordra.createDataset': 'CORDRA_CREATE_DATASET',
  'server.host': 'HOST',
  'server.port': 'PORT',
  'server.rootPath': 'ROOT_PATH',
  'server.basicAuth.username': 'USER_NAME',
  'server.basicAuth.password': 'USER_PASSWORD',
  'transfers.concurrency': 'TRANSFER_CONCURRENCY',
  'transfers.duplicatePolicy': 'DUPLICATE_NOTIFICATION_POLICY',
  'transfers.historyLimit': 'TRANSFER_HISTORY_LIMIT',
  logLevel: 'LOG_LEVEL',
};

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  // NaN fails validation and is reported against the variable
  return Number(value);
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
}

function stripTrailingSlashes(value: string): string {
  return value.replace(/\/+$/, '');
}

/** Build and validate the configuration from an environment map. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<ServiceConfig> {
  const issues: string[] = [];

  const userName = env.USER_NAME?.trim();
  const userPassword = env.USER_PASSWORD;
  if (Boolean(userName) !== Boolean(userPassword)) {
    issues.push('USER_NAME and USER_PASSWORD must be set together');
  }

  const raw = {
    argo: {
      url: stripTrailingSlashes(env.ARGO_URL?.trim() ?? ''),
      token: env.ARGO_TOKEN?.trim() ?? '',
      defaultNamespace: env.ARGO_DEFAULT_NAMESPACE?.trim() || 'argo',
      verifyCert: parseBoolean(env.ARGO_VERIFY_CERT, true),
    },
    cordra: {
      url: stripTrailingSlashes(env.CORDRA_URL?.trim() ?? ''),
      username: env.CORDRA_USER?.trim() ?? '',
      password: env.CORDRA_PASSWORD ?? '',
      verifyCert: parseBoolean(env.CORDRA_VERIFY_CERT, true),
      maxFileSizeBytes: parseNumber(env.CORDRA_MAX_FILE_SIZE, DEFAULT_MAX_ARTIFACT_BYTES),
      createDataset: parseBoolean(env.CORDRA_CREATE_DATASET, true),
    },
    server: {
      host: env.HOST?.trim() || '0.0.0.0',
      port: parseNumber(env.PORT, 8000),
      rootPath: stripTrailingSlashes(env.ROOT_PATH?.trim() ?? ''),
      basicAuth: userName && userPassword ? { username: userName, password: userPassword } : undefined,
    },
    transfers: {
      concurrency: parseNumber(env.TRANSFER_CONCURRENCY, 2),
      duplicatePolicy: (env.DUPLICATE_NOTIFICATION_POLICY?.trim().toLowerCase() || 'reprocess'),
      historyLimit: parseNumber(env.TRANSFER_HISTORY_LIMIT, DEFAULT_HISTORY_LIMIT),
    },
    logLevel: parseLogLevel(env.LOG_LEVEL ?? 'info') ?? env.LOG_LEVEL,
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    for (const issue of result.error.issues) {
      const path = issue.path.join('.');
      issues.push(`${ENV_NAMES[path] ?? path}: ${issue.message}`);
    }
  }

  if (issues.length > 0 || !result.success) {
    throw new ConfigError(issues);
  }

  return deepFreeze(result.data);
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
