/**
 * Express server configuration.
 *
 * Builds the clients from the frozen configuration, wires them into the
 * orchestrator and queue, and mounts the routes under ROOT_PATH.
 */

import express from 'express';
import { Agent } from 'undici';
import type { Dispatcher } from 'undici';
import { ServiceConfig } from './config';
import { TransferOrchestrator } from './engine/orchestrator';
import { TransferQueue } from './engine/transfer-queue';
import { ArgoClient } from './source/argo-client';
import { ArtifactSource } from './source/source';
import { CordraClient } from './sink/cordra-client';
import { ObjectSink } from './sink/sink';
import { TransferStore } from './storage/store';
import { createMemoryStore } from './storage/memory-store';
import { basicAuth, errorHandler } from './api/middleware';
import { createHealthRoutes } from './api/health';
import { createNotificationRoutes } from './api/notifications';
import { createTransferRoutes } from './api/transfers';
import { Logger, logger as rootLogger } from './logger';

/** Application context containing all services. */
export interface AppContext {
  config: Readonly<ServiceConfig>;
  store: TransferStore;
  source: ArtifactSource;
  sink: ObjectSink;
  orchestrator: TransferOrchestrator;
  queue: TransferQueue;
}

/** Replaceable collaborators; tests pass in-memory fakes. */
export interface AppDependencies {
  store?: TransferStore;
  source?: ArtifactSource;
  sink?: ObjectSink;
  logger?: Logger;
}

/** An undici dispatcher honouring the certificate verification setting. */
export function createDispatcher(verifyCert: boolean): Dispatcher {
  return new Agent({ connect: { rejectUnauthorized: verifyCert } });
}

/** Create the application context with all services. */
export function createAppContext(config: Readonly<ServiceConfig>, deps: AppDependencies = {}): AppContext {
  const log = deps.logger ?? rootLogger;
  const store = deps.store ?? createMemoryStore({ historyLimit: config.transfers.historyLimit });
  const source =
    deps.source ??
    new ArgoClient({
      baseUrl: config.argo.url,
      token: config.argo.token,
      defaultNamespace: config.argo.defaultNamespace,
      dispatcher: createDispatcher(config.argo.verifyCert),
      logger: log,
    });
  const sink =
    deps.sink ??
    new CordraClient({
      baseUrl: config.cordra.url,
      username: config.cordra.username,
      password: config.cordra.password,
      dispatcher: createDispatcher(config.cordra.verifyCert),
      logger: log,
    });

  const orchestrator = new TransferOrchestrator(
    source,
    sink,
    { maxFileSizeBytes: config.cordra.maxFileSizeBytes, createDataset: config.cordra.createDataset },
    log,
  );
  const queue = new TransferQueue(store, orchestrator, { concurrency: config.transfers.concurrency }, log);

  return { config, store, source, sink, orchestrator, queue };
}

/** Create and configure the Express application. */
export function createApp(ctx: AppContext): express.Application {
  const app = express();
  const router = express.Router();

  router.use(express.json({ limit: '1mb' }));

  // Health stays reachable without credentials
  router.use(
    createHealthRoutes({
      argo: () => ctx.source.checkHealth(),
      cordra: () => ctx.sink.checkHealth(),
    }),
  );

  router.use(basicAuth(ctx.config.server.basicAuth));
  router.use(
    createNotificationRoutes(ctx.queue, ctx.store, {
      defaultNamespace: ctx.config.argo.defaultNamespace,
      duplicatePolicy: ctx.config.transfers.duplicatePolicy,
    }),
  );
  router.use(createTransferRoutes(ctx.store));

  app.use(ctx.config.server.rootPath || '/', router);
  app.use(errorHandler);

  return app;
}
