/**
 * Process entry point: load configuration, start the HTTP server, and drain
 * running transfers on shutdown.
 */

import 'dotenv/config';
import { ConfigError, loadConfig } from './config';
import { createApp, createAppContext } from './server';
import { logger, setLogLevel, setLogSecrets } from './logger';

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  setLogSecrets([config.argo.token, config.cordra.password, config.server.basicAuth?.password]);

  const ctx = createAppContext(config);
  const app = createApp(ctx);

  const server = app.listen(config.server.port, config.server.host, () => {
    logger.info('Connector listening', {
      host: config.server.host,
      port: config.server.port,
      rootPath: config.server.rootPath || '/',
      argo: config.argo.url,
      cordra: config.cordra.url,
      maxFileSizeBytes: config.cordra.maxFileSizeBytes,
      authentication: config.server.basicAuth ? 'basic' : 'none',
    });
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down', { signal, pendingTransfers: ctx.queue.size });
    server.close((err) => {
      if (err) {
        logger.error('HTTP server close failed', { error: err.message });
      }
      ctx.queue
        .onIdle()
        .then(() => {
          logger.info('All transfers finished');
          process.exit(0);
        })
        .catch((drainErr: unknown) => {
          logger.error('Failed to drain transfers', { error: drainErr instanceof Error ? drainErr.message : String(drainErr) });
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    logger.error('Invalid configuration', { issues: err.issues });
  } else {
    logger.error('Startup failed', { error: err instanceof Error ? err.message : String(err) });
  }
  process.exit(1);
});
