/**
 * GET /health: reachability of the workflow engine and the repository.
 */

import { Router } from 'express';
import { HealthStatus } from '../source/source';

export type HealthCheck = () => Promise<HealthStatus>;

export function createHealthRoutes(checks: Record<string, HealthCheck>, startTime: number = Date.now()): Router {
  const router = Router();

  router.get('/health', async (_req, res) => {
    const entries = await Promise.all(
      Object.entries(checks).map(async ([name, check]): Promise<[string, HealthStatus]> => {
        try {
          return [name, await check()];
        } catch (err) {
          return [name, { ok: false, message: err instanceof Error ? err.message : 'Health check failed' }];
        }
      }),
    );
    const results = Object.fromEntries(entries);
    const ok = entries.every(([, status]) => status.ok);

    res.status(ok ? 200 : 503).json({
      status: ok ? 'ok' : 'degraded',
      uptimeMs: Date.now() - startTime,
      checks: results,
    });
  });

  return router;
}
