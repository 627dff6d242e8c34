/**
 * Notification API routes.
 *
 * POST /notify: a workflow run finished; queue the copy of its artifacts.
 *
 * The response only says whether the notification was accepted. Transfer
 * results are read later through the transfers routes or the logs.
 */

import { Router } from 'express';
import { z } from 'zod';
import { DuplicatePolicy } from '../config';
import { apiError, validationError } from '../domain/errors';
import { TransferStatus, WorkflowRunRef } from '../domain/transfer';
import { TransferQueue } from '../engine/transfer-queue';
import { TransferStore } from '../storage/store';
import { logger } from '../logger';

export interface NotificationRouteConfig {
  defaultNamespace: string;
  duplicatePolicy: DuplicatePolicy;
}

// Kubernetes object names (DNS subdomain) and namespaces (DNS label)
const workflowName = z
  .string()
  .min(1)
  .max(253)
  .regex(/^[a-z0-9]([-a-z0-9.]*[a-z0-9])?$/, 'must be a valid Kubernetes object name');
const namespaceName = z
  .string()
  .min(1)
  .max(63)
  .regex(/^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/, 'must be a valid Kubernetes namespace');

export const notificationSchema = z.object({
  name: workflowName,
  namespace: namespaceName.optional(),
});

export type Notification = z.infer<typeof notificationSchema>;

export function createNotificationRoutes(
  queue: TransferQueue,
  store: TransferStore,
  config: NotificationRouteConfig,
): Router {
  const router = Router();

  /**
   * POST /notify
   * Accept a "workflow finished" notification and schedule the transfer.
   */
  router.post('/notify', async (req, res, next) => {
    const parsed = notificationSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json(
        apiError(
          validationError('Malformed workflow run identifier', {
            issues: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
          }),
        ),
      );
      return;
    }

    const run: WorkflowRunRef = {
      namespace: parsed.data.namespace ?? config.defaultNamespace,
      name: parsed.data.name,
    };

    try {
      if (config.duplicatePolicy === 'skip') {
        const previous = (await store.listByRun(run)).find((record) => record.status !== TransferStatus.Failed);
        if (previous) {
          logger.info('Duplicate notification skipped', { transferId: previous.id, namespace: run.namespace, workflow: run.name });
          res.status(200).json({ transfer: previous, duplicate: true });
          return;
        }
      }

      const transfer = await queue.submit(run);
      res.status(202).json({ transfer });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
