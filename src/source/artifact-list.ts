/**
 * Workflow status parsing.
 *
 * Argo reports every output artifact of a run in `status.nodes`. Only the
 * run's own results are worth archiving: cache entries live outside the
 * run's key prefix, and artifacts that Argo garbage-collects exist only to
 * pass data between steps.
 */

import { z } from 'zod';
import { ArtifactRef } from '../domain/transfer';

/** Argo names the main container log artifact like this. */
export const MAIN_LOGS_ARTIFACT = 'main-logs';

const argoArtifactSchema = z.object({
  name: z.string(),
  path: z.string().optional(),
  deleted: z.boolean().optional(),
  s3: z.object({ key: z.string().optional() }).optional(),
  artifactGC: z.object({ strategy: z.string().optional() }).optional(),
});

const argoNodeSchema = z.object({
  id: z.string().optional(),
  outputs: z
    .object({
      artifacts: z.array(argoArtifactSchema).optional(),
    })
    .optional(),
});

export const argoWorkflowSchema = z.object({
  metadata: z.object({
    name: z.string(),
    namespace: z.string().optional(),
    labels: z.record(z.string()).optional(),
    annotations: z.record(z.string()).optional(),
  }),
  spec: z.record(z.unknown()).optional(),
  status: z
    .object({
      phase: z.string().optional(),
      nodes: z.record(argoNodeSchema).optional(),
      storedWorkflowTemplateSpec: z.record(z.unknown()).optional(),
    })
    .optional(),
});

export type ArgoWorkflow = z.infer<typeof argoWorkflowSchema>;
export type ArgoArtifact = z.infer<typeof argoArtifactSchema>;

/** A submittable workflow manifest rebuilt from a run. */
export interface WorkflowDefinition {
  kind: 'Workflow';
  metadata: { annotations: Record<string, string> };
  spec: Record<string, unknown>;
}

function belongsToRun(artifact: ArgoArtifact, workflowName: string): boolean {
  const key = artifact.s3?.key;
  return key !== undefined && key.includes(workflowName);
}

function isGarbageCollected(artifact: ArgoArtifact): boolean {
  if (artifact.deleted) return true;
  const strategy = artifact.artifactGC?.strategy;
  return strategy !== undefined && strategy !== 'Never';
}

/** List the archivable output artifacts of a workflow, in status order. */
export function parseArtifactList(workflow: ArgoWorkflow): ArtifactRef[] {
  const refs: ArtifactRef[] = [];
  const nodes = workflow.status?.nodes ?? {};

  for (const [nodeId, node] of Object.entries(nodes)) {
    for (const artifact of node.outputs?.artifacts ?? []) {
      if (!belongsToRun(artifact, workflow.metadata.name)) continue;
      if (isGarbageCollected(artifact)) continue;

      const path =
        artifact.name === MAIN_LOGS_ARTIFACT ? 'main.log' : artifact.path ?? artifact.name;
      refs.push({ nodeId, artifactName: artifact.name, path });
    }
  }

  return refs;
}

/**
 * Rebuild the manifest a run was started from. Runs created from a
 * WorkflowTemplate only carry a reference in `spec`; the resolved template
 * is stored in the status and the run's own spec entries override it.
 */
export function reconstructWorkflow(workflow: ArgoWorkflow): WorkflowDefinition {
  const own = workflow.spec ?? {};
  const spec: Record<string, unknown> = {};

  if ('workflowTemplateRef' in own) {
    Object.assign(spec, workflow.status?.storedWorkflowTemplateSpec ?? {});
  }
  Object.assign(spec, own);
  delete spec.workflowTemplateRef;

  return {
    kind: 'Workflow',
    metadata: { annotations: { ...workflow.metadata.annotations } },
    spec,
  };
}
