/**
 * Dataset packaging.
 *
 * Groups the file objects stored for one run under a single `Dataset`
 * object and records how they were made: a `SoftwareApplication` holding
 * the run's workflow manifest is the instrument of a `CreateAction` whose
 * result is the files. Each file points back at both through `partOf` and
 * `resultOf`. Runs after the artifact loop; it never changes artifact
 * outcomes and never removes stored objects.
 */

import { WorkflowRunRef, runKey } from '../domain/transfer';
import { ObjectContent, ObjectSink } from '../sink/sink';
import { WorkflowDefinition } from '../source/artifact-list';

export const DATASET_OBJECT_TYPE = 'Dataset';
export const ACTION_OBJECT_TYPE = 'CreateAction';
export const INSTRUMENT_OBJECT_TYPE = 'SoftwareApplication';

export interface ProvenanceInput {
  definition?: WorkflowDefinition;
  startTime: string;
  endTime: string;
}

export interface DatasetPackage {
  datasetId: string;
  actionId: string;
  instrumentId: string;
}

export function buildInstrumentContent(run: WorkflowRunRef, definition?: WorkflowDefinition): ObjectContent {
  const content: ObjectContent = {
    name: `Argo workflow ${runKey(run)}`,
    description: `Workflow manifest of the Argo run "${run.name}" in namespace "${run.namespace}".`,
  };
  if (definition) {
    content.encodingFormat = 'application/json';
    content.text = JSON.stringify(definition);
  }
  return content;
}

export function buildActionContent(
  run: WorkflowRunRef,
  instrumentId: string,
  fileIds: string[],
  provenance: ProvenanceInput,
): ObjectContent {
  return {
    name: `Run of workflow ${runKey(run)}`,
    instrument: instrumentId,
    result: fileIds,
    startTime: provenance.startTime,
    endTime: provenance.endTime,
  };
}

export function buildDatasetContent(run: WorkflowRunRef, fileIds: string[], actionId: string): ObjectContent {
  return {
    name: `Results of workflow ${runKey(run)}`,
    description: `Output artifacts of the Argo workflow run "${run.name}" in namespace "${run.namespace}".`,
    keywords: ['Argo', 'workflow', run.name],
    hasPart: fileIds,
    mentions: [actionId],
  };
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

/** Create the provenance objects and the dataset, then link the files to them. */
export async function packageDataset(
  sink: ObjectSink,
  run: WorkflowRunRef,
  fileIds: string[],
  provenance: ProvenanceInput,
): Promise<DatasetPackage> {
  const instrumentId = await sink.createObject(INSTRUMENT_OBJECT_TYPE, buildInstrumentContent(run, provenance.definition));
  const actionId = await sink.createObject(ACTION_OBJECT_TYPE, buildActionContent(run, instrumentId, fileIds, provenance));
  const datasetId = await sink.createObject(DATASET_OBJECT_TYPE, buildDatasetContent(run, fileIds, actionId));

  for (const fileId of fileIds) {
    const content = await sink.readObject(fileId);
    const partOf = stringList(content.partOf);
    await sink.updateObject(fileId, {
      ...content,
      partOf: partOf.includes(datasetId) ? partOf : [...partOf, datasetId],
      resultOf: actionId,
    });
  }

  return { datasetId, actionId, instrumentId };
}
