/**
 * argo-cordra-connector: copies the output artifacts of finished Argo
 * workflow runs into a Cordra repository.
 *
 * Library entry point; `main.ts` runs the HTTP service.
 */

export { loadConfig, ConfigError } from './config';
export type { ServiceConfig, DuplicatePolicy } from './config';

export * from './domain/errors';
export * from './domain/transfer';
export { allowSize, readWithinLimit, DEFAULT_MAX_ARTIFACT_BYTES } from './domain/size-filter';
export type { BoundedReadResult } from './domain/size-filter';

export { ArgoClient } from './source/argo-client';
export type { ArgoClientOptions } from './source/argo-client';
export { parseArtifactList, reconstructWorkflow } from './source/artifact-list';
export type { ArgoWorkflow, WorkflowDefinition } from './source/artifact-list';
export type { ArtifactSource, ArtifactListing, HealthStatus } from './source/source';

export { CordraClient, FILE_OBJECT_TYPE } from './sink/cordra-client';
export type { CordraClientOptions } from './sink/cordra-client';
export type { ObjectSink, ObjectContent, StoreArtifactInput } from './sink/sink';

export { TransferOrchestrator } from './engine/orchestrator';
export type { OrchestratorConfig, RunOptions, TransferRunner } from './engine/orchestrator';
export { TransferQueue } from './engine/transfer-queue';
export { packageDataset, DATASET_OBJECT_TYPE, ACTION_OBJECT_TYPE, INSTRUMENT_OBJECT_TYPE } from './engine/dataset';
export type { DatasetPackage, ProvenanceInput } from './engine/dataset';
export { transitionTransferStatus, isTerminalTransferStatus } from './engine/state-machine';

export { createMemoryStore, DEFAULT_HISTORY_LIMIT } from './storage/memory-store';
export type { MemoryStoreOptions } from './storage/memory-store';
export type { TransferStore, ListOptions } from './storage/store';

export { createApp, createAppContext, createDispatcher } from './server';
export type { AppContext, AppDependencies } from './server';

export { logger, createLogger, setLogHandler, setLogLevel, setLogSecrets, parseLogLevel, LogLevel } from './logger';
export type { Logger, LogEntry, LogHandler } from './logger';
