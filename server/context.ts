import type { AppConfig } from './config/env';
import type { BatchScheduler } from './services/batchScheduler';
import type { PipelineContext } from './services/pipelineOrchestrator';
import type { BlobStore } from './services/blobStore';
import type { PipelineStorage } from './storage';

/**
 * Everything a request handler or operator script needs, built once at
 * startup and passed down explicitly.
 */
export interface AppContext {
  config: AppConfig;
  storage: PipelineStorage;
  blobs: BlobStore;
  pipeline: PipelineContext;
  scheduler: BatchScheduler | null;
}
