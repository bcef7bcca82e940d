/**
 * Builds the application context from configuration. Shared by the HTTP
 * server and the operator scripts so both run the pipeline the same way.
 */

import type { AppConfig } from './config/env';
import { loadRuleSet } from './config/ruleSet';
import type { AppContext } from './context';
import { createDatabase, type Database } from './db';
import { loggers } from './lib/logger';
import { createMappingCollaborator } from './services/aiMappingClient';
import { FileSystemBlobStore } from './services/blobStore';
import { TabularFileDecoder } from './services/spreadsheetDecoder';
import { MappingSuggestionGenerator } from './services/mappingSuggestion';
import type { PipelineContext } from './services/pipelineOrchestrator';
import { DrizzleStorage } from './storage';

export interface Application {
  context: AppContext;
  database: Database;
}

export async function createApplication(config: AppConfig): Promise<Application> {
  const database = createDatabase(config);
  const storage = new DrizzleStorage(database.db);
  const blobs = new FileSystemBlobStore(config.blobStoragePath);
  const rules = await loadRuleSet(config.rulesFile);

  const collaborator = createMappingCollaborator(config);
  const suggestions = new MappingSuggestionGenerator(collaborator, {
    timeoutMs: config.openai.timeoutMs,
    minScore: config.suggestions.minScore,
    sampleRowCount: config.suggestions.sampleRows,
  });

  const pipeline: PipelineContext = {
    storage,
    blobs,
    decoder: new TabularFileDecoder(),
    suggestions,
    rules,
    matchThreshold: config.matching.threshold,
    logger: loggers.pipeline,
  };

  loggers.pipeline.info(
    {
      ruleCount: rules.length,
      matchThreshold: config.matching.threshold,
      aiCollaborator: collaborator.name,
    },
    'Pipeline configured'
  );

  return {
    context: { config, storage, blobs, pipeline, scheduler: null },
    database,
  };
}
