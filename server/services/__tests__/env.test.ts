/**
 * Environment Configuration Tests
 *
 * Run with: npx vitest run server/services/__tests__/env.test.ts
 *
 * These tests verify:
 * 1. Defaults for every setting
 * 2. Boolean flags, numbers and blank values are parsed from strings
 * 3. Invalid settings are reported as configuration errors
 * 4. The AI collaborator is only built when enabled and keyed
 */

import { describe, it, expect } from 'vitest';
import { isAiConfigured, loadConfig } from '../../config/env';
import { ConfigurationError } from '../../lib/errors';
import { createMappingCollaborator } from '../aiMappingClient';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      env: 'development',
      port: 5000,
      databaseUrl: undefined,
      databaseSsl: false,
      blobStoragePath: './storage/blobs',
      rulesFile: './config/rules.json',
      templatesDir: './config/templates',
      matching: { threshold: 0.8 },
      suggestions: { minScore: 0.6, aiEnabled: true, sampleRows: 3 },
      openai: { apiKey: undefined, baseUrl: undefined, model: 'gpt-4o-mini', timeoutMs: 30000 },
      batch: { enabled: true, intervalMinutes: 5 },
    });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.batch)).toBe(true);
  });

  it('parses strings from the environment', () => {
    const config = loadConfig({
      NODE_ENV: 'production',
      PORT: '8080',
      DATABASE_SSL: 'yes',
      TEMPLATE_MATCH_THRESHOLD: '0.9',
      AI_SUGGESTIONS_ENABLED: 'false',
      BATCH_ENABLED: '0',
      BATCH_INTERVAL_MINUTES: '15',
      OPENAI_API_KEY: 'test-secret',
      OPENAI_BASE_URL: '',
    });

    expect(config.env).toBe('production');
    expect(config.port).toBe(8080);
    expect(config.databaseSsl).toBe(true);
    expect(config.matching.threshold).toBe(0.9);
    expect(config.suggestions.aiEnabled).toBe(false);
    expect(config.batch).toEqual({ enabled: false, intervalMinutes: 15 });
    expect(config.openai.apiKey).toBe('test-secret');
    expect(config.openai.baseUrl).toBeUndefined();
  });

  it('rejects invalid settings', () => {
    expect(() => loadConfig({ TEMPLATE_MATCH_THRESHOLD: '1.5' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ PORT: 'http' })).toThrow('PORT');
    expect(() => loadConfig({ BATCH_ENABLED: 'maybe' })).toThrow('BATCH_ENABLED');
  });
});

describe('AI configuration', () => {
  it('needs both the switch and a key', () => {
    expect(isAiConfigured(loadConfig({}))).toBe(false);
    expect(isAiConfigured(loadConfig({ OPENAI_API_KEY: 'test-secret', AI_SUGGESTIONS_ENABLED: 'false' }))).toBe(false);
    expect(isAiConfigured(loadConfig({ OPENAI_API_KEY: 'test-secret' }))).toBe(true);
  });

  it('builds the matching collaborator', () => {
    expect(createMappingCollaborator(loadConfig({})).name).toBe('disabled');
    expect(createMappingCollaborator(loadConfig({})).enabled).toBe(false);
    expect(createMappingCollaborator(loadConfig({ OPENAI_API_KEY: 'test-secret' })).name).toBe('openai');
  });
});
