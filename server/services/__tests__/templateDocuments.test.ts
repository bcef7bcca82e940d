/**
 * Template Document Tests
 *
 * Run with: npx vitest run server/services/__tests__/templateDocuments.test.ts
 *
 * These tests verify:
 * 1. Template documents compile into normalized templates
 * 2. Documents with unknown fields, bad ids or no mappings are rejected
 * 3. The bundled template directory loads in filename order
 * 4. Duplicate ids across documents are rejected
 */

import { describe, it, expect } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { FileType } from '../../../shared/schema';
import { compileTemplateDocument, loadTemplateDocuments } from '../../config/templateDocuments';
import { ConfigurationError } from '../../lib/errors';

const bundledTemplates = fileURLToPath(new URL('../../../config/templates', import.meta.url));

const document = {
  template_id: 'acme-premium-v1',
  name: 'Acme premium',
  file_type: 'premium',
  column_mappings: { 'Policy Ref': 'policy_number', 'Gross Premium (GBP)': 'premium_amount' },
};

describe('compileTemplateDocument', () => {
  it('compiles a document with normalized headers and defaults', () => {
    expect(compileTemplateDocument(document)).toEqual({
      templateId: 'acme-premium-v1',
      name: 'Acme premium',
      carrier: null,
      fileType: FileType.PREMIUM,
      columnMappings: { policy_ref: 'policy_number', gross_premium_gbp: 'premium_amount' },
      active: true,
    });
  });

  it('defaults the file type to unknown', () => {
    const { file_type: _fileType, ...withoutType } = document;

    expect(compileTemplateDocument(withoutType).fileType).toBe(FileType.UNKNOWN);
  });

  it('rejects mappings to unknown fields', () => {
    expect(() => compileTemplateDocument({ ...document, column_mappings: { 'Policy Ref': 'policy_id' } }))
      .toThrow('Template acme-premium-v1 maps to unknown canonical fields: policy_id');
  });

  it('rejects empty mappings and bad template ids', () => {
    expect(() => compileTemplateDocument({ ...document, column_mappings: {} })).toThrow('At least one column mapping is required');
    expect(() => compileTemplateDocument({ ...document, template_id: 'Acme Premium' })).toThrow(ConfigurationError);
  });

  it('rejects headers that collide after normalization', () => {
    expect(() =>
      compileTemplateDocument({ ...document, column_mappings: { 'Policy Ref': 'policy_number', 'policy_ref': 'policy_number' } })
    ).toThrow("Column mapping headers collide after normalization: 'policy_ref'");
  });
});

describe('loadTemplateDocuments', () => {
  it('loads the bundled templates in filename order', async () => {
    const templates = await loadTemplateDocuments(bundledTemplates);

    expect(templates.map((template) => [template.templateId, template.fileType])).toEqual([
      ['harbour-premium-v1', FileType.PREMIUM],
      ['northgate-claims-v2', FileType.CLAIMS],
    ]);
    expect(templates[1].columnMappings.paid_loss).toBe('claim_amount');
  });

  it('returns nothing for a missing directory', async () => {
    expect(await loadTemplateDocuments(join(tmpdir(), 'no-such-template-dir'))).toEqual([]);
  });

  it('rejects duplicate template ids', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'templates-'));
    try {
      await writeFile(join(dir, 'a.json'), JSON.stringify(document));
      await writeFile(join(dir, 'b.json'), JSON.stringify(document));
      await writeFile(join(dir, 'notes.txt'), 'ignored');

      await expect(loadTemplateDocuments(dir)).rejects.toThrow("Duplicate template_id 'acme-premium-v1'");
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
