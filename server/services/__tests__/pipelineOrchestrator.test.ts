/**
 * Pipeline Orchestrator Tests
 *
 * Run with: npx vitest run server/services/__tests__/pipelineOrchestrator.test.ts
 *
 * These tests verify:
 * 1. A matched file is mapped, validated and persisted with the right outcome
 * 2. An unmatched file gets a pending proposal and ends in NEEDS_TEMPLATE
 * 3. File-level failures end in FAILED without stopping the batch
 * 4. A file is processed by at most one concurrent run
 * 5. Forced reprocessing replaces earlier results and rejects in-flight files
 * 6. Clean files for each bundled template pass the bundled rules, spreadsheets included
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { fileURLToPath } from 'url';
import ExcelJS from 'exceljs';
import { FileStatus, ProposalSource, ReviewStatus, type BordereauxFile } from '../../../shared/schema';
import { InvalidStatusTransitionError } from '../../../shared/fileStatus';
import { compileRuleSet, DEFAULT_RULE_SET_DOCUMENT, loadRuleSet } from '../../config/ruleSet';
import { loadTemplateDocuments } from '../../config/templateDocuments';
import { NotFoundError } from '../../lib/errors';
import { DisabledMappingCollaborator } from '../aiMappingClient';
import { DelimitedTextDecoder } from '../csvDecoder';
import { ingestFile } from '../ingestion';
import { MappingSuggestionGenerator } from '../mappingSuggestion';
import { processFile, reprocessFile, runBatch, type PipelineContext } from '../pipelineOrchestrator';
import { TabularFileDecoder } from '../spreadsheetDecoder';
import { InMemoryBlobStore, InMemoryStorage } from './helpers/inMemoryStorage';

const PREMIUM_HEADER = 'Policy Number,Inception Date,Expiry Date,Premium Amount';

const premiumTemplate = {
  templateId: 'premium-v1',
  columnMappings: {
    policy_number: 'policy_number',
    inception_date: 'inception_date',
    expiry_date: 'expiry_date',
    premium_amount: 'premium_amount',
  },
};

let storage: InMemoryStorage;
let blobs: InMemoryBlobStore;
let ctx: PipelineContext;

beforeEach(() => {
  storage = new InMemoryStorage();
  blobs = new InMemoryBlobStore();
  ctx = {
    storage,
    blobs,
    decoder: new DelimitedTextDecoder(),
    suggestions: new MappingSuggestionGenerator(new DisabledMappingCollaborator()),
    rules: compileRuleSet(DEFAULT_RULE_SET_DOCUMENT),
  };
});

async function receive(content: string | Buffer, filename: string = 'bordereau.csv'): Promise<string> {
  const bytes = typeof content === 'string' ? Buffer.from(content) : content;
  const { file } = await ingestFile({ files: storage, blobs }, { bytes, filename });
  return file.id;
}

function stored(fileId: string): BordereauxFile {
  const file = storage.fileRecords.get(fileId);
  if (!file) throw new Error(`test file ${fileId} missing`);
  return file;
}

describe('processFile with a matching template', () => {
  beforeEach(async () => {
    await storage.addTemplate(premiumTemplate);
  });

  it('persists valid rows and violations for a partially valid file', async () => {
    const fileId = await receive(
      `${PREMIUM_HEADER}\nP-1,2024-01-01,2024-12-31,100.00\n,2024-01-01,2024-12-31,50.00\n`
    );

    const result = await processFile(ctx, fileId);

    expect(result).toEqual({
      fileId,
      claimed: true,
      status: FileStatus.PARTIALLY_PROCESSED,
      templateId: 'premium-v1',
      matchScore: 1,
      totalRows: 2,
      validRows: 1,
      errorRows: 1,
    });

    const file = stored(fileId);
    expect(file.status).toBe(FileStatus.PARTIALLY_PROCESSED);
    expect(file.templateId).toBe('premium-v1');
    expect(file.matchScore).toBe(1);
    expect([file.totalRows, file.validRows, file.errorRows]).toEqual([2, 1, 1]);
    expect(file.errorMessage).toBeNull();
    expect(file.processedAt).not.toBeNull();

    expect(storage.rowRecords).toHaveLength(1);
    expect(storage.rowRecords[0].rowIndex).toBe(0);
    expect(storage.rowRecords[0].data).toEqual({
      policy_number: 'P-1',
      inception_date: '2024-01-01',
      expiry_date: '2024-12-31',
      premium_amount: '100.00',
    });

    expect(storage.errorRecords).toHaveLength(1);
    expect(storage.errorRecords[0]).toMatchObject({
      fileId,
      ordinal: 0,
      rowIndex: 1,
      fieldName: 'policy_number',
      ruleName: 'required_field',
      errorCode: 'REQUIRED_FIELD_MISSING',
      message: "Required field 'policy_number' is missing or empty",
    });
  });

  it('marks a fully valid file as processed', async () => {
    const fileId = await receive(`${PREMIUM_HEADER}\nP-1,2024-01-01,2024-12-31,100.00\n`);

    const result = await processFile(ctx, fileId);

    expect(result.status).toBe(FileStatus.PROCESSED);
    expect(result.error).toBeUndefined();
    expect(storage.errorRecords).toHaveLength(0);
  });

  it('fails a file whose rows are all invalid but keeps its violations', async () => {
    const fileId = await receive(`${PREMIUM_HEADER}\n,2024-01-01,2024-12-31,1\n,2024-01-01,2024-12-31,2\n`);

    const result = await processFile(ctx, fileId);

    expect(result.status).toBe(FileStatus.FAILED);
    expect(result.error).toBe('No valid rows: all 2 rows failed validation');

    const file = stored(fileId);
    expect(file.errorMessage).toBe('No valid rows: all 2 rows failed validation');
    expect([file.totalRows, file.validRows, file.errorRows]).toEqual([2, 0, 2]);
    expect(storage.rowRecords).toHaveLength(0);
    expect(storage.errorRecords.map((error) => error.rowIndex)).toEqual([0, 1]);
  });

  it('fails a file with no data rows', async () => {
    const fileId = await receive(`${PREMIUM_HEADER}\n`);

    const result = await processFile(ctx, fileId);

    expect(result.status).toBe(FileStatus.FAILED);
    expect(stored(fileId).errorMessage).toBe('File contains no data rows');
  });

  it('marks the file failed when persisting results fails', async () => {
    const fileId = await receive(`${PREMIUM_HEADER}\nP-1,2024-01-01,2024-12-31,100.00\n`);
    storage.failNextPersist = true;

    const result = await processFile(ctx, fileId);

    expect(result).toEqual({
      fileId,
      claimed: true,
      status: FileStatus.FAILED,
      error: `Failed to persist results for file ${fileId}`,
    });
    expect(stored(fileId).status).toBe(FileStatus.FAILED);
    expect(storage.rowRecords).toHaveLength(0);
  });

  it('stops when its status was changed underneath it', async () => {
    const fileId = await receive(`${PREMIUM_HEADER}\nP-1,2024-01-01,2024-12-31,100.00\n`);
    vi.spyOn(storage, 'updateStatus').mockResolvedValueOnce(false);

    const result = await processFile(ctx, fileId);

    expect(result.status).toBe(FileStatus.FAILED);
    expect(result.error).toBe(`File ${fileId} is no longer in status matching`);
    expect(storage.rowRecords).toHaveLength(0);
  });
});

describe('processFile without a matching template', () => {
  it('stores a pending heuristic proposal and waits for a template', async () => {
    const fileId = await receive('Policy No,Insured,Gross Premium\nP-1,Acme Ltd,100\n');

    const result = await processFile(ctx, fileId);

    expect(result.status).toBe(FileStatus.NEEDS_TEMPLATE);
    expect(storage.proposalRecords).toHaveLength(1);

    const [proposal] = storage.proposalRecords;
    expect(result.proposalId).toBe(proposal.id);
    expect(proposal.fileId).toBe(fileId);
    expect(proposal.source).toBe(ProposalSource.HEURISTIC);
    expect(proposal.reviewStatus).toBe(ReviewStatus.PENDING);
    expect(proposal.fields.filter((field) => field.rawHeader !== null).map((field) => field.canonicalField)).toEqual([
      'policy_number',
      'insured_name',
      'premium_amount',
    ]);

    const file = stored(fileId);
    expect(file.status).toBe(FileStatus.NEEDS_TEMPLATE);
    expect(file.matchScore).toBe(0);
    expect(file.totalRows).toBe(1);
    expect(file.processedAt).not.toBeNull();
    expect(storage.templateRecords.size).toBe(0);
  });

  it('does not match a template below the threshold', async () => {
    await storage.addTemplate(premiumTemplate);
    const fileId = await receive('Policy Number,Premium Amount,Broker\nP-1,100,Acme\n');

    const result = await processFile(ctx, fileId);

    expect(result.status).toBe(FileStatus.NEEDS_TEMPLATE);
    expect(result.matchScore).toBe(0.5);
  });
});

describe('claims', () => {
  it('lets only one of two concurrent runs process a file', async () => {
    await storage.addTemplate(premiumTemplate);
    const fileId = await receive(`${PREMIUM_HEADER}\nP-1,2024-01-01,2024-12-31,100.00\n`);

    const results = await Promise.all([processFile(ctx, fileId), processFile(ctx, fileId)]);

    expect(results.filter((result) => result.claimed)).toHaveLength(1);
    expect(results.filter((result) => !result.claimed)).toEqual([{ fileId, claimed: false, status: null }]);
    expect(storage.rowRecords).toHaveLength(1);
  });

  it('skips files that are not received', async () => {
    await storage.addTemplate(premiumTemplate);
    const fileId = await receive(`${PREMIUM_HEADER}\nP-1,2024-01-01,2024-12-31,100.00\n`);
    await processFile(ctx, fileId);

    const again = await processFile(ctx, fileId);

    expect(again).toEqual({ fileId, claimed: false, status: null });
  });
});

describe('runBatch', () => {
  it('isolates a file that cannot be decoded', async () => {
    await storage.addTemplate(premiumTemplate);
    const brokenId = await receive(Buffer.from([0x50, 0x4b, 0x00, 0x03]), 'broken.csv');
    const goodId = await receive(`${PREMIUM_HEADER}\nP-1,2024-01-01,2024-12-31,100.00\n`);
    const unmatchedId = await receive('Notes\nhello\n', 'notes.csv');

    const batch = await runBatch(ctx);

    expect(batch.results.map((result) => result.fileId)).toEqual([brokenId, goodId, unmatchedId]);
    expect({
      processed: batch.processedCount,
      success: batch.successCount,
      failed: batch.failedCount,
      needsTemplate: batch.needsTemplateCount,
      skipped: batch.skippedCount,
    }).toEqual({ processed: 3, success: 1, failed: 1, needsTemplate: 1, skipped: 0 });

    expect(stored(brokenId).status).toBe(FileStatus.FAILED);
    expect(stored(brokenId).errorMessage).toBe('File contains binary data and is not delimited text');
    expect(stored(goodId).status).toBe(FileStatus.PROCESSED);
  });

  it('respects the batch limit', async () => {
    await receive('Notes\none\n', 'a.csv');
    await receive('Notes\ntwo\n', 'b.csv');

    const batch = await runBatch(ctx, { limit: 1 });

    expect(batch.processedCount).toBe(1);
    expect(await storage.listFileIdsByStatus(FileStatus.RECEIVED)).toHaveLength(1);
  });

  it('returns empty counts when nothing is waiting', async () => {
    const batch = await runBatch(ctx);

    expect(batch).toEqual({
      processedCount: 0,
      successCount: 0,
      failedCount: 0,
      needsTemplateCount: 0,
      skippedCount: 0,
      results: [],
    });
  });
});

describe('reprocessFile', () => {
  beforeEach(() => {
    ctx.rules = compileRuleSet({ required_fields: ['policy_number'] });
  });

  it('processes a file that needed a template once the template exists', async () => {
    const fileId = await receive('Policy No,Insured,Gross Premium\nP-1,Acme Ltd,100\n');
    await processFile(ctx, fileId);
    await storage.addTemplate({
      templateId: 'manual-v1',
      columnMappings: { policy_no: 'policy_number', insured: 'insured_name', gross_premium: 'premium_amount' },
    });

    const result = await reprocessFile(ctx, fileId);

    expect(result.status).toBe(FileStatus.PROCESSED);
    expect(result.templateId).toBe('manual-v1');
    expect(stored(fileId).matchScore).toBe(1);
    expect(storage.rowRecords.map((row) => row.data)).toEqual([
      { policy_number: 'P-1', insured_name: 'Acme Ltd', premium_amount: '100' },
    ]);
  });

  it('replaces the results of an earlier run', async () => {
    await storage.addTemplate(premiumTemplate);
    const fileId = await receive(`${PREMIUM_HEADER}\nP-1,2024-01-01,2024-12-31,100.00\n,2024-01-01,2024-12-31,5\n`);
    await processFile(ctx, fileId);

    const result = await reprocessFile(ctx, fileId);

    expect(result.status).toBe(FileStatus.PARTIALLY_PROCESSED);
    expect(storage.rowRecords).toHaveLength(1);
    expect(storage.errorRecords).toHaveLength(1);
  });

  it('runs a received file directly', async () => {
    await storage.addTemplate(premiumTemplate);
    const fileId = await receive(`${PREMIUM_HEADER}\nP-1,2024-01-01,2024-12-31,100.00\n`);

    const result = await reprocessFile(ctx, fileId);

    expect(result.status).toBe(FileStatus.PROCESSED);
  });

  it('rejects a file that is being processed', async () => {
    const fileId = await receive('Notes\nhello\n');
    stored(fileId).status = FileStatus.VALIDATING;

    await expect(reprocessFile(ctx, fileId)).rejects.toThrow(InvalidStatusTransitionError);
    expect(stored(fileId).status).toBe(FileStatus.VALIDATING);
  });

  it('rejects an unknown file', async () => {
    await expect(reprocessFile(ctx, 'missing-id')).rejects.toThrow(NotFoundError);
  });
});

describe('bundled configuration', () => {
  const bundledRules = fileURLToPath(new URL('../../../config/rules.json', import.meta.url));
  const bundledTemplates = fileURLToPath(new URL('../../../config/templates', import.meta.url));

  beforeEach(async () => {
    ctx.rules = await loadRuleSet(bundledRules);
    for (const template of await loadTemplateDocuments(bundledTemplates)) {
      await storage.createTemplate(template);
    }
  });

  it('processes a clean premium bordereau', async () => {
    const fileId = await receive(
      'Policy Number,Insured Name,Broker,Class of Business,Inception Date,Expiry Date,Gross Premium,Commission,Net Premium,Currency\n' +
        'HP-1,Acme Ltd,Lloyd Brokers,Property,01/01/2024,31/12/2024,"1,500.00",225.00,"1,275.00",GBP\n',
      'harbour_premium_march.csv'
    );

    const result = await processFile(ctx, fileId);

    expect(result).toMatchObject({ status: FileStatus.PROCESSED, templateId: 'harbour-premium-v1', validRows: 1, errorRows: 0 });
    expect(storage.errorRecords).toEqual([]);
    expect(storage.rowRecords[0].data).toEqual({
      policy_number: 'HP-1',
      insured_name: 'Acme Ltd',
      broker_name: 'Lloyd Brokers',
      product_type: 'Property',
      inception_date: '2024-01-01',
      expiry_date: '2024-12-31',
      premium_amount: '1500.00',
      commission_amount: '225.00',
      net_premium: '1275.00',
      currency: 'GBP',
    });
  });

  it('processes a clean claims bordereau that carries no premium', async () => {
    const fileId = await receive(
      'Policy Ref,Insured,Risk Address,Peril,Period From,Period To,Paid Loss,Ccy\n' +
        'NG-1,Acme Ltd,1 High Street,Flood,2024-01-01,2024-12-31,1500.00,GBP\n',
      'northgate_claims_march.csv'
    );

    const result = await processFile(ctx, fileId);

    expect(result).toMatchObject({ status: FileStatus.PROCESSED, templateId: 'northgate-claims-v2', validRows: 1, errorRows: 0 });
    expect(storage.errorRecords).toEqual([]);
    expect(storage.rowRecords[0].data).toEqual({
      policy_number: 'NG-1',
      insured_name: 'Acme Ltd',
      risk_location: '1 High Street',
      coverage_type: 'Flood',
      inception_date: '2024-01-01',
      expiry_date: '2024-12-31',
      claim_amount: '1500.00',
      currency: 'GBP',
    });
  });

  it('processes a premium bordereau sent as a spreadsheet', async () => {
    const workbook = new ExcelJS.Workbook();
    workbook.addWorksheet('March').addRows([
      ['Policy Number', 'Insured Name', 'Broker', 'Class of Business', 'Inception Date', 'Expiry Date', 'Gross Premium', 'Commission', 'Net Premium', 'Currency'],
      ['HP-2', 'Acme Ltd', 'Lloyd Brokers', 'Marine', new Date(Date.UTC(2024, 2, 1)), new Date(Date.UTC(2025, 1, 28)), 2000, 300, 1700, 'USD'],
    ]);
    const fileId = await receive(Buffer.from(await workbook.xlsx.writeBuffer()), 'harbour_premium_march.xlsx');
    ctx.decoder = new TabularFileDecoder();

    const result = await processFile(ctx, fileId);

    expect(result).toMatchObject({ status: FileStatus.PROCESSED, templateId: 'harbour-premium-v1', validRows: 1 });
    expect(storage.rowRecords[0].data).toMatchObject({
      policy_number: 'HP-2',
      inception_date: '2024-03-01',
      expiry_date: '2025-02-28',
      premium_amount: '2000',
      net_premium: '1700',
      currency: 'USD',
    });
  });

  it('still rejects a negative paid loss on a claims bordereau', async () => {
    const fileId = await receive(
      'Policy Ref,Insured,Risk Address,Peril,Period From,Period To,Paid Loss,Ccy\n' +
        'NG-1,Acme Ltd,1 High Street,Flood,2024-01-01,2024-12-31,1500.00,GBP\n' +
        'NG-2,Acme Ltd,1 High Street,Flood,2024-01-01,2024-12-31,-20.00,GBP\n',
      'northgate_claims_april.csv'
    );

    const result = await processFile(ctx, fileId);

    expect(result.status).toBe(FileStatus.PARTIALLY_PROCESSED);
    expect(storage.errorRecords.map((error) => [error.rowIndex, error.ruleName, error.errorCode])).toEqual([
      [1, 'claim_non_negative', 'NUMERIC_OUT_OF_RANGE'],
    ]);
  });
});
