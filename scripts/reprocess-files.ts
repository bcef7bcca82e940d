/**
 * Reset and reprocess every file in a terminal status.
 *
 * Usage: npm run files:reprocess [-- <status>]   (default: needs_template)
 */

import 'dotenv/config';

import { FileStatus } from '../shared/schema';
import { isFileStatus, isTerminalStatus } from '../shared/fileStatus';
import { createApplication } from '../server/bootstrap';
import { loadConfig } from '../server/config/env';
import { reprocessFile } from '../server/services/pipelineOrchestrator';

const PAGE_SIZE = 100;

function parseStatus(arg: string | undefined): FileStatus {
  const value = arg ?? FileStatus.NEEDS_TEMPLATE;
  if (!isFileStatus(value) || !isTerminalStatus(value)) {
    throw new Error(`'${value}' is not a terminal status; expected processed, partially_processed, needs_template or failed`);
  }
  return value;
}

async function reprocessFiles(): Promise<void> {
  const status = parseStatus(process.argv[2]);
  const { context, database } = await createApplication(loadConfig());

  try {
    // Snapshot first: reprocessed files may land back in the same status.
    const fileIds: string[] = [];
    for (let offset = 0; ; offset += PAGE_SIZE) {
      const page = await context.storage.files.listFiles({ status, limit: PAGE_SIZE, offset });
      fileIds.push(...page.items.map((file) => file.id));
      if (offset + PAGE_SIZE >= page.total) break;
    }

    console.log(`Reprocessing ${fileIds.length} file(s) in status ${status}`);

    const outcomes = new Map<string, number>();
    for (const fileId of fileIds) {
      try {
        const result = await reprocessFile(context.pipeline, fileId);
        const outcome = result.status ?? 'skipped';
        outcomes.set(outcome, (outcomes.get(outcome) ?? 0) + 1);
        console.log(`${fileId}: ${outcome}${result.error ? ` (${result.error})` : ''}`);
      } catch (error) {
        outcomes.set('error', (outcomes.get('error') ?? 0) + 1);
        console.error(`${fileId}: could not reprocess:`, error instanceof Error ? error.message : error);
      }
    }

    const summary = [...outcomes].map(([outcome, total]) => `${outcome}=${total}`).join(', ');
    console.log(`Reprocessing complete: ${summary || 'nothing to do'}`);
  } finally {
    await database.pool.end();
  }
}

reprocessFiles()
  .then(() => process.exit(0))
  .catch((err) => {
    console.error('Reprocessing failed:', err);
    process.exit(1);
  });
