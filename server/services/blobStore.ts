/**
 * Content-addressed blob storage on the local filesystem.
 *
 * Blobs live at <root>/<first two hex chars>/<sha256>. Writing goes through
 * a temporary file and a rename so a reader never sees a partial blob.
 */

import { createHash, randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import { PipelineError } from '../lib/errors';
import { createLogger } from '../lib/logger';

const log = createLogger({ module: 'blob-store' });

export interface StoredBlob {
  contentHash: string;
  isDuplicate: boolean;
}

export interface BlobStore {
  store(bytes: Buffer): Promise<StoredBlob>;
  fetch(contentHash: string): Promise<Buffer>;
  /** No-op when the blob is already gone. */
  remove(contentHash: string): Promise<void>;
}

export function hashContent(bytes: Buffer): string {
  return createHash('sha256').update(bytes).digest('hex');
}

const HASH_PATTERN = /^[a-f0-9]{64}$/;

export class FileSystemBlobStore implements BlobStore {
  constructor(private readonly rootDir: string) {}

  private pathFor(contentHash: string): string {
    if (!HASH_PATTERN.test(contentHash)) {
      throw new PipelineError(`Invalid content hash '${contentHash}'`);
    }
    return path.join(this.rootDir, contentHash.slice(0, 2), contentHash);
  }

  async store(bytes: Buffer): Promise<StoredBlob> {
    const contentHash = hashContent(bytes);
    const target = this.pathFor(contentHash);

    if (await exists(target)) {
      log.debug({ contentHash }, 'Blob already stored');
      return { contentHash, isDuplicate: true };
    }

    await fs.mkdir(path.dirname(target), { recursive: true });
    const temp = `${target}.${randomUUID()}.tmp`;
    await fs.writeFile(temp, bytes);
    await fs.rename(temp, target);

    log.info({ contentHash, bytes: bytes.length }, 'Blob stored');
    return { contentHash, isDuplicate: false };
  }

  async fetch(contentHash: string): Promise<Buffer> {
    try {
      return await fs.readFile(this.pathFor(contentHash));
    } catch (error) {
      if (error instanceof PipelineError) throw error;
      throw new PipelineError(`Blob ${contentHash} could not be read`, 'PIPELINE_ERROR', { contentHash }, { cause: error });
    }
  }

  async remove(contentHash: string): Promise<void> {
    const target = this.pathFor(contentHash);
    try {
      await fs.rm(target, { force: true });
    } catch (error) {
      throw new PipelineError(`Blob ${contentHash} could not be removed`, 'PIPELINE_ERROR', { contentHash }, { cause: error });
    }
    log.info({ contentHash }, 'Blob removed');
  }
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
