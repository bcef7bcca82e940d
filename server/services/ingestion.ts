/**
 * File Ingestion
 *
 * Entry point for new bordereaux: stores the bytes, registers the File in
 * RECEIVED and leaves processing to the batch run. Re-sending identical
 * content returns the existing File instead of registering it twice.
 * Deleting a File removes its results and its stored bytes.
 */

import path from 'path';
import { FileFormat, FileType, type BordereauxFile } from '../../shared/schema';
import { ConflictError, NotFoundError } from '../lib/errors';
import { loggers } from '../lib/logger';
import type { FileRepository } from '../storage';
import type { BlobStore } from './blobStore';

const log = loggers.ingestion;

export interface IngestInput {
  bytes: Buffer;
  filename: string;
  sender?: string | null;
  subject?: string | null;
  /** explicit type; inferred from subject and filename when omitted */
  fileType?: FileType;
}

export interface IngestResult {
  file: BordereauxFile;
  duplicate: boolean;
}

export interface IngestionDeps {
  files: FileRepository;
  blobs: BlobStore;
}

const FILE_TYPE_KEYWORDS: ReadonlyArray<[FileType, RegExp]> = [
  [FileType.CLAIMS, /\b(claims?|loss(es)?|bdx[_ -]?clm)\b/],
  [FileType.PREMIUM, /\b(premiums?|prem|gwp|bdx[_ -]?prm)\b/],
  [FileType.EXPOSURE, /\b(exposures?|sov|schedule of values)\b/],
];

/**
 * First keyword hit wins, checking the subject before the filename.
 */
export function inferFileType(filename: string, subject?: string | null): FileType {
  const sources = [subject ?? '', path.parse(filename).name];

  for (const source of sources) {
    const text = source.toLowerCase().replace(/[_.]+/g, ' ');
    for (const [fileType, pattern] of FILE_TYPE_KEYWORDS) {
      if (pattern.test(text)) return fileType;
    }
  }

  return FileType.UNKNOWN;
}

export function inferFormat(filename: string): FileFormat {
  switch (path.extname(filename).toLowerCase()) {
    case '.tsv':
    case '.tab':
      return FileFormat.TSV;
    case '.xlsx':
    case '.xls':
      return FileFormat.XLSX;
    default:
      return FileFormat.CSV;
  }
}

export async function ingestFile(deps: IngestionDeps, input: IngestInput): Promise<IngestResult> {
  const { contentHash, isDuplicate } = await deps.blobs.store(input.bytes);

  if (isDuplicate) {
    const existing = await deps.files.findByContentHash(contentHash);
    if (existing) {
      log.info({ fileId: existing.id, contentHash, filename: input.filename }, 'Duplicate content, returning existing file');
      return { file: existing, duplicate: true };
    }
  }

  const file = await deps.files.createFile({
    filename: input.filename,
    sender: input.sender ?? null,
    subject: input.subject ?? null,
    contentHash,
    fileType: input.fileType ?? inferFileType(input.filename, input.subject),
    format: inferFormat(input.filename),
  });

  log.info(
    { fileId: file.id, contentHash, filename: file.filename, fileType: file.fileType, format: file.format },
    'File received'
  );
  return { file, duplicate: false };
}

/**
 * Only RECEIVED and terminal files can go; a file mid-run is refused with
 * ConflictError.
 */
export async function deleteFile(deps: IngestionDeps, fileId: string): Promise<BordereauxFile> {
  const file = await deps.files.getFile(fileId);
  if (!file) {
    throw new NotFoundError('File', fileId);
  }

  const deleted = await deps.files.deleteFile(fileId);
  if (!deleted) {
    throw new ConflictError(`File ${fileId} is being processed and cannot be deleted`, { fileId, status: file.status });
  }

  await deps.blobs.remove(deleted.contentHash);
  log.info({ fileId, contentHash: deleted.contentHash, filename: deleted.filename, status: deleted.status }, 'File deleted');
  return deleted;
}
