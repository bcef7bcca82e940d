/**
 * File Status State Machine
 *
 * RECEIVED → MATCHING → MAPPING → VALIDATING → PERSISTING → PROCESSED | PARTIALLY_PROCESSED
 *                     → SUGGESTING → NEEDS_TEMPLATE
 * any non-terminal stage → FAILED
 *
 * The only way back to RECEIVED is an explicit reprocess of a terminal file
 * (see reprocessTransition). Every other status write goes through
 * transition(), which fails closed on anything not listed here.
 */

import { FileStatus } from './schema';

// ============================================
// 1. TRANSITION TABLE
// ============================================

const TRANSITIONS: Record<FileStatus, readonly FileStatus[]> = {
  [FileStatus.RECEIVED]: [FileStatus.MATCHING, FileStatus.FAILED],
  [FileStatus.MATCHING]: [FileStatus.MAPPING, FileStatus.SUGGESTING, FileStatus.FAILED],
  [FileStatus.MAPPING]: [FileStatus.VALIDATING, FileStatus.FAILED],
  [FileStatus.VALIDATING]: [FileStatus.PERSISTING, FileStatus.FAILED],
  [FileStatus.PERSISTING]: [FileStatus.PROCESSED, FileStatus.PARTIALLY_PROCESSED, FileStatus.FAILED],
  [FileStatus.SUGGESTING]: [FileStatus.NEEDS_TEMPLATE, FileStatus.FAILED],
  [FileStatus.PROCESSED]: [],
  [FileStatus.PARTIALLY_PROCESSED]: [],
  [FileStatus.NEEDS_TEMPLATE]: [],
  [FileStatus.FAILED]: [],
};

export const TERMINAL_STATUSES: readonly FileStatus[] = [
  FileStatus.PROCESSED,
  FileStatus.PARTIALLY_PROCESSED,
  FileStatus.NEEDS_TEMPLATE,
  FileStatus.FAILED,
];

// ============================================
// 2. ERRORS
// ============================================

export class InvalidStatusTransitionError extends Error {
  readonly code = 'INVALID_STATUS_TRANSITION';

  constructor(
    readonly from: FileStatus,
    readonly to: FileStatus,
  ) {
    super(`Invalid file status transition: ${from} -> ${to}`);
    this.name = 'InvalidStatusTransitionError';
  }
}

// ============================================
// 3. QUERIES
// ============================================

export function isTerminalStatus(status: FileStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function allowedTransitions(from: FileStatus): readonly FileStatus[] {
  return TRANSITIONS[from];
}

export function canTransition(from: FileStatus, to: FileStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isFileStatus(value: string): value is FileStatus {
  return Object.values(FileStatus).some((status) => status === value);
}

// ============================================
// 4. TRANSITIONS
// ============================================

/**
 * Returns `to` when the move is allowed, throws otherwise.
 */
export function transition(from: FileStatus, to: FileStatus): FileStatus {
  if (!canTransition(from, to)) {
    throw new InvalidStatusTransitionError(from, to);
  }
  return to;
}

/**
 * Forced reprocessing: terminal → RECEIVED. In-flight and already-received
 * files are rejected.
 */
export function reprocessTransition(from: FileStatus): FileStatus {
  if (!isTerminalStatus(from)) {
    throw new InvalidStatusTransitionError(from, FileStatus.RECEIVED);
  }
  return FileStatus.RECEIVED;
}
