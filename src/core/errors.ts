/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type ElectionHistoryErrorCode = 'MALFORMED_TIMESTAMP' | 'FILE_ACCESS';

export class ElectionHistoryError extends Error {
  constructor(
    message: string,
    public readonly code: ElectionHistoryErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ElectionHistoryError';
  }
}

/**
 * Raised when a matched line does not start with a usable timestamp prefix.
 * Aborts the whole run; no partial report is produced.
 */
export class MalformedTimestampError extends ElectionHistoryError {
  constructor(public readonly line: string, reason: string) {
    super(`Malformed timestamp (${reason}): ${line}`, 'MALFORMED_TIMESTAMP');
    this.name = 'MalformedTimestampError';
  }
}

const describeCause = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);

export class FileAccessError extends ElectionHistoryError {
  constructor(public readonly path: string, cause: unknown) {
    super(`Cannot read log file ${path}: ${describeCause(cause)}`, 'FILE_ACCESS', { cause });
    this.name = 'FileAccessError';
  }
}
