import type { BankType } from '../types';

export type StatementErrorCode = 'format_unsupported' | 'document_unreadable' | 'not_found';

/**
 * Errors that end the processing of one statement.
 * They are caught by the statement service and recorded as `failed`.
 */
export class StatementError extends Error {
  readonly code: StatementErrorCode;

  constructor(code: StatementErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StatementError';
    this.code = code;
  }
}

export class FormatUnsupportedError extends StatementError {
  readonly bankType: BankType;

  constructor(bankType: BankType) {
    super('format_unsupported', `No statement format registered for bank type "${bankType}"`);
    this.name = 'FormatUnsupportedError';
    this.bankType = bankType;
  }
}

export class DocumentUnreadableError extends StatementError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super('document_unreadable', `Could not read document ${path}: ${describeError(cause)}`, { cause });
    this.name = 'DocumentUnreadableError';
    this.path = path;
  }
}

// A candidate line that had the shape of a transaction but did not convert
export interface LineIssue {
  line: string;
  reason: string;
}

// A regex rule that could not be compiled and was left out of the run
export interface RuleWarning {
  pattern: string;
  category: string;
  reason: string;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
