import type { BankType, Direction, Transaction } from '../../types';

// Outcome of reading one candidate line
export type LineOutcome =
  | { kind: 'matched'; transaction: Transaction }
  | { kind: 'no_match' }
  | { kind: 'malformed'; reason: string };

// State carried from one line to the next while a statement is read
export interface ExtractionContext {
  previousBalanceCents: number | null;
}

// Statement format interface that every bank layout implements
export interface StatementFormat {
  // Bank type this format reads
  readonly bankType: BankType;

  // Human-readable name
  readonly name: string;

  // Confidence (0-1) that the document is in this format, 0 means cannot handle
  canParse(firstPageText: string, fileName: string): number;

  // Keep only the lines that may hold transactions
  segment(lines: string[]): string[];

  // Balance printed on the opening marker line, if the layout has one
  openingBalance?(lines: string[]): number | null;

  // Read a single candidate line
  extract(line: string, context: ExtractionContext): LineOutcome;
}

export interface FormatRegistry {
  formats: StatementFormat[];

  // Find the format for an explicit or detected bank type
  get(bankType: BankType): StatementFormat | null;

  // Detect the bank type of a document
  detect(firstPageText: string, fileName: string): BankType;

  // Register a new format
  register(format: StatementFormat): void;
}

export type { BankType, Direction, Transaction };
