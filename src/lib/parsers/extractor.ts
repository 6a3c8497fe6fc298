import type { StatementFormat, ExtractionContext, Transaction } from './types';
import type { LineIssue } from '../errors';

export interface ExtractionResult {
  transactions: Transaction[];
  issues: LineIssue[];
  openingBalanceCents: number | null;
  closingBalanceCents: number | null;
}

/**
 * Run one statement through a format: segment the document, read every
 * candidate line, and return the transactions most recent first.
 * Malformed lines are logged and collected, never thrown.
 */
export function extractStatement(lines: string[], format: StatementFormat): ExtractionResult {
  const openingBalanceCents = format.openingBalance?.(lines) ?? null;
  const candidates = format.segment(lines);

  const extracted: Transaction[] = [];
  const issues: LineIssue[] = [];
  let context: ExtractionContext = { previousBalanceCents: openingBalanceCents };

  for (const line of candidates) {
    const outcome = format.extract(line, context);

    switch (outcome.kind) {
      case 'matched': {
        extracted.push(outcome.transaction);
        context = {
          previousBalanceCents: outcome.transaction.balanceCents ?? context.previousBalanceCents,
        };
        break;
      }
      case 'malformed': {
        console.warn(`[statement_extract] Skipping line "${line}": ${outcome.reason}`);
        issues.push({ line, reason: outcome.reason });
        break;
      }
      case 'no_match':
        break;
    }
  }

  return {
    transactions: sortByDateDescending(extracted),
    issues,
    openingBalanceCents,
    closingBalanceCents: lastBalance(extracted),
  };
}

function lastBalance(transactions: Transaction[]): number | null {
  for (let i = transactions.length - 1; i >= 0; i--) {
    const balance = transactions[i].balanceCents;
    if (balance !== undefined) return balance;
  }
  return null;
}

/**
 * Most recent first; equal dates keep their order of appearance.
 */
export function sortByDateDescending<T extends { date: Date }>(transactions: T[]): T[] {
  return transactions
    .map((transaction, index) => ({ transaction, index }))
    .sort((a, b) => b.transaction.date.getTime() - a.transaction.date.getTime() || a.index - b.index)
    .map(({ transaction }) => transaction);
}
