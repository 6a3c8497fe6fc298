import type { CategoryRule, StatementTotals, Transaction } from '../../types';

// Turns a document into its ordered text lines
export interface DocumentTextExtractor {
  extractLines(documentPath: string): Promise<string[]>;
}

// Active category rules of a user scope (null is the global scope)
export interface RuleSetProvider {
  activeRules(userId: number | null): Promise<CategoryRule[]>;
}

export interface BalanceInfo {
  openingBalanceCents: number | null;
  closingBalanceCents: number | null;
}

/**
 * Durable home of a processed statement. `complete` must record every
 * transaction before the statement becomes `completed`, and leave the
 * statement `failed` with its error detail when any write fails.
 */
export interface StatementSink {
  complete(
    statementId: number,
    transactions: ReadonlyArray<Transaction & { category: string }>,
    totals: StatementTotals,
    balances: BalanceInfo
  ): void;
}
