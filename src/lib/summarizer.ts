import type {
  CategoryTotal,
  Direction,
  MonthlyTotal,
  StatementTotals,
  Summary,
  Transaction,
} from '../types';
import { monthBounds, toMonthKey } from './dates';

export const DEFAULT_TOP_CATEGORIES = 5;
const UNCATEGORIZED = 'others';

/**
 * Cached totals stored on a completed statement.
 */
export function statementTotals(transactions: readonly Transaction[]): StatementTotals {
  let totalDebitsCents = 0;
  let totalCreditsCents = 0;

  for (const tx of transactions) {
    if (tx.direction === 'Debit') {
      totalDebitsCents += tx.amountCents;
    } else {
      totalCreditsCents += tx.amountCents;
    }
  }

  return { totalDebitsCents, totalCreditsCents, transactionCount: transactions.length };
}

export function aggregateByCategory(transactions: readonly Transaction[]): Record<string, CategoryTotal> {
  const byCategory: Record<string, CategoryTotal> = {};

  // Credits are income and refunds, not spend
  for (const tx of transactions) {
    if (tx.direction !== 'Debit') continue;
    const cat = tx.category?.trim() || UNCATEGORIZED;
    const existing = byCategory[cat] ?? { totalCents: 0, transactionCount: 0 };
    byCategory[cat] = {
      totalCents: existing.totalCents + tx.amountCents,
      transactionCount: existing.transactionCount + 1,
    };
  }

  return byCategory;
}

export function aggregateByMonth(transactions: readonly Transaction[]): MonthlyTotal[] {
  const byMonth = new Map<string, MonthlyTotal>();

  for (const tx of transactions) {
    const month = toMonthKey(tx.date);
    const summary = byMonth.get(month) ?? { month, amountCents: 0, creditCents: 0, transactionCount: 0 };

    if (tx.direction === 'Debit') {
      summary.amountCents += tx.amountCents;
      summary.transactionCount += 1;
    } else {
      summary.creditCents += tx.amountCents;
    }
    byMonth.set(month, summary);
  }

  return Array.from(byMonth.values()).sort((a, b) => a.month.localeCompare(b.month));
}

export function rankCategories(
  byCategory: Record<string, CategoryTotal>,
  limit = DEFAULT_TOP_CATEGORIES
): Array<{ category: string } & CategoryTotal> {
  return Object.entries(byCategory)
    .map(([category, total]) => ({ category, ...total }))
    .sort((a, b) => b.totalCents - a.totalCents || (a.category < b.category ? -1 : a.category > b.category ? 1 : 0))
    .slice(0, limit);
}

/**
 * Fold a set of categorized transactions into a summary.
 * Recomputed from scratch on every call.
 */
export function buildSummary(
  transactions: readonly Transaction[],
  options: { topN?: number } = {}
): Summary {
  const byCategory = aggregateByCategory(transactions);

  return {
    ...statementTotals(transactions),
    byCategory,
    byMonth: aggregateByMonth(transactions),
    topCategories: rankCategories(byCategory, options.topN ?? DEFAULT_TOP_CATEGORIES),
  };
}

/**
 * Transactions dated within [start, end], both days included.
 */
export function filterByDateRange<T extends Transaction>(
  transactions: readonly T[],
  start?: Date,
  end?: Date
): T[] {
  return transactions.filter((tx) => {
    const time = tx.date.getTime();
    if (start && time < start.getTime()) return false;
    if (end && time > end.getTime()) return false;
    return true;
  });
}

export interface SpendingSummary {
  totalSpendingCents: number;
  totalTransactions: number;
  averageTransactionCents: number;
  byCategory: Record<string, CategoryTotal>;
  topCategories: Array<{ category: string } & CategoryTotal>;
  byMonth: MonthlyTotal[];
}

export function spendingSummary(
  transactions: readonly Transaction[],
  options: { topN?: number } = {}
): SpendingSummary {
  const summary = buildSummary(transactions, options);
  const categories = Object.values(summary.byCategory);
  const totalSpendingCents = categories.reduce((sum, c) => sum + c.totalCents, 0);
  const totalTransactions = categories.reduce((sum, c) => sum + c.transactionCount, 0);

  return {
    totalSpendingCents,
    totalTransactions,
    averageTransactionCents: totalTransactions > 0 ? Math.round(totalSpendingCents / totalTransactions) : 0,
    byCategory: summary.byCategory,
    topCategories: summary.topCategories,
    byMonth: summary.byMonth,
  };
}

export interface MonthComparison {
  month1: { month: string; spendingCents: number; transactions: number; categories: Record<string, CategoryTotal> };
  month2: { month: string; spendingCents: number; transactions: number; categories: Record<string, CategoryTotal> };
  spendingDifferenceCents: number;
  spendingChangePercentage: number;
  transactionDifference: number;
}

/**
 * Compare debit spend between two YYYY-MM months.
 * The percentage is 0 when the first month has no spend.
 */
export function compareMonths(
  transactions: readonly Transaction[],
  month1: string,
  month2: string
): MonthComparison {
  const describe = (month: string) => {
    const { start, end } = monthBounds(month);
    const summary = spendingSummary(filterByDateRange(transactions, start, end));
    return {
      month,
      spendingCents: summary.totalSpendingCents,
      transactions: summary.totalTransactions,
      categories: summary.byCategory,
    };
  };

  const first = describe(month1);
  const second = describe(month2);
  const spendingDifferenceCents = second.spendingCents - first.spendingCents;

  return {
    month1: first,
    month2: second,
    spendingDifferenceCents,
    spendingChangePercentage: first.spendingCents > 0 ? (spendingDifferenceCents / first.spendingCents) * 100 : 0,
    transactionDifference: second.transactions - first.transactions,
  };
}

export function getLargestTransactions<T extends Transaction>(
  transactions: readonly T[],
  direction: Direction = 'Debit',
  limit = 10
): T[] {
  return transactions
    .filter((tx) => tx.direction === direction)
    .map((tx, index) => ({ tx, index }))
    .sort((a, b) => b.tx.amountCents - a.tx.amountCents || a.index - b.index)
    .map(({ tx }) => tx)
    .slice(0, limit);
}
