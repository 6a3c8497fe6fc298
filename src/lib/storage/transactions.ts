import { and, asc, desc, eq, gte, lte, type SQL } from 'drizzle-orm';
import type { StatementTotals, StoredTransaction, Transaction } from '../../types';
import type { BalanceInfo, StatementSink } from '../services/types';
import { describeError } from '../errors';
import { fromIsoDate, toIsoDate } from '../dates';
import type { LedgerDatabase } from './database';
import { recordFailure } from './statements';
import { statements, transactions, type TransactionRow } from './schema';

function toStoredTransaction(row: TransactionRow): StoredTransaction {
  return {
    id: row.id,
    statementId: row.statementId,
    date: fromIsoDate(row.transactionDate),
    description: row.description,
    amountCents: row.amountCents,
    direction: row.direction,
    category: row.category,
    originalCategory: row.originalCategory,
    userCorrected: row.userCorrected,
    balanceCents: row.balanceCents ?? undefined,
    rawText: row.rawText,
  };
}

export class TransactionRepository {
  constructor(private readonly db: LedgerDatabase) {}

  getById(id: number): StoredTransaction | null {
    const row = this.db.select().from(transactions).where(eq(transactions.id, id)).get();
    return row ? toStoredTransaction(row) : null;
  }

  listByStatement(statementId: number): StoredTransaction[] {
    return this.db
      .select()
      .from(transactions)
      .where(eq(transactions.statementId, statementId))
      .orderBy(desc(transactions.transactionDate), asc(transactions.id))
      .all()
      .map(toStoredTransaction);
  }

  listByUser(userId: number, limit?: number): StoredTransaction[] {
    return this.listForUser(userId, undefined, limit);
  }

  listByCategory(userId: number, category: string): StoredTransaction[] {
    return this.listForUser(userId, eq(transactions.category, category));
  }

  // Both ends included
  listByDateRange(userId: number, start: Date, end: Date): StoredTransaction[] {
    return this.listForUser(
      userId,
      and(gte(transactions.transactionDate, toIsoDate(start)), lte(transactions.transactionDate, toIsoDate(end)))
    );
  }

  /**
   * User correction of a category. The first category the pipeline gave
   * the transaction is kept in originalCategory.
   */
  updateCategory(id: number, category: string): StoredTransaction | null {
    const existing = this.getById(id);
    if (!existing) return null;

    const row = this.db
      .update(transactions)
      .set({
        category,
        originalCategory: existing.originalCategory ?? existing.category,
        userCorrected: true,
      })
      .where(eq(transactions.id, id))
      .returning()
      .get();
    return row ? toStoredTransaction(row) : null;
  }

  private listForUser(userId: number, filter?: SQL, limit?: number): StoredTransaction[] {
    const query = this.db
      .select({ transaction: transactions })
      .from(transactions)
      .innerJoin(statements, eq(transactions.statementId, statements.id))
      .where(and(eq(statements.userId, userId), eq(statements.parsingStatus, 'completed'), filter))
      .orderBy(desc(transactions.transactionDate), asc(transactions.id));
    const rows = limit ? query.limit(limit).all() : query.all();
    return rows.map(({ transaction }) => toStoredTransaction(transaction));
  }
}

/**
 * Writes a processed statement in one SQLite transaction. Earlier rows of
 * the same statement are replaced, so processing again gives the same rows.
 */
export class DatabaseStatementSink implements StatementSink {
  constructor(private readonly db: LedgerDatabase) {}

  complete(
    statementId: number,
    items: ReadonlyArray<Transaction & { category: string }>,
    totals: StatementTotals,
    balances: BalanceInfo
  ): void {
    try {
      this.db.transaction((tx) => {
        tx.delete(transactions).where(eq(transactions.statementId, statementId)).run();

        const createdAt = new Date().toISOString();
        for (const item of items) {
          tx.insert(transactions)
            .values({
              statementId,
              transactionDate: toIsoDate(item.date),
              description: item.description,
              amountCents: item.amountCents,
              direction: item.direction,
              category: item.category,
              balanceCents: item.balanceCents ?? null,
              rawText: item.rawText,
              createdAt,
            })
            .run();
        }

        const updated = tx
          .update(statements)
          .set({
            totalDebitsCents: totals.totalDebitsCents,
            totalCreditsCents: totals.totalCreditsCents,
            transactionCount: totals.transactionCount,
            openingBalanceCents: balances.openingBalanceCents,
            closingBalanceCents: balances.closingBalanceCents,
            parsingStatus: 'completed',
            errorDetail: null,
            updatedAt: new Date().toISOString(),
          })
          .where(eq(statements.id, statementId))
          .returning({ id: statements.id })
          .all();

        if (updated.length === 0) {
          throw new Error(`Statement ${statementId} not found`);
        }
      });
    } catch (error) {
      console.error(`[statement_sink] Rolling back statement ${statementId}:`, error);
      recordFailure(this.db, statementId, describeError(error));
      throw error;
    }
  }
}
