import { desc, eq } from 'drizzle-orm';
import type { BankType, ParsingStatus, StatementRecord } from '../../types';
import { fromIsoDate, toIsoDate } from '../dates';
import type { LedgerDatabase } from './database';
import { statements, transactions, type StatementRow } from './schema';

function toStatement(row: StatementRow): StatementRecord {
  return {
    id: row.id,
    userId: row.userId,
    filePath: row.filePath,
    fileName: row.fileName,
    bankType: row.bankType,
    statementDate: fromIsoDate(row.statementDate),
    parsingStatus: row.parsingStatus,
    totalDebitsCents: row.totalDebitsCents,
    totalCreditsCents: row.totalCreditsCents,
    transactionCount: row.transactionCount,
    openingBalanceCents: row.openingBalanceCents,
    closingBalanceCents: row.closingBalanceCents,
    errorDetail: row.errorDetail,
    createdAt: new Date(row.createdAt),
    updatedAt: new Date(row.updatedAt),
  };
}

export interface NewStatement {
  userId: number;
  filePath: string;
  fileName: string;
  bankType: BankType;
  statementDate: Date;
}

export interface StatementStats {
  totalStatements: number;
  totalTransactions: number;
  totalDebitsCents: number;
  totalCreditsCents: number;
  bankTypes: Partial<Record<BankType, number>>;
}

export class StatementRepository {
  constructor(private readonly db: LedgerDatabase) {}

  create(input: NewStatement): StatementRecord {
    const now = new Date().toISOString();
    const row = this.db
      .insert(statements)
      .values({
        userId: input.userId,
        filePath: input.filePath,
        fileName: input.fileName,
        bankType: input.bankType,
        statementDate: toIsoDate(input.statementDate),
        createdAt: now,
        updatedAt: now,
      })
      .returning()
      .get();
    return toStatement(row);
  }

  getById(id: number): StatementRecord | null {
    const row = this.db.select().from(statements).where(eq(statements.id, id)).get();
    return row ? toStatement(row) : null;
  }

  listByUser(userId: number, limit?: number): StatementRecord[] {
    const query = this.db
      .select()
      .from(statements)
      .where(eq(statements.userId, userId))
      .orderBy(desc(statements.statementDate), desc(statements.id));
    const rows = limit ? query.limit(limit).all() : query.all();
    return rows.map(toStatement);
  }

  /**
   * Move a statement through pending -> processing -> completed | failed.
   * Starting a new attempt clears the previous error detail; failing goes
   * through recordFailure.
   */
  setStatus(id: number, status: ParsingStatus, errorDetail?: string): StatementRecord | null {
    if (status === 'failed') {
      return recordFailure(this.db, id, errorDetail ?? null);
    }

    const row = this.db
      .update(statements)
      .set({ parsingStatus: status, errorDetail: null, updatedAt: new Date().toISOString() })
      .where(eq(statements.id, id))
      .returning()
      .get();
    return row ? toStatement(row) : null;
  }

  // Transactions go with it (ON DELETE CASCADE)
  delete(id: number): boolean {
    return this.db.delete(statements).where(eq(statements.id, id)).returning({ id: statements.id }).all().length > 0;
  }

  stats(userId: number): StatementStats {
    const records = this.listByUser(userId);
    const bankTypes: Partial<Record<BankType, number>> = {};

    for (const record of records) {
      bankTypes[record.bankType] = (bankTypes[record.bankType] ?? 0) + 1;
    }

    return {
      totalStatements: records.length,
      totalTransactions: records.reduce((sum, r) => sum + r.transactionCount, 0),
      totalDebitsCents: records.reduce((sum, r) => sum + r.totalDebitsCents, 0),
      totalCreditsCents: records.reduce((sum, r) => sum + r.totalCreditsCents, 0),
      bankTypes,
    };
  }
}

/**
 * Mark a statement failed. A failed statement keeps no transactions and
 * no totals, whatever an earlier attempt stored.
 */
export function recordFailure(db: LedgerDatabase, id: number, errorDetail: string | null): StatementRecord | null {
  const row = db.transaction((tx) => {
    tx.delete(transactions).where(eq(transactions.statementId, id)).run();
    return tx
      .update(statements)
      .set({
        parsingStatus: 'failed',
        errorDetail,
        totalDebitsCents: 0,
        totalCreditsCents: 0,
        transactionCount: 0,
        openingBalanceCents: null,
        closingBalanceCents: null,
        updatedAt: new Date().toISOString(),
      })
      .where(eq(statements.id, id))
      .returning()
      .get();
  });
  return row ? toStatement(row) : null;
}
