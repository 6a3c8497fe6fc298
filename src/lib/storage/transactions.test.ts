import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Direction, Transaction } from '../../types';
import { fromIsoDate } from '../dates';
import { createRepositories, openDatabase, type DatabaseHandle, type Repositories } from './index';

type Item = Transaction & { category: string };

function item(date: string, description: string, amountCents: number, direction: Direction, category: string): Item {
  return { date: fromIsoDate(date), description, amountCents, direction, category, rawText: `${date} ${description}` };
}

const noBalances = { openingBalanceCents: null, closingBalanceCents: null };

describe('storage', () => {
  let handle: DatabaseHandle;
  let repos: Repositories;
  let userId: number;
  let statementId: number;

  beforeEach(async () => {
    handle = await openDatabase(':memory:');
    repos = createRepositories(handle.db);
    userId = repos.users.create('test_user', 'test@example.com').id;
    statementId = repos.statements.create({
      userId,
      filePath: '/statements/axis_savings_31-10-2024.pdf',
      fileName: 'axis_savings_31-10-2024.pdf',
      bankType: 'axis_savings',
      statementDate: fromIsoDate('2024-10-31'),
    }).id;
  });

  afterEach(() => {
    handle.close();
    vi.restoreAllMocks();
  });

  describe('DatabaseStatementSink', () => {
    it('stores transactions and completes the statement', () => {
      repos.sink.complete(
        statementId,
        [item('2024-10-05', 'SWIGGY', 50000, 'Debit', 'food_dining'), item('2024-10-20', 'SALARY', 300000, 'Credit', 'income')],
        { totalDebitsCents: 50000, totalCreditsCents: 300000, transactionCount: 2 },
        { openingBalanceCents: 100000, closingBalanceCents: 350000 }
      );

      const stored = repos.transactions.listByStatement(statementId);
      expect(stored.map((tx) => tx.description)).toEqual(['SALARY', 'SWIGGY']);
      expect(stored[1]).toMatchObject({
        statementId,
        amountCents: 50000,
        direction: 'Debit',
        category: 'food_dining',
        originalCategory: null,
        userCorrected: false,
      });
      expect(stored[1].date.toISOString()).toBe('2024-10-05T00:00:00.000Z');

      expect(repos.statements.getById(statementId)).toMatchObject({
        parsingStatus: 'completed',
        totalDebitsCents: 50000,
        totalCreditsCents: 300000,
        transactionCount: 2,
        openingBalanceCents: 100000,
        closingBalanceCents: 350000,
        errorDetail: null,
      });
    });

    it('replaces earlier rows when a statement is stored again', () => {
      const items = [item('2024-10-05', 'SWIGGY', 50000, 'Debit', 'food_dining')];
      const totals = { totalDebitsCents: 50000, totalCreditsCents: 0, transactionCount: 1 };

      repos.sink.complete(statementId, items, totals, noBalances);
      repos.sink.complete(statementId, items, totals, noBalances);

      expect(repos.transactions.listByStatement(statementId)).toHaveLength(1);
    });

    it('rolls back, clears the statement and marks it failed when a write fails', () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const good = item('2024-10-05', 'SWIGGY', 50000, 'Debit', 'food_dining');
      repos.sink.complete(statementId, [good], { totalDebitsCents: 50000, totalCreditsCents: 0, transactionCount: 1 }, noBalances);

      const bad = item('2024-10-06', 'BROKEN', -1, 'Debit', 'others');
      expect(() =>
        repos.sink.complete(
          statementId,
          [good, bad],
          { totalDebitsCents: 49999, totalCreditsCents: 0, transactionCount: 2 },
          noBalances
        )
      ).toThrow();

      // The failed attempt leaves nothing behind, not even the earlier rows
      expect(repos.transactions.listByStatement(statementId)).toEqual([]);
      const statement = repos.statements.getById(statementId);
      expect(statement?.parsingStatus).toBe('failed');
      expect(statement?.totalDebitsCents).toBe(0);
      expect(statement?.transactionCount).toBe(0);
      expect(statement?.errorDetail).toEqual(expect.any(String));
    });

    it('refuses to complete a statement that does not exist', () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      expect(() =>
        repos.sink.complete(999, [], { totalDebitsCents: 0, totalCreditsCents: 0, transactionCount: 0 }, noBalances)
      ).toThrow('Statement 999 not found');
    });
  });

  describe('TransactionRepository', () => {
    beforeEach(() => {
      repos.sink.complete(
        statementId,
        [
          item('2024-10-05', 'SWIGGY', 50000, 'Debit', 'food_dining'),
          item('2024-10-20', 'AMAZON', 20000, 'Debit', 'shopping'),
          item('2024-11-02', 'ZOMATO', 15000, 'Debit', 'food_dining'),
        ],
        { totalDebitsCents: 85000, totalCreditsCents: 0, transactionCount: 3 },
        noBalances
      );
    });

    it('lists the transactions of a user by category and date range', () => {
      expect(repos.transactions.listByUser(userId).map((tx) => tx.description)).toEqual(['ZOMATO', 'AMAZON', 'SWIGGY']);
      expect(repos.transactions.listByUser(userId, 1).map((tx) => tx.description)).toEqual(['ZOMATO']);
      expect(repos.transactions.listByCategory(userId, 'food_dining').map((tx) => tx.description)).toEqual([
        'ZOMATO',
        'SWIGGY',
      ]);
      expect(
        repos.transactions
          .listByDateRange(userId, fromIsoDate('2024-10-05'), fromIsoDate('2024-10-20'))
          .map((tx) => tx.description)
      ).toEqual(['AMAZON', 'SWIGGY']);
    });

    it('keeps the first category through repeated corrections', () => {
      const [latest] = repos.transactions.listByUser(userId);

      repos.transactions.updateCategory(latest.id, 'groceries');
      const corrected = repos.transactions.updateCategory(latest.id, 'shopping');

      expect(corrected).toMatchObject({ category: 'shopping', originalCategory: 'food_dining', userCorrected: true });
      expect(repos.transactions.updateCategory(9999, 'x')).toBeNull();
    });

    it('only reads transactions of completed statements', () => {
      repos.statements.setStatus(statementId, 'processing');
      expect(repos.transactions.listByUser(userId)).toEqual([]);
      expect(repos.transactions.listByStatement(statementId)).toHaveLength(3);
    });

    it('drops stored rows and totals when a statement fails', () => {
      const failed = repos.statements.setStatus(statementId, 'failed', 'Could not read document');

      expect(failed).toMatchObject({
        parsingStatus: 'failed',
        errorDetail: 'Could not read document',
        totalDebitsCents: 0,
        totalCreditsCents: 0,
        transactionCount: 0,
      });
      expect(repos.transactions.listByStatement(statementId)).toEqual([]);
      expect(repos.transactions.listByUser(userId)).toEqual([]);
    });

    it('deletes transactions with their statement', () => {
      expect(repos.statements.delete(statementId)).toBe(true);
      expect(repos.transactions.listByUser(userId)).toEqual([]);
    });
  });

  describe('StatementRepository', () => {
    it('clears the error detail when a new attempt starts', () => {
      expect(repos.statements.setStatus(statementId, 'failed', 'boom')?.errorDetail).toBe('boom');
      expect(repos.statements.setStatus(statementId, 'processing')).toMatchObject({
        parsingStatus: 'processing',
        errorDetail: null,
      });
      expect(repos.statements.setStatus(9999, 'processing')).toBeNull();
    });

    it('lists statements newest first and totals them', () => {
      const second = repos.statements.create({
        userId,
        filePath: '/statements/axis_credit_30-11-2024.pdf',
        fileName: 'axis_credit_30-11-2024.pdf',
        bankType: 'axis_credit',
        statementDate: fromIsoDate('2024-11-30'),
      });
      repos.sink.complete(
        second.id,
        [item('2024-11-12', 'UBER', 40000, 'Debit', 'transport')],
        { totalDebitsCents: 40000, totalCreditsCents: 0, transactionCount: 1 },
        noBalances
      );

      expect(repos.statements.listByUser(userId).map((s) => s.id)).toEqual([second.id, statementId]);
      expect(repos.statements.listByUser(userId, 1).map((s) => s.id)).toEqual([second.id]);
      expect(repos.statements.stats(userId)).toEqual({
        totalStatements: 2,
        totalTransactions: 1,
        totalDebitsCents: 40000,
        totalCreditsCents: 0,
        bankTypes: { axis_savings: 1, axis_credit: 1 },
      });
    });
  });
});
