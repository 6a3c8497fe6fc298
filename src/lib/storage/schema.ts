import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';
import type { BankType, Direction, ParsingStatus } from '../../types';

export const users = sqliteTable('users', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  username: text('username').notNull().unique(),
  email: text('email').notNull().unique(),
  isActive: integer('is_active', { mode: 'boolean' }).notNull().default(true),
  createdAt: text('created_at').notNull(),
});

export const statements = sqliteTable('statements', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  userId: integer('user_id')
    .notNull()
    .references(() => users.id, { onDelete: 'cascade' }),
  filePath: text('file_path').notNull(),
  fileName: text('file_name').notNull(),
  bankType: text('bank_type').$type<BankType>().notNull(),
  statementDate: text('statement_date').notNull(), // YYYY-MM-DD
  parsingStatus: text('parsing_status').$type<ParsingStatus>().notNull().default('pending'),
  totalDebitsCents: integer('total_debits_cents').notNull().default(0),
  totalCreditsCents: integer('total_credits_cents').notNull().default(0),
  transactionCount: integer('transaction_count').notNull().default(0),
  openingBalanceCents: integer('opening_balance_cents'),
  closingBalanceCents: integer('closing_balance_cents'),
  errorDetail: text('error_detail'),
  createdAt: text('created_at').notNull(),
  updatedAt: text('updated_at').notNull(),
});

export const transactions = sqliteTable('transactions', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  statementId: integer('statement_id')
    .notNull()
    .references(() => statements.id, { onDelete: 'cascade' }),
  transactionDate: text('transaction_date').notNull(), // YYYY-MM-DD
  description: text('description').notNull(),
  amountCents: integer('amount_cents').notNull(),
  direction: text('direction').$type<Direction>().notNull(),
  category: text('category').notNull(),
  originalCategory: text('original_category'), // category before user correction
  userCorrected: integer('user_corrected', { mode: 'boolean' }).notNull().default(false),
  balanceCents: integer('balance_cents'),
  rawText: text('raw_text').notNull(),
  createdAt: text('created_at').notNull(),
});

// user_id NULL holds the global default rule set
export const categoryRules = sqliteTable('category_rules', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  userId: integer('user_id').references(() => users.id, { onDelete: 'cascade' }),
  pattern: text('pattern').notNull(),
  isRegex: integer('is_regex', { mode: 'boolean' }).notNull().default(false),
  category: text('category').notNull(),
  priority: integer('priority').notNull().default(0),
  isActive: integer('is_active', { mode: 'boolean' }).notNull().default(true),
  createdAt: text('created_at').notNull(),
  updatedAt: text('updated_at').notNull(),
});

export type UserRow = typeof users.$inferSelect;
export type StatementRow = typeof statements.$inferSelect;
export type TransactionRow = typeof transactions.$inferSelect;
export type CategoryRuleRow = typeof categoryRules.$inferSelect;
