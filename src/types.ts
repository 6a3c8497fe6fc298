export type Direction = 'Debit' | 'Credit';

export interface Transaction {
  date: Date; // UTC midnight of the posting date
  description: string;
  amountCents: number; // always >= 0, direction carries the sign
  direction: Direction;
  category?: string;
  balanceCents?: number; // running balance, when the layout prints one
  rawText: string;
}

export interface CategoryRule {
  id?: number;
  pattern: string;
  isRegex: boolean;
  category: string;
  priority: number;
  active: boolean;
}

export type BankType =
  | 'axis_credit'
  | 'axis_savings'
  | 'hdfc_credit'
  | 'hdfc_savings'
  | 'icici_credit'
  | 'icici_savings'
  | 'sbi_credit'
  | 'sbi_savings'
  | 'other';

export const BANK_TYPES: readonly BankType[] = [
  'axis_credit',
  'axis_savings',
  'hdfc_credit',
  'hdfc_savings',
  'icici_credit',
  'icici_savings',
  'sbi_credit',
  'sbi_savings',
  'other',
];

export type ParsingStatus = 'pending' | 'processing' | 'completed' | 'failed';

export interface StatementRecord {
  id: number;
  userId: number;
  filePath: string;
  fileName: string;
  bankType: BankType;
  statementDate: Date;
  parsingStatus: ParsingStatus;
  totalDebitsCents: number;
  totalCreditsCents: number;
  transactionCount: number;
  openingBalanceCents: number | null;
  closingBalanceCents: number | null;
  errorDetail: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface StoredTransaction extends Transaction {
  id: number;
  statementId: number;
  category: string;
  originalCategory: string | null; // category before a user correction
  userCorrected: boolean;
}

export interface User {
  id: number;
  username: string;
  email: string;
  active: boolean;
  createdAt: Date;
}

export interface CategoryTotal {
  totalCents: number;
  transactionCount: number;
}

export interface MonthlyTotal {
  month: string; // YYYY-MM
  amountCents: number; // debit spend
  creditCents: number;
  transactionCount: number; // debits only, matching amountCents
}

export interface StatementTotals {
  totalDebitsCents: number;
  totalCreditsCents: number;
  transactionCount: number;
}

export interface Summary extends StatementTotals {
  byCategory: Record<string, CategoryTotal>;
  byMonth: MonthlyTotal[];
  topCategories: Array<{ category: string } & CategoryTotal>;
}
