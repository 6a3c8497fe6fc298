import type { StatementFormat, ExtractionContext, LineOutcome, Direction } from './types';
import { segmentByMarkers, PAGE_MARKER } from './segmenter';
import { parseAmountToCents } from '../money';
import { parseDayMonthYear } from '../dates';

const OPENING_MARKER = /OPENING\s+BALANCE/i;
const CLOSING_MARKER = /CLOSING\s+BALANCE/i;
const COLUMN_HEADERS = [/^tran(saction)?\s+date\b/i, /^date\b/i, /^chq\s+no\b/i];

const DATE_PREFIX = /^(\d{2}-\d{2}-\d{4})\s+(.+)$/;
// Anything printed in an amount column, valid or not ("500.00", "-12.50", "1,23,456.00")
const NUMERIC_TOKEN = /^-?[\d,]*\d\.\d+$/;
const BRANCH_CODE = /^\d+$/;

const PAYMENT_RAILS = /^(UPI|NEFT|IMPS|RTGS)$/i;
const CREDIT_KEYWORDS = [/\bsalary\b/i, /CR-/, /\bcredit\b/i, /\brefund\b/i, /\breversal\b/i, /\binterest\b/i, /\bdeposit\b/i];

/**
 * Canonical counterparty of a '/'-delimited transfer reference.
 * "UPI/P2M/430912345678/SWIGGY/Payment" -> "SWIGGY"
 */
export function processDescription(description: string): string {
  const parts = description.split('/');
  if (parts.length >= 4 && PAYMENT_RAILS.test(parts[0].trim())) {
    const entity = parts[3].trim();
    if (entity) return entity;
  }
  return description;
}

function hasCreditKeyword(description: string): boolean {
  return CREDIT_KEYWORDS.some((pattern) => pattern.test(description));
}

/**
 * Axis Bank savings account statement.
 * Transactions sit between OPENING BALANCE and CLOSING BALANCE and read
 * DD-MM-YYYY <particulars> <debit|credit> [<credit>] <balance> [<branch>].
 */
export class AxisSavingsFormat implements StatementFormat {
  readonly bankType = 'axis_savings' as const;
  readonly name = 'Axis Bank Savings Account';

  canParse(firstPageText: string, fileName: string): number {
    const text = firstPageText.toLowerCase();
    const name = fileName.toLowerCase();

    if (!text.includes('axis') && !name.includes('axis')) return 0;
    if (OPENING_MARKER.test(firstPageText)) return 0.95;
    if (text.includes('savings account') || name.includes('saving')) return 0.8;
    return 0;
  }

  segment(lines: string[]): string[] {
    return segmentByMarkers(lines, {
      opening: OPENING_MARKER,
      closing: CLOSING_MARKER,
      noise: [PAGE_MARKER, ...COLUMN_HEADERS],
    });
  }

  openingBalance(lines: string[]): number | null {
    const marker = lines.find((line) => OPENING_MARKER.test(line));
    if (!marker) return null;
    const tokens = marker.trim().split(/\s+/).filter((token) => NUMERIC_TOKEN.test(token));
    const last = tokens[tokens.length - 1];
    return last === undefined ? null : parseAmountToCents(last);
  }

  extract(line: string, context: ExtractionContext): LineOutcome {
    const trimmed = line.trim();
    const match = trimmed.match(DATE_PREFIX);
    if (!match) return { kind: 'no_match' };

    const date = parseDayMonthYear(match[1]);
    if (!date) return { kind: 'malformed', reason: `invalid date "${match[1]}"` };

    const tokens = match[2].split(/\s+/);
    let end = tokens.length - 1;

    // Init. branch code trails the balance
    if (end > 0 && BRANCH_CODE.test(tokens[end]) && NUMERIC_TOKEN.test(tokens[end - 1])) {
      end--;
    }

    const columns: string[] = [];
    while (end >= 0 && columns.length < 3 && NUMERIC_TOKEN.test(tokens[end])) {
      columns.unshift(tokens[end]);
      end--;
    }

    const description = tokens.slice(0, end + 1).join(' ');
    if (!description) return { kind: 'malformed', reason: 'missing description' };
    if (columns.length < 2) return { kind: 'malformed', reason: 'missing amount or balance column' };

    const cents: number[] = [];
    for (const column of columns) {
      const value = parseAmountToCents(column);
      if (value === null) return { kind: 'malformed', reason: `invalid amount "${column}"` };
      cents.push(value);
    }

    const balanceCents = cents[cents.length - 1];
    let amountCents: number;
    let direction: Direction;

    if (cents.length === 3) {
      const [debit, credit] = cents;
      if (debit > 0 && credit === 0) {
        amountCents = debit;
        direction = 'Debit';
      } else if (credit > 0 && debit === 0) {
        amountCents = credit;
        direction = 'Credit';
      } else {
        return { kind: 'malformed', reason: 'debit and credit columns are both set or both empty' };
      }
    } else {
      amountCents = cents[0];
      direction = this.inferDirection(description, amountCents, balanceCents, context.previousBalanceCents);
    }

    return {
      kind: 'matched',
      transaction: {
        date,
        description: processDescription(description),
        amountCents,
        direction,
        balanceCents,
        rawText: trimmed,
      },
    };
  }

  // Balance movement first, then credit keywords, debit otherwise
  private inferDirection(
    description: string,
    amountCents: number,
    balanceCents: number,
    previousBalanceCents: number | null
  ): Direction {
    if (previousBalanceCents !== null) {
      if (previousBalanceCents - amountCents === balanceCents) return 'Debit';
      if (previousBalanceCents + amountCents === balanceCents) return 'Credit';
    }
    return hasCreditKeyword(description) ? 'Credit' : 'Debit';
  }
}

export const axisSavingsFormat = new AxisSavingsFormat();
