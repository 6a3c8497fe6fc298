import type { StatementFormat, LineOutcome, Direction } from './types';
import { filterNoise, PAGE_MARKER } from './segmenter';
import { parseAmountToCents } from '../money';
import { parseShortMonthDate } from '../dates';

const NOISE = [
  /Transaction\s+Details/i,
  /Credit\s+Card\s+Number/i,
  /End\s+of\s+Transaction/i,
  /^date\s+(transaction|description)/i,
  PAGE_MARKER,
];

const DATE_PREFIX = /^\d{1,2}\s+[A-Za-z]{3,9}\s+'\d{2}\b/;
// 12 Oct '24 SWIGGY BANGALORE ₹ 1,234.50 Debit
const TRANSACTION_LINE =
  /^(\d{1,2}\s+[A-Za-z]{3,9}\s+'\d{2})\s+(.+?)\s+(?:₹|â‚¹|Rs\.?|INR)?\s*(-?[\d,]*\d(?:\.\d+)?)\s+(Debit|Credit)\b/i;

/**
 * Axis Bank credit card statement.
 * No section markers; every transaction line carries an explicit
 * Debit/Credit token after the amount.
 */
export class AxisCreditFormat implements StatementFormat {
  readonly bankType = 'axis_credit' as const;
  readonly name = 'Axis Bank Credit Card';

  canParse(firstPageText: string, fileName: string): number {
    const text = firstPageText.toLowerCase();
    const name = fileName.toLowerCase();

    if (!text.includes('axis') && !name.includes('axis')) return 0;
    if (text.includes('credit card')) return 0.9;
    if (name.includes('credit')) return 0.8;

    // Axis documents without a clearer marker are most often card statements
    return 0.55;
  }

  segment(lines: string[]): string[] {
    return filterNoise(lines, NOISE);
  }

  extract(line: string): LineOutcome {
    const trimmed = line.trim();
    if (!DATE_PREFIX.test(trimmed)) return { kind: 'no_match' };

    const match = trimmed.match(TRANSACTION_LINE);
    if (!match) return { kind: 'malformed', reason: 'missing amount or Debit/Credit marker' };

    const [, dateText, rawDescription, amountText, directionText] = match;

    const date = parseShortMonthDate(dateText);
    if (!date) return { kind: 'malformed', reason: `invalid date "${dateText}"` };

    const amountCents = parseAmountToCents(amountText);
    if (amountCents === null) return { kind: 'malformed', reason: `invalid amount "${amountText}"` };

    const direction: Direction = directionText.toLowerCase() === 'credit' ? 'Credit' : 'Debit';

    return {
      kind: 'matched',
      transaction: {
        date,
        description: rawDescription.replace(/\s+/g, ' ').trim(),
        amountCents,
        direction,
        rawText: trimmed,
      },
    };
  }
}

export const axisCreditFormat = new AxisCreditFormat();
