import { describe, expect, it } from 'vitest';
import {
  monthBounds,
  parseDayMonthYear,
  parseShortMonthDate,
  statementDateFromFileName,
  toIsoDate,
  toMonthKey,
} from './dates';

const iso = (date: Date | null) => (date ? toIsoDate(date) : null);

describe('statement dates', () => {
  it('parses DD-MM-YYYY and rejects impossible days', () => {
    expect(iso(parseDayMonthYear('31-10-2024'))).toBe('2024-10-31');
    expect(parseDayMonthYear('31-02-2024')).toBeNull();
    expect(parseDayMonthYear('2024-10-31')).toBeNull();
  });

  it("parses DD Mon 'YY", () => {
    expect(iso(parseShortMonthDate("12 Oct '24"))).toBe('2024-10-12');
    expect(iso(parseShortMonthDate("5 September '23"))).toBe('2023-09-05');
    expect(parseShortMonthDate("12 Foo '24")).toBeNull();
  });

  it('derives month keys and calendar bounds', () => {
    expect(toMonthKey(new Date(Date.UTC(2024, 0, 31)))).toBe('2024-01');
    const feb = monthBounds('2024-02');
    expect(toIsoDate(feb.start)).toBe('2024-02-01');
    expect(toIsoDate(feb.end)).toBe('2024-02-29');
    expect(() => monthBounds('2024-13')).toThrow(RangeError);
  });

  it('reads the statement date from file names', () => {
    expect(iso(statementDateFromFileName('AXISMB_24-11-2024.pdf'))).toBe('2024-11-24');
    expect(iso(statementDateFromFileName('savings_2024-03-31.pdf'))).toBe('2024-03-31');
    expect(iso(statementDateFromFileName('card_05-01-25.pdf'))).toBe('2025-01-05');
    expect(statementDateFromFileName('statement.pdf')).toBeNull();
  });
});
