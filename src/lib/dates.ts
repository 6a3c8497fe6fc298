const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

/**
 * Build a UTC date, rejecting values that roll over (31-02 etc).
 */
export function utcDate(year: number, month: number, day: number): Date | null {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return null;
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
}

// "31-10-2024"
export function parseDayMonthYear(text: string): Date | null {
  const match = text.trim().match(/^(\d{2})-(\d{2})-(\d{4})$/);
  if (!match) return null;
  return utcDate(Number(match[3]), Number(match[2]), Number(match[1]));
}

// "12 Oct '24"
export function parseShortMonthDate(text: string): Date | null {
  const match = text.trim().match(/^(\d{1,2})\s+([A-Za-z]{3})[A-Za-z]*\s+'(\d{2})$/);
  if (!match) return null;
  const month = MONTHS.indexOf(match[2].toLowerCase()) + 1;
  if (month === 0) return null;
  return utcDate(2000 + Number(match[3]), month, Number(match[1]));
}

export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function fromIsoDate(text: string): Date {
  const [year, month, day] = text.split('-').map(Number);
  return new Date(Date.UTC(year, month - 1, day));
}

export function toMonthKey(date: Date): string {
  return `${date.getUTCFullYear()}-${String(date.getUTCMonth() + 1).padStart(2, '0')}`;
}

/**
 * First and last calendar day of a YYYY-MM month, both at UTC midnight.
 */
export function monthBounds(month: string): { start: Date; end: Date } {
  const match = month.match(/^(\d{4})-(\d{2})$/);
  const monthIndex = match ? Number(match[2]) - 1 : -1;
  if (!match || monthIndex < 0 || monthIndex > 11) {
    throw new RangeError(`Invalid month "${month}", expected YYYY-MM`);
  }
  const year = Number(match[1]);
  return {
    start: new Date(Date.UTC(year, monthIndex, 1)),
    end: new Date(Date.UTC(year, monthIndex + 1, 0)),
  };
}

/**
 * Statement date from a file name such as "AXISMB_24-11-2024.pdf".
 */
export function statementDateFromFileName(fileName: string): Date | null {
  const iso = fileName.match(/(\d{4})-(\d{2})-(\d{2})/);
  if (iso) return utcDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));

  const long = fileName.match(/(\d{2})-(\d{2})-(\d{4})/);
  if (long) return utcDate(Number(long[3]), Number(long[2]), Number(long[1]));

  const short = fileName.match(/(\d{2})-(\d{2})-(\d{2})/);
  if (short) return utcDate(2000 + Number(short[3]), Number(short[2]), Number(short[1]));

  return null;
}
