// Amount tokens as printed on statements: "1,234.50", "1,23,456.00", "500.00"
const AMOUNT_TOKEN = /^\d+\.\d{2}$/;

/**
 * Parse a printed amount into integer minor units.
 * Thousands separators are stripped first; anything that is not a
 * non-negative number with two fractional digits yields null.
 */
export function parseAmountToCents(text: string): number | null {
  const cleaned = text.trim().replace(/,/g, '');
  if (!AMOUNT_TOKEN.test(cleaned)) return null;

  const [whole, fraction] = cleaned.split('.');
  const cents = Number(whole) * 100 + Number(fraction);
  if (!Number.isSafeInteger(cents)) return null;
  return cents;
}

export function formatCents(cents: number): string {
  const sign = cents < 0 ? '-' : '';
  const abs = Math.abs(cents);
  const whole = Math.floor(abs / 100);
  const fraction = String(abs % 100).padStart(2, '0');
  return `${sign}${whole}.${fraction}`;
}
