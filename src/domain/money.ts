const PLAIN_DECIMAL = /^\d+(?:\.\d{1,2})?$/;
const GROUPED_DECIMAL = /^\d{1,3}(?:,\d{3})+(?:\.\d{1,2})?$/;

/**
 * Converts a non-negative decimal (number or string) with at most two fraction
 * digits into integer cents. Works on the decimal text so no float rounding
 * can creep in. Returns null when the value does not have that shape.
 */
export function decimalToCents(value: number | string): number | null {
  let text: string;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    text = String(value);
    if (!PLAIN_DECIMAL.test(text)) return null;
  } else if (PLAIN_DECIMAL.test(value)) {
    text = value;
  } else if (GROUPED_DECIMAL.test(value)) {
    text = value.replace(/,/g, '');
  } else {
    return null;
  }

  const [whole, fraction = ''] = text.split('.');
  const cents = Number(whole) * 100 + Number(fraction.padEnd(2, '0'));
  return Number.isSafeInteger(cents) ? cents : null;
}

export function formatCents(cents: number): string {
  const whole = Math.trunc(cents / 100);
  const fraction = cents % 100;
  return `${whole}.${String(fraction).padStart(2, '0')}`;
}
