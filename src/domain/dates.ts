import type { IsoDate } from './types.js';

const ISO_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const US_PATTERN = /^(\d{2})\/(\d{2})\/(\d{4})$/;

/**
 * Parses `YYYY-MM-DD` or `MM/DD/YYYY` into an ISO calendar date.
 * Returns null for any other shape or for a day that does not exist.
 */
export function parseCalendarDate(value: string): IsoDate | null {
  const iso = ISO_PATTERN.exec(value);
  if (iso) return toIsoDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));

  const us = US_PATTERN.exec(value);
  if (us) return toIsoDate(Number(us[3]), Number(us[1]), Number(us[2]));

  return null;
}

function toIsoDate(year: number, month: number, day: number): IsoDate | null {
  if (month < 1 || month > 12 || day < 1) return null;

  // Day 0 of the next month is the last day of this one.
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day > daysInMonth) return null;

  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}
