const ISO_DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})/;

function isValidYearMonthDay(year: number, month: number, day: number): boolean {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return false;
  if (month < 1 || month > 12 || day < 1 || day > 31) return false;
  const parsed = new Date(year, month - 1, day);
  return parsed.getFullYear() === year && parsed.getMonth() === month - 1 && parsed.getDate() === day;
}

/**
 * Parses a `yyyy-MM-dd` transaction date (a trailing time part is ignored)
 * into local midnight, the same calendar the period buckets are built in.
 */
export function parseDateKey(value: string): Date | null {
  const match = value.trim().match(ISO_DATE_PREFIX);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (!isValidYearMonthDay(year, month, day)) {
    return null;
  }

  return new Date(year, month - 1, day);
}
