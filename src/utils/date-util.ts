const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Parses a `YYYY-MM-DD` calendar date as midnight UTC.
 *
 * @returns the parsed date, or null for malformed input and impossible
 * dates such as `2025-02-30`
 */
export const parseIsoDate = (value: string): Date | null => {
  const match = ISO_DATE_PATTERN.exec(value.trim());
  if (!match) return null;

  const [, year, month, day] = match.map(Number);
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
};

/**
 * @returns the last millisecond of the UTC day that `date` starts.
 */
export const endOfDay = (date: Date): Date =>
  new Date(date.getTime() + DAY_MS - 1);

export const formatDate = (date: Date): string =>
  date.toISOString().slice(0, 10);
