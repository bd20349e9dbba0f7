const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Parses an ISO-8601 timestamp. Returns undefined when the value is not a date.
 */
export function parseTimestamp(value: string): Date | undefined {
  const parsed = new Date(value);
  return isNaN(parsed.getTime()) ? undefined : parsed;
}

export function subtractDays(date: Date, days: number): Date {
  return new Date(date.getTime() - days * DAY_MS);
}

/**
 * Monday 00:00 UTC of the week containing `date`
 */
export function weekStart(date: Date): Date {
  // getUTCDay(): Sunday = 0, so shift to Monday = 0
  const daysSinceMonday = (date.getUTCDay() + 6) % 7;
  return new Date(Date.UTC(
    date.getUTCFullYear(),
    date.getUTCMonth(),
    date.getUTCDate() - daysSinceMonday
  ));
}

/**
 * YYYY-MM-DD of the UTC calendar day
 */
export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * ISO-8601 with an explicit +00:00 offset, e.g. 2024-01-03T10:00:00+00:00.
 * Milliseconds are written only when non-zero.
 */
export function toIsoWithOffset(date: Date): string {
  return date.toISOString().replace(/\.000Z$/, 'Z').replace(/Z$/, '+00:00');
}
