/** Returns the date as YYYY-MM-DD (UTC). */
export function toDateString(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** Returns today's date as YYYY-MM-DD. */
export function todayDateString(): string {
  return toDateString(new Date());
}

/** Shifts a YYYY-MM-DD date by whole days. */
export function addDays(dateStr: string, days: number): string {
  const d = new Date(`${dateStr}T00:00:00Z`);
  d.setUTCDate(d.getUTCDate() + days);
  return toDateString(d);
}

/**
 * Season id for a date, e.g. '2023-24'. Seasons start in October, so
 * January through September belong to the season that began the year before.
 */
export function seasonForDate(date: Date): string {
  const year = date.getUTCFullYear();
  const start = date.getUTCMonth() >= 9 ? year : year - 1;
  return `${start}-${String(start + 1).slice(-2)}`;
}

/** Regular season plus playoffs: October through June. */
export function isSeasonActive(date: Date): boolean {
  const month = date.getUTCMonth() + 1;
  return month >= 10 || month <= 6;
}
