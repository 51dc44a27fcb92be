/**
 * Calendar-date helpers. Earnings dates and "today" are compared as YYYY-MM-DD
 * strings in the market's time zone, never as instants.
 */

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function toMs(value: unknown): number | null {
  if (value == null) return null;
  if (value instanceof Date) {
    const t = value.getTime();
    return Number.isNaN(t) ? null : t;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    // Assume seconds if small (e.g. < 1e12), else ms
    const ms = value < 1e12 ? value * 1000 : value;
    return ms > 0 ? ms : null;
  }
  if (typeof value === "string") {
    const t = new Date(value).getTime();
    return Number.isNaN(t) ? null : t;
  }
  return null;
}

/** Calendar date of `date` in `timeZone`, formatted YYYY-MM-DD. */
export function toMarketDate(date: Date, timeZone: string): string {
  const formatter = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  });
  return formatter.format(date);
}

export function isIsoDate(value: string): boolean {
  if (!ISO_DATE.test(value)) return false;
  return !Number.isNaN(new Date(`${value}T00:00:00Z`).getTime());
}

/** Start of the history window: `years` before `now` (fractional years rounded to whole months). */
export function historyStart(now: Date, years: number): Date {
  const start = new Date(now);
  start.setUTCMonth(start.getUTCMonth() - Math.round(years * 12));
  return start;
}
