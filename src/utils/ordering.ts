/**
 * Deterministic comparison helpers shared by context selection and planning.
 * Plain code-unit comparison is used for ids so results never depend on locale.
 */

export const DAY_MS = 24 * 60 * 60 * 1000;

export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Parse an ISO timestamp; unparseable values sort as the oldest possible
 */
export function toEpochMs(iso: string | null | undefined): number {
  if (!iso) {
    return Number.NEGATIVE_INFINITY;
  }
  const ms = Date.parse(iso);
  return Number.isNaN(ms) ? Number.NEGATIVE_INFINITY : ms;
}

/**
 * Newest first, ties broken by id descending
 */
export function byRecency<T extends { id: string }>(timestamp: (item: T) => string) {
  return (a: T, b: T): number => {
    const diff = toEpochMs(timestamp(b)) - toEpochMs(timestamp(a));
    if (diff !== 0 && !Number.isNaN(diff)) {
      return diff > 0 ? 1 : -1;
    }
    return compareText(b.id, a.id);
  };
}

/**
 * Whole days between two calendar dates (YYYY-MM-DD), or null when unparseable
 */
export function daysBetween(fromDate: string, toDate: string): number | null {
  const from = Date.parse(`${fromDate}T00:00:00Z`);
  const to = Date.parse(`${toDate}T00:00:00Z`);
  if (Number.isNaN(from) || Number.isNaN(to)) {
    return null;
  }
  return Math.round((to - from) / DAY_MS);
}

export function toCalendarDate(now: Date): string {
  return now.toISOString().slice(0, 10);
}
