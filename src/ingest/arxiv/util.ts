const DAY_MS = 86_400_000;

/** `YYYY-MM-DD` for the UTC calendar day of `date`. */
export function formatDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** `YYYYMMDD` for the UTC calendar day of `date`. */
export function dateTag(date: Date): string {
  return formatDay(date).replace(/-/g, '');
}

export function isWeekend(date: Date): boolean {
  const day = date.getUTCDay();
  return day === 0 || day === 6;
}

export function parseDay(value: string): Date {
  const trimmed = value.trim();
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(trimmed);
  const parsed = match ? new Date(`${trimmed}T00:00:00Z`) : null;
  if (!parsed || Number.isNaN(parsed.getTime()) || formatDay(parsed) !== trimmed) {
    throw new RangeError(`target date must be in YYYY-MM-DD format, got "${value}"`);
  }
  return parsed;
}

/**
 * Explicit dates are parsed strictly. Otherwise the day before `now` (UTC),
 * walking back past Saturday and Sunday.
 */
export function resolveTargetDate(targetDate?: string, now: Date = new Date()): Date {
  if (targetDate) {
    return parseDay(targetDate);
  }
  const today = parseDay(formatDay(now));
  let candidate = new Date(today.getTime() - DAY_MS);
  while (isWeekend(candidate)) {
    candidate = new Date(candidate.getTime() - DAY_MS);
  }
  return candidate;
}

/** UTC day of an ISO timestamp such as arXiv's `published`, or null. */
export function publishedDay(published: string): string | null {
  const parsed = new Date(published.trim());
  if (!published.trim() || Number.isNaN(parsed.getTime())) {
    return null;
  }
  return formatDay(parsed);
}

export function extractArxivId(entryId: string): string {
  const m = entryId.match(/(\d{4}\.\d{4,5})(v\d+)?$/);
  if (m) return `${m[1]}${m[2] ?? ''}`;
  const parts = entryId.split('/abs/');
  return parts[parts.length - 1] ?? entryId;
}
