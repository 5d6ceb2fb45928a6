import dayjs from 'dayjs';
import advancedFormat from 'dayjs/plugin/advancedFormat';
import utc from 'dayjs/plugin/utc';

dayjs.extend(utc);
dayjs.extend(advancedFormat);

export const ISO_DATE_FORMAT = 'YYYY-MM-DD';
const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Date values seen in catalog records: ISO `YYYY-MM-DD` strings once
 * post-processed, unix seconds when still raw, or nothing at all.
 */
export type RecordDate = string | number | null | undefined;

/**
 * Converts unix seconds to `YYYY-MM-DD` in UTC. Returns null for values the
 * calendar cannot represent.
 */
export function unixToIsoDate(seconds: number): string | null {
  if (!Number.isFinite(seconds)) return null;
  const parsed = dayjs.unix(seconds).utc();
  return parsed.isValid() ? parsed.format(ISO_DATE_FORMAT) : null;
}

/**
 * Normalizes a record date to an ISO string. Empty strings and
 * non-positive timestamps count as absent.
 */
export function toIsoDate(value: RecordDate): string | null {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  if (typeof value === 'number' && value > 0) {
    return unixToIsoDate(value);
  }
  return null;
}

/**
 * Missing-date policy for chronological ordering: a record without a date
 * sorts after every dated record, and two undated records compare equal so
 * a stable sort keeps their input order. Present dates compare as strings,
 * which is chronological for `YYYY-MM-DD`.
 */
export function compareDatesMissingLast(
  a: string | null | undefined,
  b: string | null | undefined,
): number {
  const left = a || null;
  const right = b || null;
  if (left === null && right === null) return 0;
  if (left === null) return 1;
  if (right === null) return -1;
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

/** Smallest present date, or null when none is present. */
export function earliestOf(dates: RecordDate[]): string | null {
  let earliest: string | null = null;
  for (const value of dates) {
    const date = toIsoDate(value);
    if (date !== null && (earliest === null || date < earliest)) {
      earliest = date;
    }
  }
  return earliest;
}

/** `1995-09-29` as `29th September 1995`; other strings come back as given. */
export function formatLongDate(isoDate: string): string {
  if (!ISO_DATE_PATTERN.test(isoDate)) return isoDate;
  const parsed = dayjs.utc(isoDate);
  return parsed.isValid() ? parsed.format('Do MMMM YYYY') : isoDate;
}
