/**
 * Session window computation.
 *
 * All times are wall-clock times in the process's local time zone. There is
 * no exchange calendar: weekends and holidays produce a window like any other
 * day.
 */

import { InvalidInputError, SESSION_BAR_INTERVAL, type BarInterval, type SessionWindow } from '@mdpoc/contracts';

/** Regular session open, local time */
export const SESSION_OPEN = { hour: 9, minute: 30 } as const;

/** Regular session close, local time (exclusive) */
export const SESSION_CLOSE = { hour: 16, minute: 0 } as const;

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Formats the local calendar date of `date` as YYYY-MM-DD.
 */
export function formatLocalDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Parses a YYYY-MM-DD string into local midnight of that date.
 *
 * @throws {InvalidInputError} If the text is not a real calendar date
 */
export function parseSessionDate(text: string): Date {
  const match = DATE_PATTERN.exec(text);
  if (!match) {
    throw new InvalidInputError(`Invalid session date: ${text}. Expected YYYY-MM-DD`, { date: text });
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(year, month - 1, day);

  // Date rolls 2025-02-30 over into March
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    throw new InvalidInputError(`Invalid session date: ${text}. Not a calendar date`, { date: text });
  }

  return date;
}

/**
 * Resolves the calendar date a batch targets.
 *
 * An explicit date keeps its calendar date and loses its time of day.
 * Without one, the date is the day before `now`.
 *
 * @returns Local midnight of the target date
 * @throws {InvalidInputError} If `date` is an invalid Date
 *
 * @example
 * ```typescript
 * resolveTargetDate(undefined, new Date(2025, 0, 16, 8, 0)); // 2025-01-15 00:00 local
 * resolveTargetDate(new Date(2025, 0, 10, 13, 45));          // 2025-01-10 00:00 local
 * ```
 */
export function resolveTargetDate(date: Date | undefined, now: Date = new Date()): Date {
  if (date !== undefined) {
    if (Number.isNaN(date.getTime())) {
      throw new InvalidInputError('Invalid session date: not a valid Date');
    }
    return new Date(date.getFullYear(), date.getMonth(), date.getDate());
  }

  return new Date(now.getFullYear(), now.getMonth(), now.getDate() - 1);
}

/**
 * Computes the regular-hours window of a calendar date.
 *
 * @example
 * ```typescript
 * const window = computeSessionWindow(new Date(2025, 0, 15));
 * // { date: '2025-01-15', start: 09:30 local, end: 16:00 local, interval: '5m' }
 * ```
 */
export function computeSessionWindow(date: Date, interval: BarInterval = SESSION_BAR_INTERVAL): SessionWindow {
  const year = date.getFullYear();
  const month = date.getMonth();
  const day = date.getDate();

  return {
    date: formatLocalDate(date),
    start: new Date(year, month, day, SESSION_OPEN.hour, SESSION_OPEN.minute),
    end: new Date(year, month, day, SESSION_CLOSE.hour, SESSION_CLOSE.minute),
    interval,
  };
}
