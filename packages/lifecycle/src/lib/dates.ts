import { ValidationError } from './errors.js';

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * Clock pinned to a single instant. Each call returns a fresh copy so callers
 * cannot mutate the pinned value.
 */
export function fixedClock(instant: Date | string): Clock {
  const time = new Date(instant).getTime();
  return {
    now: () => new Date(time),
  };
}

/**
 * Effective date for an operation: the explicit value, otherwise "now".
 */
export function getEffectiveDate(date: Date | null | undefined, clock: Clock = systemClock): Date {
  return date ?? clock.now();
}

/**
 * Effective start date for a period. Future dates are clamped to "now" so an
 * immediate status change cannot be post-dated.
 */
export function getEffectiveStartDate(
  date: Date | null | undefined,
  clock: Clock = systemClock,
): Date {
  const now = clock.now();
  const effective = date ?? now;
  return effective.getTime() > now.getTime() ? now : effective;
}

export function getEffectiveEndDate(date: Date | null | undefined, clock: Clock = systemClock): Date {
  return getEffectiveDate(date, clock);
}

export function isValidDateRange(start: Date, end: Date): boolean {
  return start.getTime() <= end.getTime();
}

export function ensureValidDateRange(start: Date, end: Date): void {
  if (!isValidDateRange(start, end)) {
    throw new ValidationError(
      `End date (${toDateString(end)}) must be after or equal to start date (${toDateString(start)})`,
      { start: start.toISOString(), end: end.toISOString() },
    );
  }
}

export function toDateString(date: Date): string {
  return date.toISOString().slice(0, 10);
}
