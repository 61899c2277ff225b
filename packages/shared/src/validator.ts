import { ValidationReason } from './enums.js';
import { addIsoDays, clockTimeToMinutes, minutesToHours, hoursToMinutes } from './time.js';
import type { EntryCandidate, TimeCardEntry, ValidationResult } from './types.js';

const MAX_ENTRY_MINUTES = 24 * 60;

export interface ValidateEntryOptions {
  /** Today's calendar day (`YYYY-MM-DD`) as seen by the caller's clock. */
  today: string;
  futureSubmissionGraceDays: number;
}

type EntrySlot = Pick<
  TimeCardEntry,
  'employeeId' | 'workDate' | 'startTime' | 'endTime' | 'project'
>;

function fail(reason: ValidationReason): ValidationResult {
  return { ok: false, reason };
}

function hasInterval(entry: {
  startTime: string | null;
  endTime: string | null;
}): entry is { startTime: string; endTime: string } {
  return entry.startTime !== null && entry.endTime !== null;
}

function isValidInterval(candidate: EntryCandidate): boolean {
  if (hasInterval(candidate)) {
    return clockTimeToMinutes(candidate.startTime) < clockTimeToMinutes(candidate.endTime);
  }
  // A lone start or end time is neither an interval nor a duration.
  if (candidate.startTime !== null || candidate.endTime !== null) return false;
  if (candidate.hours === null || !Number.isFinite(candidate.hours)) return false;
  // Judged on the whole minutes that get stored, not the raw submitted value.
  const minutes = hoursToMinutes(candidate.hours);
  return minutes > 0 && minutes <= MAX_ENTRY_MINUTES;
}

type ClockInterval = { startTime: string; endTime: string };

/**
 * Interval entries are keyed by start time. Duration entries have no start time and
 * are keyed by project instead, so one day can carry hours for several projects.
 */
function sameSlot(candidate: EntryCandidate, entry: EntrySlot): boolean {
  if (candidate.startTime !== entry.startTime) return false;
  return candidate.startTime !== null || candidate.project === entry.project;
}

function intervalsOverlap(a: ClockInterval, b: ClockInterval): boolean {
  // Half-open [start, end): touching intervals do not overlap.
  return (
    clockTimeToMinutes(a.startTime) < clockTimeToMinutes(b.endTime) &&
    clockTimeToMinutes(b.startTime) < clockTimeToMinutes(a.endTime)
  );
}

/**
 * Checks a candidate entry against the employee's existing entries for the same date.
 * Stops at the first failing rule: future date, interval shape, duplicate slot, overlap.
 *
 * This is a pre-check only; the storage layer's unique index stays the source of truth
 * for duplicate slots.
 */
export function validateEntry(
  candidate: EntryCandidate,
  existing: readonly EntrySlot[],
  options: ValidateEntryOptions
): ValidationResult {
  const latestAllowed = addIsoDays(options.today, options.futureSubmissionGraceDays);
  if (candidate.workDate > latestAllowed) {
    return fail(ValidationReason.FUTURE_DATE);
  }

  if (!isValidInterval(candidate)) {
    return fail(ValidationReason.INVALID_INTERVAL);
  }

  const sameDay = existing.filter(
    (entry) => entry.employeeId === candidate.employeeId && entry.workDate === candidate.workDate
  );

  if (sameDay.some((entry) => sameSlot(candidate, entry))) {
    return fail(ValidationReason.DUPLICATE_SLOT);
  }

  if (hasInterval(candidate)) {
    for (const entry of sameDay) {
      if (hasInterval(entry) && intervalsOverlap(candidate, entry)) {
        return fail(ValidationReason.OVERLAP);
      }
    }
  }

  return { ok: true };
}

/**
 * Hours an entry counts for: the interval length, or the submitted duration.
 * Rounded to two decimals.
 */
export function candidateHours(
  candidate: Pick<EntryCandidate, 'startTime' | 'endTime' | 'hours'>
): number {
  if (hasInterval(candidate)) {
    return minutesToHours(
      clockTimeToMinutes(candidate.endTime) - clockTimeToMinutes(candidate.startTime)
    );
  }
  return minutesToHours(hoursToMinutes(candidate.hours ?? 0));
}
