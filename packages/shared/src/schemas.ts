import { z } from 'zod';
import { differenceInCalendarDays, isValid, parseISO } from 'date-fns';
import { EntryStatus } from './enums.js';
import { CLOCK_TIME_PATTERN, ISO_DAY_PATTERN, toIsoDay } from './time.js';

/**
 * `YYYY-MM-DD` that is also a real calendar day (rejects 2026-02-30).
 */
export const IsoDaySchema = z
  .string()
  .regex(ISO_DAY_PATTERN, 'Expected a YYYY-MM-DD date')
  .refine((value) => {
    const parsed = parseISO(value);
    return isValid(parsed) && toIsoDay(parsed) === value;
  }, 'Not a calendar date');

export const ClockTimeSchema = z.string().regex(CLOCK_TIME_PATTERN, 'Expected an HH:MM time');

export const EntryStatusSchema = z.nativeEnum(EntryStatus);

/**
 * Body of an employee submission. Shape only: business rules live in `validateEntry`.
 */
export const CreateEntrySchema = z.object({
  workDate: IsoDaySchema,
  startTime: ClockTimeSchema.optional(),
  endTime: ClockTimeSchema.optional(),
  hours: z.number().finite().optional(),
  project: z.string().trim().min(1).max(255).optional(),
});

export const RejectEntrySchema = z.object({
  comment: z.string().max(2000).optional(),
});

/** Longest period, in days inclusive, that a summary or listing may cover. */
const MAX_PERIOD_DAYS = 366;

export const PeriodQuerySchema = z
  .object({
    from: IsoDaySchema,
    to: IsoDaySchema,
  })
  .refine((period) => period.from <= period.to, {
    message: '`from` must not be after `to`',
    path: ['from'],
  })
  .refine(
    (period) =>
      differenceInCalendarDays(parseISO(period.to), parseISO(period.from)) < MAX_PERIOD_DAYS,
    { message: `A period may cover at most ${MAX_PERIOD_DAYS} days`, path: ['to'] }
  );

export const EntryFilterSchema = z.object({
  status: EntryStatusSchema.optional(),
  employeeId: z.string().uuid().optional(),
  project: z.string().trim().min(1).optional(),
  from: IsoDaySchema.optional(),
  to: IsoDaySchema.optional(),
});

export type CreateEntryInput = z.infer<typeof CreateEntrySchema>;
export type RejectEntryInput = z.infer<typeof RejectEntrySchema>;
export type PeriodQuery = z.infer<typeof PeriodQuerySchema>;
export type EntryFilter = z.infer<typeof EntryFilterSchema>;
