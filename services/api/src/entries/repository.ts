import type {
  DecisionStatus,
  Employee,
  EntryFilter,
  Project,
  TimeCardEntry,
  ValidationReason,
  ValidationResult,
} from '@timecard/shared';

/**
 * A validated entry about to be persisted. `hours` is already derived from the interval.
 */
export type NewEntry = {
  employeeId: string;
  workDate: string;
  startTime: string | null;
  endTime: string | null;
  hours: number;
  project: string | null;
  submittedAt: Date;
};

export type InsertOutcome =
  | { ok: true; entry: TimeCardEntry }
  | { ok: false; reason: ValidationReason };

export type Decision = {
  status: DecisionStatus;
  decidedBy: string;
  decidedAt: Date;
  comment: string | null;
};

export type DecideOutcome =
  | { kind: 'updated'; entry: TimeCardEntry }
  | { kind: 'not_found' }
  | { kind: 'invalid_transition'; entry: TimeCardEntry };

/**
 * Persistence for time-card entries.
 * Implementations: `PgEntryRepository` (production) and `MemoryEntryRepository` (tests, local runs).
 */
export interface EntryRepository {
  /**
   * Insert `entry` if `check` passes against the employee's existing entries for that date.
   * Calls for the same (employee, date) are serialized, and a storage-level uniqueness
   * failure is reported as `DuplicateSlot`. A named project is created on first use.
   */
  insertChecked(
    entry: NewEntry,
    check: (sameDay: TimeCardEntry[]) => ValidationResult
  ): Promise<InsertOutcome>;

  findById(id: string): Promise<TimeCardEntry | null>;

  /** Ordered by work date, then start time (duration entries first). */
  listByEmployeeAndPeriod(
    employeeId: string,
    startDate: string,
    endDate: string
  ): Promise<TimeCardEntry[]>;

  /** Newest work date first. */
  list(filter: EntryFilter): Promise<TimeCardEntry[]>;

  /**
   * Apply a decision if the transition table allows it from the entry's current
   * status. Reading the status and writing the decision is one atomic step.
   */
  decidePending(id: string, decision: Decision): Promise<DecideOutcome>;

  /** Every project an entry has named, by name. */
  listProjects(): Promise<Project[]>;
}

/**
 * Read-only access to employee accounts and their sessions.
 */
export interface EmployeeDirectory {
  findById(id: string): Promise<Employee | null>;
  list(): Promise<Employee[]>;
  /** The active employee owning an unexpired, unrevoked session token. */
  findBySessionToken(token: string, now: Date): Promise<Employee | null>;
}
