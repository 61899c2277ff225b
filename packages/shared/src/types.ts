import type { AnomalyKind, EmployeeRole, EntryStatus, ValidationReason } from './enums.js';

/**
 * A project entries can be logged against. Created the first time an entry names it.
 */
export interface Project {
  id: number;
  name: string;
  createdAt: string;
}

/**
 * An employee account. Provisioned by admins, never mutated by the workflow.
 */
export interface Employee {
  id: string;
  name: string;
  email: string;
  role: EmployeeRole;
}

/**
 * A single time-card submission for one employee and one calendar day.
 *
 * Interval entries carry `startTime`/`endTime` (`HH:MM`); duration entries carry
 * only `hours` and have both times set to null.
 */
export interface TimeCardEntry {
  id: string;
  employeeId: string;
  workDate: string;
  startTime: string | null;
  endTime: string | null;
  hours: number;
  project: string | null;
  status: EntryStatus;
  submittedAt: string;
  decidedAt: string | null;
  decidedBy: string | null;
  comment: string | null;
}

/**
 * What the validator needs to know about an entry that does not exist yet.
 */
export interface EntryCandidate {
  employeeId: string;
  workDate: string;
  startTime: string | null;
  endTime: string | null;
  hours: number | null;
  project: string | null;
}

export type ValidationResult = { ok: true } | { ok: false; reason: ValidationReason };

export type MissingDayAnomaly = {
  kind: AnomalyKind.MISSING_DAY;
  date: string;
};

export type ExcessHoursAnomaly = {
  kind: AnomalyKind.EXCESS_HOURS;
  date: string;
  hours: number;
};

export type Anomaly = MissingDayAnomaly | ExcessHoursAnomaly;

/**
 * Per-employee totals over a date range, plus anomaly flags for admin review.
 */
export interface PeriodSummary {
  employeeId: string;
  startDate: string;
  endDate: string;
  approvedHours: number;
  pendingHours: number;
  rejectedHours: number;
  approvedDays: number;
  anomalies: Anomaly[];
}

/**
 * Approved hours one employee logged against a project. `project` is null for
 * entries submitted without one.
 */
export interface ProjectHours {
  project: string | null;
  approvedHours: number;
  approvedEntries: number;
}

/**
 * Approved/pending totals for one employee, used by the admin leaderboard report.
 */
export interface EmployeeTotals {
  employeeId: string;
  name: string;
  email: string;
  approvedHours: number;
  pendingHours: number;
  projectCount: number;
}
