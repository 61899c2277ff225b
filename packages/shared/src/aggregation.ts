import { AnomalyKind, EntryStatus } from './enums.js';
import { eachIsoDay, hoursToMinutes, isoWeekday, minutesToHours } from './time.js';
import type {
  Anomaly,
  Employee,
  EmployeeTotals,
  PeriodSummary,
  ProjectHours,
  TimeCardEntry,
} from './types.js';

export interface SummarizeOptions {
  employeeId: string;
  startDate: string;
  endDate: string;
  /** ISO weekdays (1 = Monday) that are expected to carry at least one entry. */
  workingDays: readonly number[];
  dailyHoursCap: number;
}

type SummaryEntry = Pick<TimeCardEntry, 'employeeId' | 'workDate' | 'hours' | 'status'>;

/**
 * Builds the admin period summary from a snapshot of entries.
 * Totals are accumulated in whole minutes so repeated quarter-hours do not drift.
 */
export function summarizeEntries(
  entries: readonly SummaryEntry[],
  options: SummarizeOptions
): PeriodSummary {
  const minutesByStatus: Record<EntryStatus, number> = {
    [EntryStatus.PENDING]: 0,
    [EntryStatus.APPROVED]: 0,
    [EntryStatus.REJECTED]: 0,
  };
  const approvedMinutesByDay = new Map<string, number>();
  const daysWithEntries = new Set<string>();

  for (const entry of entries) {
    if (entry.employeeId !== options.employeeId) continue;
    if (entry.workDate < options.startDate || entry.workDate > options.endDate) continue;

    const minutes = hoursToMinutes(entry.hours);
    minutesByStatus[entry.status] += minutes;
    daysWithEntries.add(entry.workDate);

    if (entry.status === EntryStatus.APPROVED) {
      approvedMinutesByDay.set(entry.workDate, (approvedMinutesByDay.get(entry.workDate) ?? 0) + minutes);
    }
  }

  const capMinutes = hoursToMinutes(options.dailyHoursCap);
  const anomalies: Anomaly[] = [];

  for (const day of eachIsoDay(options.startDate, options.endDate)) {
    if (options.workingDays.includes(isoWeekday(day)) && !daysWithEntries.has(day)) {
      anomalies.push({ kind: AnomalyKind.MISSING_DAY, date: day });
    }
    const approved = approvedMinutesByDay.get(day) ?? 0;
    if (approved > capMinutes) {
      anomalies.push({ kind: AnomalyKind.EXCESS_HOURS, date: day, hours: minutesToHours(approved) });
    }
  }

  return {
    employeeId: options.employeeId,
    startDate: options.startDate,
    endDate: options.endDate,
    approvedHours: minutesToHours(minutesByStatus[EntryStatus.APPROVED]),
    pendingHours: minutesToHours(minutesByStatus[EntryStatus.PENDING]),
    rejectedHours: minutesToHours(minutesByStatus[EntryStatus.REJECTED]),
    approvedDays: approvedMinutesByDay.size,
    anomalies,
  };
}

type TotalsEntry = Pick<TimeCardEntry, 'employeeId' | 'hours' | 'status' | 'project'>;

/**
 * Approved/pending hours per employee, highest approved first (ties by name).
 * Employees without entries are listed with zero totals.
 */
export function computeEmployeeTotals(
  employees: readonly Employee[],
  entries: readonly TotalsEntry[]
): EmployeeTotals[] {
  const approved = new Map<string, number>();
  const pending = new Map<string, number>();
  const projects = new Map<string, Set<string>>();

  for (const entry of entries) {
    const minutes = hoursToMinutes(entry.hours);
    if (entry.status === EntryStatus.APPROVED) {
      approved.set(entry.employeeId, (approved.get(entry.employeeId) ?? 0) + minutes);
      if (entry.project) {
        const set = projects.get(entry.employeeId) ?? new Set<string>();
        set.add(entry.project);
        projects.set(entry.employeeId, set);
      }
    } else if (entry.status === EntryStatus.PENDING) {
      pending.set(entry.employeeId, (pending.get(entry.employeeId) ?? 0) + minutes);
    }
  }

  return employees
    .map((employee) => ({
      employeeId: employee.id,
      name: employee.name,
      email: employee.email,
      approvedHours: minutesToHours(approved.get(employee.id) ?? 0),
      pendingHours: minutesToHours(pending.get(employee.id) ?? 0),
      projectCount: projects.get(employee.id)?.size ?? 0,
    }))
    .sort((a, b) => b.approvedHours - a.approvedHours || a.name.localeCompare(b.name));
}

type ProjectEntry = Pick<TimeCardEntry, 'hours' | 'status' | 'project'>;

/**
 * Approved hours per project, most hours first. Entries without a project are
 * grouped under `null` and listed after named projects with the same hours.
 */
export function summarizeProjectHours(entries: readonly ProjectEntry[]): ProjectHours[] {
  const byProject = new Map<string | null, { minutes: number; count: number }>();

  for (const entry of entries) {
    if (entry.status !== EntryStatus.APPROVED) continue;
    const totals = byProject.get(entry.project) ?? { minutes: 0, count: 0 };
    totals.minutes += hoursToMinutes(entry.hours);
    totals.count += 1;
    byProject.set(entry.project, totals);
  }

  return [...byProject.entries()]
    .map(([project, totals]) => ({
      project,
      approvedHours: minutesToHours(totals.minutes),
      approvedEntries: totals.count,
    }))
    .sort(
      (a, b) =>
        b.approvedHours - a.approvedHours ||
        (a.project === null ? 1 : b.project === null ? -1 : a.project.localeCompare(b.project))
    );
}
