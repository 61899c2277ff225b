import Papa from 'papaparse';
import type { Employee, TimeCardEntry } from '@timecard/shared';

export const APPROVED_CSV_COLUMNS = [
  'employee',
  'email',
  'project',
  'work_date',
  'start_time',
  'end_time',
  'hours',
  'decided_by',
  'decided_at',
] as const;

type ApprovedCsvRow = Record<(typeof APPROVED_CSV_COLUMNS)[number], string>;

/**
 * Render entries as CSV, one row per entry. Unknown employee ids fall back to the raw id.
 * Cells that a spreadsheet would read as a formula are exported as text.
 */
export function toApprovedCsv(
  entries: readonly TimeCardEntry[],
  employees: ReadonlyMap<string, Employee>
): string {
  const rows: ApprovedCsvRow[] = entries.map((entry) => {
    const employee = employees.get(entry.employeeId);
    const decider = entry.decidedBy ? employees.get(entry.decidedBy) : undefined;
    return {
      employee: employee?.name ?? entry.employeeId,
      email: employee?.email ?? '',
      project: entry.project ?? '',
      work_date: entry.workDate,
      start_time: entry.startTime ?? '',
      end_time: entry.endTime ?? '',
      hours: entry.hours.toFixed(2),
      decided_by: decider?.name ?? entry.decidedBy ?? '',
      decided_at: entry.decidedAt ?? '',
    };
  });

  return Papa.unparse(
    {
      fields: [...APPROVED_CSV_COLUMNS],
      data: rows.map((row) => APPROVED_CSV_COLUMNS.map((c) => row[c])),
    },
    // Project names are free text; cells starting with = + - @ are prefixed with '.
    { newline: '\n', escapeFormulae: true }
  );
}
