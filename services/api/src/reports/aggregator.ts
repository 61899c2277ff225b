import {
  EntryStatus,
  computeEmployeeTotals,
  summarizeEntries,
  summarizeProjectHours,
  type EmployeeTotals,
  type EntryFilter,
  type PeriodSummary,
  type ProjectHours,
} from '@timecard/shared';
import type { WorkflowConfig } from '../config/index.js';
import type { EntryStore } from '../entries/entryStore.js';
import type { EmployeeDirectory } from '../entries/repository.js';
import { toApprovedCsv } from './csv.js';

export interface AggregatorOptions {
  store: EntryStore;
  employees: EmployeeDirectory;
  config: Pick<WorkflowConfig, 'workingDays' | 'dailyHoursCap'>;
}

/**
 * Read-only views over the Entry Store for the admin surface.
 */
export class Aggregator {
  constructor(private readonly options: AggregatorOptions) {}

  async summarize(employeeId: string, startDate: string, endDate: string): Promise<PeriodSummary> {
    const entries = await this.options.store.listByEmployeeAndPeriod(employeeId, startDate, endDate);
    return summarizeEntries(entries, {
      employeeId,
      startDate,
      endDate,
      workingDays: this.options.config.workingDays,
      dailyHoursCap: this.options.config.dailyHoursCap,
    });
  }

  /**
   * Approved hours per project for one employee over a period.
   */
  async projectHours(
    employeeId: string,
    startDate: string,
    endDate: string
  ): Promise<ProjectHours[]> {
    const { store } = this.options;
    const entries = await store.listByEmployeeAndPeriod(employeeId, startDate, endDate);
    return summarizeProjectHours(entries);
  }

  async employeeTotals(startDate?: string, endDate?: string): Promise<EmployeeTotals[]> {
    const [employees, entries] = await Promise.all([
      this.options.employees.list(),
      this.options.store.listEntries({ from: startDate, to: endDate }),
    ]);
    return computeEmployeeTotals(employees, entries);
  }

  async exportApprovedCsv(filter: Omit<EntryFilter, 'status'>): Promise<string> {
    const [employees, entries] = await Promise.all([
      this.options.employees.list(),
      this.options.store.listEntries({ ...filter, status: EntryStatus.APPROVED }),
    ]);
    return toApprovedCsv(entries, new Map(employees.map((e) => [e.id, e])));
  }
}
