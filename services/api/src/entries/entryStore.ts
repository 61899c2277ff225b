import {
  candidateHours,
  toIsoDay,
  validateEntry,
  type CreateEntryInput,
  type DecisionStatus,
  type EntryCandidate,
  type EntryFilter,
  type Project,
  type TimeCardEntry,
} from '@timecard/shared';
import {
  err,
  invalidTransition,
  notFound,
  ok,
  validationFailed,
  type Result,
} from '../errors/workflowErrors.js';
import type { EntryRepository } from './repository.js';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export interface EntryStoreOptions {
  repository: EntryRepository;
  futureSubmissionGraceDays: number;
  clock?: Clock;
}

/**
 * The only writer of time-card entries. Validation runs inside the repository's
 * per-(employee, date) critical section so the check sees every committed entry.
 */
export class EntryStore {
  private readonly repository: EntryRepository;
  private readonly futureSubmissionGraceDays: number;
  private readonly clock: Clock;

  constructor(options: EntryStoreOptions) {
    this.repository = options.repository;
    this.futureSubmissionGraceDays = options.futureSubmissionGraceDays;
    this.clock = options.clock ?? systemClock;
  }

  async create(employeeId: string, input: CreateEntryInput): Promise<Result<TimeCardEntry>> {
    const now = this.clock();
    const rules = {
      today: toIsoDay(now),
      futureSubmissionGraceDays: this.futureSubmissionGraceDays,
    };
    const candidate: EntryCandidate = {
      employeeId,
      workDate: input.workDate,
      startTime: input.startTime ?? null,
      endTime: input.endTime ?? null,
      hours: input.hours ?? null,
      project: input.project ?? null,
    };

    // Date and shape rules need no stored data; fail them before taking the lock.
    const shape = validateEntry(candidate, [], rules);
    if (!shape.ok) return err(validationFailed(shape.reason));

    const outcome = await this.repository.insertChecked(
      {
        employeeId,
        workDate: candidate.workDate,
        startTime: candidate.startTime,
        endTime: candidate.endTime,
        hours: candidateHours(candidate),
        project: candidate.project,
        submittedAt: now,
      },
      (sameDay) => validateEntry(candidate, sameDay, rules)
    );

    return outcome.ok ? ok(outcome.entry) : err(validationFailed(outcome.reason));
  }

  async getById(id: string): Promise<Result<TimeCardEntry>> {
    const entry = await this.repository.findById(id);
    return entry ? ok(entry) : err(notFound(id));
  }

  async listByEmployeeAndPeriod(
    employeeId: string,
    startDate: string,
    endDate: string
  ): Promise<TimeCardEntry[]> {
    if (endDate < startDate) return [];
    return this.repository.listByEmployeeAndPeriod(employeeId, startDate, endDate);
  }

  async listEntries(filter: EntryFilter): Promise<TimeCardEntry[]> {
    return this.repository.list(filter);
  }

  async listProjects(): Promise<Project[]> {
    return this.repository.listProjects();
  }

  /**
   * Move an entry to a decision state. The first decision wins; later ones get
   * `InvalidTransition` carrying the status they lost to.
   */
  async updateStatus(
    id: string,
    status: DecisionStatus,
    decidedBy: string,
    comment: string | null
  ): Promise<Result<TimeCardEntry>> {
    const outcome = await this.repository.decidePending(id, {
      status,
      decidedBy,
      decidedAt: this.clock(),
      comment,
    });

    switch (outcome.kind) {
      case 'updated':
        return ok(outcome.entry);
      case 'not_found':
        return err(notFound(id));
      case 'invalid_transition':
        return err(invalidTransition(id, outcome.entry.status));
    }
  }
}
