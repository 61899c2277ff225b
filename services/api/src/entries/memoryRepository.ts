import { randomUUID } from 'node:crypto';
import {
  EntryStatus,
  ValidationReason,
  canTransition,
  type Employee,
  type EntryFilter,
  type Project,
  type TimeCardEntry,
  type ValidationResult,
} from '@timecard/shared';
import type { AuditLogAction } from '../audit/auditLog.js';
import type {
  DecideOutcome,
  Decision,
  EmployeeDirectory,
  EntryRepository,
  InsertOutcome,
  NewEntry,
} from './repository.js';

export type MemoryEmployee = Employee & { active: boolean };

export type MemorySession = {
  employeeId: string;
  expiresAt: Date;
  revokedAt: Date | null;
};

export type MemoryAuditRow = {
  actorId: string | null;
  action: AuditLogAction;
  entityId: string;
  oldValue: unknown;
  newValue: unknown;
  createdAt: Date;
};

/**
 * Backing tables for the in-memory repositories. One instance is shared by the
 * entry repository and the employee directory, like one database.
 */
export class MemoryDatabase {
  readonly employees = new Map<string, MemoryEmployee>();
  readonly sessions = new Map<string, MemorySession>();
  readonly entries = new Map<string, TimeCardEntry>();
  readonly projects = new Map<string, Project>();
  readonly auditLog: MemoryAuditRow[] = [];

  addEmployee(employee: Omit<Employee, 'id'> & { id?: string; active?: boolean }): Employee {
    const row: MemoryEmployee = {
      id: employee.id ?? randomUUID(),
      name: employee.name,
      email: employee.email,
      role: employee.role,
      active: employee.active ?? true,
    };
    this.employees.set(row.id, row);
    return toEmployee(row);
  }

  addSession(token: string, employeeId: string, expiresAt: Date): void {
    this.sessions.set(token, { employeeId, expiresAt, revokedAt: null });
  }

  /** Look a project up by name, creating it on first use. */
  ensureProject(name: string, now: Date): Project {
    const found = this.projects.get(name);
    if (found) return found;
    const project: Project = { id: this.projects.size + 1, name, createdAt: now.toISOString() };
    this.projects.set(name, project);
    return project;
  }
}

function toEmployee(row: MemoryEmployee): Employee {
  return { id: row.id, name: row.name, email: row.email, role: row.role };
}

// Mirrors the two partial unique indexes: interval entries by start time, duration
// entries by project.
type SlotFields = Pick<TimeCardEntry, 'employeeId' | 'workDate' | 'startTime' | 'project'>;

function slotKey(entry: SlotFields): string {
  const slot = entry.startTime ?? `duration:${entry.project ?? ''}`;
  return `${entry.employeeId}|${entry.workDate}|${slot}`;
}

// Null start times (duration entries) sort first, matching `NULLS FIRST` in SQL.
function compareStartTime(a: TimeCardEntry, b: TimeCardEntry): number {
  if (a.startTime === b.startTime) return 0;
  if (a.startTime === null) return -1;
  if (b.startTime === null) return 1;
  return a.startTime.localeCompare(b.startTime);
}

function compareEntries(a: TimeCardEntry, b: TimeCardEntry): number {
  return (
    a.workDate.localeCompare(b.workDate) ||
    compareStartTime(a, b) ||
    a.submittedAt.localeCompare(b.submittedAt)
  );
}

/**
 * Serializes async work per key with a promise chain.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}

export class MemoryEntryRepository implements EntryRepository {
  private readonly locks = new KeyedMutex();

  constructor(private readonly db: MemoryDatabase) {}

  async insertChecked(
    entry: NewEntry,
    check: (sameDay: TimeCardEntry[]) => ValidationResult
  ): Promise<InsertOutcome> {
    return this.locks.run<InsertOutcome>(`${entry.employeeId}:${entry.workDate}`, () => {
      const sameDay = [...this.db.entries.values()]
        .filter((e) => e.employeeId === entry.employeeId && e.workDate === entry.workDate)
        .sort(compareEntries);

      const verdict = check(sameDay.map((e) => ({ ...e })));
      if (!verdict.ok) {
        return { ok: false, reason: verdict.reason };
      }

      // Stand-in for the unique slot index.
      const key = slotKey(entry);
      if (sameDay.some((e) => slotKey(e) === key)) {
        return { ok: false, reason: ValidationReason.DUPLICATE_SLOT };
      }

      if (entry.project) {
        this.db.ensureProject(entry.project, entry.submittedAt);
      }

      const created: TimeCardEntry = {
        id: randomUUID(),
        employeeId: entry.employeeId,
        workDate: entry.workDate,
        startTime: entry.startTime,
        endTime: entry.endTime,
        hours: entry.hours,
        project: entry.project,
        status: EntryStatus.PENDING,
        submittedAt: entry.submittedAt.toISOString(),
        decidedAt: null,
        decidedBy: null,
        comment: null,
      };
      this.db.entries.set(created.id, created);
      this.audit(entry.employeeId, 'ENTRY_SUBMITTED', created.id, null, {
        workDate: entry.workDate,
        startTime: entry.startTime,
        endTime: entry.endTime,
        hours: entry.hours,
        project: entry.project,
      });

      return { ok: true, entry: { ...created } };
    });
  }

  async findById(id: string): Promise<TimeCardEntry | null> {
    const entry = this.db.entries.get(id);
    return entry ? { ...entry } : null;
  }

  async listByEmployeeAndPeriod(
    employeeId: string,
    startDate: string,
    endDate: string
  ): Promise<TimeCardEntry[]> {
    return [...this.db.entries.values()]
      .filter(
        (e) => e.employeeId === employeeId && e.workDate >= startDate && e.workDate <= endDate
      )
      .sort(compareEntries)
      .map((e) => ({ ...e }));
  }

  async list(filter: EntryFilter): Promise<TimeCardEntry[]> {
    return [...this.db.entries.values()]
      .filter((e) => !filter.status || e.status === filter.status)
      .filter((e) => !filter.employeeId || e.employeeId === filter.employeeId)
      .filter((e) => !filter.project || e.project === filter.project)
      .filter((e) => !filter.from || e.workDate >= filter.from)
      .filter((e) => !filter.to || e.workDate <= filter.to)
      .sort(
        (a, b) =>
          b.workDate.localeCompare(a.workDate) ||
          compareStartTime(a, b) ||
          a.submittedAt.localeCompare(b.submittedAt)
      )
      .map((e) => ({ ...e }));
  }

  /**
   * Check-and-set with no await in between, so concurrent callers cannot both see PENDING.
   */
  async decidePending(id: string, decision: Decision): Promise<DecideOutcome> {
    const entry = this.db.entries.get(id);
    if (!entry) return { kind: 'not_found' };
    if (!canTransition(entry.status, decision.status)) {
      return { kind: 'invalid_transition', entry: { ...entry } };
    }

    const updated: TimeCardEntry = {
      ...entry,
      status: decision.status,
      decidedAt: decision.decidedAt.toISOString(),
      decidedBy: decision.decidedBy,
      comment: decision.comment,
    };
    this.db.entries.set(id, updated);
    this.audit(
      decision.decidedBy,
      decision.status === EntryStatus.APPROVED ? 'ENTRY_APPROVED' : 'ENTRY_REJECTED',
      id,
      { status: entry.status },
      { status: decision.status, comment: decision.comment }
    );

    return { kind: 'updated', entry: { ...updated } };
  }

  async listProjects(): Promise<Project[]> {
    return [...this.db.projects.values()]
      .sort((a, b) => a.name.localeCompare(b.name))
      .map((project) => ({ ...project }));
  }

  private audit(
    actorId: string | null,
    action: AuditLogAction,
    entityId: string,
    oldValue: unknown,
    newValue: unknown
  ): void {
    this.db.auditLog.push({ actorId, action, entityId, oldValue, newValue, createdAt: new Date() });
  }
}

export class MemoryEmployeeDirectory implements EmployeeDirectory {
  constructor(private readonly db: MemoryDatabase) {}

  async findById(id: string): Promise<Employee | null> {
    const row = this.db.employees.get(id);
    return row?.active ? toEmployee(row) : null;
  }

  async list(): Promise<Employee[]> {
    return [...this.db.employees.values()]
      .filter((row) => row.active)
      .sort((a, b) => a.name.localeCompare(b.name))
      .map(toEmployee);
  }

  async findBySessionToken(token: string, now: Date): Promise<Employee | null> {
    const session = this.db.sessions.get(token);
    if (!session || session.revokedAt !== null || session.expiresAt <= now) return null;
    return this.findById(session.employeeId);
  }
}

export type MemoryRepositories = {
  db: MemoryDatabase;
  entries: MemoryEntryRepository;
  employees: MemoryEmployeeDirectory;
};

export function createMemoryRepositories(db: MemoryDatabase = new MemoryDatabase()): MemoryRepositories {
  return {
    db,
    entries: new MemoryEntryRepository(db),
    employees: new MemoryEmployeeDirectory(db),
  };
}
