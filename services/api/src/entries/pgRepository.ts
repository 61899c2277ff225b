import { z } from 'zod';
import {
  EmployeeRole,
  EntryStatus,
  ValidationReason,
  canTransition,
  type Employee,
  type EntryFilter,
  type Project,
  type TimeCardEntry,
  type ValidationResult,
} from '@timecard/shared';
import type { QueryResult, QueryResultRow } from 'pg';
import { isUniqueViolation, query, transaction } from '../db/index.js';
import { insertAuditLog } from '../audit/auditLog.js';
import { DatastoreError } from '../errors/DatastoreError.js';
import type {
  DecideOutcome,
  Decision,
  EmployeeDirectory,
  EntryRepository,
  InsertOutcome,
  NewEntry,
} from './repository.js';

type Queryable = {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<QueryResult<R>>;
};

const UuidSchema = z.string().uuid();

// DATE/TIME columns are rendered as text so they never pass through a JS Date (and its time zone).
const SELECT_ENTRY = `
  SELECT
    e.id,
    e.employee_id,
    to_char(e.work_date, 'YYYY-MM-DD') AS work_date,
    to_char(e.start_time, 'HH24:MI') AS start_time,
    to_char(e.end_time, 'HH24:MI') AS end_time,
    e.hours,
    p.name AS project,
    e.status,
    e.submitted_at,
    e.decided_at,
    e.decided_by,
    e.comment
  FROM time_card_entries e
  LEFT JOIN projects p ON p.id = e.project_id
`;

const EntryRowSchema = z.object({
  id: z.string(),
  employee_id: z.string(),
  work_date: z.string(),
  start_time: z.string().nullable(),
  end_time: z.string().nullable(),
  // NUMERIC arrives as a string from node-postgres.
  hours: z.union([z.string(), z.number()]).transform((value) => Number(value)),
  project: z.string().nullable(),
  status: z.nativeEnum(EntryStatus),
  submitted_at: z.date(),
  decided_at: z.date().nullable(),
  decided_by: z.string().nullable(),
  comment: z.string().nullable(),
});

const EmployeeRowSchema = z.object({
  id: z.string(),
  name: z.string(),
  email: z.string(),
  role: z.nativeEnum(EmployeeRole),
});

/**
 * Validate a driver row at the store boundary and convert it to the domain shape.
 */
export function mapEntryRow(row: unknown): TimeCardEntry {
  const r = EntryRowSchema.parse(row);
  return {
    id: r.id,
    employeeId: r.employee_id,
    workDate: r.work_date,
    startTime: r.start_time,
    endTime: r.end_time,
    hours: r.hours,
    project: r.project,
    status: r.status,
    submittedAt: r.submitted_at.toISOString(),
    decidedAt: r.decided_at ? r.decided_at.toISOString() : null,
    decidedBy: r.decided_by,
    comment: r.comment,
  };
}

const ProjectRowSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  created_at: z.date(),
});

const StatusRowSchema = z.object({ status: z.nativeEnum(EntryStatus) });

function mapEmployeeRow(row: unknown): Employee {
  return EmployeeRowSchema.parse(row);
}

async function guarded<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw new DatastoreError(operation, error);
  }
}

async function fetchEntry(db: Queryable, id: string): Promise<TimeCardEntry | null> {
  const result = await db.query(`${SELECT_ENTRY} WHERE e.id = $1`, [id]);
  const row = result.rows[0];
  return row ? mapEntryRow(row) : null;
}

async function upsertProject(db: Queryable, name: string): Promise<number> {
  const result = await db.query<{ id: number }>(
    `INSERT INTO projects (name) VALUES ($1)
     ON CONFLICT (name) DO UPDATE SET name = EXCLUDED.name
     RETURNING id`,
    [name]
  );
  const row = result.rows[0];
  if (!row) throw new Error(`Project upsert returned no row for ${name}`);
  return row.id;
}

export class PgEntryRepository implements EntryRepository {
  async insertChecked(
    entry: NewEntry,
    check: (sameDay: TimeCardEntry[]) => ValidationResult
  ): Promise<InsertOutcome> {
    try {
      return await transaction<InsertOutcome>(async (client) => {
        // Serializes submissions for one employee/day so check-then-insert cannot interleave.
        await client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [
          `${entry.employeeId}:${entry.workDate}`,
        ]);

        const sameDay = await client.query(
          `${SELECT_ENTRY} WHERE e.employee_id = $1 AND e.work_date = $2`,
          [entry.employeeId, entry.workDate]
        );
        const verdict = check(sameDay.rows.map(mapEntryRow));
        if (!verdict.ok) {
          return { ok: false, reason: verdict.reason };
        }

        const projectId = entry.project ? await upsertProject(client, entry.project) : null;
        const inserted = await client.query<{ id: string }>(
          `INSERT INTO time_card_entries
             (employee_id, work_date, start_time, end_time, hours, project_id, status, submitted_at)
           VALUES ($1, $2, $3, $4, $5, $6, 'PENDING', $7)
           RETURNING id`,
          [
            entry.employeeId,
            entry.workDate,
            entry.startTime,
            entry.endTime,
            entry.hours,
            projectId,
            entry.submittedAt,
          ]
        );
        const id = inserted.rows[0]?.id;
        if (!id) throw new Error('Entry insert returned no row');

        await insertAuditLog(client, {
          actorId: entry.employeeId,
          action: 'ENTRY_SUBMITTED',
          entityType: 'time_card_entry',
          entityId: id,
          newValue: {
            workDate: entry.workDate,
            startTime: entry.startTime,
            endTime: entry.endTime,
            hours: entry.hours,
            project: entry.project,
          },
        });

        const created = await fetchEntry(client, id);
        if (!created) throw new Error(`Inserted entry ${id} could not be read back`);
        return { ok: true, entry: created };
      });
    } catch (error) {
      // The unique slot index is the source of truth when the pre-check loses a race.
      if (isUniqueViolation(error)) {
        return { ok: false, reason: ValidationReason.DUPLICATE_SLOT };
      }
      throw new DatastoreError('insert time card entry', error);
    }
  }

  async findById(id: string): Promise<TimeCardEntry | null> {
    if (!UuidSchema.safeParse(id).success) return null;
    return guarded('find time card entry', async () => fetchEntry({ query }, id));
  }

  async listByEmployeeAndPeriod(
    employeeId: string,
    startDate: string,
    endDate: string
  ): Promise<TimeCardEntry[]> {
    if (!UuidSchema.safeParse(employeeId).success) return [];
    return guarded('list entries for employee', async () => {
      const result = await query(
        `${SELECT_ENTRY}
         WHERE e.employee_id = $1 AND e.work_date BETWEEN $2 AND $3
         ORDER BY e.work_date ASC, e.start_time ASC NULLS FIRST, e.submitted_at ASC`,
        [employeeId, startDate, endDate]
      );
      return result.rows.map(mapEntryRow);
    });
  }

  async list(filter: EntryFilter): Promise<TimeCardEntry[]> {
    const params: unknown[] = [];
    let sql = `${SELECT_ENTRY} WHERE 1=1`;

    if (filter.status) {
      params.push(filter.status);
      sql += ` AND e.status = $${params.length}`;
    }
    if (filter.employeeId) {
      params.push(filter.employeeId);
      sql += ` AND e.employee_id = $${params.length}`;
    }
    if (filter.project) {
      params.push(filter.project);
      sql += ` AND p.name = $${params.length}`;
    }
    if (filter.from) {
      params.push(filter.from);
      sql += ` AND e.work_date >= $${params.length}`;
    }
    if (filter.to) {
      params.push(filter.to);
      sql += ` AND e.work_date <= $${params.length}`;
    }
    sql += ` ORDER BY e.work_date DESC, e.start_time ASC NULLS FIRST, e.submitted_at ASC`;

    return guarded('list time card entries', async () => {
      const result = await query(sql, params);
      return result.rows.map(mapEntryRow);
    });
  }

  async decidePending(id: string, decision: Decision): Promise<DecideOutcome> {
    if (!UuidSchema.safeParse(id).success) return { kind: 'not_found' };

    return guarded('decide time card entry', () =>
      transaction<DecideOutcome>(async (client) => {
        // A concurrent decision waits on the row lock, then reads the committed status.
        const locked = await client.query(
          'SELECT status FROM time_card_entries WHERE id = $1 FOR UPDATE',
          [id]
        );
        const row = locked.rows[0];
        if (!row) return { kind: 'not_found' };
        const { status: current } = StatusRowSchema.parse(row);

        if (!canTransition(current, decision.status)) {
          const entry = await fetchEntry(client, id);
          if (!entry) return { kind: 'not_found' };
          return { kind: 'invalid_transition', entry };
        }

        await client.query(
          `UPDATE time_card_entries
           SET status = $2, decided_at = $3, decided_by = $4, comment = $5
           WHERE id = $1`,
          [id, decision.status, decision.decidedAt, decision.decidedBy, decision.comment]
        );

        await insertAuditLog(client, {
          actorId: decision.decidedBy,
          action: decision.status === EntryStatus.APPROVED ? 'ENTRY_APPROVED' : 'ENTRY_REJECTED',
          entityType: 'time_card_entry',
          entityId: id,
          oldValue: { status: current },
          newValue: { status: decision.status, comment: decision.comment },
        });

        const entry = await fetchEntry(client, id);
        if (!entry) throw new Error(`Decided entry ${id} could not be read back`);
        return { kind: 'updated', entry };
      })
    );
  }

  async listProjects(): Promise<Project[]> {
    return guarded('list projects', async () => {
      const result = await query('SELECT id, name, created_at FROM projects ORDER BY name ASC');
      return result.rows.map((row) => {
        const r = ProjectRowSchema.parse(row);
        return { id: r.id, name: r.name, createdAt: r.created_at.toISOString() };
      });
    });
  }
}

export class PgEmployeeDirectory implements EmployeeDirectory {
  async findById(id: string): Promise<Employee | null> {
    if (!UuidSchema.safeParse(id).success) return null;
    return guarded('find employee', async () => {
      const result = await query(
        `SELECT id, name, email, role FROM employees WHERE id = $1 AND active = true`,
        [id]
      );
      const row = result.rows[0];
      return row ? mapEmployeeRow(row) : null;
    });
  }

  async list(): Promise<Employee[]> {
    return guarded('list employees', async () => {
      const result = await query(
        `SELECT id, name, email, role FROM employees WHERE active = true ORDER BY name ASC`
      );
      return result.rows.map(mapEmployeeRow);
    });
  }

  async findBySessionToken(token: string, now: Date): Promise<Employee | null> {
    return guarded('resolve session', async () => {
      const result = await query(
        `SELECT e.id, e.name, e.email, e.role
         FROM employee_sessions s
         JOIN employees e ON e.id = s.employee_id
         WHERE s.session_token = $1
           AND s.revoked_at IS NULL
           AND s.expires_at > $2
           AND e.active = true`,
        [token, now]
      );
      const row = result.rows[0];
      return row ? mapEmployeeRow(row) : null;
    });
  }
}
