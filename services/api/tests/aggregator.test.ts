import { beforeEach, describe, expect, it } from 'vitest';
import { AnomalyKind, EntryStatus, type CreateEntryInput, type Employee } from '@timecard/shared';
import { DEFAULT_WORKFLOW_CONFIG } from '../src/config/index.js';
import { EntryStore } from '../src/entries/entryStore.js';
import { createMemoryRepositories, type MemoryRepositories } from '../src/entries/memoryRepository.js';
import { Aggregator } from '../src/reports/aggregator.js';
import { fixedClock, seedPeople, type TestPeople } from './helpers.js';

describe('Aggregator', () => {
  let memory: MemoryRepositories;
  let store: EntryStore;
  let aggregator: Aggregator;
  let people: TestPeople;

  async function submit(employee: Employee, input: CreateEntryInput): Promise<string> {
    const created = await store.create(employee.id, input);
    if (!created.ok) throw new Error(`setup failed: ${JSON.stringify(created.error)}`);
    return created.value.id;
  }

  async function approve(id: string): Promise<void> {
    const decided = await store.updateStatus(id, EntryStatus.APPROVED, people.admin.id, null);
    if (!decided.ok) throw new Error('setup failed');
  }

  beforeEach(() => {
    memory = createMemoryRepositories();
    people = seedPeople(memory.db);
    store = new EntryStore({ repository: memory.entries, futureSubmissionGraceDays: 0, clock: fixedClock });
    aggregator = new Aggregator({ store, employees: memory.employees, config: DEFAULT_WORKFLOW_CONFIG });
  });

  describe('summarize', () => {
    it('flags a working day with no entries after an approved day', async () => {
      await approve(
        await submit(people.employee, { workDate: '2026-01-13', startTime: '09:00', endTime: '17:00' })
      );

      const summary = await aggregator.summarize(people.employee.id, '2026-01-13', '2026-01-14');

      expect(summary).toEqual({
        employeeId: people.employee.id,
        startDate: '2026-01-13',
        endDate: '2026-01-14',
        approvedHours: 8,
        pendingHours: 0,
        rejectedHours: 0,
        approvedDays: 1,
        anomalies: [{ kind: AnomalyKind.MISSING_DAY, date: '2026-01-14' }],
      });
    });

    it('splits hours by status and ignores other employees', async () => {
      await approve(await submit(people.employee, { workDate: '2026-01-12', hours: 7.5 }));
      await submit(people.employee, { workDate: '2026-01-13', hours: 6 });
      const rejected = await submit(people.employee, { workDate: '2026-01-14', hours: 2.25 });
      await store.updateStatus(rejected, EntryStatus.REJECTED, people.admin.id, 'Not a shift day');
      await approve(await submit(people.other, { workDate: '2026-01-12', hours: 8 }));

      const summary = await aggregator.summarize(people.employee.id, '2026-01-12', '2026-01-14');

      expect(summary.approvedHours).toBe(7.5);
      expect(summary.pendingHours).toBe(6);
      expect(summary.rejectedHours).toBe(2.25);
      expect(summary.approvedDays).toBe(1);
      expect(summary.anomalies).toEqual([]);
    });

    it('flags approved hours above the daily cap', async () => {
      const strict = new Aggregator({
        store,
        employees: memory.employees,
        config: { workingDays: [1, 2, 3, 4, 5], dailyHoursCap: 6 },
      });
      await approve(
        await submit(people.employee, { workDate: '2026-01-13', startTime: '08:00', endTime: '16:30' })
      );

      const summary = await strict.summarize(people.employee.id, '2026-01-13', '2026-01-13');

      expect(summary.anomalies).toEqual([
        { kind: AnomalyKind.EXCESS_HOURS, date: '2026-01-13', hours: 8.5 },
      ]);
    });
  });

  describe('employeeTotals', () => {
    it('ranks every employee by approved hours', async () => {
      await approve(
        await submit(people.employee, { workDate: '2026-01-13', hours: 8, project: 'Site A' })
      );
      await submit(people.employee, { workDate: '2026-01-14', hours: 3 });
      await approve(await submit(people.other, { workDate: '2026-01-12', hours: 4 }));

      const totals = await aggregator.employeeTotals();

      expect(totals).toEqual([
        {
          employeeId: people.employee.id,
          name: 'Jordan Field',
          email: 'jordan@example.com',
          approvedHours: 8,
          pendingHours: 3,
          projectCount: 1,
        },
        {
          employeeId: people.other.id,
          name: 'Riley Shop',
          email: 'riley@example.com',
          approvedHours: 4,
          pendingHours: 0,
          projectCount: 0,
        },
        {
          employeeId: people.admin.id,
          name: 'Avery Admin',
          email: 'avery@example.com',
          approvedHours: 0,
          pendingHours: 0,
          projectCount: 0,
        },
      ]);
    });

    it('only counts entries inside the requested range', async () => {
      await approve(await submit(people.employee, { workDate: '2026-01-12', hours: 8 }));
      await approve(await submit(people.employee, { workDate: '2026-01-13', hours: 5 }));

      const totals = await aggregator.employeeTotals('2026-01-13', '2026-01-13');

      expect(totals[0]).toMatchObject({ employeeId: people.employee.id, approvedHours: 5 });
    });
  });

  describe('projectHours', () => {
    it('breaks approved hours down by project within the period', async () => {
      const logged = (workDate: string, hours: number, project?: string) =>
        submit(people.employee, { workDate, hours, project });
      await approve(await logged('2026-01-12', 3, 'Library'));
      await approve(await logged('2026-01-13', 4, 'Food bank'));
      await approve(await logged('2026-01-13', 1.5));
      await logged('2026-01-14', 6, 'Library');
      await approve(await logged('2026-01-05', 8, 'Library'));

      const projects = await aggregator.projectHours(
        people.employee.id,
        '2026-01-12',
        '2026-01-14'
      );

      expect(projects).toEqual([
        { project: 'Food bank', approvedHours: 4, approvedEntries: 1 },
        { project: 'Library', approvedHours: 3, approvedEntries: 1 },
        { project: null, approvedHours: 1.5, approvedEntries: 1 },
      ]);
    });
  });

  describe('exportApprovedCsv', () => {
    it('writes approved entries only, newest first', async () => {
      await approve(
        await submit(people.employee, {
          workDate: '2026-01-13',
          startTime: '09:00',
          endTime: '17:00',
          project: 'Site A, North',
        })
      );
      await submit(people.employee, { workDate: '2026-01-14', hours: 8 });
      await approve(await submit(people.other, { workDate: '2026-01-12', hours: 4 }));
      const decidedAt = fixedClock().toISOString();

      const csv = await aggregator.exportApprovedCsv({});

      expect(csv.split('\n')).toEqual([
        'employee,email,project,work_date,start_time,end_time,hours,decided_by,decided_at',
        `Jordan Field,jordan@example.com,"Site A, North",2026-01-13,09:00,17:00,8.00,Avery Admin,${decidedAt}`,
        `Riley Shop,riley@example.com,,2026-01-12,,,4.00,Avery Admin,${decidedAt}`,
      ]);
    });

    it('applies the employee filter', async () => {
      await approve(await submit(people.employee, { workDate: '2026-01-13', hours: 8 }));
      await approve(await submit(people.other, { workDate: '2026-01-12', hours: 4 }));

      const csv = await aggregator.exportApprovedCsv({ employeeId: people.other.id });

      expect(csv.split('\n')).toHaveLength(2);
      expect(csv.split('\n')[1]).toMatch(/^Riley Shop,/);
    });
  });
});
