import { beforeEach, describe, expect, it } from 'vitest';
import { EntryStatus, ValidationReason, type CreateEntryInput, type Employee } from '@timecard/shared';
import { EntryStore } from '../src/entries/entryStore.js';
import { createMemoryRepositories, type MemoryDatabase } from '../src/entries/memoryRepository.js';
import { fixedClock, seedPeople } from './helpers.js';

describe('EntryStore', () => {
  let db: MemoryDatabase;
  let store: EntryStore;
  let employee: Employee;
  let admin: Employee;

  const interval = (overrides: Partial<CreateEntryInput> = {}): CreateEntryInput => ({
    workDate: '2026-01-13',
    startTime: '09:00',
    endTime: '17:00',
    ...overrides,
  });

  beforeEach(() => {
    const memory = createMemoryRepositories();
    db = memory.db;
    ({ employee, admin } = seedPeople(db));
    store = new EntryStore({
      repository: memory.entries,
      futureSubmissionGraceDays: 0,
      clock: fixedClock,
    });
  });

  describe('create', () => {
    it('stores an interval entry as PENDING with derived hours', async () => {
      const result = await store.create(employee.id, interval({ project: 'Site A' }));

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value).toMatchObject({
        employeeId: employee.id,
        workDate: '2026-01-13',
        startTime: '09:00',
        endTime: '17:00',
        hours: 8,
        project: 'Site A',
        status: EntryStatus.PENDING,
        submittedAt: fixedClock().toISOString(),
        decidedAt: null,
        decidedBy: null,
        comment: null,
      });
    });

    it('stores a duration entry with no clock times', async () => {
      const result = await store.create(employee.id, { workDate: '2026-01-13', hours: 7.5 });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.startTime).toBeNull();
      expect(result.value.endTime).toBeNull();
      expect(result.value.hours).toBe(7.5);
      expect(result.value.project).toBeNull();
    });

    it('rejects a second entry for the same slot', async () => {
      await store.create(employee.id, interval());
      const result = await store.create(employee.id, interval({ endTime: '10:00' }));

      expect(result).toEqual({
        ok: false,
        error: { kind: 'ValidationFailed', reason: ValidationReason.DUPLICATE_SLOT },
      });
    });

    it('rejects an interval overlapping an existing one', async () => {
      await store.create(employee.id, interval());
      const result = await store.create(employee.id, interval({ startTime: '12:00', endTime: '13:00' }));

      expect(result).toEqual({
        ok: false,
        error: { kind: 'ValidationFailed', reason: ValidationReason.OVERLAP },
      });
    });

    it('accepts an interval that starts when another ends', async () => {
      await store.create(employee.id, interval());
      const result = await store.create(employee.id, interval({ startTime: '17:00', endTime: '18:30' }));

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.hours).toBe(1.5);
    });

    it('does not compare entries of different employees', async () => {
      const other = db.addEmployee({ name: 'Sam Other', email: 'sam@example.com', role: employee.role });
      await store.create(employee.id, interval());
      const result = await store.create(other.id, interval());

      expect(result.ok).toBe(true);
    });

    it('rejects a date after today', async () => {
      const result = await store.create(employee.id, interval({ workDate: '2026-01-15' }));

      expect(result).toEqual({
        ok: false,
        error: { kind: 'ValidationFailed', reason: ValidationReason.FUTURE_DATE },
      });
    });

    it('accepts tomorrow inside a one-day grace window', async () => {
      const lenient = new EntryStore({
        repository: createMemoryRepositories(db).entries,
        futureSubmissionGraceDays: 1,
        clock: fixedClock,
      });

      const result = await lenient.create(employee.id, interval({ workDate: '2026-01-15' }));
      expect(result.ok).toBe(true);
    });

    it.each([
      ['end before start', { startTime: '10:00', endTime: '09:00' }],
      ['zero-length interval', { startTime: '09:00', endTime: '09:00' }],
      ['start without end', { startTime: '09:00', endTime: undefined }],
      ['zero hours', { startTime: undefined, endTime: undefined, hours: 0 }],
      ['more than 24 hours', { startTime: undefined, endTime: undefined, hours: 24.5 }],
      [
        'hours that round to zero minutes',
        { startTime: undefined, endTime: undefined, hours: 0.001 },
      ],
      ['neither interval nor hours', { startTime: undefined, endTime: undefined }],
    ])('rejects %s as InvalidInterval', async (_label, overrides) => {
      const result = await store.create(employee.id, interval(overrides));

      expect(result).toEqual({
        ok: false,
        error: { kind: 'ValidationFailed', reason: ValidationReason.INVALID_INTERVAL },
      });
      expect(db.entries.size).toBe(0);
    });

    it('allows one duration entry per employee per day', async () => {
      await store.create(employee.id, { workDate: '2026-01-13', hours: 4 });
      const result = await store.create(employee.id, { workDate: '2026-01-13', hours: 2 });

      expect(result).toEqual({
        ok: false,
        error: { kind: 'ValidationFailed', reason: ValidationReason.DUPLICATE_SLOT },
      });
    });

    it('keys duration entries by project', async () => {
      const duration = (hours: number, project: string): CreateEntryInput => ({
        workDate: '2026-01-13',
        hours,
        project,
      });
      const first = await store.create(employee.id, duration(4, 'Food bank'));
      const second = await store.create(employee.id, duration(2, 'Library'));
      const repeat = await store.create(employee.id, duration(1, 'Library'));

      expect(first.ok).toBe(true);
      expect(second.ok).toBe(true);
      expect(repeat).toEqual({
        ok: false,
        error: { kind: 'ValidationFailed', reason: ValidationReason.DUPLICATE_SLOT },
      });
    });

    it('keeps the slot of a rejected entry occupied', async () => {
      const first = await store.create(employee.id, interval());
      if (!first.ok) throw new Error('setup failed');
      await store.updateStatus(first.value.id, EntryStatus.REJECTED, admin.id, 'Wrong day');

      const again = await store.create(employee.id, interval());
      expect(again).toEqual({
        ok: false,
        error: { kind: 'ValidationFailed', reason: ValidationReason.DUPLICATE_SLOT },
      });
    });

    it('writes an audit row for each submission', async () => {
      const result = await store.create(employee.id, interval());
      if (!result.ok) throw new Error('setup failed');

      expect(db.auditLog).toHaveLength(1);
      expect(db.auditLog[0]).toMatchObject({
        actorId: employee.id,
        action: 'ENTRY_SUBMITTED',
        entityId: result.value.id,
      });
    });
  });

  describe('getById', () => {
    it('returns a stored entry', async () => {
      const created = await store.create(employee.id, interval());
      if (!created.ok) throw new Error('setup failed');

      expect(await store.getById(created.value.id)).toEqual({ ok: true, value: created.value });
    });

    it('reports NotFound for an unknown id', async () => {
      expect(await store.getById('missing')).toEqual({
        ok: false,
        error: { kind: 'NotFound', entryId: 'missing' },
      });
    });
  });

  describe('listByEmployeeAndPeriod', () => {
    it('orders by date, then start time with duration entries first', async () => {
      await store.create(employee.id, { workDate: '2026-01-13', startTime: '09:00', endTime: '10:00' });
      await store.create(employee.id, { workDate: '2026-01-12', startTime: '13:00', endTime: '14:00' });
      await store.create(employee.id, { workDate: '2026-01-12', hours: 2 });
      await store.create(employee.id, { workDate: '2026-01-12', startTime: '08:00', endTime: '09:00' });

      const entries = await store.listByEmployeeAndPeriod(employee.id, '2026-01-12', '2026-01-13');
      expect(entries.map((e) => [e.workDate, e.startTime])).toEqual([
        ['2026-01-12', null],
        ['2026-01-12', '08:00'],
        ['2026-01-12', '13:00'],
        ['2026-01-13', '09:00'],
      ]);
    });

    it('limits results to the employee and the inclusive range', async () => {
      const other = db.addEmployee({ name: 'Sam Other', email: 'sam@example.com', role: employee.role });
      await store.create(employee.id, { workDate: '2026-01-09', hours: 8 });
      await store.create(employee.id, { workDate: '2026-01-12', hours: 8 });
      await store.create(other.id, { workDate: '2026-01-12', hours: 8 });

      const entries = await store.listByEmployeeAndPeriod(employee.id, '2026-01-12', '2026-01-14');
      expect(entries.map((e) => [e.employeeId, e.workDate])).toEqual([[employee.id, '2026-01-12']]);
    });

    it('returns an empty list when the range is reversed', async () => {
      await store.create(employee.id, { workDate: '2026-01-12', hours: 8 });

      expect(await store.listByEmployeeAndPeriod(employee.id, '2026-01-14', '2026-01-12')).toEqual([]);
    });
  });

  describe('listEntries', () => {
    it('filters by status and project, newest date first', async () => {
      const a = await store.create(employee.id, { workDate: '2026-01-12', hours: 8, project: 'Site A' });
      await store.create(employee.id, { workDate: '2026-01-13', hours: 8, project: 'Site B' });
      await store.create(employee.id, { workDate: '2026-01-14', hours: 8, project: 'Site A' });
      if (!a.ok) throw new Error('setup failed');
      await store.updateStatus(a.value.id, EntryStatus.APPROVED, admin.id, null);

      const siteA = await store.listEntries({ project: 'Site A' });
      expect(siteA.map((e) => e.workDate)).toEqual(['2026-01-14', '2026-01-12']);

      const pending = await store.listEntries({ status: EntryStatus.PENDING });
      expect(pending.map((e) => e.workDate)).toEqual(['2026-01-14', '2026-01-13']);

      const ranged = await store.listEntries({ from: '2026-01-13', to: '2026-01-13' });
      expect(ranged.map((e) => e.project)).toEqual(['Site B']);
    });
  });

  describe('listProjects', () => {
    it('lists each named project once, by name', async () => {
      await store.create(employee.id, interval({ project: 'Library' }));
      await store.create(employee.id, interval({ workDate: '2026-01-12', project: 'Food bank' }));
      await store.create(employee.id, interval({ workDate: '2026-01-09', project: 'Library' }));
      await store.create(employee.id, interval({ workDate: '2026-01-08' }));

      expect(await store.listProjects()).toEqual([
        { id: 2, name: 'Food bank', createdAt: fixedClock().toISOString() },
        { id: 1, name: 'Library', createdAt: fixedClock().toISOString() },
      ]);
    });
  });

  describe('updateStatus', () => {
    it('records the decision on a pending entry', async () => {
      const created = await store.create(employee.id, interval());
      if (!created.ok) throw new Error('setup failed');

      const result = await store.updateStatus(created.value.id, EntryStatus.APPROVED, admin.id, null);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value).toMatchObject({
        status: EntryStatus.APPROVED,
        decidedBy: admin.id,
        decidedAt: fixedClock().toISOString(),
        comment: null,
        submittedAt: created.value.submittedAt,
      });
      expect(db.auditLog.map((row) => row.action)).toEqual(['ENTRY_SUBMITTED', 'ENTRY_APPROVED']);
      expect(db.auditLog[1]).toMatchObject({
        oldValue: { status: EntryStatus.PENDING },
        newValue: { status: EntryStatus.APPROVED, comment: null },
      });
    });

    it('refuses to change a decided entry', async () => {
      const created = await store.create(employee.id, interval());
      if (!created.ok) throw new Error('setup failed');
      await store.updateStatus(created.value.id, EntryStatus.APPROVED, admin.id, null);

      const result = await store.updateStatus(created.value.id, EntryStatus.REJECTED, admin.id, 'Too late');

      expect(result).toEqual({
        ok: false,
        error: {
          kind: 'InvalidTransition',
          entryId: created.value.id,
          currentStatus: EntryStatus.APPROVED,
        },
      });
      const stored = await store.getById(created.value.id);
      expect(stored.ok && stored.value.status).toBe(EntryStatus.APPROVED);
    });

    it('reports NotFound for an unknown id', async () => {
      const result = await store.updateStatus('missing', EntryStatus.APPROVED, admin.id, null);

      expect(result).toEqual({ ok: false, error: { kind: 'NotFound', entryId: 'missing' } });
    });
  });
});
