import { vi } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { EmployeeRole, type Employee } from '@timecard/shared';
import { registerApp } from '../src/app.js';
import { DEFAULT_WORKFLOW_CONFIG, type AppConfig } from '../src/config/index.js';
import type { Clock } from '../src/entries/entryStore.js';
import { MemoryDatabase, createMemoryRepositories } from '../src/entries/memoryRepository.js';
import type { EmailMessage, EmailTransport } from '../src/notifications/transport.js';
import { createServices, type TimecardServices } from '../src/services.js';

/** Wednesday. Entries up to this date are accepted with no grace window. */
export const TODAY = '2026-01-14';

export const fixedClock: Clock = () => new Date(2026, 0, 14, 12, 0, 0);

export function testLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    port: 0,
    host: '127.0.0.1',
    logLevel: 'silent',
    prettyLogs: false,
    storeDriver: 'memory',
    database: {
      host: 'localhost',
      port: 5432,
      database: 'timecards_test',
      user: 'timecards',
      password: 'test-secret',
      ssl: false,
      poolMax: 1,
    },
    workflow: { ...DEFAULT_WORKFLOW_CONFIG },
    mail: { transport: 'log', from: 'timecards@test.local' },
    ...overrides,
  };
}

/**
 * Keeps sent messages in memory. Set `failWith` to make the next sends throw.
 */
export class RecordingTransport implements EmailTransport {
  readonly name = 'recording';
  readonly sent: EmailMessage[] = [];
  failWith: Error | null = null;

  async send(message: EmailMessage): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.sent.push(message);
  }
}

export const ADMIN_TOKEN = 'test-admin-token';
export const EMPLOYEE_TOKEN = 'test-employee-token';
export const OTHER_TOKEN = 'test-other-token';

export type TestPeople = {
  admin: Employee;
  employee: Employee;
  other: Employee;
};

export function seedPeople(db: MemoryDatabase): TestPeople {
  const expiresAt = new Date(Date.now() + 60 * 60 * 1000);
  const admin = db.addEmployee({
    name: 'Avery Admin',
    email: 'avery@example.com',
    role: EmployeeRole.ADMIN,
  });
  const employee = db.addEmployee({
    name: 'Jordan Field',
    email: 'jordan@example.com',
    role: EmployeeRole.EMPLOYEE,
  });
  const other = db.addEmployee({
    name: 'Riley Shop',
    email: 'riley@example.com',
    role: EmployeeRole.EMPLOYEE,
  });
  db.addSession(ADMIN_TOKEN, admin.id, expiresAt);
  db.addSession(EMPLOYEE_TOKEN, employee.id, expiresAt);
  db.addSession(OTHER_TOKEN, other.id, expiresAt);
  return { admin, employee, other };
}

export type TestApp = TestPeople & {
  app: FastifyInstance;
  db: MemoryDatabase;
  transport: RecordingTransport;
  services: TimecardServices;
};

export async function buildTestApp(config: AppConfig = testConfig()): Promise<TestApp> {
  const memory = createMemoryRepositories();
  const people = seedPeople(memory.db);
  const transport = new RecordingTransport();
  const services = createServices({
    config,
    logger: testLogger(),
    repositories: { entries: memory.entries, employees: memory.employees },
    transport,
    clock: fixedClock,
  });

  const app = Fastify({ logger: false });
  await registerApp(app, services);
  await app.ready();

  return { app, db: memory.db, transport, services, ...people };
}

export function bearer(token: string): { authorization: string } {
  return { authorization: `Bearer ${token}` };
}
