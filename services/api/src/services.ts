import type { AppConfig } from './config/index.js';
import { EntryStore, systemClock, type Clock } from './entries/entryStore.js';
import { createMemoryRepositories } from './entries/memoryRepository.js';
import { PgEmployeeDirectory, PgEntryRepository } from './entries/pgRepository.js';
import type { EmployeeDirectory, EntryRepository } from './entries/repository.js';
import type { AppLogger } from './logger.js';
import { Notifier } from './notifications/notifier.js';
import { createEmailTransport, type EmailTransport } from './notifications/transport.js';
import { Aggregator } from './reports/aggregator.js';
import { ApprovalWorkflow } from './workflow/approvalWorkflow.js';

export type Repositories = {
  entries: EntryRepository;
  employees: EmployeeDirectory;
};

/**
 * Everything the routes need, built once per process.
 */
export type TimecardServices = {
  config: AppConfig;
  employees: EmployeeDirectory;
  store: EntryStore;
  aggregator: Aggregator;
  workflow: ApprovalWorkflow;
};

export type CreateServicesOptions = {
  config: AppConfig;
  logger: AppLogger;
  /** Overrides the repositories selected by `config.storeDriver`. */
  repositories?: Repositories;
  transport?: EmailTransport;
  clock?: Clock;
};

export function createRepositories(driver: AppConfig['storeDriver']): Repositories {
  switch (driver) {
    case 'postgres':
      return { entries: new PgEntryRepository(), employees: new PgEmployeeDirectory() };
    case 'memory': {
      const memory = createMemoryRepositories();
      return { entries: memory.entries, employees: memory.employees };
    }
  }
}

export function createServices(options: CreateServicesOptions): TimecardServices {
  const { config, logger } = options;
  const repositories = options.repositories ?? createRepositories(config.storeDriver);
  const clock = options.clock ?? systemClock;

  const store = new EntryStore({
    repository: repositories.entries,
    futureSubmissionGraceDays: config.workflow.futureSubmissionGraceDays,
    clock,
  });

  const notifier = new Notifier({
    employees: repositories.employees,
    transport: options.transport ?? createEmailTransport(config.mail, logger),
    from: config.mail.from,
    logger,
  });

  return {
    config,
    employees: repositories.employees,
    store,
    aggregator: new Aggregator({
      store,
      employees: repositories.employees,
      config: config.workflow,
    }),
    workflow: new ApprovalWorkflow({ store, listener: notifier, logger }),
  };
}
