import Fastify from 'fastify';
import { registerApp } from './app.js';
import { ConfigError, loadAppConfig, type AppConfig } from './config/index.js';
import { loadDotEnv } from './config/env.js';
import { closeDatabase, initializeDatabase } from './db/index.js';
import { loadDemoAccounts, seedMemoryAccounts } from './db/demoAccounts.js';
import { createMemoryRepositories } from './entries/memoryRepository.js';
import { loggerOptions } from './logger.js';
import { createServices, type Repositories } from './services.js';

function readConfig(): AppConfig {
  try {
    return loadAppConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

async function main(): Promise<void> {
  const appliedEnv = loadDotEnv();
  const config = readConfig();

  const fastify = Fastify({ logger: loggerOptions(config) });
  if (appliedEnv.length > 0) {
    fastify.log.info({ keys: appliedEnv }, 'Loaded .env');
  }

  let repositories: Repositories | undefined;
  if (config.storeDriver === 'postgres') {
    try {
      await initializeDatabase(config.database);
      fastify.log.info('Database connection initialized');
    } catch (err) {
      fastify.log.error(err, 'Failed to initialize database');
      process.exit(1);
    }
  } else {
    const memory = createMemoryRepositories();
    const seeded = seedMemoryAccounts(memory.db, await loadDemoAccounts());
    fastify.log.warn('STORE_DRIVER=memory: entries are lost on restart');
    for (const { employee, token } of seeded) {
      fastify.log.info({ employee: employee.name, role: employee.role, token }, 'Demo session');
    }
    repositories = { entries: memory.entries, employees: memory.employees };
  }

  const services = createServices({ config, logger: fastify.log, repositories });
  await registerApp(fastify, services);

  // Graceful shutdown
  const shutdown = async () => {
    fastify.log.info('Shutting down...');
    await fastify.close();
    if (config.storeDriver === 'postgres') {
      await closeDatabase();
    }
    process.exit(0);
  };

  process.on('SIGTERM', () => { void shutdown(); });
  process.on('SIGINT', () => { void shutdown(); });

  try {
    await fastify.listen({ port: config.port, host: config.host });
    fastify.log.info(`Server listening on http://${config.host}:${config.port}`);
    fastify.log.info('Available endpoints:');
    fastify.log.info('  GET  /health');
    fastify.log.info('  POST /v1/time-entries');
    fastify.log.info('  GET  /v1/time-entries');
    fastify.log.info('  GET  /v1/time-entries/summary');
    fastify.log.info('  GET  /v1/admin/time-entries');
    fastify.log.info('  POST /v1/admin/time-entries/:id/approve');
    fastify.log.info('  POST /v1/admin/time-entries/:id/reject');
    fastify.log.info('  GET  /v1/admin/employees/:employeeId/summary');
    fastify.log.info('  GET  /v1/admin/reports/employee-totals');
    fastify.log.info('  GET  /v1/admin/reports/approved.csv');
    fastify.log.info('  GET  /v1/admin/projects');
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
}

main().catch(console.error);
