import { fileURLToPath } from 'node:url';
import { closeDatabase, initializeDatabase, transaction } from './index.js';
import { loadDemoAccounts } from './demoAccounts.js';
import { generateSessionToken, getSessionExpiry } from '../auth/utils.js';
import { loadDotEnv } from '../config/env.js';
import { loadAppConfig, type DatabaseConfig } from '../config/index.js';

/**
 * Upsert the demo employees (by email) and open one session per employee.
 */
async function seed(database: DatabaseConfig): Promise<void> {
  await initializeDatabase(database);
  const accounts = await loadDemoAccounts();

  const seeded = await transaction(async (client) => {
    const rows: Array<{ name: string; role: string; token: string }> = [];
    for (const account of accounts) {
      const employee = await client.query<{ id: string }>(
        `INSERT INTO employees (name, email, role)
         VALUES ($1, $2, $3)
         ON CONFLICT (email) DO UPDATE SET name = EXCLUDED.name, role = EXCLUDED.role, active = true
         RETURNING id`,
        [account.name, account.email, account.role]
      );
      const id = employee.rows[0]?.id;
      if (!id) throw new Error(`Employee upsert returned no row for ${account.email}`);

      const token = generateSessionToken();
      await client.query(
        `INSERT INTO employee_sessions (employee_id, session_token, expires_at) VALUES ($1, $2, $3)`,
        [id, token, getSessionExpiry()]
      );
      rows.push({ name: account.name, role: account.role, token });
    }
    return rows;
  });

  console.log(`Seeded ${seeded.length} employee(s). Session tokens:`);
  for (const row of seeded) {
    console.log(`  ${row.name} (${row.role}): ${row.token}`);
  }
}

async function main(): Promise<void> {
  try {
    await seed(loadAppConfig().database);
  } finally {
    await closeDatabase();
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  loadDotEnv();
  main().catch((err: unknown) => {
    console.error('Seed failed:', err);
    process.exit(1);
  });
}
