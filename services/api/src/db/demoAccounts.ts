import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { EmployeeRole, type Employee } from '@timecard/shared';
import { generateSessionToken, getSessionExpiry } from '../auth/utils.js';
import type { MemoryDatabase } from '../entries/memoryRepository.js';

export const DEMO_ACCOUNTS_FILE = fileURLToPath(
  new URL('../../fixtures/demo-accounts.json', import.meta.url)
);

const DemoAccountsSchema = z.object({
  employees: z
    .array(
      z.object({
        name: z.string().min(1),
        email: z.string().email(),
        role: z.nativeEnum(EmployeeRole),
      })
    )
    .min(1),
});

export type DemoAccount = z.infer<typeof DemoAccountsSchema>['employees'][number];

export type SeededAccount = {
  employee: Employee;
  token: string;
};

export async function loadDemoAccounts(file: string = DEMO_ACCOUNTS_FILE): Promise<DemoAccount[]> {
  const raw: unknown = JSON.parse(await readFile(file, 'utf8'));
  return DemoAccountsSchema.parse(raw).employees;
}

/**
 * Create the demo employees in an in-memory database, each with a fresh session token.
 */
export function seedMemoryAccounts(
  db: MemoryDatabase,
  accounts: readonly DemoAccount[],
  now: Date = new Date()
): SeededAccount[] {
  return accounts.map((account) => {
    const employee = db.addEmployee(account);
    const token = generateSessionToken();
    db.addSession(token, employee.id, getSessionExpiry(now));
    return { employee, token };
  });
}
