import fs from 'node:fs';
import path from 'node:path';

function stripQuotes(value: string): string {
  const v = value.trim();
  if ((v.startsWith('"') && v.endsWith('"')) || (v.startsWith("'") && v.endsWith("'"))) {
    return v.slice(1, -1);
  }
  return v;
}

/**
 * Parse `KEY=VALUE` lines. Blank lines, `#` comments and an `export ` prefix are allowed.
 */
export function parseDotEnv(raw: string): Record<string, string> {
  const values: Record<string, string> = {};
  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;

    const assignment = trimmed.startsWith('export ') ? trimmed.slice('export '.length) : trimmed;
    const eq = assignment.indexOf('=');
    if (eq <= 0) continue;

    const key = assignment.slice(0, eq).trim();
    if (!key) continue;
    values[key] = stripQuotes(assignment.slice(eq + 1));
  }
  return values;
}

/**
 * Load `${cwd}/.env` into `env` without overriding variables that are already set.
 * Returns the keys that were applied.
 */
export function loadDotEnv(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): string[] {
  const envPath = path.resolve(cwd, '.env');
  if (!fs.existsSync(envPath)) return [];

  const applied: string[] = [];
  for (const [key, value] of Object.entries(parseDotEnv(fs.readFileSync(envPath, 'utf8')))) {
    if (env[key] != null) continue;
    env[key] = value;
    applied.push(key);
  }
  return applied;
}
