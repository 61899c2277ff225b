import { describe, expect, it } from 'vitest';
import { loadMigrations, selectMigrationFiles } from '../src/db/migrate.js';

describe('selectMigrationFiles', () => {
  it('keeps numbered .sql files in numeric order', () => {
    expect(
      selectMigrationFiles(['010_reports.sql', 'README.md', '002_projects.sql', '001_init.sql', 'draft.sql'])
    ).toEqual([
      { id: 1, filename: '001_init.sql' },
      { id: 2, filename: '002_projects.sql' },
      { id: 10, filename: '010_reports.sql' },
    ]);
  });
});

describe('loadMigrations', () => {
  it('loads the bundled schema', async () => {
    const migrations = await loadMigrations();

    expect(migrations[0]).toMatchObject({ id: 1, name: '001_timecards', filename: '001_timecards.sql' });
    expect(migrations[0]?.sql).toContain('CREATE TABLE IF NOT EXISTS time_card_entries');
  });
});
