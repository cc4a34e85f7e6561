import { afterEach, describe, expect, it, vi } from 'vitest';

import { createPool, ensureSchema } from '../db/index.js';
import { createMockPool } from './helpers/mock-pg.js';

describe('database client', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('refuses to build a pool without a connection string', () => {
    vi.stubEnv('DATABASE_URL', '');

    expect(() => createPool()).toThrow(/DATABASE_URL is not configured/);
  });

  it('creates missing tables and leaves existing ones alone', async () => {
    const pool = createMockPool();

    expect(await ensureSchema(pool)).toEqual(['grammar_items', 'settings']);
    await pool.query(`insert into settings ("key", "value") values ('daily_lesson_limit', '12')`);

    expect(await ensureSchema(pool)).toEqual([]);

    const { rows } = await pool.query('select "value" from settings');
    expect(rows).toEqual([{ value: '12' }]);
    await pool.end();
  });
});
