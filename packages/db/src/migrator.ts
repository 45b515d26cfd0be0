import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Pool } from 'pg';
import { createLogger, errorMessage } from '@parley/shared';

const logger = createLogger({ name: 'db:migrate' });

export const MIGRATIONS_DIR = join(__dirname, '..', 'migrations');

/** Applies every `.sql` file not yet recorded in `_migrations`, in name order. */
export async function migrate(databaseUrl: string, dir: string = MIGRATIONS_DIR): Promise<string[]> {
  const pool = new Pool({ connectionString: databaseUrl });
  const client = await pool.connect();
  const appliedNow: string[] = [];

  try {
    await client.query(`
      CREATE TABLE IF NOT EXISTS _migrations (
        name VARCHAR(255) PRIMARY KEY,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);

    const applied = await client.query<{ name: string }>('SELECT name FROM _migrations ORDER BY name');
    const appliedSet = new Set(applied.rows.map((r) => r.name));

    const files = (await readdir(dir)).filter((f) => f.endsWith('.sql')).sort();

    for (const file of files) {
      if (appliedSet.has(file)) continue;

      const sql = await readFile(join(dir, file), 'utf-8');

      await client.query('BEGIN');
      try {
        await client.query(sql);
        await client.query('INSERT INTO _migrations (name) VALUES ($1)', [file]);
        await client.query('COMMIT');
        appliedNow.push(file);
        logger.info({ file }, 'Migration applied');
      } catch (err) {
        await client.query('ROLLBACK');
        throw err;
      }
    }

    logger.info({ count: appliedNow.length }, 'All migrations applied');
    return appliedNow;
  } finally {
    client.release();
    await pool.end();
  }
}

if (require.main === module) {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    logger.fatal({}, 'DATABASE_URL environment variable is required');
    process.exit(1);
  }
  migrate(databaseUrl).catch((err: unknown) => {
    logger.fatal({ err: errorMessage(err) }, 'Migration failed');
    process.exit(1);
  });
}
