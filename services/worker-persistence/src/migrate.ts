/**
 * Database Migration Runner
 *
 * Applies the SQL files under src/migrations in name order, once each.
 * Applied files are recorded in schema_migrations.
 */

import fs from 'fs';
import path from 'path';
import { Pool } from 'pg';
import { config, logger } from '@memobench/shared';

const pool = new Pool({
  connectionString: config.databaseUrl,
});

const migrationsDir = process.env.MIGRATIONS_DIR || path.join(process.cwd(), 'src', 'migrations');

async function runMigrations(): Promise<void> {
  const client = await pool.connect();

  try {
    logger.info('Running database migrations', { migrationsDir });

    await client.query(
      `CREATE TABLE IF NOT EXISTS schema_migrations (
         name TEXT PRIMARY KEY,
         applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
       )`
    );

    const applied = await client.query<{ name: string }>('SELECT name FROM schema_migrations');
    const appliedNames = new Set(applied.rows.map((row) => row.name));

    const migrationFiles = fs
      .readdirSync(migrationsDir)
      .filter((f) => f.endsWith('.sql'))
      .sort();

    for (const file of migrationFiles) {
      if (appliedNames.has(file)) {
        logger.debug('Migration already applied', { file });
        continue;
      }

      logger.info('Running migration', { file });

      const sql = fs.readFileSync(path.join(migrationsDir, file), 'utf-8');
      await client.query('BEGIN');
      try {
        await client.query(sql);
        await client.query('INSERT INTO schema_migrations (name) VALUES ($1)', [file]);
        await client.query('COMMIT');
      } catch (error) {
        await client.query('ROLLBACK');
        throw error;
      }

      logger.info('Migration complete', { file });
    }

    logger.info('All migrations complete');
  } catch (error) {
    logger.error('Migration failed', error);
    throw error;
  } finally {
    client.release();
    await pool.end();
  }
}

runMigrations()
  .then(() => process.exit(0))
  .catch(() => process.exit(1));
