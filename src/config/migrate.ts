import fs from 'fs';
import path from 'path';
import { ConnectionManager, createPool } from './database';
import { loadConfig } from './env';
import { logger } from '../utils/logger';
import { toError } from '../utils/errors';

export const MIGRATIONS_DIR = path.join(__dirname, '../../migrations');

export function listMigrations(dir: string = MIGRATIONS_DIR): string[] {
  return fs.readdirSync(dir).filter((f) => f.endsWith('.sql')).sort();
}

/** Applies every pending migration once, in file-name order. Returns the names applied. */
export async function migrate(db: ConnectionManager, dir: string = MIGRATIONS_DIR): Promise<string[]> {
  await db.query(
    'migrations.init',
    `CREATE TABLE IF NOT EXISTS _migrations (
      id SERIAL PRIMARY KEY,
      name VARCHAR(255) NOT NULL UNIQUE,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )`
  );

  const applied: string[] = [];
  for (const file of listMigrations(dir)) {
    const existing = await db.query('migrations.check', 'SELECT 1 FROM _migrations WHERE name = $1', [file]);
    if (existing.rows.length > 0) {
      logger.debug('Skipping migration (already applied)', { file });
      continue;
    }

    const sql = fs.readFileSync(path.join(dir, file), 'utf8');
    logger.info('Running migration', { file });
    await db.query('migrations.apply', sql);
    await db.query('migrations.record', 'INSERT INTO _migrations (name) VALUES ($1)', [file]);
    applied.push(file);
  }

  logger.info('All migrations complete', { applied: applied.length });
  return applied;
}

if (require.main === module) {
  const db = new ConnectionManager(createPool(loadConfig().database));
  migrate(db)
    .then(() => db.close())
    .catch((err: unknown) => {
      logger.error('Migration failed', { error: toError(err).message });
      process.exit(1);
    });
}
