import fs from 'fs';
import path from 'path';
import { IBackup, newDb } from 'pg-mem';
import { ConnectionManager, LedgerPool, QueryResultLike } from '../../src/config/database';

const SCHEMA = path.join(__dirname, '../../migrations/001_initial_schema.sql');

/** In-process PostgreSQL, loaded with the real schema unless `empty` is set. */
export function createMemoryDatabase(options: { empty?: boolean } = {}): ConnectionManager {
  const db = newDb({ autoCreateForeignKeyIndices: true, noAstCoverageCheck: true });
  if (!options.empty) {
    db.public.none(fs.readFileSync(SCHEMA, 'utf8'));
  }

  const { Pool } = db.adapters.createPg();
  const pool = new Pool();

  // One connection at a time, so a transaction never interleaves with other work
  let tail: Promise<void> = Promise.resolve();

  const ledgerPool: LedgerPool = {
    connect: async () => {
      const previous = tail;
      let unlock: () => void = () => undefined;
      tail = new Promise<void>((resolve) => {
        unlock = resolve;
      });
      await previous;

      // Connections are lent one at a time, so a snapshot taken at BEGIN
      // holds nothing but this connection's own writes
      let snapshot: IBackup | undefined;

      return {
        query: async (text: string, values?: unknown[]): Promise<QueryResultLike> => {
          switch (text.trim().toUpperCase()) {
            case 'BEGIN':
              snapshot = db.backup();
              return { rows: [], rowCount: null };
            case 'COMMIT':
              snapshot = undefined;
              return { rows: [], rowCount: null };
            case 'ROLLBACK':
              snapshot?.restore();
              snapshot = undefined;
              return { rows: [], rowCount: null };
          }
          const result = await pool.query(text, values);
          return { rows: result.rows, rowCount: result.rowCount ?? null };
        },
        release: () => unlock(),
      };
    },
    end: async () => {
      await pool.end();
    },
  };

  return new ConnectionManager(ledgerPool);
}
