import * as Sentry from '@sentry/node';
import { v4 as uuidv4 } from 'uuid';
import { Queryable } from '../config/database';
import { SystemLog, SystemLogCreate, systemLogRowSchema } from '../types/system-log';
import { decodeRows, encodeJson } from '../utils/columns';
import { toError } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * Structured event log stored alongside the ledger. Writes are best-effort:
 * `log` resolves to `false` on failure and never rejects, so an event can
 * follow a primary write without being able to undo it.
 */
export class SystemLogSink {
  constructor(private readonly db: Queryable) {}

  async log(entry: SystemLogCreate): Promise<boolean> {
    try {
      await this.db.query(
        'system_logs.insert',
        `INSERT INTO system_logs (id, session_id, log_level, component, event_type, message, details)
         VALUES ($1, $2, $3, $4, $5, $6, $7)`,
        [
          uuidv4(),
          entry.session_id ?? null,
          entry.log_level,
          entry.component,
          entry.event_type,
          entry.message,
          encodeJson(entry.details),
        ]
      );
      return true;
    } catch (error) {
      const err = toError(error);
      logger.warn('System log write failed', {
        component: entry.component,
        eventType: entry.event_type,
        error: err.message,
      });
      Sentry.captureException(err, { tags: { component: entry.component, event_type: entry.event_type } });
      return false;
    }
  }

  async getForSession(sessionUuid: string, limit: number = 100): Promise<SystemLog[]> {
    const result = await this.db.query(
      'system_logs.getForSession',
      `SELECT * FROM system_logs
       WHERE session_id = $1
       ORDER BY "timestamp" DESC
       LIMIT $2`,
      [sessionUuid, limit]
    );
    return decodeRows(systemLogRowSchema, result.rows, 'system_logs');
  }
}
