import { v4 as uuidv4 } from 'uuid';
import { Queryable } from '../config/database';
import {
  Session,
  SessionCreate,
  SessionUpdate,
  UPDATABLE_SESSION_COLUMNS,
  sessionCreateSchema,
  sessionRowSchema,
  sessionUpdateSchema,
} from '../types/session';
import { decodeRow, decodeRows } from '../utils/columns';
import { logger } from '../utils/logger';
import { parseInput } from '../utils/validation';
import { SessionCache } from './cache.service';
import { SystemLogSink } from './system-log.service';

const TABLE = 'sessions';

export class SessionStore {
  constructor(
    private readonly db: Queryable,
    private readonly events?: SystemLogSink,
    private readonly cache?: SessionCache
  ) {}

  async createSession(input: SessionCreate): Promise<Session> {
    const data = parseInput(sessionCreateSchema, input);
    const id = uuidv4();

    const result = await this.db.query(
      'sessions.create',
      `INSERT INTO sessions (id, session_id, channel, language, locale, persona, initial_confidence, current_state)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       RETURNING *`,
      [id, data.session_id, data.channel, data.language, data.locale, data.persona, data.initial_confidence, data.current_state]
    );

    const session = decodeRow(sessionRowSchema, result.rows[0], TABLE);
    logger.info('Session created', { id, sessionId: session.session_id, channel: session.channel });

    await this.events?.log({
      session_id: session.id,
      log_level: 'INFO',
      component: 'session_store',
      event_type: 'session_created',
      message: `Session ${session.session_id} created`,
      details: { persona: session.persona, current_state: session.current_state },
    });

    return session;
  }

  async getBySessionId(sessionId: string): Promise<Session | null> {
    const result = await this.db.query('sessions.getBySessionId', 'SELECT * FROM sessions WHERE session_id = $1', [
      sessionId,
    ]);
    return result.rows[0] ? decodeRow(sessionRowSchema, result.rows[0], TABLE) : null;
  }

  async getById(id: string): Promise<Session | null> {
    const result = await this.db.query('sessions.getById', 'SELECT * FROM sessions WHERE id = $1', [id]);
    return result.rows[0] ? decodeRow(sessionRowSchema, result.rows[0], TABLE) : null;
  }

  /**
   * Writes only the fields present in `patch`. Column names come from
   * UPDATABLE_SESSION_COLUMNS, never from the patch's own keys. Cached
   * snapshots of the session are invalidated once the write has committed.
   */
  async updateSession(sessionId: string, patch: SessionUpdate): Promise<Session | null> {
    const data = parseInput(sessionUpdateSchema, patch);

    const setClauses: string[] = [];
    const values: unknown[] = [];

    for (const column of UPDATABLE_SESSION_COLUMNS) {
      const value = data[column];
      if (value === undefined) continue;
      values.push(column === 'callback_response' ? JSON.stringify(value) : value);
      setClauses.push(`${column} = $${values.length}`);
    }

    if (setClauses.length === 0) {
      return this.getBySessionId(sessionId);
    }

    values.push(sessionId);
    const result = await this.db.query(
      'sessions.update',
      `UPDATE sessions
       SET ${setClauses.join(', ')}, updated_at = NOW()
       WHERE session_id = $${values.length}
       RETURNING *`,
      values
    );

    if (!result.rows[0]) {
      return null;
    }

    const session = decodeRow(sessionRowSchema, result.rows[0], TABLE);
    // Drop snapshots taken before this write; the next cached read repopulates them
    await this.cache?.invalidate(sessionId);

    const fields = UPDATABLE_SESSION_COLUMNS.filter((column) => data[column] !== undefined);
    logger.debug('Session updated', { sessionId, fields });

    await this.events?.log({
      session_id: session.id,
      log_level: 'INFO',
      component: 'session_store',
      event_type: 'session_updated',
      message: `Session ${sessionId} updated`,
      details: { fields, status: session.status, current_state: session.current_state },
    });

    return session;
  }

  async listActiveSessions(): Promise<Session[]> {
    const result = await this.db.query(
      'sessions.listActive',
      `SELECT * FROM sessions WHERE status = 'active' ORDER BY created_at DESC`
    );
    return decodeRows(sessionRowSchema, result.rows, TABLE);
  }

  async markCallbackSent(sessionId: string, response: Record<string, unknown>): Promise<Session | null> {
    return this.updateSession(sessionId, {
      callback_sent: true,
      callback_sent_at: new Date().toISOString(),
      callback_response: response,
    });
  }
}
