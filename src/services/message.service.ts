import { v4 as uuidv4 } from 'uuid';
import { TransactionalQueryable } from '../config/database';
import { Message, MessageCreate, messageCreateSchema, messageRowSchema } from '../types/message';
import { decodeRow, decodeRows } from '../utils/columns';
import { logger } from '../utils/logger';
import { parseInput } from '../utils/validation';

const TABLE = 'messages';
const DEFAULT_HISTORY_LIMIT = 50;

export class MessageLedger {
  constructor(private readonly db: TransactionalQueryable) {}

  async appendMessage(input: MessageCreate): Promise<Message> {
    const data = parseInput(messageCreateSchema, input);
    const id = uuidv4();

    // The row and the session's running counter commit together
    const row = await this.db.transaction('messages.append', async (tx) => {
      const result = await tx.query(
        'messages.append',
        `INSERT INTO messages (
           id, session_id, sender, "text", turn_number, "timestamp",
           response_delay_seconds, raw_llm_response, final_response,
           state_at_message, confidence_at_message, exposure_risk_at_message
         )
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
         RETURNING *`,
        [
          id,
          data.session_id,
          data.sender,
          data.text,
          data.turn_number,
          data.timestamp ?? new Date().toISOString(),
          data.response_delay_seconds ?? null,
          data.raw_llm_response ?? null,
          data.final_response ?? null,
          data.state_at_message ?? null,
          data.confidence_at_message ?? null,
          data.exposure_risk_at_message ?? null,
        ]
      );

      await tx.query(
        'sessions.countMessage',
        `UPDATE sessions
         SET total_messages_exchanged = total_messages_exchanged + 1, updated_at = NOW()
         WHERE id = $1`,
        [data.session_id]
      );

      return result.rows[0];
    });

    logger.debug('Message appended', { sessionId: data.session_id, sender: data.sender, turn: data.turn_number });
    return decodeRow(messageRowSchema, row, TABLE);
  }

  async getHistory(sessionUuid: string, limit: number = DEFAULT_HISTORY_LIMIT): Promise<Message[]> {
    const result = await this.db.query(
      'messages.history',
      `SELECT * FROM messages
       WHERE session_id = $1
       ORDER BY turn_number ASC, "timestamp" ASC
       LIMIT $2`,
      [sessionUuid, limit]
    );
    return decodeRows(messageRowSchema, result.rows, TABLE);
  }

  async getLastAgentMessage(sessionUuid: string): Promise<Message | null> {
    const result = await this.db.query(
      'messages.lastAgent',
      `SELECT * FROM messages
       WHERE session_id = $1 AND sender = 'agent'
       ORDER BY turn_number DESC, "timestamp" DESC
       LIMIT 1`,
      [sessionUuid]
    );
    return result.rows[0] ? decodeRow(messageRowSchema, result.rows[0], TABLE) : null;
  }
}
