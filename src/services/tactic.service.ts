import { v4 as uuidv4 } from 'uuid';
import { Queryable } from '../config/database';
import { ScammerTactic, TacticCreate, tacticCreateSchema, tacticRowSchema } from '../types/tactic';
import { decodeRow, decodeRows, encodeList } from '../utils/columns';
import { parseInput } from '../utils/validation';
import { SystemLogSink } from './system-log.service';

const TABLE = 'scammer_tactics';

export class TacticRecorder {
  constructor(
    private readonly db: Queryable,
    private readonly events?: SystemLogSink
  ) {}

  async recordTactic(input: TacticCreate): Promise<ScammerTactic> {
    const data = parseInput(tacticCreateSchema, input);

    const result = await this.db.query(
      'scammer_tactics.record',
      `INSERT INTO scammer_tactics (
         id, session_id, tactic_type, tactic_description,
         detected_at_turn, message_text, keywords_used, threat_level
       )
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       RETURNING *`,
      [
        uuidv4(),
        data.session_id,
        data.tactic_type,
        data.tactic_description ?? null,
        data.detected_at_turn,
        data.message_text,
        encodeList(data.keywords_used),
        data.threat_level,
      ]
    );

    const tactic = decodeRow(tacticRowSchema, result.rows[0], TABLE);

    await this.events?.log({
      session_id: tactic.session_id,
      log_level: tactic.threat_level === 'high' ? 'WARNING' : 'INFO',
      component: 'tactic_recorder',
      event_type: 'tactic_detected',
      message: `${tactic.tactic_type} at turn ${data.detected_at_turn}`,
      details: { threat_level: tactic.threat_level, keywords: tactic.keywords_used },
    });

    return tactic;
  }

  async getForSession(sessionUuid: string): Promise<ScammerTactic[]> {
    const result = await this.db.query(
      'scammer_tactics.forSession',
      `SELECT * FROM scammer_tactics
       WHERE session_id = $1
       ORDER BY detected_at_turn ASC, "timestamp" ASC`,
      [sessionUuid]
    );
    return decodeRows(tacticRowSchema, result.rows, TABLE);
  }
}
