import { v4 as uuidv4 } from 'uuid';
import { Queryable } from '../config/database';
import {
  StateEvolution,
  StateEvolutionCreate,
  stateEvolutionCreateSchema,
  stateEvolutionRowSchema,
} from '../types/state-evolution';
import { decodeRow, decodeRows, encodeList } from '../utils/columns';
import { logger } from '../utils/logger';
import { parseInput } from '../utils/validation';

const TABLE = 'state_evolution';

/** Per-turn snapshots of conversation state, confidence, exposure and tone. */
export class StateEvolutionLedger {
  constructor(private readonly db: Queryable) {}

  async recordEvolution(input: StateEvolutionCreate): Promise<StateEvolution> {
    const data = parseInput(stateEvolutionCreateSchema, input);

    const result = await this.db.query(
      'state_evolution.record',
      `INSERT INTO state_evolution (
         id, session_id, message_id, turn_number,
         previous_state, current_state, state_transition_occurred, turns_in_current_state,
         previous_confidence, current_confidence, confidence_delta, confidence_trend,
         exposure_risk, exposure_delta,
         tone_confusion, tone_anxiety, tone_urgency, tone_compliance, tone_cognitive_load,
         drift_rate, initiative, signals_detected
       )
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18, $19, $20, $21, $22)
       RETURNING *`,
      [
        uuidv4(),
        data.session_id,
        data.message_id,
        data.turn_number,
        data.previous_state ?? null,
        data.current_state,
        data.state_transition_occurred,
        data.turns_in_current_state,
        data.previous_confidence ?? null,
        data.current_confidence,
        data.confidence_delta ?? null,
        data.confidence_trend ?? null,
        data.exposure_risk,
        data.exposure_delta ?? null,
        data.tone.confusion ?? null,
        data.tone.anxiety ?? null,
        data.tone.urgency ?? null,
        data.tone.compliance ?? null,
        data.tone.cognitive_load ?? null,
        data.drift_rate ?? null,
        data.initiative ?? null,
        encodeList(data.signals_detected),
      ]
    );

    if (data.state_transition_occurred) {
      logger.info('State transition recorded', {
        sessionId: data.session_id,
        turn: data.turn_number,
        from: data.previous_state ?? null,
        to: data.current_state,
      });
    }

    return decodeRow(stateEvolutionRowSchema, result.rows[0], TABLE);
  }

  async getHistory(sessionUuid: string): Promise<StateEvolution[]> {
    const result = await this.db.query(
      'state_evolution.history',
      `SELECT * FROM state_evolution
       WHERE session_id = $1
       ORDER BY turn_number ASC, "timestamp" ASC`,
      [sessionUuid]
    );
    return decodeRows(stateEvolutionRowSchema, result.rows, TABLE);
  }

  async getTransitions(sessionUuid: string): Promise<StateEvolution[]> {
    const result = await this.db.query(
      'state_evolution.transitions',
      `SELECT * FROM state_evolution
       WHERE session_id = $1 AND state_transition_occurred = true
       ORDER BY turn_number ASC, "timestamp" ASC`,
      [sessionUuid]
    );
    return decodeRows(stateEvolutionRowSchema, result.rows, TABLE);
  }
}
