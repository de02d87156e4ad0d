import { v4 as uuidv4 } from 'uuid';
import { Queryable } from '../config/database';
import {
  EVALUATION_METRIC_COLUMNS,
  EvaluationMetrics,
  EvaluationMetricsCreate,
  evaluationMetricsCreateSchema,
  evaluationMetricsRowSchema,
} from '../types/evaluation';
import { decodeRow } from '../utils/columns';
import { logger } from '../utils/logger';
import { parseInput } from '../utils/validation';

const TABLE = 'evaluation_metrics';

/** Scores written once per session by the evaluation collaborator. */
export class EvaluationMetricsStore {
  constructor(private readonly db: Queryable) {}

  async recordMetrics(input: EvaluationMetricsCreate): Promise<EvaluationMetrics> {
    const data = parseInput(evaluationMetricsCreateSchema, input);
    const columns = ['id', ...EVALUATION_METRIC_COLUMNS];
    const values = [uuidv4(), ...EVALUATION_METRIC_COLUMNS.map((column) => data[column])];
    const placeholders = values.map((_value, index) => `$${index + 1}`);

    const result = await this.db.query(
      'evaluation_metrics.record',
      `INSERT INTO evaluation_metrics (${columns.join(', ')})
       VALUES (${placeholders.join(', ')})
       RETURNING *`,
      values
    );

    logger.info('Evaluation metrics recorded', {
      sessionId: data.session_id,
      overallQuality: data.overall_quality_score,
    });
    return decodeRow(evaluationMetricsRowSchema, result.rows[0], TABLE);
  }

  async getForSession(sessionUuid: string): Promise<EvaluationMetrics | null> {
    const result = await this.db.query('evaluation_metrics.forSession', 'SELECT * FROM evaluation_metrics WHERE session_id = $1', [
      sessionUuid,
    ]);
    return result.rows[0] ? decodeRow(evaluationMetricsRowSchema, result.rows[0], TABLE) : null;
  }
}
