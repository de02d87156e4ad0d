import { z } from 'zod';
import { decimal, integer, timestamp } from '../utils/columns';

const score = z.number().finite();
const count = z.number().int().min(0);

export const evaluationMetricsCreateSchema = z
  .object({
    session_id: z.string().uuid(),
    engagement_depth_score: score,
    conversation_naturalness_score: score,
    extraction_efficiency: score,
    scam_detection_confidence: score,
    false_positive_risk: score,
    average_response_delay: score,
    tone_drift_smoothness: score,
    state_transition_count: count,
    premature_exits: count,
    unique_artifacts_extracted: count,
    confirmed_artifacts_extracted: count,
    high_confidence_artifacts: count,
    typo_count: count,
    message_truncations: count,
    repetitions: count,
    clarification_questions_asked: count,
    overall_quality_score: score,
  })
  .strict();

export type EvaluationMetricsCreate = z.input<typeof evaluationMetricsCreateSchema>;

export const EVALUATION_METRIC_COLUMNS = [
  'session_id',
  'engagement_depth_score',
  'conversation_naturalness_score',
  'extraction_efficiency',
  'scam_detection_confidence',
  'false_positive_risk',
  'average_response_delay',
  'tone_drift_smoothness',
  'state_transition_count',
  'premature_exits',
  'unique_artifacts_extracted',
  'confirmed_artifacts_extracted',
  'high_confidence_artifacts',
  'typo_count',
  'message_truncations',
  'repetitions',
  'clarification_questions_asked',
  'overall_quality_score',
] as const satisfies ReadonlyArray<keyof EvaluationMetricsCreate>;

export const evaluationMetricsRowSchema = z.object({
  id: z.string(),
  session_id: z.string(),
  engagement_depth_score: decimal,
  conversation_naturalness_score: decimal,
  extraction_efficiency: decimal,
  scam_detection_confidence: decimal,
  false_positive_risk: decimal,
  average_response_delay: decimal,
  tone_drift_smoothness: decimal,
  state_transition_count: integer,
  premature_exits: integer,
  unique_artifacts_extracted: integer,
  confirmed_artifacts_extracted: integer,
  high_confidence_artifacts: integer,
  typo_count: integer,
  message_truncations: integer,
  repetitions: integer,
  clarification_questions_asked: integer,
  overall_quality_score: decimal,
  calculated_at: timestamp,
});

export type EvaluationMetrics = z.infer<typeof evaluationMetricsRowSchema>;
