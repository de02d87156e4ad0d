import { z } from 'zod';
import { CONVERSATION_STATES } from './session';
import { decimal, integer, nullableDecimal, stringList, timestamp, unitInterval } from '../utils/columns';

export const CONFIDENCE_TRENDS = ['increasing', 'decreasing', 'stable'] as const;

export type ConfidenceTrend = (typeof CONFIDENCE_TRENDS)[number];

export interface ToneVector {
  confusion: number | null;
  anxiety: number | null;
  urgency: number | null;
  compliance: number | null;
  cognitive_load: number | null;
}

export const stateEvolutionRowSchema = z
  .object({
    id: z.string(),
    session_id: z.string(),
    message_id: z.string(),
    turn_number: integer,
    previous_state: z.enum(CONVERSATION_STATES).nullable(),
    current_state: z.enum(CONVERSATION_STATES),
    state_transition_occurred: z.boolean(),
    turns_in_current_state: integer,
    previous_confidence: nullableDecimal,
    current_confidence: decimal,
    confidence_delta: nullableDecimal,
    confidence_trend: z.enum(CONFIDENCE_TRENDS).nullable(),
    exposure_risk: decimal,
    exposure_delta: nullableDecimal,
    tone_confusion: nullableDecimal,
    tone_anxiety: nullableDecimal,
    tone_urgency: nullableDecimal,
    tone_compliance: nullableDecimal,
    tone_cognitive_load: nullableDecimal,
    drift_rate: nullableDecimal,
    initiative: nullableDecimal,
    signals_detected: stringList,
    timestamp: timestamp,
  })
  .transform(({ tone_confusion, tone_anxiety, tone_urgency, tone_compliance, tone_cognitive_load, ...rest }) => ({
    ...rest,
    tone: {
      confusion: tone_confusion,
      anxiety: tone_anxiety,
      urgency: tone_urgency,
      compliance: tone_compliance,
      cognitive_load: tone_cognitive_load,
    } satisfies ToneVector,
  }));

export type StateEvolution = z.output<typeof stateEvolutionRowSchema>;

const signedDelta = z.number().min(-1).max(1);

export const stateEvolutionCreateSchema = z
  .object({
    session_id: z.string().uuid(),
    message_id: z.string().uuid(),
    turn_number: z.number().int(),
    previous_state: z.enum(CONVERSATION_STATES).optional(),
    current_state: z.enum(CONVERSATION_STATES),
    state_transition_occurred: z.boolean().default(false),
    turns_in_current_state: z.number().int().min(0).default(0),
    previous_confidence: unitInterval.optional(),
    current_confidence: unitInterval,
    confidence_delta: signedDelta.optional(),
    confidence_trend: z.enum(CONFIDENCE_TRENDS).optional(),
    exposure_risk: unitInterval,
    exposure_delta: signedDelta.optional(),
    tone: z
      .object({
        confusion: unitInterval.optional(),
        anxiety: unitInterval.optional(),
        urgency: unitInterval.optional(),
        compliance: unitInterval.optional(),
        cognitive_load: unitInterval.optional(),
      })
      .strict()
      .default({}),
    drift_rate: unitInterval.optional(),
    initiative: unitInterval.optional(),
    signals_detected: z.array(z.string()).optional(),
  })
  .strict();

export type StateEvolutionCreate = z.input<typeof stateEvolutionCreateSchema>;
