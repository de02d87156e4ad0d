import { z } from 'zod';
import { nullableInteger, nullableText, stringList, timestamp } from '../utils/columns';

export const TACTIC_TYPES = [
  'urgency_pressure',
  'authority_claim',
  'payment_redirect',
  'account_threat',
  'verification_scam',
] as const;

export const THREAT_LEVELS = ['low', 'medium', 'high'] as const;

export type TacticType = (typeof TACTIC_TYPES)[number];
export type ThreatLevel = (typeof THREAT_LEVELS)[number];

export const tacticRowSchema = z.object({
  id: z.string(),
  session_id: z.string(),
  tactic_type: z.enum(TACTIC_TYPES),
  tactic_description: nullableText,
  detected_at_turn: nullableInteger,
  message_text: nullableText,
  keywords_used: stringList,
  threat_level: z.enum(THREAT_LEVELS),
  timestamp: timestamp,
});

export type ScammerTactic = z.infer<typeof tacticRowSchema>;

export const tacticCreateSchema = z
  .object({
    session_id: z.string().uuid(),
    tactic_type: z.enum(TACTIC_TYPES),
    tactic_description: z.string().optional(),
    detected_at_turn: z.number().int(),
    message_text: z.string(),
    keywords_used: z.array(z.string()).optional(),
    threat_level: z.enum(THREAT_LEVELS).default('medium'),
  })
  .strict();

export type TacticCreate = z.input<typeof tacticCreateSchema>;
