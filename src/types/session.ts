import { z } from 'zod';
import {
  decimal,
  integer,
  jsonObject,
  nullableDecimal,
  nullableTimestamp,
  timestamp,
  unitInterval,
} from '../utils/columns';

export const CHANNELS = ['SMS', 'WhatsApp', 'Email', 'Chat'] as const;
export const PERSONAS = ['ELDERLY_UNCLE', 'BUSY_PROFESSIONAL'] as const;
export const SESSION_STATUSES = ['active', 'completed', 'terminated', 'burned'] as const;
export const CONVERSATION_STATES = ['UNKNOWN', 'PROBING', 'ENGAGING', 'DRAINING', 'EXITING', 'TERMINATED'] as const;

export type Channel = (typeof CHANNELS)[number];
export type Persona = (typeof PERSONAS)[number];
export type SessionStatus = (typeof SESSION_STATUSES)[number];
export type ConversationState = (typeof CONVERSATION_STATES)[number];

export const sessionRowSchema = z.object({
  id: z.string(),
  session_id: z.string(),
  channel: z.enum(CHANNELS),
  language: z.string(),
  locale: z.string(),
  persona: z.enum(PERSONAS),
  initial_confidence: decimal,
  status: z.enum(SESSION_STATUSES),
  current_state: z.enum(CONVERSATION_STATES),
  scam_detected: z.boolean(),
  final_confidence: nullableDecimal,
  exposure_risk: nullableDecimal,
  total_messages_exchanged: integer,
  engagement_duration_seconds: integer,
  intelligence_extracted_count: integer,
  created_at: timestamp,
  updated_at: timestamp,
  completed_at: nullableTimestamp,
  callback_sent: z.boolean(),
  callback_sent_at: nullableTimestamp,
  callback_response: jsonObject,
});

export type Session = z.infer<typeof sessionRowSchema>;

export const sessionCreateSchema = z
  .object({
    session_id: z.string().trim().min(1).max(255),
    channel: z.enum(CHANNELS).default('SMS'),
    language: z.string().min(1).max(10).default('en'),
    locale: z.string().min(1).max(10).default('IN'),
    persona: z.enum(PERSONAS).default('ELDERLY_UNCLE'),
    initial_confidence: unitInterval.default(0.35),
    current_state: z.enum(CONVERSATION_STATES).default('UNKNOWN'),
  })
  .strict();

export type SessionCreate = z.input<typeof sessionCreateSchema>;

export const sessionUpdateSchema = z
  .object({
    current_state: z.enum(CONVERSATION_STATES).optional(),
    status: z.enum(SESSION_STATUSES).optional(),
    scam_detected: z.boolean().optional(),
    final_confidence: unitInterval.optional(),
    exposure_risk: unitInterval.optional(),
    engagement_duration_seconds: z.number().int().min(0).optional(),
    completed_at: z.string().datetime({ offset: true }).optional(),
    callback_sent: z.boolean().optional(),
    callback_sent_at: z.string().datetime({ offset: true }).optional(),
    callback_response: z.record(z.unknown()).optional(),
  })
  .strict()
  .superRefine((patch, ctx) => {
    const closing = patch.status !== undefined && patch.status !== 'active';
    for (const field of ['final_confidence', 'completed_at'] as const) {
      if (patch[field] !== undefined && !closing) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [field],
          message: `${field} can only be set together with a non-active status`,
        });
      }
    }
  });

export type SessionUpdate = z.input<typeof sessionUpdateSchema>;

/** Columns a partial update may touch, in the order they are written. */
export const UPDATABLE_SESSION_COLUMNS = [
  'current_state',
  'status',
  'scam_detected',
  'final_confidence',
  'exposure_risk',
  'engagement_duration_seconds',
  'completed_at',
  'callback_sent',
  'callback_sent_at',
  'callback_response',
] as const satisfies ReadonlyArray<keyof SessionUpdate>;
