import { z } from 'zod';
import { CONVERSATION_STATES } from './session';
import { integer, nullableDecimal, nullableInteger, nullableText, timestamp, unitInterval } from '../utils/columns';

export const SENDERS = ['scammer', 'agent'] as const;

export type Sender = (typeof SENDERS)[number];

export const messageRowSchema = z.object({
  id: z.string(),
  session_id: z.string(),
  sender: z.enum(SENDERS),
  text: z.string(),
  turn_number: integer,
  timestamp: timestamp,
  response_delay_seconds: nullableInteger,
  raw_llm_response: nullableText,
  final_response: nullableText,
  state_at_message: z.enum(CONVERSATION_STATES).nullable(),
  confidence_at_message: nullableDecimal,
  exposure_risk_at_message: nullableDecimal,
  created_at: timestamp,
});

export type Message = z.infer<typeof messageRowSchema>;

export const messageCreateSchema = z
  .object({
    session_id: z.string().uuid(),
    sender: z.enum(SENDERS),
    text: z.string(),
    // Caller-assigned; the ledger neither renumbers nor checks for gaps.
    turn_number: z.number().int(),
    timestamp: z.string().datetime({ offset: true }).optional(),
    response_delay_seconds: z.number().int().min(0).optional(),
    raw_llm_response: z.string().optional(),
    final_response: z.string().optional(),
    state_at_message: z.enum(CONVERSATION_STATES).optional(),
    confidence_at_message: unitInterval.optional(),
    exposure_risk_at_message: unitInterval.optional(),
  })
  .strict();

export type MessageCreate = z.input<typeof messageCreateSchema>;
