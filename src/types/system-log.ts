import { z } from 'zod';
import { jsonObject, nullableText, timestamp } from '../utils/columns';

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const systemLogRowSchema = z.object({
  id: z.string(),
  session_id: z.string().nullable(),
  log_level: z.enum(LOG_LEVELS),
  component: nullableText,
  event_type: nullableText,
  message: z.string(),
  details: jsonObject,
  timestamp: timestamp,
});

export type SystemLog = z.infer<typeof systemLogRowSchema>;

export interface SystemLogCreate {
  session_id?: string | null;
  log_level: LogLevel;
  component: string;
  event_type: string;
  message: string;
  details?: Record<string, unknown>;
}
