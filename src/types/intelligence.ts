import { z } from 'zod';
import { decimal, integer, jsonObject, nullableInteger, nullableText, timestamp, unitInterval } from '../utils/columns';

export const ARTIFACT_TYPES = ['upi_id', 'bank_account', 'phone_number', 'phishing_link', 'suspicious_keyword'] as const;

export type ArtifactType = (typeof ARTIFACT_TYPES)[number];

export const intelligenceRowSchema = z.object({
  id: z.string(),
  session_id: z.string(),
  artifact_type: z.enum(ARTIFACT_TYPES),
  artifact_value: z.string(),
  extracted_from_message_id: z.string().nullable(),
  extracted_at_turn: nullableInteger,
  extraction_method: z.string(),
  confirmed: z.boolean(),
  confirmation_count: integer.pipe(z.number().min(1)),
  confidence_score: decimal,
  first_seen_at: timestamp,
  last_seen_at: timestamp,
  context_snippet: nullableText,
  metadata: jsonObject,
});

export type ExtractedIntelligence = z.infer<typeof intelligenceRowSchema>;

export const intelligenceCreateSchema = z
  .object({
    session_id: z.string().uuid(),
    artifact_type: z.enum(ARTIFACT_TYPES),
    artifact_value: z.string().min(1),
    extracted_from_message_id: z.string().uuid(),
    extracted_at_turn: z.number().int(),
    extraction_method: z.string().min(1).max(50).default('regex'),
    confidence_score: unitInterval.default(0.5),
    context_snippet: z.string().optional(),
    metadata: z.record(z.unknown()).optional(),
    /** When the artifact was seen; stamps first_seen_at on insert and last_seen_at on merge. */
    observed_at: z.string().datetime({ offset: true }).optional(),
  })
  .strict();

export type IntelligenceCreate = z.input<typeof intelligenceCreateSchema>;

export interface IntelligenceSummary {
  total_artifacts: number;
  confirmed_artifacts: number;
  by_type: Record<ArtifactType, number>;
}
