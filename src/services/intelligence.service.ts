import { v4 as uuidv4 } from 'uuid';
import { TransactionalQueryable } from '../config/database';
import {
  ArtifactType,
  ExtractedIntelligence,
  IntelligenceCreate,
  IntelligenceSummary,
  intelligenceCreateSchema,
  intelligenceRowSchema,
} from '../types/intelligence';
import { decodeRow, decodeRows, encodeJson } from '../utils/columns';
import { logger } from '../utils/logger';
import { parseInput } from '../utils/validation';
import { SystemLogSink } from './system-log.service';

const TABLE = 'extracted_intelligence';

/**
 * Idempotent store for extracted artifacts. Identity is
 * (session_id, artifact_type, artifact_value); a repeat sighting bumps the
 * confirmation count of the existing row in the same statement that tried
 * the insert, so concurrent extractions of one artifact cannot produce two
 * rows or lose a count.
 */
export class IntelligenceDeduplicator {
  constructor(
    private readonly db: TransactionalQueryable,
    private readonly events?: SystemLogSink
  ) {}

  async extractArtifact(input: IntelligenceCreate): Promise<ExtractedIntelligence> {
    const data = parseInput(intelligenceCreateSchema, input);
    const observedAt = data.observed_at ?? new Date().toISOString();

    // On conflict only the counters and last_seen_at move; everything else
    // keeps the values from the first sighting. last_seen_at never moves back.
    const { artifact, isNew } = await this.db.transaction('intelligence.extract', async (tx) => {
      const result = await tx.query(
        'intelligence.extract',
        `INSERT INTO extracted_intelligence (
           id, session_id, artifact_type, artifact_value,
           extracted_from_message_id, extracted_at_turn, extraction_method,
           confirmed, confirmation_count, confidence_score,
           first_seen_at, last_seen_at, context_snippet, metadata
         )
         VALUES ($1, $2, $3, $4, $5, $6, $7, false, 1, $8, $9, $9, $10, $11)
         ON CONFLICT (session_id, artifact_type, artifact_value)
         DO UPDATE SET
           confirmation_count = extracted_intelligence.confirmation_count + 1,
           confirmed = true,
           last_seen_at = CASE
             WHEN EXCLUDED.last_seen_at > extracted_intelligence.last_seen_at THEN EXCLUDED.last_seen_at
             ELSE extracted_intelligence.last_seen_at
           END
         RETURNING *`,
        [
          uuidv4(),
          data.session_id,
          data.artifact_type,
          data.artifact_value,
          data.extracted_from_message_id,
          data.extracted_at_turn,
          data.extraction_method,
          data.confidence_score,
          observedAt,
          data.context_snippet ?? null,
          encodeJson(data.metadata),
        ]
      );

      const stored = decodeRow(intelligenceRowSchema, result.rows[0], TABLE);
      const inserted = stored.confirmation_count === 1;

      if (inserted) {
        await tx.query(
          'sessions.countIntelligence',
          `UPDATE sessions
           SET intelligence_extracted_count = intelligence_extracted_count + 1, updated_at = NOW()
           WHERE id = $1`,
          [stored.session_id]
        );
      }

      return { artifact: stored, isNew: inserted };
    });

    logger.info(isNew ? 'Artifact extracted' : 'Artifact confirmed', {
      sessionId: artifact.session_id,
      type: artifact.artifact_type,
      confirmations: artifact.confirmation_count,
    });

    await this.events?.log({
      session_id: artifact.session_id,
      log_level: 'INFO',
      component: 'intelligence',
      event_type: isNew ? 'artifact_extracted' : 'artifact_confirmed',
      message: `${artifact.artifact_type} seen ${artifact.confirmation_count} time(s)`,
      details: { artifact_id: artifact.id, turn: data.extracted_at_turn },
    });

    return artifact;
  }

  async getAllForSession(sessionUuid: string): Promise<ExtractedIntelligence[]> {
    const result = await this.db.query(
      'intelligence.all',
      `SELECT * FROM extracted_intelligence
       WHERE session_id = $1
       ORDER BY first_seen_at ASC`,
      [sessionUuid]
    );
    return decodeRows(intelligenceRowSchema, result.rows, TABLE);
  }

  /** Confirmed artifacts, most corroborated first. */
  async getConfirmed(sessionUuid: string): Promise<ExtractedIntelligence[]> {
    const result = await this.db.query(
      'intelligence.confirmed',
      `SELECT * FROM extracted_intelligence
       WHERE session_id = $1 AND confirmed = true
       ORDER BY confirmation_count DESC, first_seen_at ASC`,
      [sessionUuid]
    );
    return decodeRows(intelligenceRowSchema, result.rows, TABLE);
  }

  async summarize(sessionUuid: string): Promise<IntelligenceSummary> {
    return summarizeArtifacts(await this.getAllForSession(sessionUuid));
  }
}

export function summarizeArtifacts(artifacts: ExtractedIntelligence[]): IntelligenceSummary {
  const byType: Record<ArtifactType, number> = {
    upi_id: 0,
    bank_account: 0,
    phone_number: 0,
    phishing_link: 0,
    suspicious_keyword: 0,
  };
  for (const artifact of artifacts) {
    byType[artifact.artifact_type] += 1;
  }
  return {
    total_artifacts: artifacts.length,
    confirmed_artifacts: artifacts.filter((artifact) => artifact.confirmed).length,
    by_type: byType,
  };
}
