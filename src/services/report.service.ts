import { ArtifactMap, FinalCallbackPayload } from '../types/api';
import { ArtifactType, ExtractedIntelligence } from '../types/intelligence';
import { Session } from '../types/session';
import { ScammerTactic } from '../types/tactic';

const ARTIFACT_FIELDS: Record<ArtifactType, keyof ArtifactMap> = {
  upi_id: 'upiIds',
  bank_account: 'bankAccounts',
  phone_number: 'phoneNumbers',
  phishing_link: 'phishingLinks',
  suspicious_keyword: 'suspiciousKeywords',
};

export function toArtifactMap(artifacts: ExtractedIntelligence[]): ArtifactMap {
  const map: ArtifactMap = {
    upiIds: [],
    bankAccounts: [],
    phoneNumbers: [],
    phishingLinks: [],
    suspiciousKeywords: [],
  };
  for (const artifact of artifacts) {
    const values = map[ARTIFACT_FIELDS[artifact.artifact_type]];
    if (!values.includes(artifact.artifact_value)) {
      values.push(artifact.artifact_value);
    }
  }
  return map;
}

export function describeTactics(tactics: ScammerTactic[]): string {
  if (tactics.length === 0) {
    return 'No manipulation tactics recorded';
  }
  const seen = [...new Set(tactics.map((tactic) => tactic.tactic_type))];
  const high = tactics.filter((tactic) => tactic.threat_level === 'high').length;
  return `Tactics observed: ${seen.join(', ')}` + (high > 0 ? ` (${high} high-threat)` : '');
}

export function buildFinalCallback(
  session: Session,
  artifacts: ExtractedIntelligence[],
  tactics: ScammerTactic[],
  notes?: string
): FinalCallbackPayload {
  return {
    sessionId: session.session_id,
    scamDetected: session.scam_detected,
    totalMessagesExchanged: session.total_messages_exchanged,
    extractedIntelligence: toArtifactMap(artifacts),
    agentNotes: notes ? `${notes}. ${describeTactics(tactics)}` : describeTactics(tactics),
  };
}
