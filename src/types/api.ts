import { z } from 'zod';

// Wire shapes exchanged with the surrounding service. Field names are
// camelCase here and snake_case in the ledger.

export const artifactMapSchema = z.object({
  upiIds: z.array(z.string()),
  bankAccounts: z.array(z.string()),
  phoneNumbers: z.array(z.string()),
  phishingLinks: z.array(z.string()),
  suspiciousKeywords: z.array(z.string()),
});

export type ArtifactMap = z.infer<typeof artifactMapSchema>;

const envelopeMessageSchema = z.object({
  sender: z.enum(['scammer', 'user']),
  text: z.string(),
  timestamp: z.union([z.string(), z.number()]),
});

export const inboundMessageSchema = z.object({
  sessionId: z.string().min(1),
  message: envelopeMessageSchema,
  conversationHistory: z.array(envelopeMessageSchema).default([]),
  metadata: z
    .object({
      channel: z.string().optional(),
      language: z.string().optional(),
      locale: z.string().optional(),
    })
    .passthrough()
    .optional(),
});

export type InboundMessage = z.infer<typeof inboundMessageSchema>;

export const agentResponseSchema = z.object({
  status: z.string().default('success'),
  scamDetected: z.boolean(),
  agentMessage: z.string().optional(),
  shouldContinue: z.boolean().default(true),
  extractedIntelligence: artifactMapSchema.partial().optional(),
  agentNotes: z.string().optional(),
});

export type AgentResponse = z.infer<typeof agentResponseSchema>;

export const finalCallbackSchema = z.object({
  sessionId: z.string(),
  scamDetected: z.boolean(),
  totalMessagesExchanged: z.number().int().min(0),
  extractedIntelligence: artifactMapSchema,
  agentNotes: z.string(),
});

export type FinalCallbackPayload = z.infer<typeof finalCallbackSchema>;
