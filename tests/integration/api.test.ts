jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

jest.mock('@sentry/node', () => ({
  captureException: jest.fn(),
  setupExpressErrorHandler: jest.fn(),
}));

import { Server } from 'http';
import { createApp } from '../../src/app';
import { parseApiKeys } from '../../src/middleware/auth';
import { HoneypotLedger } from '../../src/services/ledger';
import { createMemoryDatabase } from '../helpers/memory-db';
import { MemoryCache } from '../helpers/memory-cache';

const API_KEY = 'test-key';

describe('Operations API', () => {
  let ledger: HoneypotLedger;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    ledger = new HoneypotLedger(createMemoryDatabase(), new MemoryCache());
    const app = createApp(ledger, { apiKeys: parseApiKeys(API_KEY), sentryEnabled: false });
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server did not bind a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  function get(path: string, apiKey: string | null = API_KEY) {
    return fetch(`${baseUrl}${path}`, { headers: apiKey === null ? {} : { 'x-api-key': apiKey } });
  }

  async function seedSession() {
    const session = await ledger.sessions.createSession({ session_id: 'sess-api' });
    const message = await ledger.messages.appendMessage({
      session_id: session.id,
      sender: 'scammer',
      text: 'Send money to pay@upi now',
      turn_number: 1,
    });
    const artifact = {
      session_id: session.id,
      artifact_type: 'upi_id' as const,
      artifact_value: 'pay@upi',
      extracted_from_message_id: message.id,
      extracted_at_turn: 1,
    };
    await ledger.intelligence.extractArtifact(artifact);
    await ledger.intelligence.extractArtifact(artifact);
    await ledger.tactics.recordTactic({
      session_id: session.id,
      tactic_type: 'urgency_pressure',
      detected_at_turn: 1,
      message_text: 'now',
      threat_level: 'high',
    });
    await ledger.sessions.updateSession('sess-api', { scam_detected: true });
  }

  describe('auth', () => {
    it('should parse a comma separated key list', () => {
      expect([...parseApiKeys(' key-one, ,key-two ')]).toEqual(['key-one', 'key-two']);
      expect(parseApiKeys(undefined).size).toBe(0);
    });

    it('should answer health checks without a key', async () => {
      const res = await get('/health', null);
      const body = await res.json();

      // No Redis client is attached, so its status is unknown.
      expect(res.status).toBe(503);
      expect(body).toMatchObject({
        status: 'degraded',
        database: { status: 'healthy' },
        redis: { status: 'unknown' },
      });
    });

    it('should respond 401 without a key', async () => {
      const res = await get('/api/sessions/active', null);
      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ success: false, error: 'Missing API key' });
    });

    it('should respond 403 for an unknown key', async () => {
      const res = await get('/api/sessions/active', 'wrong-key');
      expect(res.status).toBe(403);
      expect(await res.json()).toEqual({ success: false, error: 'Invalid API key' });
    });
  });

  describe('sessions', () => {
    it('should list active sessions', async () => {
      await seedSession();
      const res = await get('/api/sessions/active');
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body).toMatchObject({ success: true, count: 1, sessions: [{ session_id: 'sess-api' }] });
    });

    it('should return one session', async () => {
      await seedSession();
      const body = await (await get('/api/sessions/sess-api')).json();

      expect(body).toMatchObject({
        success: true,
        session: { session_id: 'sess-api', scam_detected: true, total_messages_exchanged: 1 },
      });
    });

    it('should respond 404 for an unknown session', async () => {
      const res = await get('/api/sessions/nope');
      expect(res.status).toBe(404);
    });

    it('should summarise intelligence', async () => {
      await seedSession();
      const body = await (await get('/api/sessions/sess-api/intelligence')).json();

      expect(body).toMatchObject({
        sessionId: 'sess-api',
        summary: { total_artifacts: 1, confirmed_artifacts: 1, by_type: { upi_id: 1 } },
        extractedIntelligence: { upiIds: ['pay@upi'] },
        confirmed: [{ artifact_value: 'pay@upi', confirmation_count: 2 }],
      });
    });

    it('should respond 404 from intelligence for an unknown session', async () => {
      const res = await get('/api/sessions/nope/intelligence');
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ success: false, error: 'Session nope not found' });
    });

    it('should build the final callback payload', async () => {
      await seedSession();
      const body = await (await get('/api/sessions/sess-api/callback-payload?notes=Asked%20for%20UPI')).json();

      expect(body).toEqual({
        sessionId: 'sess-api',
        scamDetected: true,
        totalMessagesExchanged: 1,
        extractedIntelligence: {
          upiIds: ['pay@upi'],
          bankAccounts: [],
          phoneNumbers: [],
          phishingLinks: [],
          suspiciousKeywords: [],
        },
        agentNotes: 'Asked for UPI. Tactics observed: urgency_pressure (1 high-threat)',
      });
    });
  });
});
