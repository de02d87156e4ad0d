jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { ConnectionManager } from '../../src/config/database';
import { MessageLedger } from '../../src/services/message.service';
import { ConnectivityError } from '../../src/utils/errors';

const SESSION_UUID = '6f1c2a1e-4b7d-4c8e-9a3f-2d5b8e7c1a90';

const messageRow = {
  id: '1d2c3b4a-5e6f-4a7b-8c9d-0e1f2a3b4c5d',
  session_id: SESSION_UUID,
  sender: 'scammer',
  text: 'Share the OTP',
  turn_number: 1,
  timestamp: new Date('2026-03-01T10:00:00.000Z'),
  response_delay_seconds: null,
  raw_llm_response: null,
  final_response: null,
  state_at_message: null,
  confidence_at_message: null,
  exposure_risk_at_message: null,
  created_at: new Date('2026-03-01T10:00:00.000Z'),
};

describe('MessageLedger', () => {
  let client: { query: jest.Mock; release: jest.Mock };
  let ledger: MessageLedger;

  beforeEach(() => {
    client = {
      query: jest.fn(async (text: string) => ({
        rows: text.includes('INSERT INTO messages') ? [messageRow] : [],
        rowCount: 1,
      })),
      release: jest.fn(),
    };
    ledger = new MessageLedger(
      new ConnectionManager({ connect: jest.fn().mockResolvedValue(client), end: jest.fn() })
    );
  });

  const statements = () =>
    client.query.mock.calls.map((call) => {
      const text = String(call[0]).trim();
      return text.split(/\s+/).slice(0, 2).join(' ');
    });

  it('should insert the message and bump the counter in one transaction', async () => {
    const message = await ledger.appendMessage({
      session_id: SESSION_UUID,
      sender: 'scammer',
      text: 'Share the OTP',
      turn_number: 1,
    });

    expect(message.timestamp).toBe('2026-03-01T10:00:00.000Z');
    expect(statements()).toEqual(['BEGIN', 'INSERT INTO', 'UPDATE sessions', 'COMMIT']);
  });

  it('should roll back the message when the counter update fails', async () => {
    client.query.mockImplementation(async (text: string) => {
      if (text.includes('UPDATE sessions')) {
        throw new Error('Connection terminated unexpectedly');
      }
      return { rows: text.includes('INSERT INTO messages') ? [messageRow] : [], rowCount: 1 };
    });

    await expect(
      ledger.appendMessage({ session_id: SESSION_UUID, sender: 'scammer', text: 'Share the OTP', turn_number: 1 })
    ).rejects.toBeInstanceOf(ConnectivityError);
    expect(statements()).toEqual(['BEGIN', 'INSERT INTO', 'UPDATE sessions', 'ROLLBACK']);
    expect(client.release.mock.calls[0][0]).toBeInstanceOf(ConnectivityError);
  });

  it('should accept timestamps with a UTC offset', async () => {
    await ledger.appendMessage({
      session_id: SESSION_UUID,
      sender: 'agent',
      text: 'Which OTP?',
      turn_number: 2,
      timestamp: '2026-03-01T15:30:00+05:30',
    });

    const insert = client.query.mock.calls[1];
    expect(insert[1][5]).toBe('2026-03-01T15:30:00+05:30');
  });
});
