import { ConnectionManager, LedgerPool, createPool } from '../config/database';
import { LedgerConfig } from '../config/env';
import { RedisClient, checkRedisHealth, connectRedis, createRedisClient } from '../config/redis';
import { Session, sessionRowSchema } from '../types/session';
import { logger } from '../utils/logger';
import { CacheClient, SessionCache } from './cache.service';
import { EvaluationMetricsStore } from './evaluation.service';
import { IntelligenceDeduplicator } from './intelligence.service';
import { MessageLedger } from './message.service';
import { SessionStore } from './session.service';
import { StateEvolutionLedger } from './state-evolution.service';
import { SystemLogSink } from './system-log.service';
import { TacticRecorder } from './tactic.service';

export interface HealthReport {
  status: 'healthy' | 'degraded';
  database: { status: string; error?: string };
  redis: { status: string; error?: string };
}

export interface LedgerDeps {
  pool?: LedgerPool;
  cache?: CacheClient;
}

/**
 * One handle over every store. The durable stores share a connection
 * manager; the cache is a separate, non-authoritative client.
 */
export class HoneypotLedger {
  readonly sessions: SessionStore;
  readonly messages: MessageLedger;
  readonly evolution: StateEvolutionLedger;
  readonly intelligence: IntelligenceDeduplicator;
  readonly tactics: TacticRecorder;
  readonly systemLogs: SystemLogSink;
  readonly evaluations: EvaluationMetricsStore;
  readonly cache: SessionCache;

  constructor(
    readonly connections: ConnectionManager,
    cacheClient: CacheClient,
    private readonly redis?: RedisClient
  ) {
    this.cache = new SessionCache(cacheClient);
    this.systemLogs = new SystemLogSink(connections);
    this.sessions = new SessionStore(connections, this.systemLogs, this.cache);
    this.messages = new MessageLedger(connections);
    this.evolution = new StateEvolutionLedger(connections);
    this.intelligence = new IntelligenceDeduplicator(connections, this.systemLogs);
    this.tactics = new TacticRecorder(connections, this.systemLogs);
    this.evaluations = new EvaluationMetricsStore(connections);
  }

  /**
   * Cached snapshot when present and decodable, otherwise the durable record
   * (which is then cached). Hits do not extend the TTL, so counters bumped
   * outside updateSession are stale for at most CACHE_TTL.
   */
  async getSessionCached(sessionId: string): Promise<Session | null> {
    const cached = await this.cache.getCachedSession(sessionId);
    if (cached) {
      const decoded = sessionRowSchema.safeParse(cached);
      if (decoded.success && decoded.data.session_id === sessionId) {
        return decoded.data;
      }
      logger.warn('Discarding cached session that does not decode', { sessionId });
    }

    const session = await this.sessions.getBySessionId(sessionId);
    if (session) {
      await this.cache.cacheSession(sessionId, session);
    }
    return session;
  }

  async checkHealth(): Promise<HealthReport> {
    const [database, redis] = await Promise.all([
      this.connections.checkHealth(),
      this.redis ? checkRedisHealth(this.redis) : Promise.resolve({ status: 'unknown' }),
    ]);
    const healthy = database.status === 'healthy' && redis.status === 'healthy';
    return { status: healthy ? 'healthy' : 'degraded', database, redis };
  }

  async close(): Promise<void> {
    await this.connections.close();
    if (this.redis?.isOpen) {
      await this.redis.quit();
    }
    logger.info('Ledger closed');
  }
}

export async function createLedger(config: LedgerConfig, deps: LedgerDeps = {}): Promise<HoneypotLedger> {
  const connections = new ConnectionManager(deps.pool ?? createPool(config.database));

  if (deps.cache) {
    return new HoneypotLedger(connections, deps.cache);
  }

  const redis = createRedisClient(config.cache);
  await connectRedis(redis);
  return new HoneypotLedger(connections, redis, redis);
}
