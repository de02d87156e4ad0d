import { logger } from '../utils/logger';
import { toError } from '../utils/errors';

export const CACHE_TTL = 3600; // 1 hour

export type CacheSnapshot = Record<string, unknown>;

/** The Redis commands the cache issues. */
export interface CacheClient {
  get(key: string): Promise<unknown>;
  set(key: string, value: string, options: { EX: number }): Promise<unknown>;
  del(keys: string[]): Promise<unknown>;
  expire(key: string, seconds: number): Promise<unknown>;
}

export const sessionKey = (sessionId: string) => `session:${sessionId}`;
export const stateKey = (sessionId: string) => `state:${sessionId}`;

function isSnapshot(value: unknown): value is CacheSnapshot {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Ephemeral mirror of session and state snapshots. Never authoritative:
 * every failure is logged and reported as a miss, and nothing here touches
 * the durable ledger.
 */
export class SessionCache {
  constructor(private readonly redis: CacheClient) {}

  async cacheSession(sessionId: string, snapshot: CacheSnapshot): Promise<void> {
    await this.write(sessionKey(sessionId), snapshot);
  }

  async getCachedSession(sessionId: string): Promise<CacheSnapshot | null> {
    return this.read(sessionKey(sessionId));
  }

  async cacheState(sessionId: string, snapshot: CacheSnapshot): Promise<void> {
    await this.write(stateKey(sessionId), snapshot);
  }

  async getCachedState(sessionId: string): Promise<CacheSnapshot | null> {
    return this.read(stateKey(sessionId));
  }

  async invalidate(sessionId: string): Promise<void> {
    try {
      await this.redis.del([sessionKey(sessionId), stateKey(sessionId)]);
    } catch (error) {
      logger.warn('Cache invalidate failed', { sessionId, error: toError(error).message });
    }
  }

  /** Refreshes the TTL of whichever keys still exist; EXPIRE never creates one. */
  async extendTtl(sessionId: string): Promise<void> {
    try {
      await Promise.all([
        this.redis.expire(sessionKey(sessionId), CACHE_TTL),
        this.redis.expire(stateKey(sessionId), CACHE_TTL),
      ]);
    } catch (error) {
      logger.warn('Cache TTL extension failed', { sessionId, error: toError(error).message });
    }
  }

  private async write(key: string, snapshot: CacheSnapshot): Promise<void> {
    try {
      await this.redis.set(key, JSON.stringify(snapshot), { EX: CACHE_TTL });
    } catch (error) {
      logger.warn('Cache set failed', { key, error: toError(error).message });
    }
  }

  private async read(key: string): Promise<CacheSnapshot | null> {
    let data: unknown;
    try {
      data = await this.redis.get(key);
    } catch (error) {
      logger.warn('Cache get failed', { key, error: toError(error).message });
      return null;
    }
    if (typeof data !== 'string') return null;

    try {
      const parsed: unknown = JSON.parse(data);
      return isSnapshot(parsed) ? parsed : null;
    } catch (error) {
      logger.warn('Discarding unreadable cache entry', { key, error: toError(error).message });
      return null;
    }
  }
}
