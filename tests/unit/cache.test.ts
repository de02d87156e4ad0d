jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { CACHE_TTL, SessionCache } from '../../src/services/cache.service';
import { logger } from '../../src/utils/logger';

describe('SessionCache', () => {
  let redis: { get: jest.Mock; set: jest.Mock; del: jest.Mock; expire: jest.Mock };
  let cache: SessionCache;

  beforeEach(() => {
    jest.clearAllMocks();
    redis = {
      get: jest.fn().mockResolvedValue(null),
      set: jest.fn().mockResolvedValue('OK'),
      del: jest.fn().mockResolvedValue(2),
      expire: jest.fn().mockResolvedValue(true),
    };
    cache = new SessionCache(redis);
  });

  it('should expire entries after one hour', () => {
    expect(CACHE_TTL).toBe(3600);
  });

  it('should store session snapshots under session:<id>', async () => {
    await cache.cacheSession('sess-1', { status: 'active' });
    expect(redis.set).toHaveBeenCalledWith('session:sess-1', '{"status":"active"}', { EX: 3600 });
  });

  it('should store state snapshots under state:<id>', async () => {
    await cache.cacheState('sess-1', { current_state: 'PROBING' });
    expect(redis.set).toHaveBeenCalledWith('state:sess-1', '{"current_state":"PROBING"}', { EX: 3600 });
  });

  it('should return parsed snapshots on a hit', async () => {
    redis.get.mockResolvedValue('{"current_state":"DRAINING"}');
    expect(await cache.getCachedState('sess-1')).toEqual({ current_state: 'DRAINING' });
    expect(redis.get).toHaveBeenCalledWith('state:sess-1');
  });

  it('should return null on a miss', async () => {
    expect(await cache.getCachedSession('sess-1')).toBeNull();
  });

  it('should treat unreadable entries as a miss', async () => {
    redis.get.mockResolvedValue('{not json');
    expect(await cache.getCachedSession('sess-1')).toBeNull();

    redis.get.mockResolvedValue('[1,2]');
    expect(await cache.getCachedSession('sess-1')).toBeNull();
  });

  it('should remove both keys on invalidate', async () => {
    await cache.invalidate('sess-1');
    expect(redis.del).toHaveBeenCalledWith(['session:sess-1', 'state:sess-1']);
  });

  it('should refresh the TTL of both keys', async () => {
    await cache.extendTtl('sess-1');
    expect(redis.expire).toHaveBeenCalledWith('session:sess-1', 3600);
    expect(redis.expire).toHaveBeenCalledWith('state:sess-1', 3600);
  });

  it('should log and swallow failures', async () => {
    const down = new Error('connection lost');
    redis.get.mockRejectedValue(down);
    redis.set.mockRejectedValue(down);
    redis.del.mockRejectedValue(down);
    redis.expire.mockRejectedValue(down);

    await expect(cache.cacheSession('sess-1', {})).resolves.toBeUndefined();
    await expect(cache.getCachedSession('sess-1')).resolves.toBeNull();
    await expect(cache.invalidate('sess-1')).resolves.toBeUndefined();
    await expect(cache.extendTtl('sess-1')).resolves.toBeUndefined();
    expect(logger.warn).toHaveBeenCalledTimes(4);
  });
});
