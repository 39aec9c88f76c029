import { describe, it, expect, vi } from 'vitest';
import type { Redis } from 'ioredis';
import { CacheError, CircuitOpenError, RedisCache } from '@authbridge/shared';

function createFakeRedis() {
    return {
        get: vi.fn(),
        set: vi.fn(),
        del: vi.fn(),
        quit: vi.fn().mockResolvedValue('OK'),
        on: vi.fn()
    };
}

function createCache(fake: ReturnType<typeof createFakeRedis>) {
    return new RedisCache({
        client: fake as unknown as Redis,
        breaker: { failureThreshold: 2, cooldownMs: 1000, now: () => 0 }
    });
}

describe('RedisCache', () => {
    it('should be disabled without a url', async () => {
        const cache = new RedisCache();

        expect(cache.enabled).toBe(false);
        await expect(cache.get('cookie:alice.json')).resolves.toBeNull();
        await expect(cache.set('cookie:alice.json', 'cookies', 60)).resolves.toBeUndefined();
        await expect(cache.delete('cookie:alice.json')).resolves.toBeUndefined();
    });

    it('should read values', async () => {
        const fake = createFakeRedis();
        fake.get.mockResolvedValue('cookies');
        const cache = createCache(fake);

        expect(cache.enabled).toBe(true);
        await expect(cache.get('cookie:alice.json')).resolves.toBe('cookies');
        expect(fake.get).toHaveBeenCalledWith('cookie:alice.json');
    });

    it('should write values with an expiry', async () => {
        const fake = createFakeRedis();
        fake.set.mockResolvedValue('OK');
        const cache = createCache(fake);

        await cache.set('cookie:alice.json', 'cookies', 604800);

        expect(fake.set).toHaveBeenCalledWith('cookie:alice.json', 'cookies', 'EX', 604800);
    });

    it('should delete keys', async () => {
        const fake = createFakeRedis();
        fake.del.mockResolvedValue(1);
        const cache = createCache(fake);

        await cache.delete('cookie:alice.json');

        expect(fake.del).toHaveBeenCalledWith('cookie:alice.json');
    });

    it('should wrap failures in CacheError', async () => {
        const fake = createFakeRedis();
        fake.get.mockRejectedValue(new Error('connection refused'));
        const cache = createCache(fake);

        const error = await cache.get('cookie:alice.json').catch((e: unknown) => e);

        expect(error).toBeInstanceOf(CacheError);
        expect(error).toMatchObject({
            code: 'CACHE_ERROR',
            message: 'Remote cache get failed',
            context: { operation: 'get', originalError: 'connection refused', key: 'cookie:alice.json' }
        });
    });

    it('should stop calling the server once the breaker opens', async () => {
        const fake = createFakeRedis();
        fake.get.mockRejectedValue(new Error('connection refused'));
        const cache = createCache(fake);

        await expect(cache.get('a')).rejects.toBeInstanceOf(CacheError);
        await expect(cache.get('a')).rejects.toBeInstanceOf(CacheError);
        const error = await cache.get('a').catch((e: unknown) => e);

        expect(fake.get).toHaveBeenCalledTimes(2);
        expect(error).toBeInstanceOf(CacheError);
        expect(error instanceof CacheError && error.cause).toBeInstanceOf(CircuitOpenError);
    });

    it('should quit on disconnect', async () => {
        const fake = createFakeRedis();
        const cache = createCache(fake);

        await cache.disconnect();

        expect(fake.quit).toHaveBeenCalledTimes(1);
        await expect(cache.get('a')).resolves.toBeNull();
    });
});
