import { Redis } from 'ioredis';
import logger from '../utils/logger.js';
import { CircuitBreaker, type CircuitBreakerOptions } from '../utils/circuit-breaker.js';
import { CacheError } from '../types/errors.js';
import type { RemoteCache } from '../types/cache.interface.js';

export interface RedisCacheOptions {
    url?: string;
    breaker?: Partial<CircuitBreakerOptions>;
    /** Pre-built connection; mainly for tests */
    client?: Redis;
}

/**
 * Remote cookie tier on Redis (or any Redis-compatible store).
 * Without a URL the tier reports itself disabled and every call is a miss or a no-op.
 */
export class RedisCache implements RemoteCache {
    private client: Redis | null;
    private readonly breaker: CircuitBreaker;
    readonly enabled: boolean;

    constructor(options: RedisCacheOptions = {}) {
        this.breaker = new CircuitBreaker('RemoteCookieCache', {
            failureThreshold: 5,
            cooldownMs: 10000,
            successThreshold: 2,
            ...options.breaker
        });

        if (options.client) {
            this.client = options.client;
        } else if (options.url) {
            this.client = new Redis(options.url, {
                maxRetriesPerRequest: 3,
                enableReadyCheck: true,
                lazyConnect: true,
                keepAlive: 10000,
                connectTimeout: 10000,
                retryStrategy: (times: number) => {
                    if (times > 10) {
                        logger.warn('Remote cache connection failed after 10 retries');
                        return null;
                    }
                    return Math.min(times * 100, 3000);
                }
            });
            this.setupEventHandlers(this.client);
        } else {
            this.client = null;
        }

        this.enabled = this.client !== null;
    }

    private setupEventHandlers(instance: Redis): void {
        instance.on('connect', () => {
            logger.info('Remote cache connected');
        });

        instance.on('error', (err: Error) => {
            logger.warn({ err: err.message }, 'Remote cache error');
        });
    }

    private async run<T>(operation: string, key: string, fn: (client: Redis) => Promise<T>, fallback: T): Promise<T> {
        const client = this.client;
        if (!client) {
            return fallback;
        }
        try {
            return await this.breaker.execute(() => fn(client));
        } catch (error) {
            throw new CacheError(operation, error, { key });
        }
    }

    async get(key: string): Promise<string | null> {
        return this.run('get', key, client => client.get(key), null);
    }

    async set(key: string, value: string, ttlSeconds: number): Promise<void> {
        await this.run<unknown>('set', key, client => client.set(key, value, 'EX', ttlSeconds), null);
    }

    async delete(key: string): Promise<void> {
        await this.run<unknown>('delete', key, client => client.del(key), 0);
    }

    async disconnect(): Promise<void> {
        if (this.client) {
            await this.client.quit();
            this.client = null;
            logger.info('Remote cache disconnected');
        }
    }
}

/**
 * Factory function to create the remote tier from configuration
 */
export function createRedisCache(url?: string): RedisCache {
    return new RedisCache({ url: url || undefined });
}
