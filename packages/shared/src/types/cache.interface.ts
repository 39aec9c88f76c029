import type { CookieRef } from './session.interface.js';

/**
 * Remote TTL-backed key/value tier. Operations reject with CacheError on failure.
 */
export interface RemoteCache {
    readonly enabled: boolean;
    get(key: string): Promise<string | null>;
    set(key: string, value: string, ttlSeconds: number): Promise<void>;
    delete(key: string): Promise<void>;
}

export interface CookieCacheOptions {
    cookiesDir: string;
    ttlSeconds: number;
    remote?: RemoteCache;
}

export interface ICookieCache {
    load(identity: string): Promise<CookieRef>;
    save(identity: string, cleanupLocal?: boolean): Promise<void>;
    delete(identity: string): Promise<void>;
}
