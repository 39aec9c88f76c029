import { mkdir, readFile, rm, stat, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import logger from '../utils/logger.js';
import { normalizeIdentity } from './identity.js';
import type { CookieCacheOptions, ICookieCache, RemoteCache } from '../types/cache.interface.js';
import type { CookieRef } from '../types/session.interface.js';

const REMOTE_KEY_PREFIX = 'cookie:';
const COOKIE_FILE_SUFFIX = '.json';

async function fileExists(path: string): Promise<boolean> {
    try {
        const info = await stat(path);
        return info.isFile();
    } catch {
        return false;
    }
}

/**
 * Cache-aside store for post-login cookie blobs.
 *
 * The local file is authoritative whenever it exists; the remote tier is a
 * best-effort, TTL-bounded copy that lets a fresh host skip the login. Remote
 * failures are logged and treated as a miss (read) or a no-op (write/delete).
 */
export class CookieCache implements ICookieCache {
    private readonly cookiesDir: string;
    private readonly ttlSeconds: number;
    private readonly remote?: RemoteCache;
    // Last content seen per key, from either tier
    private readonly mirror = new Map<string, string>();

    constructor(options: CookieCacheOptions) {
        this.cookiesDir = options.cookiesDir;
        this.ttlSeconds = options.ttlSeconds;
        this.remote = options.remote?.enabled ? options.remote : undefined;

        if (!this.remote) {
            logger.warn('Remote cookie tier not configured. Cookies persist on local disk only.');
        }
    }

    keyFor(identity: string): string {
        return `${REMOTE_KEY_PREFIX}${normalizeIdentity(identity)}${COOKIE_FILE_SUFFIX}`;
    }

    getCookiePath(identity: string): string {
        return join(this.cookiesDir, `${normalizeIdentity(identity)}${COOKIE_FILE_SUFFIX}`);
    }

    peek(identity: string): string | undefined {
        return this.mirror.get(this.keyFor(identity));
    }

    /**
     * Make sure the identity's cookie file is on local disk, pulling it from the remote tier if needed
     */
    async load(identity: string): Promise<CookieRef> {
        const path = this.getCookiePath(identity);
        const key = this.keyFor(identity);
        const ref = (exists: boolean): CookieRef => ({ identity: normalizeIdentity(identity), path, exists });

        if (await fileExists(path)) {
            try {
                this.mirror.set(key, await readFile(path, 'utf8'));
            } catch (error) {
                logger.warn({ err: error, path }, 'Failed reading cookie file');
            }
            return ref(true);
        }

        if (!this.remote) {
            return ref(false);
        }

        let data: string | null;
        try {
            data = await this.remote.get(key);
        } catch (error) {
            logger.warn({ err: error, key }, 'Remote cookie get failed');
            return ref(false);
        }

        if (!data) {
            return ref(false);
        }

        try {
            await mkdir(dirname(path), { recursive: true });
            await writeFile(path, data, 'utf8');
            this.mirror.set(key, data);
            logger.debug({ key }, 'Cookie restored from remote tier');
            return ref(true);
        } catch (error) {
            logger.warn({ err: error, path }, 'Failed writing cookie file');
            return ref(false);
        }
    }

    /**
     * Push the local cookie file to the remote tier, optionally deleting the local copy afterwards.
     * Without a remote tier the local copy is the only one and is left untouched.
     */
    async save(identity: string, cleanupLocal: boolean = false): Promise<void> {
        if (!this.remote) {
            return;
        }

        const path = this.getCookiePath(identity);
        if (!(await fileExists(path))) {
            logger.warn({ path }, 'No local cookie file to save');
            return;
        }

        let content: string;
        try {
            content = await readFile(path, 'utf8');
        } catch (error) {
            logger.warn({ err: error, path }, 'Failed reading cookie file');
            return;
        }

        const key = this.keyFor(identity);
        try {
            await this.remote.set(key, content, this.ttlSeconds);
            this.mirror.set(key, content);
            logger.debug({ key, ttlSeconds: this.ttlSeconds }, 'Cookie pushed to remote tier');
        } catch (error) {
            logger.warn({ err: error, key }, 'Remote cookie set failed');
        }

        if (cleanupLocal) {
            await this.removeLocal(path);
        }
    }

    async delete(identity: string): Promise<void> {
        const key = this.keyFor(identity);
        await this.removeLocal(this.getCookiePath(identity));
        this.mirror.delete(key);

        if (this.remote) {
            try {
                await this.remote.delete(key);
            } catch (error) {
                logger.warn({ err: error, key }, 'Remote cookie delete failed');
            }
        }
    }

    private async removeLocal(path: string): Promise<void> {
        try {
            await rm(path, { force: true });
        } catch (error) {
            logger.warn({ err: error, path }, 'Failed deleting cookie file');
        }
    }
}

/**
 * Factory function to create CookieCache instance
 */
export function createCookieCache(options: CookieCacheOptions): CookieCache {
    return new CookieCache(options);
}
