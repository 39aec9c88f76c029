import dotenv from 'dotenv';
import type { Server } from 'http';
import {
    createChallengeLoginDriver,
    createCookieCache,
    createRedisCache,
    createSessionRegistry,
    logger,
    validateEnvironment
} from '@authbridge/shared';
import type { LoginClientFactory } from '@authbridge/shared';
import { createApp } from './api/server.js';
import { AuthService } from './services/auth.service.js';

export { createApp } from './api/server.js';
export { AuthService } from './services/auth.service.js';
export type { AuthResult, AuthServiceDeps } from './services/auth.service.js';

/**
 * Wire the auth stack from the environment and start listening.
 * The login client is supplied by the embedding application.
 */
export async function startAuthServer(createLoginClient: LoginClientFactory): Promise<Server> {
    dotenv.config();
    const env = validateEnvironment();

    const remote = createRedisCache(env.REDIS_URL);
    const cookieCache = createCookieCache({
        cookiesDir: env.COOKIES_DIR,
        ttlSeconds: env.COOKIE_TTL_SECONDS,
        remote
    });
    const registry = createSessionRegistry({ ttlMs: env.AUTH_SESSION_TTL_MS });
    const driver = createChallengeLoginDriver({ registry });
    const authService = new AuthService({
        driver,
        registry,
        cookieCache,
        createLoginClient,
        cleanupLocalCookies: env.COOKIE_CLEANUP_LOCAL
    });

    const sweeper = env.AUTH_SESSION_TTL_MS > 0
        ? setInterval(() => registry.sweep(), env.SESSION_SWEEP_INTERVAL_MS)
        : undefined;
    sweeper?.unref();

    const app = createApp({ authService });
    const server = app.listen(env.PORT, () => {
        logger.info({ port: env.PORT }, 'Auth server listening');
    });

    server.on('close', () => {
        if (sweeper) clearInterval(sweeper);
        remote.disconnect().catch(error => logger.warn({ err: error }, 'Remote cache disconnect failed'));
    });

    return server;
}
