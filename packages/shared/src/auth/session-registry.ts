import logger from '../utils/logger.js';
import { ConflictError, InvalidSessionError } from '../types/errors.js';
import type { LoginClient } from '../types/login-client.interface.js';
import type {
    ChallengeKind,
    CookieRef,
    ISessionRegistry,
    LoginSession,
    SessionRegistryOptions
} from '../types/session.interface.js';

/**
 * In-memory table of in-flight login attempts, keyed by opaque session token.
 *
 * Every method is synchronous, so each mutation completes within one event-loop
 * turn and concurrent requests never observe a half-applied change.
 *
 * Tokens are single-use: once removed (or expired) a token is retired and
 * `create` refuses it. With `ttlMs > 0` idle sessions expire lazily on access
 * and on `sweep()`.
 */
export class SessionRegistry implements ISessionRegistry {
    private readonly sessions = new Map<string, LoginSession>();
    private readonly retired = new Set<string>();
    private readonly options: SessionRegistryOptions;

    constructor(options: Partial<SessionRegistryOptions> = {}) {
        this.options = {
            ttlMs: options.ttlMs ?? 0,
            now: options.now ?? Date.now
        };
    }

    get size(): number {
        return this.sessions.size;
    }

    create(token: string, identity: string, secret: string, client: LoginClient, cookieRef: CookieRef): LoginSession {
        if (this.sessions.has(token) || this.retired.has(token)) {
            throw new ConflictError('Session token already in use', { reason: 'duplicate_token' });
        }

        const now = this.options.now();
        const session: LoginSession = {
            token,
            identity,
            secret,
            client,
            cookieRef,
            challengePending: false,
            completed: false,
            createdAt: now,
            lastAccessedAt: now
        };
        this.sessions.set(token, session);

        logger.debug({ identity, sessions: this.sessions.size }, 'Login session created');
        return session;
    }

    get(token: string): LoginSession | undefined {
        const session = this.sessions.get(token);
        if (!session) {
            return undefined;
        }
        if (this.isExpired(session)) {
            this.evict(token, 'expired');
            return undefined;
        }
        session.lastAccessedAt = this.options.now();
        return session;
    }

    markChallenge(token: string, kind: ChallengeKind): void {
        const session = this.require(token);
        session.challengePending = true;
        session.challengeKind = kind;
    }

    /**
     * Queue the one-shot answer. A newer answer replaces an unconsumed one.
     */
    setAnswer(token: string, answer: string): void {
        const session = this.require(token);
        session.answer = answer;
        session.challengePending = false;
    }

    markCompleted(token: string): void {
        const session = this.require(token);
        session.completed = true;
        session.challengePending = false;
        session.answer = undefined;
    }

    takeAnswer(token: string): string | undefined {
        const session = this.sessions.get(token);
        if (!session) {
            return undefined;
        }
        const answer = session.answer;
        session.answer = undefined;
        return answer;
    }

    remove(token: string): void {
        this.evict(token, 'removed');
    }

    /**
     * Reclaim every expired session. Returns how many were dropped.
     */
    sweep(): number {
        if (this.options.ttlMs <= 0) {
            return 0;
        }

        let reclaimed = 0;
        for (const [token, session] of this.sessions) {
            if (this.isExpired(session)) {
                this.evict(token, 'expired');
                reclaimed++;
            }
        }

        if (reclaimed > 0) {
            logger.info({ reclaimed, remaining: this.sessions.size }, 'Expired login sessions swept');
        }
        return reclaimed;
    }

    private require(token: string): LoginSession {
        const session = this.get(token);
        if (!session) {
            throw new InvalidSessionError(token);
        }
        return session;
    }

    private isExpired(session: LoginSession): boolean {
        return this.options.ttlMs > 0 && session.lastAccessedAt + this.options.ttlMs <= this.options.now();
    }

    private evict(token: string, reason: 'removed' | 'expired'): void {
        const session = this.sessions.get(token);
        this.retired.add(token);
        if (session) {
            this.sessions.delete(token);
            logger.debug({ identity: session.identity, reason }, 'Login session released');
        }
    }
}

/**
 * Factory function to create SessionRegistry instance
 */
export function createSessionRegistry(options: Partial<SessionRegistryOptions> = {}): SessionRegistry {
    return new SessionRegistry(options);
}
