import crypto from 'crypto';
import {
    ChallengeLoginDriver,
    CookieCache,
    InvalidSessionError,
    SessionRegistry,
    logger
} from '@authbridge/shared';
import type { LoginClientFactory, LoginOutcome, VerificationChallenge } from '@authbridge/shared';

export type AuthResult =
    | { status: 'success'; identity: string }
    | { status: 'challenge'; sessionToken: string; challenge: VerificationChallenge };

export interface AuthServiceDeps {
    driver: ChallengeLoginDriver;
    registry: SessionRegistry;
    cookieCache: CookieCache;
    createLoginClient: LoginClientFactory;
    cleanupLocalCookies?: boolean;
    generateToken?: () => string;
}

/**
 * Caller side of the login driver: owns token generation, cookie hand-off and session cleanup.
 * Only a successful login releases its session here.
 */
export class AuthService {
    private readonly generateToken: () => string;

    constructor(private readonly deps: AuthServiceDeps) {
        this.generateToken = deps.generateToken ?? (() => crypto.randomUUID());
    }

    /**
     * Start a login, reusing any cached cookies for the identity
     */
    async startAuth(identity: string, secret: string): Promise<AuthResult> {
        const token = this.generateToken();
        const cookieRef = await this.deps.cookieCache.load(identity);

        const outcome = await this.deps.driver.begin(
            token,
            identity,
            secret,
            cookieRef,
            this.deps.createLoginClient()
        );
        return this.settle(token, identity, outcome);
    }

    /**
     * Answer the pending challenge of a suspended login
     */
    async submitChallenge(sessionToken: string, answer: string): Promise<AuthResult> {
        const session = this.deps.registry.get(sessionToken);
        if (!session) {
            throw new InvalidSessionError(sessionToken);
        }

        const outcome = await this.deps.driver.resume(sessionToken, answer);
        return this.settle(sessionToken, session.identity, outcome);
    }

    cancel(sessionToken: string): void {
        if (!this.deps.registry.get(sessionToken)) {
            throw new InvalidSessionError(sessionToken);
        }
        this.deps.registry.remove(sessionToken);
        logger.info('Login session cancelled');
    }

    async logout(identity: string): Promise<void> {
        await this.deps.cookieCache.delete(identity);
        logger.info({ identity }, 'Cached cookies discarded');
    }

    private async settle(token: string, identity: string, outcome: LoginOutcome): Promise<AuthResult> {
        switch (outcome.status) {
            case 'success':
                await this.deps.cookieCache.save(identity, this.deps.cleanupLocalCookies ?? false);
                this.deps.registry.remove(token);
                return { status: 'success', identity };

            case 'suspended':
                return { status: 'challenge', sessionToken: token, challenge: outcome.challenge };

            case 'failed':
                // The session stays for another answer; cancel or expiry reclaims it
                throw outcome.error;
        }
    }
}
