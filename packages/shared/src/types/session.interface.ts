import type { ApplicationError } from './errors.js';
import type { LoginClient } from './login-client.interface.js';

export type ChallengeKind = 'confirmation_code' | 'email_verification';

/**
 * Out-of-band proof demanded by the provider mid-login.
 * Lives only as long as the HTTP round-trip that carries it.
 */
export interface VerificationChallenge {
    kind: ChallengeKind;
    message: string;
    hint?: string;
}

/**
 * Where an identity's cookie blob lives locally. `exists` is false on a cache miss.
 */
export interface CookieRef {
    identity: string;
    path: string;
    exists: boolean;
}

export interface LoginSession {
    token: string;
    identity: string;
    secret: string;
    client: LoginClient;
    cookieRef: CookieRef;

    challengePending: boolean;
    challengeKind?: ChallengeKind;
    // One-shot; cleared the moment it is handed to the login client
    answer?: string;
    // Set once the login has succeeded; a completed session takes no more answers
    completed: boolean;

    createdAt: number;
    lastAccessedAt: number;
}

export type LoginOutcome =
    | { status: 'success' }
    | { status: 'suspended'; challenge: VerificationChallenge }
    | { status: 'failed'; error: ApplicationError };

export interface SessionRegistryOptions {
    /** Idle lifetime of a session; 0 keeps sessions until removed */
    ttlMs: number;
    now: () => number;
}

export interface ISessionRegistry {
    create(token: string, identity: string, secret: string, client: LoginClient, cookieRef: CookieRef): LoginSession;
    get(token: string): LoginSession | undefined;
    markChallenge(token: string, kind: ChallengeKind): void;
    setAnswer(token: string, answer: string): void;
    markCompleted(token: string): void;
    takeAnswer(token: string): string | undefined;
    remove(token: string): void;
    sweep(): number;
    readonly size: number;
}
