import type { CookieRef } from './session.interface.js';

/**
 * Receives text the login client would show a human and returns the reply.
 * Throwing aborts the authenticate call.
 */
export type PromptHandler = (prompt: string) => Promise<string>;

export type OutputHandler = (text: string) => void;

export interface LoginAttempt {
    identity: string;
    secret: string;
    cookieRef: CookieRef;
    onPrompt: PromptHandler;
    onOutput: OutputHandler;
}

/**
 * Narrow capability over a third-party login client.
 *
 * `authenticate` resolves once the provider accepts the login and has written
 * its cookies to `cookieRef.path`, and rejects on any failure.
 *
 * Resumption re-runs `authenticate` from the start after an aborted attempt.
 * Implementations must tolerate that: resubmitting credentials after an
 * interrupted attempt has to be idempotent at the provider (an already-issued
 * verification code stays valid).
 */
export interface LoginClient {
    authenticate(attempt: LoginAttempt): Promise<void>;
}

export type LoginClientFactory = () => LoginClient;
