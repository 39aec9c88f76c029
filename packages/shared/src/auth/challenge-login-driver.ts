import logger from '../utils/logger.js';
import { ExclusiveLock, loginLock } from './exclusive-lock.js';
import { classifyPrompt } from './prompt-classifier.js';
import {
    ApplicationError,
    InvalidSessionError,
    UnexpectedPromptError,
    UpstreamLoginError,
    toApplicationError
} from '../types/errors.js';
import type { LoginClient, PromptHandler, OutputHandler } from '../types/login-client.interface.js';
import type {
    CookieRef,
    ISessionRegistry,
    LoginOutcome,
    LoginSession,
    VerificationChallenge
} from '../types/session.interface.js';

export const TRANSCRIPT_LIMIT = 50;

export interface ChallengeLoginDriverOptions {
    registry: ISessionRegistry;
    lock?: ExclusiveLock;
    transcriptLimit?: number;
}

/**
 * Thrown from the prompt handler to unwind the login client when a challenge is detected
 */
class ChallengeInterrupt extends Error {
    constructor(public readonly challenge: VerificationChallenge) {
        super(`Verification challenge: ${challenge.kind}`);
        this.name = 'ChallengeInterrupt';
    }
}

const success = (): LoginOutcome => ({ status: 'success' });
const suspended = (challenge: VerificationChallenge): LoginOutcome => ({ status: 'suspended', challenge });
const failed = (error: ApplicationError): LoginOutcome => ({ status: 'failed', error });

/**
 * Drives a login client that may stop mid-call to ask a human for a verification code.
 *
 * Each prompt the client raises is classified. A recognised challenge aborts the call
 * and suspends the session; anything else is answered from the session's one-shot
 * answer slot or fails the attempt. `resume` stores the answer and re-runs the
 * whole login, because the client exposes no checkpoint to continue from.
 * A session stays resumable after a failure and until it logs in successfully.
 *
 * The driver never persists cookies or removes sessions; its caller does both
 * once it sees `success`.
 */
export class ChallengeLoginDriver {
    private readonly registry: ISessionRegistry;
    private readonly lock: ExclusiveLock;
    private readonly transcriptLimit: number;

    constructor(options: ChallengeLoginDriverOptions) {
        this.registry = options.registry;
        this.lock = options.lock ?? loginLock;
        this.transcriptLimit = options.transcriptLimit ?? TRANSCRIPT_LIMIT;
    }

    async begin(token: string, identity: string, secret: string, cookieRef: CookieRef, client: LoginClient): Promise<LoginOutcome> {
        let session: LoginSession;
        try {
            session = this.registry.create(token, identity, secret, client, cookieRef);
        } catch (error) {
            return failed(toApplicationError(error));
        }

        logger.info({ identity, cachedCookie: cookieRef.exists }, 'Starting login attempt');
        return this.lock.runExclusive(async () => {
            // Cancelled while queued
            if (!this.registry.get(token)) {
                return failed(new InvalidSessionError(token));
            }
            return this.runLogin(session);
        });
    }

    /**
     * Answer a suspended or failed attempt and re-run it. Completed sessions are refused.
     */
    async resume(token: string, answer: string): Promise<LoginOutcome> {
        if (!this.resumable(token)) {
            return failed(new InvalidSessionError(token));
        }

        return this.lock.runExclusive(async () => {
            // Re-check: a queued resume may find the session cancelled or already logged in
            const session = this.resumable(token);
            if (!session) {
                return failed(new InvalidSessionError(token));
            }

            this.registry.setAnswer(token, answer);
            logger.info({ identity: session.identity, challengeKind: session.challengeKind }, 'Resuming login attempt');
            return this.runLogin(session);
        });
    }

    /**
     * One full authenticate call. Must run inside the lock.
     */
    private async runLogin(session: LoginSession): Promise<LoginOutcome> {
        const transcript: string[] = [];
        // Set from inside the prompt handler
        const outcome: { interrupt?: ChallengeInterrupt; fault?: UnexpectedPromptError } = {};

        const onOutput: OutputHandler = text => {
            for (const line of text.split(/\r?\n/)) {
                const trimmed = line.trim();
                if (!trimmed) continue;
                transcript.push(trimmed);
                if (transcript.length > this.transcriptLimit) {
                    transcript.shift();
                }
            }
        };

        const onPrompt: PromptHandler = async prompt => {
            // A client that swallowed our abort gets no further answers
            if (outcome.interrupt) throw outcome.interrupt;
            if (outcome.fault) throw outcome.fault;

            const lastLine = transcript.length > 0 ? transcript[transcript.length - 1] : '';
            const classification = classifyPrompt(prompt, lastLine);

            if (classification) {
                outcome.interrupt = new ChallengeInterrupt({
                    kind: classification.kind,
                    message: lastLine || prompt,
                    ...(classification.hint ? { hint: classification.hint } : {})
                });
                throw outcome.interrupt;
            }

            const answer = this.registry.takeAnswer(session.token);
            if (answer !== undefined) {
                return answer;
            }

            outcome.fault = new UnexpectedPromptError(prompt, { identity: session.identity });
            throw outcome.fault;
        };

        let clientError: unknown;
        let clientFailed = false;
        try {
            await session.client.authenticate({
                identity: session.identity,
                secret: session.secret,
                cookieRef: session.cookieRef,
                onPrompt,
                onOutput
            });
        } catch (error) {
            clientFailed = true;
            clientError = error;
        }

        if (outcome.interrupt) {
            return this.suspend(session, outcome.interrupt.challenge);
        }

        if (outcome.fault) {
            logger.warn({ identity: session.identity, code: outcome.fault.code }, 'Login attempt hit an unexpected prompt');
            return failed(outcome.fault);
        }

        if (clientFailed) {
            const error = clientError instanceof ApplicationError
                ? clientError
                : new UpstreamLoginError(
                    clientError instanceof Error ? clientError.message : 'Login client failed',
                    clientError,
                    { identity: session.identity }
                );
            logger.warn({ identity: session.identity, code: error.code, err: clientError }, 'Login attempt failed');
            return failed(error);
        }

        if (this.registry.get(session.token)) {
            this.registry.markCompleted(session.token);
        }
        logger.info({ identity: session.identity }, 'Login attempt succeeded');
        return success();
    }

    private resumable(token: string): LoginSession | undefined {
        const session = this.registry.get(token);
        return session && !session.completed ? session : undefined;
    }

    private suspend(session: LoginSession, challenge: VerificationChallenge): LoginOutcome {
        if (!this.registry.get(session.token)) {
            return failed(new InvalidSessionError(session.token));
        }

        this.registry.markChallenge(session.token, challenge.kind);
        logger.info({ identity: session.identity, challengeKind: challenge.kind }, 'Login suspended on verification challenge');
        return suspended(challenge);
    }
}

/**
 * Factory function to create ChallengeLoginDriver instance
 */
export function createChallengeLoginDriver(options: ChallengeLoginDriverOptions): ChallengeLoginDriver {
    return new ChallengeLoginDriver(options);
}
