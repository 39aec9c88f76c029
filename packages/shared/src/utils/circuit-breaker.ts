import logger from './logger.js';
import { ApplicationError, ErrorCategory, FailurePoint } from '../types/errors.js';

export enum CircuitState {
    CLOSED,   // Normal operation
    OPEN,     // Failing, reject requests
    HALF_OPEN // Testing recovery
}

export interface CircuitBreakerOptions {
    failureThreshold: number; // Consecutive failures before opening
    cooldownMs: number;       // Time to wait before trying again (Half-Open)
    successThreshold: number; // Successes needed to close circuit
    now: () => number;
}

export class CircuitOpenError extends ApplicationError {
    constructor(public readonly circuit: string) {
        super(
            `Circuit Breaker '${circuit}' is OPEN. Requests blocked.`,
            'CIRCUIT_OPEN',
            503,
            true,
            { circuit },
            ErrorCategory.OPERATIONAL,
            FailurePoint.COOKIE_CACHE
        );
    }
}

export class CircuitBreaker {
    private state: CircuitState = CircuitState.CLOSED;
    private failureCount = 0;
    private successCount = 0;
    private nextAttempt = 0;
    private readonly options: CircuitBreakerOptions;

    constructor(private readonly name: string, options: Partial<CircuitBreakerOptions> = {}) {
        this.options = {
            failureThreshold: options.failureThreshold || 5,
            cooldownMs: options.cooldownMs || 30000,
            successThreshold: options.successThreshold || 2,
            now: options.now || Date.now
        };
    }

    getState(): CircuitState {
        return this.state;
    }

    /**
     * Execute a function with circuit breaker protection
     */
    async execute<T>(fn: () => Promise<T>): Promise<T> {
        if (this.state === CircuitState.OPEN) {
            if (this.options.now() < this.nextAttempt) {
                throw new CircuitOpenError(this.name);
            }
            this.transitionTo(CircuitState.HALF_OPEN);
        }

        try {
            const result = await fn();
            this.onSuccess();
            return result;
        } catch (error) {
            this.onFailure(error);
            throw error;
        }
    }

    private onSuccess(): void {
        if (this.state === CircuitState.HALF_OPEN) {
            this.successCount++;
            if (this.successCount >= this.options.successThreshold) {
                this.transitionTo(CircuitState.CLOSED);
            }
        } else {
            // Consecutive-failure semantics
            this.failureCount = 0;
        }
    }

    private onFailure(error: unknown): void {
        this.failureCount++;
        logger.warn({ err: error, circuit: this.name, state: CircuitState[this.state] }, 'Circuit breaker recorded failure');

        if (this.state === CircuitState.HALF_OPEN
            || (this.state === CircuitState.CLOSED && this.failureCount >= this.options.failureThreshold)) {
            this.transitionTo(CircuitState.OPEN);
        }
    }

    private transitionTo(newState: CircuitState): void {
        logger.info({ circuit: this.name, from: CircuitState[this.state], to: CircuitState[newState] }, 'Circuit state changed');
        this.state = newState;

        if (newState === CircuitState.OPEN) {
            this.nextAttempt = this.options.now() + this.options.cooldownMs;
        } else if (newState === CircuitState.CLOSED) {
            this.failureCount = 0;
            this.successCount = 0;
        } else {
            this.successCount = 0;
        }
    }
}
