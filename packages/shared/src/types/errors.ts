/**
 * Error hierarchy for authbridge
 * Typed errors with status codes, retry hints and classification
 */

import logger from '../utils/logger.js';

/**
 * Error Category - High-level classification for errors
 */
export enum ErrorCategory {
    TRANSIENT = 'transient',        // Retry likely helps (network, timeout)
    PERMANENT = 'permanent',        // Retry won't help (validation, bad credentials)
    OPERATIONAL = 'operational',    // System issue (cache, configuration)
    SECURITY = 'security'           // Provider demanded something we cannot answer
}

/**
 * Failure Point - Where in the login pipeline the error occurred
 */
export enum FailurePoint {
    API_VALIDATION = 'api_validation',
    SESSION_LOOKUP = 'session_lookup',
    PROMPT_INTERCEPTION = 'prompt_interception',
    LOGIN_CLIENT = 'login_client',
    COOKIE_CACHE = 'cookie_cache',
    CONFIGURATION = 'configuration',
    UNKNOWN = 'unknown'
}

export type ErrorContext = Record<string, unknown>;

/**
 * Base Application Error - All custom errors extend this
 */
export class ApplicationError extends Error {
    public readonly timestamp: Date;
    public readonly context?: ErrorContext;
    public readonly category: ErrorCategory;
    public readonly failurePoint: FailurePoint;

    constructor(
        message: string,
        public readonly code: string,
        public readonly statusCode: number = 500,
        public readonly retryable: boolean = false,
        context?: ErrorContext,
        category?: ErrorCategory,
        failurePoint?: FailurePoint
    ) {
        super(message);
        this.name = this.constructor.name;
        this.timestamp = new Date();
        this.context = context;

        this.category = category || this.autoClassifyCategory();
        this.failurePoint = failurePoint || FailurePoint.UNKNOWN;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }

    private autoClassifyCategory(): ErrorCategory {
        if (this.retryable) {
            return this.statusCode >= 500 ? ErrorCategory.OPERATIONAL : ErrorCategory.TRANSIENT;
        }
        if (this.statusCode >= 400 && this.statusCode < 500) {
            return ErrorCategory.PERMANENT;
        }
        return ErrorCategory.OPERATIONAL;
    }

    toJSON() {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            statusCode: this.statusCode,
            retryable: this.retryable,
            category: this.category,
            failurePoint: this.failurePoint,
            timestamp: this.timestamp.toISOString(),
            context: this.context
        };
    }

    /**
     * Get a unique fingerprint for error grouping
     */
    getFingerprint(): string {
        return `${this.code}:${this.failurePoint}:${this.statusCode}`;
    }
}

// ==========================================
// Client Errors (4xx - Not Retryable)
// ==========================================

export class ValidationError extends ApplicationError {
    constructor(message: string, public readonly validationErrors?: Array<{ field: string; message: string }>, context?: ErrorContext) {
        super(
            message,
            'VALIDATION_ERROR',
            400,
            false,
            { validationErrors, ...context },
            ErrorCategory.PERMANENT,
            FailurePoint.API_VALIDATION
        );
    }
}

export class ConflictError extends ApplicationError {
    constructor(message: string, context?: ErrorContext) {
        super(message, 'CONFLICT_ERROR', 409, false, context, ErrorCategory.PERMANENT, FailurePoint.SESSION_LOOKUP);
    }
}

/**
 * An operation referenced an unknown, expired or already-removed session token
 */
export class InvalidSessionError extends ApplicationError {
    constructor(public readonly sessionToken: string, context?: ErrorContext) {
        super(
            'Invalid or expired authentication session',
            'INVALID_SESSION',
            404,
            false,
            context,
            ErrorCategory.PERMANENT,
            FailurePoint.SESSION_LOOKUP
        );
    }
}

/**
 * The login client asked something that is not a known challenge
 * and no answer was queued for it
 */
export class UnexpectedPromptError extends ApplicationError {
    constructor(public readonly prompt: string, context?: ErrorContext) {
        super(
            `Unexpected input prompt: ${prompt}`,
            'UNEXPECTED_PROMPT',
            422,
            false,
            { prompt, ...context },
            ErrorCategory.SECURITY,
            FailurePoint.PROMPT_INTERCEPTION
        );
    }
}

// ==========================================
// Service Errors (5xx)
// ==========================================

/**
 * Any other login client failure: bad credentials, transport errors, protocol drift
 */
export class UpstreamLoginError extends ApplicationError {
    constructor(message: string, originalError?: unknown, context?: ErrorContext) {
        super(
            message,
            'UPSTREAM_LOGIN_ERROR',
            502,
            false,
            {
                originalError: originalError instanceof Error ? originalError.message : originalError === undefined ? undefined : String(originalError),
                ...context
            },
            ErrorCategory.OPERATIONAL,
            FailurePoint.LOGIN_CLIENT
        );
        this.cause = originalError;
    }
}

/**
 * Remote cookie tier failure. Never crosses the CookieCache boundary.
 */
export class CacheError extends ApplicationError {
    constructor(operation: string, originalError?: unknown, context?: ErrorContext) {
        super(
            `Remote cache ${operation} failed`,
            'CACHE_ERROR',
            503,
            true,
            {
                operation,
                originalError: originalError instanceof Error ? originalError.message : originalError === undefined ? undefined : String(originalError),
                ...context
            },
            ErrorCategory.TRANSIENT,
            FailurePoint.COOKIE_CACHE
        );
        this.cause = originalError;
    }
}

export class ConfigurationError extends ApplicationError {
    constructor(message: string, context?: ErrorContext) {
        super(
            message,
            'CONFIGURATION_ERROR',
            500,
            false,
            context,
            ErrorCategory.PERMANENT,
            FailurePoint.CONFIGURATION
        );
    }
}

export class InternalServerError extends ApplicationError {
    constructor(message: string = 'Internal server error', context?: ErrorContext) {
        super(
            message,
            'INTERNAL_SERVER_ERROR',
            500,
            false,
            context,
            ErrorCategory.OPERATIONAL
        );
    }
}

// ==========================================
// Error Utilities
// ==========================================

export function toApplicationError(error: unknown): ApplicationError {
    if (error instanceof ApplicationError) {
        return error;
    }
    if (error instanceof Error) {
        return new InternalServerError(error.message, { originalError: error.name });
    }
    return new InternalServerError('Unknown error occurred', { error: String(error) });
}

export function isAppError(error: unknown): error is ApplicationError {
    return error instanceof ApplicationError;
}

export function logError(error: unknown, context?: ErrorContext): void {
    const appError = toApplicationError(error);
    const logData = {
        error: {
            name: appError.name,
            message: appError.message,
            code: appError.code,
            statusCode: appError.statusCode,
            retryable: appError.retryable,
            context: appError.context,
            stack: appError.stack
        },
        ...context
    };

    if (appError.statusCode >= 500) {
        logger.error(logData, 'Server error occurred');
    } else if (appError.statusCode >= 400) {
        logger.warn(logData, 'Client error occurred');
    } else {
        logger.info(logData, 'Error occurred');
    }
}
