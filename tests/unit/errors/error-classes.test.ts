import { describe, it, expect } from 'vitest';
import {
    ApplicationError,
    CacheError,
    ConfigurationError,
    ConflictError,
    ErrorCategory,
    FailurePoint,
    InternalServerError,
    InvalidSessionError,
    UnexpectedPromptError,
    UpstreamLoginError,
    ValidationError,
    isAppError,
    toApplicationError
} from '@authbridge/shared';

describe('Error classes', () => {
    describe('ApplicationError', () => {
        it('should classify by status when no category is given', () => {
            expect(new ApplicationError('x', 'X', 400).category).toBe(ErrorCategory.PERMANENT);
            expect(new ApplicationError('x', 'X', 429, true).category).toBe(ErrorCategory.TRANSIENT);
            expect(new ApplicationError('x', 'X', 503, true).category).toBe(ErrorCategory.OPERATIONAL);
            expect(new ApplicationError('x', 'X').failurePoint).toBe(FailurePoint.UNKNOWN);
        });

        it('should serialize to JSON', () => {
            const json = new ConflictError('Session token already in use', { reason: 'duplicate_token' }).toJSON();

            expect(json).toMatchObject({
                name: 'ConflictError',
                code: 'CONFLICT_ERROR',
                message: 'Session token already in use',
                statusCode: 409,
                retryable: false,
                category: ErrorCategory.PERMANENT,
                failurePoint: FailurePoint.SESSION_LOOKUP,
                context: { reason: 'duplicate_token' }
            });
        });
    });

    describe('InvalidSessionError', () => {
        it('should carry the session lookup classification', () => {
            const error = new InvalidSessionError('token-1');

            expect(error.message).toBe('Invalid or expired authentication session');
            expect(error.sessionToken).toBe('token-1');
            expect(error.getFingerprint()).toBe('INVALID_SESSION:session_lookup:404');
        });
    });

    describe('UnexpectedPromptError', () => {
        it('should include the prompt', () => {
            const error = new UnexpectedPromptError('Enter password', { identity: 'alice' });

            expect(error.message).toBe('Unexpected input prompt: Enter password');
            expect(error.statusCode).toBe(422);
            expect(error.category).toBe(ErrorCategory.SECURITY);
            expect(error.context).toEqual({ prompt: 'Enter password', identity: 'alice' });
        });
    });

    describe('UpstreamLoginError', () => {
        it('should keep the original error as cause', () => {
            const original = new Error('bad credentials');
            const error = new UpstreamLoginError('bad credentials', original, { identity: 'alice' });

            expect(error.statusCode).toBe(502);
            expect(error.cause).toBe(original);
            expect(error.context).toEqual({ originalError: 'bad credentials', identity: 'alice' });
        });
    });

    describe('CacheError', () => {
        it('should be retryable', () => {
            const error = new CacheError('set', 'timeout');

            expect(error.message).toBe('Remote cache set failed');
            expect(error.statusCode).toBe(503);
            expect(error.retryable).toBe(true);
            expect(error.context).toEqual({ operation: 'set', originalError: 'timeout' });
        });
    });

    describe('ValidationError', () => {
        it('should expose field errors', () => {
            const issues = [{ field: 'secret', message: 'Required' }];
            const error = new ValidationError('Request validation failed', issues);

            expect(error.validationErrors).toEqual(issues);
            expect(error.statusCode).toBe(400);
        });
    });

    describe('ConfigurationError', () => {
        it('should map to the configuration failure point', () => {
            expect(new ConfigurationError('bad').failurePoint).toBe(FailurePoint.CONFIGURATION);
        });
    });

    describe('toApplicationError', () => {
        it('should pass application errors through', () => {
            const error = new InvalidSessionError('token-1');

            expect(toApplicationError(error)).toBe(error);
        });

        it('should wrap plain errors', () => {
            const error = toApplicationError(new TypeError('boom'));

            expect(error).toBeInstanceOf(InternalServerError);
            expect(error.message).toBe('boom');
            expect(error.context).toEqual({ originalError: 'TypeError' });
        });

        it('should wrap non-errors', () => {
            expect(toApplicationError('nope').context).toEqual({ error: 'nope' });
        });
    });

    it('isAppError should narrow', () => {
        expect(isAppError(new CacheError('get'))).toBe(true);
        expect(isAppError(new Error('x'))).toBe(false);
    });
});
