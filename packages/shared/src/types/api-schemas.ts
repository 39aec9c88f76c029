import { z } from 'zod';
import { ValidationError } from './errors.js';

/**
 * Start Auth Request Validation Schema
 */
export const StartAuthSchema = z.object({
    identity: z.string().trim().min(1, 'identity is required').max(256),
    secret: z.string().min(1, 'secret is required').max(1024)
});

export type StartAuthRequest = z.infer<typeof StartAuthSchema>;

/**
 * Submit Challenge Request Validation Schema
 */
export const SubmitChallengeSchema = z.object({
    sessionToken: z.string().uuid('sessionToken must be a UUID'),
    answer: z.string().trim().min(1, 'answer is required').max(256)
});

export type SubmitChallengeRequest = z.infer<typeof SubmitChallengeSchema>;

export const SessionTokenParamSchema = z.object({
    token: z.string().uuid('token must be a UUID')
});

export const IdentityParamSchema = z.object({
    identity: z.string().trim().min(1).max(256)
});

/**
 * Parse input against a schema, raising ValidationError with per-field details
 */
export function parseRequest<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
    const result = schema.safeParse(input);
    if (!result.success) {
        throw new ValidationError(
            'Request validation failed',
            result.error.issues.map(issue => ({
                field: issue.path.join('.'),
                message: issue.message
            }))
        );
    }
    return result.data;
}
