import { z } from 'zod';
import logger from './logger.js';
import { ConfigurationError } from '../types/errors.js';

/**
 * Environment validation for authbridge.
 * Everything has a default except the remote cache URL, whose absence disables the remote tier.
 */

const DEFAULT_COOKIE_TTL_SECONDS = 60 * 60 * 24 * 7;

const portValidator = z.coerce.number().int().min(1).max(65535);
const nonNegativeInt = z.coerce.number().int().min(0);
const flag = z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .transform(value => value === 'true' || value === '1' || value === 'yes');

const EnvironmentSchema = z.object({
    // ==========================================
    // Core Application
    // ==========================================
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: portValidator.default(3000),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

    // ==========================================
    // Cookie Cache
    // ==========================================
    COOKIES_DIR: z.string().min(1).default('cookies'),
    REDIS_URL: z.string().url().optional().or(z.literal('')),
    // A malformed TTL falls back to a week rather than failing startup
    COOKIE_TTL_SECONDS: z.coerce.number().int().positive().catch(DEFAULT_COOKIE_TTL_SECONDS).default(DEFAULT_COOKIE_TTL_SECONDS),
    COOKIE_CLEANUP_LOCAL: flag.default('false'),

    // ==========================================
    // Login Sessions
    // ==========================================
    AUTH_SESSION_TTL_MS: nonNegativeInt.default(15 * 60 * 1000),
    SESSION_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(60 * 1000),
});

export type Environment = z.infer<typeof EnvironmentSchema>;

let validatedEnv: Environment | null = null;

/**
 * Parse an environment source without side effects
 */
export function parseEnvironment(source: Record<string, string | undefined>): Environment {
    const result = EnvironmentSchema.safeParse(source);
    if (!result.success) {
        const issues = result.error.issues.map(issue => ({
            field: issue.path.join('.'),
            message: issue.message
        }));
        throw new ConfigurationError('Environment validation failed', { issues });
    }
    return result.data;
}

/**
 * Validate process.env on startup, exiting the process when it is unusable
 */
export function validateEnvironment(): Environment {
    try {
        validatedEnv = parseEnvironment(process.env);

        if (!validatedEnv.REDIS_URL) {
            logger.warn('REDIS_URL not set. Remote cookie persistence is disabled.');
        }
        if (validatedEnv.AUTH_SESSION_TTL_MS === 0) {
            logger.warn('AUTH_SESSION_TTL_MS is 0. Abandoned login sessions are never reclaimed.');
        }

        logger.info({ nodeEnv: validatedEnv.NODE_ENV }, 'Environment validation passed');
        return validatedEnv;
    } catch (error) {
        if (error instanceof ConfigurationError) {
            logger.fatal({ issues: error.context?.issues }, 'ENVIRONMENT VALIDATION FAILED');
        } else {
            logger.fatal({ error }, 'ENVIRONMENT VALIDATION FAILED');
        }
        process.exit(1);
    }
}

/**
 * Get validated environment (must call validateEnvironment() first)
 */
export function getEnv(): Environment {
    if (!validatedEnv) {
        throw new ConfigurationError('Environment not validated yet. Call validateEnvironment() at application startup.');
    }
    return validatedEnv;
}
