// Auth
export * from './auth/identity.js';
export * from './auth/prompt-classifier.js';
export * from './auth/exclusive-lock.js';
export * from './auth/session-registry.js';
export * from './auth/cookie-cache.js';
export * from './auth/challenge-login-driver.js';

// Database
export * from './database/redis-client.js';

// Utils
export { default as logger, contextStorage } from './utils/logger.js';
export * from './utils/env-validator.js';
export * from './utils/circuit-breaker.js';

// Types
export * from './types/errors.js';
export * from './types/api-response.js';
export * from './types/api-schemas.js';
export type * from './types/session.interface.js';
export type * from './types/login-client.interface.js';
export type * from './types/cache.interface.js';
