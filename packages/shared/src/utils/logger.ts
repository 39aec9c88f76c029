import pino from 'pino';
import { AsyncLocalStorage } from 'async_hooks';

export const contextStorage = new AsyncLocalStorage<Map<string, string>>();

const logger = pino({
    name: 'authbridge',
    level: process.env.LOG_LEVEL || 'info',
    transport: process.env.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname'
            }
        }
        : undefined,
    redact: {
        paths: [
            'authorization',
            'cookie',
            'headers.authorization',
            'headers.cookie',
            'password',
            'secret',
            'answer',
            'token',
            'sessionToken',
            'REDIS_URL',
            '*.password',
            '*.secret',
            '*.answer',
            '*.token',
            '*.sessionToken'
        ],
        censor: '[REDACTED]'
    },
    mixin() {
        const store = contextStorage.getStore();
        const context: Record<string, string> = {};

        if (store) {
            const correlationId = store.get('correlationId');
            if (correlationId) {
                context.correlationId = correlationId;
            }
            const requestId = store.get('requestId');
            if (requestId) {
                context.requestId = requestId;
            }
            const identity = store.get('identity');
            if (identity) {
                context.identity = identity;
            }
        }

        return context;
    }
});

export default logger;
