import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { contextStorage } from '@authbridge/shared';

declare global {
    namespace Express {
        interface Request {
            id?: string;
            correlationId?: string;
        }
    }
}

function headerValue(value: string | string[] | undefined): string | undefined {
    return Array.isArray(value) ? value[0] : value;
}

/**
 * Request ID Middleware
 * Accepts or generates request/correlation IDs and runs the request inside the logger context
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
    req.id = headerValue(req.headers['x-request-id']) || uuidv4();
    req.correlationId = headerValue(req.headers['x-correlation-id']) || req.id;

    res.setHeader('X-Request-ID', req.id);
    res.setHeader('X-Correlation-ID', req.correlationId);

    const store = new Map<string, string>();
    store.set('requestId', req.id);
    store.set('correlationId', req.correlationId);

    contextStorage.run(store, () => next());
}
