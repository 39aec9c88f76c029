import express, { Express, Request, Response } from 'express';
import { logger } from '@authbridge/shared';
import { createAuthRouter } from './routes/auth.routes.js';
import { globalErrorHandler, notFoundHandler } from './middleware/error.middleware.js';
import { requestIdMiddleware } from './middleware/request-id.middleware.js';
import type { AuthService } from '../services/auth.service.js';

export interface AppDeps {
    authService: AuthService;
}

export function createApp(deps: AppDeps): Express {
    const app = express();

    app.disable('x-powered-by');
    app.use(express.json({ limit: '16kb' }));
    app.use(requestIdMiddleware);

    app.get('/health', (_req: Request, res: Response) => {
        res.json({ status: 'healthy', timestamp: new Date().toISOString() });
    });

    app.use('/auth', createAuthRouter(deps.authService));

    // Must be last
    app.use(notFoundHandler);
    app.use(globalErrorHandler);

    logger.debug('HTTP application assembled');
    return app;
}
