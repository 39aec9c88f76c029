import { Request, Response, NextFunction } from 'express';
import { errorResponse, logError, logger, toApplicationError } from '@authbridge/shared';

/**
 * Global error handler middleware
 * Must be registered last in middleware chain
 */
export function globalErrorHandler(
    error: unknown,
    req: Request,
    res: Response,
    // Express identifies error handlers by arity
    _next: NextFunction
): void {
    logError(error, {
        requestId: req.id,
        method: req.method,
        path: req.path
    });

    const appError = toApplicationError(error);
    // Internal details stay in the logs
    const details = appError.statusCode >= 500 ? undefined : appError.context;

    res.status(appError.statusCode).json(errorResponse(appError.code, appError.message, details, req.id));
}

/**
 * 404 Not Found handler
 */
export function notFoundHandler(req: Request, res: Response): void {
    logger.warn({
        requestId: req.id,
        method: req.method,
        path: req.path
    }, 'Route not found');

    res.status(404).json(errorResponse('NOT_FOUND', `Route ${req.method} ${req.path} not found`, undefined, req.id));
}
