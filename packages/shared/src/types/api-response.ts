/**
 * Standard API Response Envelope
 */
export interface APIResponse<T = unknown> {
    success: boolean;
    data?: T;
    error?: {
        code: string;
        message: string;
        details?: unknown;
    };
    meta: {
        timestamp: string;
        requestId?: string;
    };
}

export function successResponse<T>(data: T, requestId?: string): APIResponse<T> {
    return {
        success: true,
        data,
        meta: {
            timestamp: new Date().toISOString(),
            ...(requestId ? { requestId } : {})
        }
    };
}

export function errorResponse(code: string, message: string, details?: unknown, requestId?: string): APIResponse<never> {
    return {
        success: false,
        error: {
            code,
            message,
            details
        },
        meta: {
            timestamp: new Date().toISOString(),
            ...(requestId ? { requestId } : {})
        }
    };
}
