import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import { ServiceError } from '@shared/errors';
import { getErrorMessage } from '@shared/utils/errorMessage';

export interface ErrorBody {
    success: false;
    code: string;
    message: string;
    details?: Record<string, unknown>;
}

// body-parser marks malformed JSON with this type
function isBodyParseError(err: unknown): boolean {
    return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}

export function toErrorResponse(err: unknown): { status: number; body: ErrorBody } {
    if (err instanceof ServiceError) {
        return {
            status: err.status,
            body: { success: false, code: err.code, message: err.message, ...(err.details ? { details: err.details } : {}) }
        };
    }

    if (isBodyParseError(err)) {
        return { status: 400, body: { success: false, code: 'INVALID_REQUEST', message: 'Request body is not valid JSON' } };
    }

    return {
        status: 500,
        body: { success: false, code: 'INTERNAL_ERROR', message: getErrorMessage(err) || 'Internal error' }
    };
}

export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
    const { status, body } = toErrorResponse(err);

    if (status >= 500) {
        console.error(`[HTTP] ${req.method} ${req.path} -> ${status} ${body.code}:`, err);
    } else {
        console.warn(`[HTTP] ${req.method} ${req.path} -> ${status} ${body.code}: ${body.message}`);
    }

    res.status(status).json(body);
};

export const notFoundHandler: RequestHandler = (req, res) => {
    const body: ErrorBody = { success: false, code: 'NOT_FOUND', message: `No route for ${req.method} ${req.path}` };
    res.status(404).json(body);
};

/**
 * Express 4 does not forward rejected promises; this does.
 */
export function asyncHandler(
    handler: (req: Request, res: Response) => Promise<void>
): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        handler(req, res).catch(next);
    };
}
