export type GeminiErrorCode = 'TIMEOUT' | 'RATE_LIMIT' | 'MALFORMED_RESPONSE' | 'EMPTY_RESPONSE' | 'API_ERROR';

export class GeminiError extends Error {
    constructor(
        message: string,
        public code: GeminiErrorCode,
        public isRetryable: boolean,
        public details?: Record<string, unknown>
    ) {
        super(message);
        this.name = 'GeminiError';
    }
}

export type ServiceErrorCode = 'CONFIGURATION_ERROR' | 'NOT_FOUND' | 'INVALID_REQUEST' | 'GENERATION_FAILED';

/**
 * Request-level failure. `status` is the HTTP status the error handler responds with.
 */
export abstract class ServiceError extends Error {
    abstract readonly code: ServiceErrorCode;
    abstract readonly status: number;

    constructor(message: string, public details?: Record<string, unknown>) {
        super(message);
    }
}

export class ConfigurationError extends ServiceError {
    readonly code = 'CONFIGURATION_ERROR';
    readonly status = 503;

    constructor(message: string, details?: Record<string, unknown>) {
        super(message, details);
        this.name = 'ConfigurationError';
    }
}

export type NotFoundKind = 'constraint_spec' | 'template';

export class NotFoundError extends ServiceError {
    readonly code = 'NOT_FOUND';
    readonly status = 404;

    constructor(public kind: NotFoundKind, public key: string) {
        super(`No ${kind.replace('_', ' ')} found for '${key}'`, { kind, key });
        this.name = 'NotFoundError';
    }
}

export class RequestValidationError extends ServiceError {
    readonly code = 'INVALID_REQUEST';
    readonly status = 400;

    constructor(message: string, public issues: string[] = []) {
        super(message, issues.length > 0 ? { issues } : undefined);
        this.name = 'RequestValidationError';
    }
}

export class GenerationFailedError extends ServiceError {
    readonly code = 'GENERATION_FAILED';
    readonly status = 500;

    constructor(public attempts: number, public llmError: GeminiError) {
        super(`Content generation failed after ${attempts} attempts: ${llmError.message}`, {
            attempts,
            llmErrorCode: llmError.code
        });
        this.name = 'GenerationFailedError';
    }
}
