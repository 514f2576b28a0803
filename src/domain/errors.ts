export type ErrorCode =
    | 'MISSING_INFORMATION'
    | 'SERVICE_ERROR'
    | 'TRANSPORT_ERROR'
    | 'PARSE_ERROR';

export const CONNECTIVITY_MESSAGE = 'There is currently no contact with Fraktjakt.';

/**
 * Raised for anything the remote service or the transport reported as a failure.
 * For a code-2 reply the message is the service's own (localized) error text.
 */
export class FraktjaktError extends Error {
    public readonly code: ErrorCode;
    public readonly statusCode?: number;
    public readonly details?: Record<string, unknown>;

    constructor(opts: {
        message: string;
        code?: ErrorCode;
        statusCode?: number;
        details?: Record<string, unknown>;
        cause?: Error;
    }) {
        super(opts.message);
        this.name = 'FraktjaktError';
        this.code = opts.code ?? 'SERVICE_ERROR';
        this.statusCode = opts.statusCode;
        this.details = opts.details;
        if (opts.cause) {
            this.cause = opts.cause;
        }
    }
    toJSON() {
        return {
            error: {
                code: this.code,
                message: this.message,
                ...(this.statusCode ? { statusCode: this.statusCode } : {}),
                ...(this.details ? { details: this.details } : {}),
            },
        };
    }
}

export class TransportError extends FraktjaktError {
    constructor(statusCode?: number, cause?: Error) {
        super({
            message: CONNECTIVITY_MESSAGE,
            code: 'TRANSPORT_ERROR',
            statusCode,
            cause,
        });
        this.name = 'TransportError';
    }
}

export class ParseError extends FraktjaktError {
    constructor(message: string, cause?: Error) {
        super({
            message,
            code: 'PARSE_ERROR',
            cause,
        });
        this.name = 'ParseError';
    }
}

/**
 * Caller input is incomplete or structurally invalid. Always raised before
 * any request leaves the process.
 */
export class MissingInformationError extends Error {
    public readonly code: ErrorCode = 'MISSING_INFORMATION';
    public readonly missing: string[];
    public readonly details?: Record<string, unknown>;

    constructor(message: string, opts: { missing?: string[]; details?: Record<string, unknown> } = {}) {
        super(message);
        this.name = 'MissingInformationError';
        this.missing = opts.missing ?? [];
        this.details = opts.details;
    }
    toJSON() {
        return {
            error: {
                code: this.code,
                message: this.message,
                ...(this.missing.length > 0 ? { missing: this.missing } : {}),
                ...(this.details ? { details: this.details } : {}),
            },
        };
    }
}
