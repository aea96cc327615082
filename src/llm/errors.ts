/**
 * LLM client errors
 */

export const LLMErrorCodes = {
    NETWORK_ERROR: 'NETWORK_ERROR',
    API_ERROR: 'API_ERROR',
    TIMEOUT: 'TIMEOUT',
    INVALID_RESPONSE: 'INVALID_RESPONSE',
    EMPTY_RESPONSE: 'EMPTY_RESPONSE',
    JSON_PARSE: 'JSON_PARSE',
} as const;

export type LLMErrorCode = (typeof LLMErrorCodes)[keyof typeof LLMErrorCodes];

/**
 * Codes raised by the HTTP round trip. These are retried and counted as `api` failures.
 */
export const API_ERROR_CODES: readonly LLMErrorCode[] = [
    LLMErrorCodes.NETWORK_ERROR,
    LLMErrorCodes.API_ERROR,
    LLMErrorCodes.TIMEOUT,
    LLMErrorCodes.INVALID_RESPONSE,
    LLMErrorCodes.EMPTY_RESPONSE,
];

export class LLMError extends Error {
    constructor(
        message: string,
        public code: LLMErrorCode,
        public statusCode?: number,
        public details?: Record<string, unknown>
    ) {
        super(message);
        this.name = 'LLMError';
        Object.setPrototypeOf(this, LLMError.prototype);
    }

    get isApiError(): boolean {
        return API_ERROR_CODES.includes(this.code);
    }

    toJSON() {
        return {
            name: this.name,
            message: this.message,
            code: this.code,
            statusCode: this.statusCode,
            details: this.details,
        };
    }
}

export function isRetryableError(error: unknown): boolean {
    return error instanceof LLMError && error.isApiError;
}
