/**
 * Configuration errors. Always fatal: a run never starts on a bad config.
 */

export const ConfigErrorCodes = {
    FILE_NOT_FOUND: 'FILE_NOT_FOUND',
    INVALID_JSON: 'INVALID_JSON',
    INVALID_CONFIG: 'INVALID_CONFIG',
    MISSING_PARAMETERS: 'MISSING_PARAMETERS',
    UNSUPPORTED_MODEL: 'UNSUPPORTED_MODEL',
    UNSUPPORTED_VERSION: 'UNSUPPORTED_VERSION',
} as const;

export type ConfigErrorCode = (typeof ConfigErrorCodes)[keyof typeof ConfigErrorCodes];

export class ConfigError extends Error {
    constructor(
        message: string,
        public code: ConfigErrorCode,
        public details?: Record<string, unknown>
    ) {
        super(message);
        this.name = 'ConfigError';
        Object.setPrototypeOf(this, ConfigError.prototype);
    }

    toJSON() {
        return {
            name: this.name,
            message: this.message,
            code: this.code,
            details: this.details,
        };
    }
}
