/**
 * Config file sections and their validation
 */

import { z } from 'zod';
import { ConfigError, ConfigErrorCodes } from './errors.js';

export const SUPPORTED_MODEL = 'qwen3-8b';
export const SUPPORTED_VERSION = '0.3.16';

const REQUIRED_LM_STUDIO_PARAMS = ['host', 'port', 'model', 'version'] as const;

const lmStudioSchema = z.object({
    host: z.string().min(1),
    port: z.coerce.number().int().min(1).max(65535),
    model: z.literal(SUPPORTED_MODEL),
    version: z.literal(SUPPORTED_VERSION),
    /** Seconds */
    timeout: z.coerce.number().positive().default(30),
    max_tokens: z.coerce.number().int().positive().default(2000),
    temperature: z.coerce.number().min(0).max(2).default(0.7),
});

const loggingSchema = z.object({
    level: z
        .preprocess(
            (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
            z.enum(['error', 'warn', 'info', 'debug'])
        )
        .default('info'),
    file: z.string().min(1).optional(),
    max_size: z.coerce.number().int().positive().default(10 * 1024 * 1024),
    backup_count: z.coerce.number().int().positive().default(5),
});

export type LMStudioSettings = z.infer<typeof lmStudioSchema>;
export type LoggingSettings = z.infer<typeof loggingSchema>;

export interface AppConfig {
    lm_studio: LMStudioSettings;
    logging: LoggingSettings;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
}

/**
 * Validates the `lm_studio` section of a config object and fills in defaults
 *
 * @throws {ConfigError} If the section is missing, incomplete, or names an unsupported model/version
 */
export function validateLMStudioConfig(config: unknown): LMStudioSettings {
    if (!isRecord(config)) {
        throw new ConfigError('Config must be an object', ConfigErrorCodes.INVALID_CONFIG);
    }

    const section = config.lm_studio;
    if (!isRecord(section)) {
        throw new ConfigError("Missing 'lm_studio' section in config", ConfigErrorCodes.INVALID_CONFIG);
    }

    const missing = REQUIRED_LM_STUDIO_PARAMS.filter(
        (param) => section[param] === undefined || section[param] === null
    );
    if (missing.length > 0) {
        throw new ConfigError(
            `Missing required LM Studio parameters: ${missing.join(', ')}`,
            ConfigErrorCodes.MISSING_PARAMETERS,
            { missing }
        );
    }

    if (section.version !== SUPPORTED_VERSION) {
        throw new ConfigError(
            `Unsupported LM Studio version. Required: ${SUPPORTED_VERSION}`,
            ConfigErrorCodes.UNSUPPORTED_VERSION,
            { version: section.version }
        );
    }

    if (section.model !== SUPPORTED_MODEL) {
        throw new ConfigError(
            `Unsupported model. Required: ${SUPPORTED_MODEL}`,
            ConfigErrorCodes.UNSUPPORTED_MODEL,
            { model: section.model }
        );
    }

    const parsed = lmStudioSchema.safeParse(section);
    if (!parsed.success) {
        throw new ConfigError(
            `Invalid LM Studio parameters: ${formatIssues(parsed.error)}`,
            ConfigErrorCodes.INVALID_CONFIG,
            { issues: parsed.error.issues }
        );
    }

    return parsed.data;
}

/**
 * Validates a whole config object
 *
 * @throws {ConfigError} If any section is invalid
 */
export function validateAppConfig(config: unknown): AppConfig {
    const lmStudio = validateLMStudioConfig(config);

    const rawLogging = isRecord(config) ? config.logging ?? {} : {};
    const logging = loggingSchema.safeParse(rawLogging);
    if (!logging.success) {
        throw new ConfigError(
            `Invalid logging parameters: ${formatIssues(logging.error)}`,
            ConfigErrorCodes.INVALID_CONFIG,
            { issues: logging.error.issues }
        );
    }

    return { lm_studio: lmStudio, logging: logging.data };
}
