/**
 * Config loader - reads and validates the JSON config file
 */

import * as fs from 'node:fs/promises';
import { type AppConfig, validateAppConfig } from './schema.js';
import { ConfigError, ConfigErrorCodes } from './errors.js';

/**
 * Loads a config file
 *
 * @throws {ConfigError} If the file cannot be read, is not JSON, or fails validation
 */
export async function loadConfig(filePath: string): Promise<AppConfig> {
    let content: string;
    try {
        content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
        throw new ConfigError(
            `Cannot read config file: ${filePath}`,
            ConfigErrorCodes.FILE_NOT_FOUND,
            { filePath, error: error instanceof Error ? error.message : String(error) }
        );
    }

    return parseConfig(content, filePath);
}

/**
 * Parses and validates config JSON
 */
export function parseConfig(json: string, source = '<string>'): AppConfig {
    let raw: unknown;
    try {
        raw = JSON.parse(json);
    } catch (error) {
        throw new ConfigError(
            `Invalid JSON in config file: ${error instanceof Error ? error.message : String(error)}`,
            ConfigErrorCodes.INVALID_JSON,
            { filePath: source }
        );
    }

    return validateAppConfig(raw);
}
