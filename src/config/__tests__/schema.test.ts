/**
 * Tests for config validation
 */

import { describe, expect, it } from "vitest";
import { validateAppConfig, validateLMStudioConfig } from "../schema.js";
import { ConfigError, ConfigErrorCodes } from "../errors.js";

const lmStudio = {
    host: "localhost",
    port: 1234,
    model: "qwen3-8b",
    version: "0.3.16",
};

function codeOf(fn: () => unknown): string | undefined {
    try {
        fn();
    } catch (error) {
        return error instanceof ConfigError ? error.code : "not a ConfigError";
    }
    return undefined;
}

describe("validateLMStudioConfig", () => {
    it("should accept a minimal section and fill in defaults", () => {
        expect(validateLMStudioConfig({ lm_studio: lmStudio })).toEqual({
            ...lmStudio,
            timeout: 30,
            max_tokens: 2000,
            temperature: 0.7,
        });
    });

    it("should accept a numeric string port", () => {
        expect(validateLMStudioConfig({ lm_studio: { ...lmStudio, port: "8080" } }).port).toBe(8080);
    });

    it("should reject a non-object config", () => {
        expect(codeOf(() => validateLMStudioConfig(null))).toBe(ConfigErrorCodes.INVALID_CONFIG);
        expect(codeOf(() => validateLMStudioConfig("lm_studio"))).toBe(ConfigErrorCodes.INVALID_CONFIG);
    });

    it("should list every missing parameter", () => {
        expect(() => validateLMStudioConfig({ lm_studio: { host: "localhost" } })).toThrow(
            "Missing required LM Studio parameters: port, model, version",
        );
    });

    it("should reject mismatched model and version", () => {
        expect(codeOf(() => validateLMStudioConfig({ lm_studio: { ...lmStudio, model: "qwen3-14b" } }))).toBe(
            ConfigErrorCodes.UNSUPPORTED_MODEL,
        );
        expect(codeOf(() => validateLMStudioConfig({ lm_studio: { ...lmStudio, version: "0.3.17" } }))).toBe(
            ConfigErrorCodes.UNSUPPORTED_VERSION,
        );
    });

    it("should reject an invalid port", () => {
        expect(codeOf(() => validateLMStudioConfig({ lm_studio: { ...lmStudio, port: 70000 } }))).toBe(
            ConfigErrorCodes.INVALID_CONFIG,
        );
        expect(() => validateLMStudioConfig({ lm_studio: { ...lmStudio, port: "abc" } })).toThrow(
            /^Invalid LM Studio parameters: port:/,
        );
    });

    it("should reject a non-numeric timeout", () => {
        expect(codeOf(() => validateLMStudioConfig({ lm_studio: { ...lmStudio, timeout: "soon" } }))).toBe(
            ConfigErrorCodes.INVALID_CONFIG,
        );
    });
});

describe("validateAppConfig", () => {
    it("should default the logging section", () => {
        expect(validateAppConfig({ lm_studio: lmStudio }).logging).toEqual({
            level: "info",
            max_size: 10 * 1024 * 1024,
            backup_count: 5,
        });
    });

    it("should accept upper-case log levels", () => {
        expect(validateAppConfig({ lm_studio: lmStudio, logging: { level: "INFO" } }).logging.level).toBe("info");
    });

    it("should reject an unknown log level", () => {
        expect(() => validateAppConfig({ lm_studio: lmStudio, logging: { level: "verbose" } })).toThrow(
            /^Invalid logging parameters: level:/,
        );
    });
});
