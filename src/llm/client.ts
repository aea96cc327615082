/**
 * LM Studio client - extracts offer terms from emails with the local qwen3-8b model
 */

import type { Logger } from 'winston';
import { z } from 'zod';
import {
    chatCompletionResponseSchema,
    type AnalysisResult,
    type ChatCompletionRequest,
    type ExtractionFields,
    type FetchFn,
    type LMStudioClientOptions,
    type ThreadContext,
} from './types.js';
import { LLMError, LLMErrorCodes, isRetryableError } from './errors.js';
import { buildExtractionPrompt } from './prompt-builder.js';
import { parseExtraction } from './response-parser.js';
import { failureResult } from './result.js';
import { type LMStudioSettings, validateLMStudioConfig } from '../config/schema.js';
import { extractPrices } from '../extraction/price-extractor.js';
import { ErrorCategories, type ErrorCategory, type ProcessingStats } from '../stats/stats.js';
import { type RetryOptions, withRetry } from '../utils/retry.js';
import { createLogger } from '../utils/logger.js';

export class LMStudioClient {
    readonly url: string;
    private readonly settings: LMStudioSettings;
    private readonly retryOptions: RetryOptions;
    private readonly logger: Logger;
    private readonly fetchFn: FetchFn;

    /**
     * @param config - Config object holding an `lm_studio` section
     * @throws {ConfigError} If the section is missing, incomplete or unsupported
     */
    constructor(
        config: unknown,
        private readonly stats: ProcessingStats,
        options: LMStudioClientOptions = {}
    ) {
        this.settings = validateLMStudioConfig(config);
        this.url = `http://${this.settings.host}:${this.settings.port}/v1/chat/completions`;
        this.logger = options.logger ?? createLogger('lm-studio');
        this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
        this.retryOptions = {
            ...options.retry,
            shouldRetry: options.retry?.shouldRetry ?? isRetryableError,
            logger: options.retry?.logger ?? this.logger,
        };
    }

    get config(): Readonly<LMStudioSettings> {
        return this.settings;
    }

    /**
     * Analyzes one email. Never rejects: failures come back as a result with `error` set.
     */
    async analyze(emailText: string, threadContext?: ThreadContext): Promise<AnalysisResult> {
        this.stats.recordCall();

        try {
            const [regexPrice, regexCasinoPrice] = extractPrices(emailText);

            if (threadContext !== undefined) {
                this.logger.debug('Thread context supplied', { length: threadContext.length });
            }

            const prompt = buildExtractionPrompt(emailText);
            const content = await withRetry(() => this.complete(prompt), this.retryOptions);
            const fields = parseExtraction(content);

            return this.applyRegexPrices(fields, regexPrice, regexCasinoPrice);
        } catch (error) {
            const category = classifyError(error);
            const message = error instanceof Error ? error.message : String(error);

            this.stats.recordError(category);
            this.logger.error('Email analysis failed', {
                category,
                error: error instanceof LLMError ? error.toJSON() : message,
            });

            return failureResult(message);
        }
    }

    /**
     * Sends the prompt as a single user message and returns the reply text
     *
     * @throws {LLMError} On network failure, timeout, non-2xx status or an empty reply
     */
    async complete(prompt: string): Promise<string> {
        const request: ChatCompletionRequest = {
            messages: [{ role: 'user', content: prompt }],
            max_tokens: this.settings.max_tokens,
            temperature: this.settings.temperature,
            stream: false,
        };

        const timeoutMs = this.settings.timeout * 1000;
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

        let response: Response;
        try {
            response = await this.fetchFn(this.url, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify(request),
                signal: controller.signal,
            });
        } catch (error) {
            clearTimeout(timeoutId);

            if (isAbortError(error)) {
                throw new LLMError(
                    `Request timeout after ${timeoutMs}ms`,
                    LLMErrorCodes.TIMEOUT
                );
            }

            const message = error instanceof Error ? error.message : String(error);
            throw new LLMError(
                `Network error: ${message}`,
                LLMErrorCodes.NETWORK_ERROR,
                undefined,
                { originalError: message }
            );
        }

        try {
            if (!response.ok) {
                await this.handleErrorResponse(response);
            }

            let body: unknown;
            try {
                body = await response.json();
            } catch (error) {
                throw new LLMError(
                    `Invalid response body: ${error instanceof Error ? error.message : String(error)}`,
                    LLMErrorCodes.INVALID_RESPONSE,
                    response.status
                );
            }

            const data = chatCompletionResponseSchema.safeParse(body);
            if (!data.success) {
                throw new LLMError(
                    'Unexpected response shape from API',
                    LLMErrorCodes.INVALID_RESPONSE,
                    response.status,
                    { issues: data.error.issues }
                );
            }

            const content = data.data.choices?.[0]?.message?.content;
            if (typeof content !== 'string' || content.trim() === '') {
                throw new LLMError(
                    'Empty response from API',
                    LLMErrorCodes.EMPTY_RESPONSE,
                    response.status
                );
            }

            return content;
        } finally {
            clearTimeout(timeoutId);
        }
    }

    /**
     * Reads the error body so the connection is released, then throws an API error
     */
    private async handleErrorResponse(response: Response): Promise<never> {
        let errorMessage = `API error: ${response.status} ${response.statusText}`;

        let text = '';
        try {
            text = await response.text();
        } catch (error) {
            this.logger.debug('Could not read error body', {
                status: response.status,
                error: error instanceof Error ? error.message : String(error),
            });
        }

        const parsed = apiErrorBodySchema.safeParse(safeJsonParse(text));
        if (parsed.success && parsed.data.error.message) {
            errorMessage = `API error: ${response.status} ${parsed.data.error.message}`;
        }

        throw new LLMError(errorMessage, LLMErrorCodes.API_ERROR, response.status, {
            body: text.slice(0, 500),
        });
    }

    private applyRegexPrices(
        fields: ExtractionFields,
        regexPrice: string | null,
        regexCasinoPrice: string | null
    ): ExtractionFields {
        if (regexPrice !== null && regexPrice !== fields.price_usd) {
            this.logger.debug('Using price found in email text', {
                model: fields.price_usd,
                text: regexPrice,
            });
            fields.price_usd = regexPrice;
        }

        if (regexCasinoPrice !== null && regexCasinoPrice !== fields.price_usd_casino) {
            this.logger.debug('Using casino price found in email text', {
                model: fields.price_usd_casino,
                text: regexCasinoPrice,
            });
            fields.price_usd_casino = regexCasinoPrice;
        }

        return fields;
    }

    toString(): string {
        return `LMStudioClient(url=${this.url}, model=${this.settings.model})`;
    }

    toDebugString(): string {
        return (
            `LMStudioClient(url=${this.url}, ` +
            `model=${this.settings.model}, ` +
            `version=${this.settings.version}, ` +
            `timeout=${this.settings.timeout}, ` +
            `max_tokens=${this.settings.max_tokens}, ` +
            `temperature=${this.settings.temperature})`
        );
    }
}

const apiErrorBodySchema = z.object({
    error: z.object({ message: z.string().optional() }),
});

function safeJsonParse(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
}

function isAbortError(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError';
}

/**
 * Maps an analysis failure to its statistics bucket
 */
export function classifyError(error: unknown): ErrorCategory {
    if (error instanceof LLMError) {
        if (error.code === LLMErrorCodes.JSON_PARSE) {
            return ErrorCategories.JSON_PARSE;
        }
        if (error.isApiError) {
            return ErrorCategories.API;
        }
    }
    return ErrorCategories.ANALYSIS;
}

/**
 * Creates an LM Studio client
 */
export function createLMStudioClient(
    config: unknown,
    stats: ProcessingStats,
    options?: LMStudioClientOptions
): LMStudioClient {
    return new LMStudioClient(config, stats, options);
}
