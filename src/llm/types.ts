/**
 * LLM client type definitions
 */

import { z } from 'zod';
import type { Logger } from 'winston';
import type { RetryOptions } from '../utils/retry.js';

/**
 * Message in chat completion format
 */
export interface ChatMessage {
    role: 'system' | 'user' | 'assistant';
    content: string;
}

/**
 * Request to the chat completions endpoint
 */
export interface ChatCompletionRequest {
    messages: ChatMessage[];
    max_tokens: number;
    temperature: number;
    stream: false;
}

/**
 * Response from the chat completions endpoint (OpenAI-compatible).
 * Only the path to the reply text is checked; every level may be missing.
 */
export const chatCompletionResponseSchema = z.object({
    choices: z
        .array(
            z.object({
                message: z.object({ content: z.string().nullish() }).nullish(),
            })
        )
        .nullish(),
});

export type ChatCompletionResponse = z.infer<typeof chatCompletionResponseSchema>;

/**
 * Fields extracted from one email
 */
export interface ExtractionFields {
    /** Digits only */
    price_usd: string;
    /** Digits only; set when the email quotes a separate casino rate */
    price_usd_casino: string;
    /** Placement requirements: publication process, link types, metrics, timeline */
    important_info: string;
    /** Payment, contact and other commercial terms */
    comments: string;
}

export type AnalysisSuccess = ExtractionFields & { error?: never };

export type AnalysisFailure = ExtractionFields & { error: string };

/**
 * Result of `analyze`. Failures carry `error` and empty fields.
 */
export type AnalysisResult = AnalysisSuccess | AnalysisFailure;

/**
 * Optional text of the surrounding thread
 */
export type ThreadContext = string;

export type FetchFn = typeof fetch;

export interface LMStudioClientOptions {
    retry?: RetryOptions;
    logger?: Logger;
    fetch?: FetchFn;
}
