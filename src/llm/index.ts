/**
 * LLM module exports
 */

export { LMStudioClient, createLMStudioClient, classifyError } from './client.js';
export { LLMError, LLMErrorCodes, isRetryableError } from './errors.js';
export { buildExtractionPrompt } from './prompt-builder.js';
export { extractJsonSpan, normalizePrice, parseExtraction, toExtractionFields } from './response-parser.js';
export { emptyFields, failureResult, isAnalysisFailure } from './result.js';
export type { LLMErrorCode } from './errors.js';
export type {
    AnalysisFailure,
    AnalysisResult,
    AnalysisSuccess,
    ChatCompletionRequest,
    ChatCompletionResponse,
    ChatMessage,
    ExtractionFields,
    FetchFn,
    LMStudioClientOptions,
    ThreadContext,
} from './types.js';
