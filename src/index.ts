export * from './llm/index.js';
export { extractPrices } from './extraction/price-extractor.js';
export type { PricePair } from './extraction/price-extractor.js';
export { ProcessingStats, ErrorCategories } from './stats/stats.js';
export type { ErrorCategory, StatsSummary } from './stats/stats.js';
export { loadConfig, parseConfig } from './config/loader.js';
export {
    SUPPORTED_MODEL,
    SUPPORTED_VERSION,
    validateAppConfig,
    validateLMStudioConfig,
} from './config/schema.js';
export type { AppConfig, LMStudioSettings, LoggingSettings } from './config/schema.js';
export { ConfigError, ConfigErrorCodes } from './config/errors.js';
export type { ConfigErrorCode } from './config/errors.js';
export { withRetry, retryDelay, DEFAULT_RETRY_OPTIONS } from './utils/retry.js';
export type { RetryOptions } from './utils/retry.js';
export { analyzeEmails } from './commands/analyze.js';
export type { EmailInput, BatchReport } from './commands/analyze.js';
