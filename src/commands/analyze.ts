/**
 * analyze command - runs a batch of email files through the LM Studio client
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { loadConfig } from '../config/loader.js';
import { type LMStudioClient, createLMStudioClient } from '../llm/client.js';
import { failureResult, isAnalysisFailure } from '../llm/result.js';
import type { AnalysisResult, FetchFn } from '../llm/types.js';
import { ProcessingStats, type StatsSummary } from '../stats/stats.js';
import { configureLogging, createLogger } from '../utils/logger.js';
import type { RetryOptions } from '../utils/retry.js';

const logger = createLogger('analyze');

export interface EmailInput {
    id: string;
    text: string;
    context?: string;
}

export interface EmailReport {
    id: string;
    result: AnalysisResult;
}

export interface BatchReport {
    results: EmailReport[];
    stats: StatsSummary;
}

export interface AnalyzeCommandOptions {
    configPath: string;
    inputs: string[];
    contextPath?: string;
    debug?: boolean;
    fetch?: FetchFn;
    retry?: RetryOptions;
}

/**
 * Analyzes emails one after another. A failed email never stops the batch.
 */
export async function analyzeEmails(
    client: LMStudioClient,
    emails: EmailInput[]
): Promise<EmailReport[]> {
    const reports: EmailReport[] = [];

    for (const email of emails) {
        const result = await client.analyze(email.text, email.context);
        if (isAnalysisFailure(result)) {
            logger.error(`Analysis failed for ${email.id}`, { error: result.error });
        } else {
            logger.info(`Analyzed ${email.id}`, {
                price_usd: result.price_usd,
                price_usd_casino: result.price_usd_casino,
            });
        }
        reports.push({ id: email.id, result });
    }

    return reports;
}

/**
 * Loads config and input files, then analyzes every input
 *
 * @throws {ConfigError} If the config is missing or invalid
 */
export async function runAnalyzeCommand(options: AnalyzeCommandOptions): Promise<BatchReport> {
    const config = await loadConfig(path.resolve(options.configPath));
    configureLogging({
        level: config.logging.level,
        debug: options.debug,
        file: config.logging.file,
        maxSize: config.logging.max_size,
        maxFiles: config.logging.backup_count,
    });

    const stats = new ProcessingStats();
    const client = createLMStudioClient(config, stats, {
        fetch: options.fetch,
        retry: options.retry,
    });
    logger.info(`Starting analysis of ${options.inputs.length} email(s)`, {
        client: client.toString(),
    });
    logger.debug(client.toDebugString());

    const context = options.contextPath
        ? await fs.readFile(path.resolve(options.contextPath), 'utf-8')
        : undefined;

    const results: EmailReport[] = [];
    for (const input of options.inputs) {
        let text: string;
        try {
            text = await fs.readFile(path.resolve(input), 'utf-8');
        } catch (error) {
            const message = `Cannot read input file: ${error instanceof Error ? error.message : String(error)}`;
            logger.error(message, { input });
            results.push({ id: input, result: failureResult(message) });
            continue;
        }

        results.push(...(await analyzeEmails(client, [{ id: input, text, context }])));
    }

    stats.finish();
    stats.logSummary(logger);

    return { results, stats: stats.summary() };
}
