/**
 * Run statistics shared by the components of one run
 */

import type { Logger } from 'winston';

export const ErrorCategories = {
    JSON_PARSE: 'json_parse',
    API: 'api',
    ANALYSIS: 'analysis',
} as const;

export type ErrorCategory = (typeof ErrorCategories)[keyof typeof ErrorCategories];

export interface StatsSummary {
    calls: number;
    errors: Record<ErrorCategory, number>;
    totalErrors: number;
    startedAt: string;
    finishedAt?: string;
    durationMs: number;
}

export class ProcessingStats {
    calls = 0;
    readonly errors: Record<ErrorCategory, number> = {
        json_parse: 0,
        api: 0,
        analysis: 0,
    };
    readonly startedAt: Date;
    finishedAt?: Date;

    constructor(private readonly now: () => Date = () => new Date()) {
        this.startedAt = now();
    }

    recordCall(): void {
        this.calls++;
    }

    recordError(category: ErrorCategory): void {
        this.errors[category]++;
    }

    get totalErrors(): number {
        return this.errors.json_parse + this.errors.api + this.errors.analysis;
    }

    finish(): void {
        this.finishedAt = this.now();
    }

    summary(): StatsSummary {
        const end = this.finishedAt ?? this.now();
        return {
            calls: this.calls,
            errors: { ...this.errors },
            totalErrors: this.totalErrors,
            startedAt: this.startedAt.toISOString(),
            finishedAt: this.finishedAt?.toISOString(),
            durationMs: end.getTime() - this.startedAt.getTime(),
        };
    }

    logSummary(logger: Logger): void {
        const summary = this.summary();
        logger.info('Run statistics', summary);
        if (summary.totalErrors > 0) {
            logger.warn(`${summary.totalErrors} of ${summary.calls} analyses failed`, {
                errors: summary.errors,
            });
        }
    }
}
