import type { AnalysisFailure, AnalysisResult, ExtractionFields } from './types.js';

export function emptyFields(): ExtractionFields {
    return {
        price_usd: '',
        price_usd_casino: '',
        important_info: '',
        comments: '',
    };
}

export function failureResult(error: string): AnalysisFailure {
    return { ...emptyFields(), error };
}

export function isAnalysisFailure(result: AnalysisResult): result is AnalysisFailure {
    return typeof result.error === 'string';
}
