/**
 * Response parser - pulls the extraction JSON out of model output
 */

import { LLMError, LLMErrorCodes } from './errors.js';
import { emptyFields } from './result.js';
import type { ExtractionFields } from './types.js';

/**
 * Returns the text from the first `{` to the last `}` inclusive.
 * Models often wrap the object in commentary or code fences.
 */
export function extractJsonSpan(content: string): string {
    const start = content.indexOf('{');
    const end = content.lastIndexOf('}');

    if (start === -1 || end === -1 || end < start) {
        throw new LLMError(
            'No JSON found in response',
            LLMErrorCodes.JSON_PARSE,
            undefined,
            { content }
        );
    }

    return content.slice(start, end + 1);
}

/**
 * Strips everything but digits: "$1,200" -> "1200"
 */
export function normalizePrice(value: unknown): string {
    return toText(value).replace(/\D/g, '');
}

function toText(value: unknown): string {
    if (value === null || value === undefined) {
        return '';
    }
    if (typeof value === 'string') {
        return value;
    }
    if (typeof value === 'number' || typeof value === 'boolean') {
        return String(value);
    }
    if (Array.isArray(value)) {
        return value.map(toText).filter((item) => item !== '').join('; ');
    }
    return JSON.stringify(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses model output into extraction fields. Missing fields become "".
 *
 * @throws {LLMError} JSON_PARSE when no object can be read from the content
 */
export function parseExtraction(content: string): ExtractionFields {
    const span = extractJsonSpan(content);

    let parsed: unknown;
    try {
        parsed = JSON.parse(span);
    } catch (error) {
        throw new LLMError(
            `Failed to parse response JSON: ${error instanceof Error ? error.message : String(error)}`,
            LLMErrorCodes.JSON_PARSE,
            undefined,
            { content: span }
        );
    }

    return toExtractionFields(parsed);
}

/**
 * Maps a parsed payload onto the extraction fields
 *
 * @throws {LLMError} JSON_PARSE when the payload is not a JSON object
 */
export function toExtractionFields(parsed: unknown): ExtractionFields {
    if (!isRecord(parsed)) {
        throw new LLMError(
            'Response JSON is not an object',
            LLMErrorCodes.JSON_PARSE,
            undefined,
            { payload: parsed }
        );
    }

    const fields = emptyFields();
    fields.price_usd = normalizePrice(parsed.price_usd);
    fields.price_usd_casino = normalizePrice(parsed.price_usd_casino);
    fields.important_info = toText(parsed.important_info);
    fields.comments = toText(parsed.comments);

    return fields;
}
