/**
 * Regex pre-pass for the label-per-line price layout sellers use:
 *
 *   casino        price
 *   price         usd
 *   usd           75
 *   150
 */

export type PricePair = readonly [standard: string | null, casino: string | null];

const CASINO_PRICE_PATTERN = /casino\s*\n\s*price\s*\n\s*usd\s*\n\s*(\d+)/;

// A "price" block directly under a "casino" label belongs to the casino pattern
const STANDARD_PRICE_PATTERN = /(?<!casino\s*\n\s*)price\s*\n\s*usd\s*\n\s*(\d+)/;

/**
 * Finds the standard and casino prices in raw email text
 */
export function extractPrices(text: string): PricePair {
    const normalized = text.toLowerCase();

    const standard = STANDARD_PRICE_PATTERN.exec(normalized);
    const casino = CASINO_PRICE_PATTERN.exec(normalized);

    return [standard?.[1] ?? null, casino?.[1] ?? null];
}
