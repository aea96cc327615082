/**
 * Prompt builder - wraps an email in the extraction instructions
 */

/**
 * Builds the extraction prompt. The same email always yields the same prompt.
 */
export function buildExtractionPrompt(emailText: string): string {
    return `Analyze this email and extract the following information in JSON format:

1. Prices in the format:
   casino
   price
   usd
   [number]
   OR
   price
   usd
   [number]

2. Important placement information for column Q:
   - Publication process
   - Link types (dofollow/nofollow)
   - Content requirements
   - Timeline
   - Traffic info
   - Domain metrics (DR, TF, etc.)

3. Additional details for column R:
   - Payment methods
   - Special terms
   - Discounts
   - Contact info
   - Response times
   - Extra requirements

Format the response as valid JSON:
{
    "price_usd": "number only, no symbols",
    "price_usd_casino": "number only if a separate casino price is given",
    "important_info": "key requirements and metrics",
    "comments": "additional details"
}

Email to analyze:
${emailText}

Return ONLY the JSON object. Do not add any text, explanation or markdown before or after it.`;
}
