/**
 * Text Repair
 *
 * Best-effort fixes applied to the raw model reply before it reaches the JSON
 * parser. Nothing here throws: anything still broken afterwards surfaces as a
 * `MalformedResponseError` from the decoder.
 *
 * ## Known limitation
 *
 * `stripNumericSeparators` works on raw text and cannot tell a thousands
 * separator from a digit-comma-digit run inside a quoted string, so
 * `"12,34 Main St"` becomes `"1234 Main St"`.
 *
 * @module text-repair
 */

import type { ResponseRepairer } from "./types";

const OPENING_FENCE = /^```(?:json)?[ \t]*\r?\n?/i;
const CLOSING_FENCE = /\r?\n?[ \t]*```$/;
const TYPOGRAPHIC_QUOTES = /[“”]/g;
const DIGIT_COMMA_DIGIT = /(?<=\d),(?=\d)/g;

/**
 * Trim, drop surrounding code fences and replace curly double quotes.
 *
 * @example
 * ```typescript
 * sanitizeResponseText("```json\n{“a”: 1}\n```");
 * // '{"a": 1}'
 * ```
 */
export function sanitizeResponseText(raw: string): string {
    return raw
        .trim()
        .replace(OPENING_FENCE, "")
        .replace(CLOSING_FENCE, "")
        .trim()
        .replace(TYPOGRAPHIC_QUOTES, '"');
}

/**
 * Remove every comma that sits between two digits.
 */
export function stripNumericSeparators(text: string): string {
    return text.replace(DIGIT_COMMA_DIGIT, "");
}

/** Sanitizer followed by the numeric cleaner. */
export const defaultResponseRepairer: ResponseRepairer = {
    repair: (raw) => stripNumericSeparators(sanitizeResponseText(raw)),
};
