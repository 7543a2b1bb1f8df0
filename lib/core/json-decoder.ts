import { MalformedResponseError } from "./errors";
import type { JsonValue } from "./types";

// V8 reports "... in JSON at position 12" (Node 20) and sometimes "(line 1 column 13)".
const POSITION_PATTERN = /at position (\d+)/;

/**
 * Parse repaired response text into a generic value tree.
 *
 * @param text - Text after sanitizing and numeric cleaning
 * @param rawText - The unrepaired reply, kept on the error for diagnostics
 * @throws {MalformedResponseError} When the text is not valid JSON
 */
export function decodeJson(text: string, rawText: string = text): JsonValue {
    try {
        const value: JsonValue = JSON.parse(text);
        return value;
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        const match = POSITION_PATTERN.exec(reason);
        const position = match ? Number(match[1]) : undefined;
        throw new MalformedResponseError(rawText, reason, position);
    }
}
