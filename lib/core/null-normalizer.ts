import type { JsonObject, JsonValue } from "./types";

/** Strings the model uses in place of a real null. */
export const NULL_SYNONYMS: ReadonlySet<string> = new Set(["null", "NA"]);

/**
 * Replace null-synonym strings with `null` at every depth.
 *
 * Matching is on values only, never keys, and is exact (case-sensitive, no
 * trimming). Returns a new tree; running it twice gives the same result.
 */
export function normalizeNullSynonyms(value: JsonValue): JsonValue {
    if (typeof value === "string") {
        return NULL_SYNONYMS.has(value) ? null : value;
    }

    if (Array.isArray(value)) {
        return value.map(normalizeNullSynonyms);
    }

    if (value !== null && typeof value === "object") {
        // fromEntries defines own keys, so a "__proto__" key survives.
        const result: JsonObject = Object.fromEntries(
            Object.entries(value).map(([key, child]): [string, JsonValue] => [key, normalizeNullSynonyms(child)])
        );
        return result;
    }

    return value;
}
