/**
 * Unit tests for the text repair heuristics
 */

import { describe, it, expect } from "vitest";
import {
    defaultResponseRepairer,
    sanitizeResponseText,
    stripNumericSeparators,
} from "../../lib/core/text-repair";

describe("Text Repair", () => {
    describe("sanitizeResponseText", () => {
        it("should strip a json code fence and its closing fence", () => {
            expect(sanitizeResponseText('```json\n{"a": 1}\n```')).toBe('{"a": 1}');
        });

        it("should strip a bare code fence", () => {
            expect(sanitizeResponseText("```\n{}\n```")).toBe("{}");
        });

        it("should strip fences written on the same line as the JSON", () => {
            expect(sanitizeResponseText('```JSON {"a": 1}```')).toBe('{"a": 1}');
        });

        it("should handle a missing closing fence", () => {
            expect(sanitizeResponseText('```json\n{"a": 1}')).toBe('{"a": 1}');
        });

        it("should trim surrounding whitespace", () => {
            expect(sanitizeResponseText('  \n {"a": 1} \n ')).toBe('{"a": 1}');
        });

        it("should replace typographic double quotes", () => {
            expect(sanitizeResponseText("{“name”: “Acme”}")).toBe('{"name": "Acme"}');
        });

        it("should leave plain JSON untouched", () => {
            const json = '{"items": [1, 2], "note": "a, b"}';
            expect(sanitizeResponseText(json)).toBe(json);
        });
    });

    describe("stripNumericSeparators", () => {
        it("should remove thousands separators inside numbers", () => {
            expect(stripNumericSeparators('{"total": 1,234.56}')).toBe('{"total": 1234.56}');
        });

        it("should remove every separator in a long number", () => {
            expect(stripNumericSeparators("1,234,567.89")).toBe("1234567.89");
        });

        it("should keep structural commas followed by whitespace", () => {
            const json = '{"a": 1, "b": 2}';
            expect(stripNumericSeparators(json)).toBe(json);
        });

        it("should keep commas that are not between two digits", () => {
            expect(stripNumericSeparators('"Main St, Springfield"')).toBe('"Main St, Springfield"');
        });

        it("should also strip digit commas inside quoted strings (known limitation)", () => {
            expect(stripNumericSeparators('{"address": "12,34 Main St"}')).toBe('{"address": "1234 Main St"}');
        });
    });

    describe("defaultResponseRepairer", () => {
        it("should sanitize before stripping separators", () => {
            const raw = "```json\n{“grand_total”: “2,500.00”}\n```";
            expect(defaultResponseRepairer.repair(raw)).toBe('{"grand_total": "2500.00"}');
        });
    });
});
