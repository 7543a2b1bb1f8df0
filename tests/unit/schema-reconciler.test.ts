/**
 * Unit tests for the schema reconciler
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { z } from "zod";
import { reconcileLevel, reconcileRecord } from "../../lib/core/schema-reconciler";
import { SchemaMismatchError } from "../../lib/core/errors";
import type { JsonObject, JsonValue, LevelHook, RecordSchema } from "../../lib/core/types";
import {
    InvoiceDataSchema,
    PartyDetailsSchema,
    PaymentSlipSchema,
} from "../../lib/extractors/invoice/schema";

function mismatch(run: () => unknown): SchemaMismatchError {
    try {
        run();
    } catch (error) {
        if (error instanceof SchemaMismatchError) return error;
        throw error;
    }
    throw new Error("Expected a SchemaMismatchError");
}

function record(value: unknown): Record<string, unknown> {
    if (typeof value !== "object" || value === null || Array.isArray(value)) {
        throw new Error("Expected a reconciled record");
    }
    return Object.fromEntries(Object.entries(value));
}

describe("Schema Reconciler", () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    describe("unknown field routing", () => {
        it("should move undeclared vendor keys into the vendor overflow map", () => {
            const result = reconcileRecord(InvoiceDataSchema, {
                invoice_metadata: {
                    invoice_number: "INV-001",
                    vendor_details: { name: "Acme", foo: "bar" },
                },
            });

            const metadata = record(result.invoice_metadata);
            expect(metadata.invoice_number).toBe("INV-001");
            expect(metadata.vendor_details).toEqual({ name: "Acme", extra_fields: { foo: "bar" } });
            expect(metadata.extra_fields).toEqual({});
            expect(result.extra_fields).toEqual({});
        });

        it("should keep overflow values by reference without normalizing them", () => {
            const nested: JsonObject = { grid: [[1, 2]], label: "x" };
            const result = reconcileLevel(PartyDetailsSchema, { name: "Acme", layout: nested }, []);

            expect(record(result.extra_fields).layout).toBe(nested);
        });

        it("should merge model-supplied extra_fields with undeclared keys", () => {
            const result = reconcileLevel(
                PartyDetailsSchema,
                { name: "Acme", extra_fields: { iban: "XX00 TEST" }, fax: "555-0100" },
                []
            );

            expect(result).toEqual({
                name: "Acme",
                extra_fields: { iban: "XX00 TEST", fax: "555-0100" },
            });
        });

        it("should promote an extra_fields entry that names an absent declared field", () => {
            const result = reconcileLevel(PartyDetailsSchema, { extra_fields: { tax_id: "T-1" } }, []);

            expect(result).toEqual({ tax_id: "T-1", extra_fields: {} });
        });

        it("should keep an extra_fields entry shadowed by a bound declared field", () => {
            const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
            const result = reconcileLevel(
                PartyDetailsSchema,
                { tax_id: "A", extra_fields: { tax_id: "B" } },
                ["invoice_metadata", "vendor_details"]
            );

            expect(result).toEqual({ tax_id: "A", extra_fields: { extra_fields: { tax_id: "B" } } });
            expect(warn).toHaveBeenCalledWith(
                expect.stringContaining(
                    'Kept extra_fields entry shadowed by declared field {"path":"invoice_metadata.vendor_details.extra_fields","field":"tax_id"}'
                )
            );
        });

        it("should keep an extra_fields entry that clashes with an undeclared key", () => {
            const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
            const result = reconcileRecord(InvoiceDataSchema, {
                invoice_metadata: { vendor_details: { foo: "top", extra_fields: { foo: "nested" } } },
            });

            expect(record(result.invoice_metadata).vendor_details).toEqual({
                extra_fields: { foo: "top", extra_fields: { foo: "nested" } },
            });
            expect(warn).toHaveBeenCalledWith(
                expect.stringContaining(
                    'Kept extra_fields entry displaced by undeclared key {"path":"invoice_metadata.vendor_details.extra_fields","field":"foo"}'
                )
            );
        });

        it("should not duplicate an extra_fields entry equal to the bound value", () => {
            const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
            const result = reconcileLevel(PartyDetailsSchema, { name: "A", extra_fields: { name: "A" } }, []);

            expect(result).toEqual({ name: "A", extra_fields: {} });
            expect(warn).not.toHaveBeenCalled();
        });

        it("should nest displaced entries one level deeper on a further clash", () => {
            vi.spyOn(console, "warn").mockImplementation(() => undefined);
            const nested: JsonObject = { tax_id: "C" };
            const result = reconcileLevel(
                PartyDetailsSchema,
                { tax_id: "A", extra_fields: { tax_id: "B", extra_fields: nested } },
                []
            );

            expect(result).toEqual({
                tax_id: "A",
                extra_fields: { extra_fields: { tax_id: "C", extra_fields: { tax_id: "B" } } },
            });
            expect(nested).toEqual({ tax_id: "C" });
        });

        it("should give the same record when its own output is reconciled again", () => {
            vi.spyOn(console, "warn").mockImplementation(() => undefined);
            const first = reconcileLevel(
                PartyDetailsSchema,
                { name: "A", foo: "top", extra_fields: { name: "B", foo: "nested" } },
                []
            );
            const again: JsonObject = JSON.parse(JSON.stringify(first));

            expect(reconcileLevel(PartyDetailsSchema, again, [])).toEqual(first);
        });

        it("should keep a __proto__ key as an own overflow entry", () => {
            const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
            const input: JsonObject = JSON.parse('{"name": "Acme", "__proto__": {"x": 1}, "y": 2}');
            const overflow = record(reconcileLevel(PartyDetailsSchema, input, []).extra_fields);

            expect(Object.getOwnPropertyDescriptor(overflow, "__proto__")?.value).toEqual({ x: 1 });
            expect(overflow.y).toBe(2);
            expect(Object.getPrototypeOf(overflow)).toBe(Object.prototype);
            expect(warn).toHaveBeenCalledWith(
                expect.stringContaining('Overflow key __proto__ is not carried into the validated record {"path":"extra_fields"}')
            );
        });

        it("should treat a null extra_fields as empty", () => {
            expect(reconcileLevel(PartyDetailsSchema, { extra_fields: null }, [])).toEqual({ extra_fields: {} });
        });

        it("should reject an extra_fields value that is not a map", () => {
            const error = mismatch(() =>
                reconcileRecord(InvoiceDataSchema, { totals: { extra_fields: "none" } })
            );

            expect(error.path).toBe("totals.extra_fields");
            expect(error.expected).toBe("object");
            expect(error.actual).toBe("string");
        });
    });

    describe("top-level cross-check", () => {
        it("should put unknown top-level keys into the root overflow map and log them", () => {
            const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
            const result = reconcileRecord(InvoiceDataSchema, { document_type: "invoice", page_count: 3 });

            expect(result.document_type).toBe("invoice");
            expect(result.extra_fields).toEqual({ page_count: 3 });
            expect(log).toHaveBeenCalledWith(
                expect.stringContaining('INFO [schema-reconciler] Unknown top-level fields detected {"fields":["page_count"]}')
            );
        });

        it("should not report the root extra_fields key itself", () => {
            const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
            const result = reconcileRecord(InvoiceDataSchema, { extra_fields: { source: "scan" } });

            expect(result.extra_fields).toEqual({ source: "scan" });
            expect(log).not.toHaveBeenCalled();
        });

        it("should reject a root that is not an object", () => {
            const error = mismatch(() => reconcileRecord(InvoiceDataSchema, [1, 2]));

            expect(error.path).toBe("(root)");
            expect(error.actual).toBe("array");
        });
    });

    describe("nested records", () => {
        it("should build required records from an empty map when absent", () => {
            const result = reconcileRecord(InvoiceDataSchema, {});

            expect(result).toEqual({
                invoice_metadata: {
                    vendor_details: { extra_fields: {} },
                    customer_details: { extra_fields: {} },
                    additional_metadata: {},
                    extra_fields: {},
                },
                line_items: [],
                totals: { partial_totals: [], taxes: [], extra_fields: {} },
                extra_fields: {},
            });
        });

        it("should treat a null required record as absent", () => {
            const result = reconcileRecord(InvoiceDataSchema, { totals: null });
            expect(result.totals).toEqual({ partial_totals: [], taxes: [], extra_fields: {} });
        });

        it("should leave optional records absent when missing, null or empty", () => {
            const cases: Array<JsonValue | undefined> = [undefined, null, {}];
            for (const payment_slip of cases) {
                const input: JsonObject = payment_slip === undefined ? {} : { payment_slip };
                const result = reconcileRecord(InvoiceDataSchema, input);
                expect(Object.hasOwn(result, "payment_slip")).toBe(false);
            }
        });

        it("should reconcile optional records when present", () => {
            const result = reconcileLevel(
                PaymentSlipSchema,
                { payment_amount: 10, bank_details: { bank_name: "Example Bank", swift: "EXAMPLE1" } },
                ["payment_slip"]
            );

            expect(result).toEqual({
                payment_amount: 10,
                bank_details: { bank_name: "Example Bank", extra_fields: { swift: "EXAMPLE1" } },
                extra_fields: {},
            });
        });

        it("should raise SchemaMismatch when a record field is a scalar", () => {
            const error = mismatch(() =>
                reconcileRecord(InvoiceDataSchema, { invoice_metadata: { vendor_details: "Acme" } })
            );

            expect(error).toBeInstanceOf(SchemaMismatchError);
            expect(error.code).toBe("SCHEMA_MISMATCH");
            expect(error.path).toBe("invoice_metadata.vendor_details");
            expect(error.expected).toBe("object");
            expect(error.actual).toBe("string");
            expect(error.value).toBe("Acme");
        });

        it("should raise SchemaMismatch when a record field is an array", () => {
            const error = mismatch(() => reconcileRecord(InvoiceDataSchema, { totals: [1] }));

            expect(error.path).toBe("totals");
            expect(error.actual).toBe("array");
        });

        it("should raise SchemaMismatch for a free-form map field given a scalar", () => {
            const error = mismatch(() =>
                reconcileRecord(InvoiceDataSchema, { invoice_metadata: { additional_metadata: "net 30" } })
            );

            expect(error.path).toBe("invoice_metadata.additional_metadata");
        });
    });

    describe("sequences", () => {
        it("should wrap a single line item map into a one-element sequence", () => {
            const result = reconcileRecord(InvoiceDataSchema, { line_items: { description: "Support" } });

            expect(result.line_items).toEqual([{ description: "Support", sub_items: [], extra_fields: {} }]);
        });

        it("should wrap a scalar sub item", () => {
            const result = reconcileRecord(InvoiceDataSchema, {
                line_items: [{ description: "Repair", sub_items: "Labour" }],
            });

            expect(result.line_items).toEqual([{ description: "Repair", sub_items: ["Labour"], extra_fields: {} }]);
        });

        it("should turn a null sequence into an empty one", () => {
            const result = reconcileRecord(InvoiceDataSchema, { line_items: null, totals: { taxes: null } });

            expect(result.line_items).toEqual([]);
            expect(record(result.totals).taxes).toEqual([]);
        });

        it("should preserve line item and sub item order", () => {
            const result = reconcileRecord(InvoiceDataSchema, {
                line_items: [
                    { description: "first", sub_items: ["a", "b", "c"] },
                    { description: "second" },
                    { description: "third" },
                ],
            });

            const items = result.line_items;
            expect(Array.isArray(items)).toBe(true);
            expect(Array.isArray(items) && items.map((item) => record(item).description)).toEqual([
                "first",
                "second",
                "third",
            ]);
            expect(Array.isArray(items) && record(items[0]).sub_items).toEqual(["a", "b", "c"]);
        });

        it("should name the index of a line item that is not a map", () => {
            const error = mismatch(() =>
                reconcileRecord(InvoiceDataSchema, { line_items: [{ description: "ok" }, "oops"] })
            );

            expect(error.path).toBe("line_items.1");
            expect(error.actual).toBe("string");
        });

        it("should route unknown line item keys into that line item's overflow", () => {
            const result = reconcileRecord(InvoiceDataSchema, {
                line_items: [{ description: "Hosting", sku: "H-1" }, { description: "Domain" }],
            });

            expect(result.line_items).toEqual([
                { description: "Hosting", sub_items: [], extra_fields: { sku: "H-1" } },
                { description: "Domain", sub_items: [], extra_fields: {} },
            ]);
        });
    });

    describe("string-or-map fields", () => {
        it("should pass strings and maps through unchanged", () => {
            const content: JsonObject = { raw_text: "hello" };
            const asMap = reconcileRecord(InvoiceDataSchema, { unstructured_content: content });
            const asText = reconcileRecord(InvoiceDataSchema, { unstructured_content: "hello" });

            expect(asMap.unstructured_content).toBe(content);
            expect(asText.unstructured_content).toBe("hello");
        });
    });

    describe("losslessness", () => {
        function expectEveryKeyAccounted(label: string, input: JsonObject, output: unknown): void {
            const reconciled = record(output);
            const overflow = record(reconciled.extra_fields);

            for (const key of Object.keys(input)) {
                const bound = key !== "extra_fields" && Object.hasOwn(reconciled, key);
                const spilled = Object.hasOwn(overflow, key);
                expect(bound !== spilled, `${label}: ${key}`).toBe(true);
                if (spilled) {
                    expect(overflow[key], `${label}: ${key}`).toBe(input[key]);
                }
            }
            for (const key of [...Object.keys(reconciled), ...Object.keys(overflow)]) {
                if (key === "extra_fields") continue;
                expect(Object.hasOwn(input, key), `${label}: ${key}`).toBe(true);
            }
        }

        it("should account for every input key exactly once at every level", () => {
            const vendor: JsonObject = {
                name: "Acme",
                address: "1 Road",
                contact: "billing@acme.example",
                tax_id: "T-1",
                website: "acme.example",
            };
            const customer: JsonObject = {
                name: "Jane",
                address: "2 Lane",
                contact: "555-0100",
                tax_id: "T-2",
                loyalty_id: { tier: "gold" },
            };
            const metadata: JsonObject = {
                invoice_number: "INV-9",
                invoice_date: "2024-01-01",
                due_date: "2024-01-31",
                currency: "EUR",
                vendor_details: vendor,
                customer_details: customer,
                additional_metadata: { notes: "n" },
                po_box: "PO 1",
            };
            const firstLine: JsonObject = {
                description: "A",
                quantity: 1,
                unit: "EA",
                unit_price: 2,
                total: 2,
                sub_items: ["x"],
                sku: "A-1",
            };
            const secondLine: JsonObject = { description: "B", total: 3, sub_items: [], colour: ["red"] };
            const bank: JsonObject = {
                account_name: "Acme",
                account_number: "123",
                bank_name: "Example Bank",
                bic: "EXAMPLEXXX",
            };
            const slip: JsonObject = {
                payment_amount: 5,
                payment_due_date: "2024-01-31",
                reference_number: "R-1",
                bank_details: bank,
                barcode: "0001",
            };
            const totals: JsonObject = {
                previous_balance: 0,
                current_charges: 5,
                partial_totals: [],
                taxes: [],
                discounts: 0,
                adjustments: 0,
                grand_total: 5,
                amount_in_words: "five",
                currency: "EUR",
                rounding: 0.01,
            };
            const input: JsonObject = {
                document_type: "invoice",
                invoice_metadata: metadata,
                line_items: [firstLine, secondLine],
                totals,
                payment_slip: slip,
                unstructured_content: "thanks",
                page_count: 1,
            };

            vi.spyOn(console, "log").mockImplementation(() => undefined);
            const result = reconcileRecord(InvoiceDataSchema, input);
            const reconciledMetadata = record(result.invoice_metadata);
            const reconciledSlip = record(result.payment_slip);
            const lines = result.line_items;
            if (!Array.isArray(lines)) throw new Error("Expected reconciled line items");

            expectEveryKeyAccounted("(root)", input, result);
            expectEveryKeyAccounted("invoice_metadata", metadata, reconciledMetadata);
            expectEveryKeyAccounted("vendor_details", vendor, reconciledMetadata.vendor_details);
            expectEveryKeyAccounted("customer_details", customer, reconciledMetadata.customer_details);
            expectEveryKeyAccounted("line_items.0", firstLine, lines[0]);
            expectEveryKeyAccounted("line_items.1", secondLine, lines[1]);
            expectEveryKeyAccounted("totals", totals, result.totals);
            expectEveryKeyAccounted("payment_slip", slip, reconciledSlip);
            expectEveryKeyAccounted("bank_details", bank, reconciledSlip.bank_details);

            expect(result.extra_fields).toEqual({ page_count: 1 });
            expect(record(reconciledMetadata.customer_details).extra_fields).toEqual({ loyalty_id: { tier: "gold" } });
            expect(record(reconciledSlip.bank_details).extra_fields).toEqual({ bic: "EXAMPLEXXX" });
        });
    });

    describe("level hooks", () => {
        it("should run a hook registered for a schema before partitioning", () => {
            const Section = z.object({
                title: z.string().optional(),
                extra_fields: z.record(z.unknown()),
            });
            const Root = z.object({ section: Section, extra_fields: z.record(z.unknown()) });
            const seen: Array<ReadonlyArray<string | number>> = [];
            const hook: LevelHook = (input, path) => {
                seen.push(path);
                const { heading, ...rest } = input;
                return heading === undefined ? input : { ...rest, title: heading };
            };
            const levelHooks = new Map<RecordSchema, LevelHook>([[Section, hook]]);

            const result = reconcileRecord(Root, { section: { heading: "Quarterly", note: "x" } }, { levelHooks });

            expect(result).toEqual({
                section: { title: "Quarterly", extra_fields: { note: "x" } },
                extra_fields: {},
            });
            expect(seen).toEqual([["section"]]);
        });

        it("should work with any object schema, not just invoices", () => {
            const Child = z.object({ x: z.number().optional(), extra_fields: z.record(z.unknown()) });
            const Root = z.object({
                tags: z.array(z.string()),
                child: Child,
                extra_fields: z.record(z.unknown()),
            });
            const input: JsonValue = { tags: "one", child: { x: 1, y: 2 } };

            expect(reconcileRecord(Root, input)).toEqual({
                tags: ["one"],
                child: { x: 1, extra_fields: { y: 2 } },
                extra_fields: {},
            });
        });
    });
});
