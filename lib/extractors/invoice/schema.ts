/**
 * Invoice Record Schema
 *
 * The validated record model. Each level is a strict Zod object with its own
 * `extra_fields` overflow map; the reconciler decides which input keys land
 * there, these schemas only coerce and validate the declared fields.
 *
 * Serialized to JSON, the parsed record is the wire shape handed to callers.
 */

import { z } from "zod";

/** Model replies often say null where they mean "not on the invoice". */
function absentIfNull(value: unknown): unknown {
    return value === null ? undefined : value;
}

const NUMERIC_TEXT = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;

/**
 * Numeric strings become numbers; anything else is left for Zod to reject so
 * the error names the raw value.
 */
function coerceNumeric(value: unknown): unknown {
    if (value === null || value === undefined) return undefined;
    if (typeof value === "string") {
        const trimmed = value.trim();
        return NUMERIC_TEXT.test(trimmed) ? Number(trimmed) : value;
    }
    return value;
}

/**
 * Identifiers such as account numbers sometimes arrive as JSON numbers.
 * Integers past 2^53 have already lost digits in `JSON.parse`, so those are
 * left for Zod to reject instead of being stringified.
 */
function coerceText(value: unknown): unknown {
    if (value === null || value === undefined) return undefined;
    if (typeof value === "number" && Number.isFinite(value)) {
        return Number.isInteger(value) && !Number.isSafeInteger(value) ? value : String(value);
    }
    return value;
}

const OptionalText = z.preprocess(coerceText, z.string().optional());

const OptionalAmount = z.preprocess(
    coerceNumeric,
    z.number({ invalid_type_error: "Expected a number or numeric text" }).finite().optional()
);

export const OverflowSchema = z.record(z.unknown());

const ExtraFields = OverflowSchema.describe("Fields found on the document that this level does not declare");

/** Fields that are either prose or a structured object. */
export const FreeFormSchema = z.preprocess(
    absentIfNull,
    z.union([z.string(), OverflowSchema]).optional()
);

export const PartyDetailsSchema = z
    .object({
        name: OptionalText.describe("Legal or trading name"),
        address: OptionalText.describe("Postal address as printed"),
        contact: OptionalText.describe("Phone, email or contact person"),
        tax_id: OptionalText.describe("VAT or tax registration number"),
        extra_fields: ExtraFields,
    })
    .strict()
    .describe("Vendor or customer details");

export const VendorDetailsSchema = PartyDetailsSchema;
export const CustomerDetailsSchema = PartyDetailsSchema;

export const LineItemSchema = z
    .object({
        transaction_date: OptionalText.describe("Date of the charge, if listed per line"),
        description: OptionalText.describe("Description of the item or service"),
        transaction_type: OptionalText.describe("Charge, credit, fee, etc."),
        quantity: OptionalAmount.describe("Quantity billed"),
        unit: OptionalText.describe("Unit of measure (EA, HR, m3, etc.)"),
        unit_price: OptionalAmount.describe("Price per unit"),
        tax_rate: OptionalAmount.describe("Tax rate in percent"),
        tax_amount: OptionalAmount.describe("Tax charged on this line"),
        subtotal: OptionalAmount.describe("Line amount before tax"),
        total: OptionalAmount.describe("Line amount including tax"),
        status: OptionalText.describe("Line status, e.g. paid or pending"),
        sub_items: z.array(z.unknown()).describe("Breakdown rows under this line, in printed order"),
        extra_details: FreeFormSchema.describe("Free-form notes for this line"),
        extra_fields: ExtraFields,
    })
    .strict()
    .describe("One invoice row");

export const BankDetailsSchema = z
    .object({
        account_name: OptionalText.describe("Account holder"),
        account_number: OptionalText.describe("Account number or IBAN"),
        bank_name: OptionalText.describe("Name of the bank"),
        extra_fields: ExtraFields,
    })
    .strict()
    .describe("Bank account to pay into");

export const PaymentSlipSchema = z
    .object({
        payment_amount: OptionalAmount.describe("Amount to pay"),
        payment_due_date: OptionalText.describe("Payment deadline as printed"),
        reference_number: OptionalText.describe("Payment reference to quote"),
        bank_details: BankDetailsSchema.optional(),
        extra_fields: ExtraFields,
    })
    .strict()
    .describe("Detachable payment slip (absent if the invoice has none)");

export const TotalsSchema = z
    .object({
        previous_balance: OptionalAmount.describe("Balance carried over from the last invoice"),
        current_charges: OptionalAmount.describe("Charges for this billing period"),
        partial_totals: z.array(z.unknown()).describe("Intermediate totals, e.g. net per tax band"),
        taxes: z.array(z.unknown()).describe("Tax lines"),
        discounts: OptionalAmount.describe("Total discounts"),
        adjustments: OptionalAmount.describe("Corrections and credits"),
        grand_total: OptionalAmount.describe("Amount due"),
        amount_in_words: OptionalText.describe("Amount due written out in words"),
        currency: OptionalText.describe("Currency code or symbol"),
        extra_fields: ExtraFields,
    })
    .strict()
    .describe("Invoice totals");

export const InvoiceMetadataSchema = z
    .object({
        invoice_number: OptionalText.describe("Invoice number as printed"),
        invoice_date: OptionalText.describe("Issue date as printed"),
        due_date: OptionalText.describe("Due date as printed"),
        currency: OptionalText.describe("Currency code or symbol"),
        vendor_details: VendorDetailsSchema,
        customer_details: CustomerDetailsSchema,
        additional_metadata: OverflowSchema.describe("Payment terms, reference numbers and notes"),
        extra_fields: ExtraFields,
    })
    .strict()
    .describe("Invoice header");

export const InvoiceDataSchema = z
    .object({
        document_type: OptionalText.describe("Kind of document, usually \"invoice\""),
        invoice_metadata: InvoiceMetadataSchema,
        line_items: z.array(LineItemSchema).describe("Every line item, in invoice row order"),
        totals: TotalsSchema,
        payment_slip: PaymentSlipSchema.optional(),
        unstructured_content: FreeFormSchema.describe("Text on the document that fits no field"),
        extra_fields: ExtraFields,
    })
    .strict()
    .describe("A complete invoice record");

export type FreeForm = string | Record<string, unknown>;
export type PartyDetails = z.infer<typeof PartyDetailsSchema>;
export type LineItem = z.infer<typeof LineItemSchema>;
export type BankDetails = z.infer<typeof BankDetailsSchema>;
export type PaymentSlip = z.infer<typeof PaymentSlipSchema>;
export type Totals = z.infer<typeof TotalsSchema>;
export type InvoiceMetadata = z.infer<typeof InvoiceMetadataSchema>;
export type InvoiceData = z.infer<typeof InvoiceDataSchema>;
