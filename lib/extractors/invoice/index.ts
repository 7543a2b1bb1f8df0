/**
 * Invoice Extractor
 *
 * Asks a vision model for the whole invoice as JSON and reconciles the reply
 * into {@link InvoiceData}:
 * - Metadata with vendor and customer details
 * - Every line item, in invoice row order
 * - Totals, taxes and the optional payment slip
 * - `extra_fields` at each level for anything the schema does not name
 */

import {
    reconcileResponse,
    tryReconcileResponse,
    type ExtractorConfig,
    type JsonObject,
    type LevelHook,
    type ReconcileResponseOptions,
    type ReconciliationOutcome,
    type RecordSchema,
} from "../../core";
import { InvoiceDataSchema, InvoiceMetadataSchema, type InvoiceData } from "./schema";

export * from "./schema";

/**
 * `additional_metadata.reference_numbers` is a list, but single references
 * usually come back as a bare string.
 */
export const wrapReferenceNumbers: LevelHook = (metadata) => {
    const additional = metadata.additional_metadata;
    if (typeof additional !== "object" || additional === null || Array.isArray(additional)) {
        return metadata;
    }

    const references = additional.reference_numbers;
    if (typeof references !== "string") {
        return metadata;
    }

    const fixed: JsonObject = { ...additional, reference_numbers: [references] };
    return { ...metadata, additional_metadata: fixed };
};

export const invoiceLevelHooks: ReadonlyMap<RecordSchema, LevelHook> = new Map<RecordSchema, LevelHook>([
    [InvoiceMetadataSchema, wrapReferenceNumbers],
]);

export const SYSTEM_PROMPT = "You are an AI specialized in invoice data extraction.";

const SCHEMA_OUTLINE = `{
  "document_type": "invoice",
  "invoice_metadata": {
    "invoice_number": "string",
    "invoice_date": "string",
    "due_date": "string",
    "currency": "string",
    "vendor_details": {
      "name": "string",
      "address": "string",
      "contact": "string",
      "tax_id": "string",
      "extra_fields": { "key": "value" }
    },
    "customer_details": {
      "name": "string",
      "address": "string",
      "contact": "string",
      "tax_id": "string",
      "extra_fields": { "key": "value" }
    },
    "additional_metadata": {
      "payment_terms": "string",
      "reference_numbers": ["string"],
      "notes": "string",
      "extra_fields": { "key": "value" }
    }
  },
  "line_items": [
    {
      "transaction_date": "string",
      "description": "string",
      "transaction_type": "string",
      "quantity": "number",
      "unit": "string",
      "unit_price": "number",
      "tax_rate": "number",
      "tax_amount": "number",
      "subtotal": "number",
      "total": "number",
      "status": "string",
      "sub_items": [
        { "description": "string", "quantity": "number", "unit_price": "number", "total": "number" }
      ],
      "extra_fields": { "key": "value" }
    }
  ],
  "totals": {
    "previous_balance": "number",
    "current_charges": "number",
    "partial_totals": [{ "type": "string", "amount": "number" }],
    "taxes": [{ "type": "string", "amount": "number", "rate": "number" }],
    "discounts": "number",
    "adjustments": "number",
    "grand_total": "number",
    "amount_in_words": "string",
    "currency": "string",
    "extra_fields": { "key": "value" }
  },
  "payment_slip": {
    "payment_amount": "number",
    "payment_due_date": "string",
    "reference_number": "string",
    "bank_details": {
      "account_name": "string",
      "account_number": "string",
      "bank_name": "string",
      "extra_fields": { "key": "value" }
    },
    "extra_fields": { "key": "value" }
  },
  "unstructured_content": {
    "raw_text": "string",
    "notes": "string",
    "extra_fields": { "key": "value" }
  },
  "extra_fields": { "key": "value" }
}`;

/**
 * Build the extraction prompt.
 *
 * The document itself travels as a separate message part, so the prompt is
 * the same for every request.
 */
export function buildPrompt(): string {
    return `You are an expert in invoice data extraction. Analyze the attached invoice and extract its data into this structured JSON format:

JSON Structure:
1. Use the predefined sections (e.g., "invoice_metadata", "line_items", "totals").
2. Include any unknown or additional fields in a dedicated "extra_fields" object at the appropriate level.
3. Ensure the response is a valid JSON object.
4. The schema shows one line item for brevity; add every line item on the invoice to "line_items", in order.

Schema:
${SCHEMA_OUTLINE}

Ensure all relevant details are captured. Use null for missing fields. Return only the JSON object, with no other text.`;
}

/**
 * Invoice extractor configuration
 */
export const invoiceExtractor: ExtractorConfig<typeof InvoiceDataSchema> = {
    name: "invoice",
    description: "Extract a complete invoice record with per-level overflow fields",
    schema: InvoiceDataSchema,
    buildPrompt,
    systemPrompt: SYSTEM_PROMPT,
    levelHooks: invoiceLevelHooks,
};

/**
 * Reconcile a raw model reply into an invoice record.
 *
 * @example
 * ```typescript
 * const invoice = reconcileInvoiceResponse('```json\n{"invoice_metadata": {"invoice_number": "INV-001"}}\n```');
 * invoice.invoice_metadata.invoice_number; // "INV-001"
 * ```
 */
export function reconcileInvoiceResponse(raw: string, options?: ReconcileResponseOptions): InvoiceData {
    return reconcileResponse(raw, invoiceExtractor, options);
}

export function tryReconcileInvoiceResponse(
    raw: string,
    options?: ReconcileResponseOptions
): ReconciliationOutcome<InvoiceData> {
    return tryReconcileResponse(raw, invoiceExtractor, options);
}

export default invoiceExtractor;
