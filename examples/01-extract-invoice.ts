/**
 * Example 01: Extract an Invoice
 *
 * Reads a PDF or image from disk, sends it to the model and prints the
 * reconciled invoice record as JSON.
 *
 * Setup:
 * 1. Set GEMINI_API_KEY in your .env file
 * 2. Run: npx tsx examples/01-extract-invoice.ts path/to/invoice.pdf
 */

import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import dotenv from "dotenv";
import { createPipeline, decodeDocumentPayload, wrapError } from "../lib/core";
import { invoiceExtractor } from "../lib/extractors/invoice";

dotenv.config();

async function runExample() {
    const filePath = process.argv[2];
    if (!filePath) {
        console.error("Usage: tsx examples/01-extract-invoice.ts <invoice.pdf|png|jpg>");
        process.exit(1);
    }

    const file = await readFile(filePath);
    const payload = decodeDocumentPayload({
        data: file.toString("base64"),
        ext: extname(filePath),
    });

    const pipeline = createPipeline({
        onProgress: (stage) => console.error(`… ${stage}`),
    });

    const { record, metrics } = await pipeline.extractFromDocument(payload, invoiceExtractor);

    console.log(JSON.stringify(record, null, 2));
    console.error(`\n✅ ${record.line_items.length} line items in ${metrics.processingTimeMs}ms`);

    const topLevelExtras = Object.keys(record.extra_fields);
    if (topLevelExtras.length > 0) {
        console.error(`ℹ️  Unrecognized top-level fields: ${topLevelExtras.join(", ")}`);
    }
}

runExample().catch((err) => {
    const error = wrapError(err);
    console.error("Example failed:", JSON.stringify(error.toJSON(), null, 2));
    process.exit(1);
});
