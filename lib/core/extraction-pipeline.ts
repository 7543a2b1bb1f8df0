/**
 * Extraction Pipeline
 *
 * ## The Orchestration Pattern
 *
 * Sends one document to a vision-capable model and reconciles its reply into
 * the extractor's record schema.
 *
 * ## Pattern: Free-Text Reply, Strict Reconciliation
 *
 * The model is asked for JSON in a prompt instead of through a constrained
 * structured-output call:
 * 1. **Unknown fields survive**: a constrained call rejects or drops keys the
 *    schema does not name; here they land in `extra_fields`.
 * 2. **Repairable replies**: fenced, curly-quoted or comma-grouped numbers
 *    are fixed up locally instead of failing the request.
 * 3. **Clear failure classes**: transport problems are `ModelRequestError`,
 *    reply problems are `MalformedResponseError`, `SchemaMismatchError` or
 *    `ValidationError`.
 *
 * @module extraction-pipeline
 */

import type { z } from "zod";
import { generateText, type UserContent } from "ai";
import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { loadConfig } from "./config";
import { isPdf } from "./document-payload";
import { ApiKeyError, ModelRequestError, wrapError } from "./errors";
import { createLogger, type Logger } from "./logger";
import { reconcileResponse } from "./response-reconciliation";
import type {
    DocumentPayload,
    ExtractionStage,
    ExtractorConfig,
    RecordSchema,
    ResponseRepairer,
} from "./types";

/**
 * Configuration options for the extraction pipeline.
 */
export interface ExtractionPipelineOptions {
    /**
     * Gemini API key.
     * Defaults to `GEMINI_API_KEY` environment variable.
     */
    apiKey?: string;

    /** Model to use (default: `GEMINI_MODEL`, then "gemini-2.5-flash"). */
    model?: string;

    /**
     * Temperature for generation (default: 0.1).
     * Low temperature keeps the JSON layout stable between calls.
     */
    temperature?: number;

    /** Upper bound on reply tokens (default: 4095). */
    maxTokens?: number;

    /** Retries the SDK performs on transport errors (default: 2). */
    maxRetries?: number;

    /** Replaces the default text repair heuristics. */
    repairer?: ResponseRepairer;

    /** Called when the pipeline enters a new stage. */
    onProgress?: (stage: ExtractionStage) => void;
}

export interface ExtractOptions {
    signal?: AbortSignal;
}

export interface ExtractionResult<T> {
    record: T;
    /** The model reply before any repair */
    rawResponse: string;
    model: string;
    metrics: {
        processingTimeMs: number;
        promptTokens?: number;
        completionTokens?: number;
    };
}

/**
 * Main orchestration class.
 *
 * @example
 * ```typescript
 * const pipeline = createPipeline();
 * const payload = decodeDocumentPayload({ data: base64Pdf, ext: "pdf" });
 * const { record } = await pipeline.extractFromDocument(payload, invoiceExtractor);
 *
 * console.log(record.totals.grand_total);
 * ```
 */
export class ExtractionPipeline {
    private google: ReturnType<typeof createGoogleGenerativeAI>;
    private model: string;
    private temperature: number;
    private maxTokens: number;
    private maxRetries: number;
    private repairer?: ResponseRepairer;
    private onProgress?: (stage: ExtractionStage) => void;
    private logger: Logger;

    constructor(options: ExtractionPipelineOptions = {}) {
        const config = loadConfig();
        const apiKey = options.apiKey || config.apiKey;

        if (!apiKey) {
            throw new ApiKeyError(
                "GEMINI_API_KEY is required. Set it in your environment or pass it to the constructor."
            );
        }

        this.google = createGoogleGenerativeAI({ apiKey });
        this.model = options.model || config.model;
        this.temperature = options.temperature ?? config.temperature;
        this.maxTokens = options.maxTokens ?? config.maxTokens;
        this.maxRetries = options.maxRetries ?? 2;
        this.repairer = options.repairer;
        this.onProgress = options.onProgress;
        this.logger = createLogger("extraction-pipeline", config.logLevel);
    }

    /**
     * Extract a record from an uploaded document (PDF or image).
     *
     * @throws {ModelRequestError} The model call failed
     * @throws {MalformedResponseError | SchemaMismatchError | ValidationError} The reply could not be reconciled
     */
    async extractFromDocument<T extends RecordSchema>(
        payload: DocumentPayload,
        extractor: ExtractorConfig<T>,
        options: ExtractOptions = {}
    ): Promise<ExtractionResult<z.infer<T>>> {
        const content: UserContent = [
            { type: "text", text: extractor.buildPrompt() },
            isPdf(payload)
                ? { type: "file", data: payload.data, mimeType: payload.mimeType }
                : { type: "image", image: payload.data, mimeType: payload.mimeType },
        ];

        return this.run(content, extractor, options, { document: payload.extension, bytes: payload.data.length });
    }

    /**
     * Extract a record from a document that is already available as text.
     */
    async extractFromText<T extends RecordSchema>(
        text: string,
        extractor: ExtractorConfig<T>,
        options: ExtractOptions = {}
    ): Promise<ExtractionResult<z.infer<T>>> {
        const content: UserContent = [
            { type: "text", text: `${extractor.buildPrompt()}\n\nDOCUMENT TEXT:\n${text}` },
        ];

        return this.run(content, extractor, options, { document: "text", characters: text.length });
    }

    private async run<T extends RecordSchema>(
        content: UserContent,
        extractor: ExtractorConfig<T>,
        options: ExtractOptions,
        context: Record<string, unknown>
    ): Promise<ExtractionResult<z.infer<T>>> {
        const startTime = Date.now();
        this.logger.info("Starting extraction", { extractor: extractor.name, model: this.model, ...context });

        this.onProgress?.("requesting");
        const { text, promptTokens, completionTokens } = await this.requestCompletion(content, extractor, options.signal);

        this.onProgress?.("reconciling");
        let record: z.infer<T>;
        try {
            record = reconcileResponse(text, extractor, { signal: options.signal, repairer: this.repairer });
        } catch (error) {
            const exError = wrapError(error);
            this.logger.error("Reconciliation failed", {
                extractor: extractor.name,
                error: exError.message,
                errorCode: exError.code,
            });
            throw exError;
        }

        const processingTimeMs = Date.now() - startTime;
        this.onProgress?.("done");
        this.logger.info("Extraction successful", { extractor: extractor.name, processingTimeMs });

        return {
            record,
            rawResponse: text,
            model: this.model,
            metrics: { processingTimeMs, promptTokens, completionTokens },
        };
    }

    private async requestCompletion<T extends RecordSchema>(
        content: UserContent,
        extractor: ExtractorConfig<T>,
        signal?: AbortSignal
    ): Promise<{ text: string; promptTokens?: number; completionTokens?: number }> {
        try {
            const result = await generateText({
                model: this.google(this.model),
                system: extractor.systemPrompt,
                messages: [{ role: "user", content }],
                temperature: this.temperature,
                maxTokens: this.maxTokens,
                maxRetries: this.maxRetries,
                abortSignal: signal,
            });

            return {
                text: result.text,
                promptTokens: result.usage?.promptTokens,
                completionTokens: result.usage?.completionTokens,
            };
        } catch (error) {
            const exError = wrapError(error);
            this.logger.error("Model request failed", {
                extractor: extractor.name,
                error: exError.message,
                errorCode: exError.code,
            });

            if (exError.code === "ABORTED") {
                throw exError;
            }
            throw new ModelRequestError(`Extraction failed for schema "${extractor.name}": ${exError.message}`, error);
        }
    }
}

/**
 * Factory function to create a new extraction pipeline.
 */
export function createPipeline(options?: ExtractionPipelineOptions): ExtractionPipeline {
    return new ExtractionPipeline(options);
}
