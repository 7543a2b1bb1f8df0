/**
 * Shared types for the reconciliation core and the extraction pipeline.
 *
 * @module types
 */

import type { z } from "zod";
import type { ExtractionError } from "./errors";

/** Any value `JSON.parse` can produce. */
export type JsonValue =
    | string
    | number
    | boolean
    | null
    | JsonValue[]
    | JsonObject;

export interface JsonObject {
    [key: string]: JsonValue;
}

/** Name of the per-level overflow container on every record. */
export const OVERFLOW_KEY = "extra_fields";

/** Unanticipated keys of one schema level, kept verbatim. */
export type Overflow = Record<string, unknown>;

/** Field path from the root, array indices included as numbers. */
export type FieldPath = ReadonlyArray<string | number>;

/** Any record-level Zod schema the reconciler can walk. */
export type RecordSchema = z.AnyZodObject;

/**
 * Text-level repair applied before JSON decoding.
 *
 * Kept behind this interface so the heuristics can be swapped or hardened
 * without touching the reconciler.
 */
export interface ResponseRepairer {
    repair(raw: string): string;
}

/**
 * Per-level structural fix applied to the raw map before keys are partitioned.
 * Must return a new object rather than mutate its input.
 */
export type LevelHook = (input: JsonObject, path: FieldPath) => JsonObject;

export interface ReconcileOptions {
    /** Hooks keyed by the record schema they apply to. */
    levelHooks?: ReadonlyMap<RecordSchema, LevelHook>;
}

/**
 * Configuration for an extractor: the record schema plus the prompt that asks
 * the model for it.
 */
export interface ExtractorConfig<T extends RecordSchema> {
    /** Identifier for logging */
    name: string;
    description: string;
    /** Root record schema */
    schema: T;
    /** Prompt text sent alongside the document */
    buildPrompt: () => string;
    /** System message for the model */
    systemPrompt: string;
    levelHooks?: ReadonlyMap<RecordSchema, LevelHook>;
}

/** Outcome of a reconciliation pass for callers that prefer values over throws. */
export type ReconciliationOutcome<T> =
    | { success: true; data: T }
    | { success: false; error: ExtractionError };

/** A decoded document ready to be attached to a model request. */
export interface DocumentPayload {
    /** Normalized extension, e.g. "pdf" */
    extension: string;
    mimeType: string;
    data: Uint8Array;
}

export type ExtractionStage = "requesting" | "reconciling" | "done";
