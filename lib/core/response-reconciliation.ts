/**
 * Response Reconciliation
 *
 * ## The Pipeline
 *
 * raw text -> repair (fences, quotes, digit commas) -> JSON decode ->
 * null-synonym normalization -> schema reconciliation -> record parse
 *
 * Every step is synchronous and works on a freshly decoded tree, so any
 * number of calls may run side by side. A pass either returns a complete
 * record or throws; there is no partial result.
 *
 * @module response-reconciliation
 */

import { z } from "zod";
import { ValidationError, wrapError } from "./errors";
import { decodeJson } from "./json-decoder";
import { createLogger } from "./logger";
import { normalizeNullSynonyms } from "./null-normalizer";
import { reconcileRecord } from "./schema-reconciler";
import { defaultResponseRepairer } from "./text-repair";
import type {
    FieldPath,
    LevelHook,
    ReconciliationOutcome,
    RecordSchema,
    ResponseRepairer,
} from "./types";

const logger = createLogger("response-reconciliation");

export interface ReconcileResponseOptions {
    /** Checked once before the pass starts */
    signal?: AbortSignal;
    /** Defaults to sanitizer + numeric cleaner */
    repairer?: ResponseRepairer;
}

/** The parts of an extractor the reconciliation pass needs. */
export interface ReconciliationTarget<T extends z.ZodTypeAny> {
    schema: T;
    levelHooks?: ReadonlyMap<RecordSchema, LevelHook>;
}

function valueAt(root: unknown, path: FieldPath): unknown {
    let current = root;
    for (const segment of path) {
        if (typeof current !== "object" || current === null) return undefined;
        current = Reflect.get(current, segment);
    }
    return current;
}

/**
 * Turn a raw model reply into a validated record.
 *
 * @throws {MalformedResponseError} The repaired text is not JSON
 * @throws {SchemaMismatchError} A record, sequence or map field has the wrong shape
 * @throws {ValidationError} A leaf cannot be coerced to its declared type
 */
export function reconcileResponse<T extends z.ZodTypeAny>(
    raw: string,
    target: ReconciliationTarget<T>,
    options: ReconcileResponseOptions = {}
): z.infer<T> {
    options.signal?.throwIfAborted();

    const { schema } = target;
    if (!(schema instanceof z.ZodObject)) {
        throw new TypeError("Reconciliation target schema must be a Zod object");
    }

    const repairer = options.repairer ?? defaultResponseRepairer;
    const repaired = repairer.repair(raw);
    const decoded = decodeJson(repaired, raw);
    const normalized = normalizeNullSynonyms(decoded);
    logger.debug("Decoded and normalized response", { length: repaired.length });

    const reconciled = reconcileRecord(schema, normalized, { levelHooks: target.levelHooks });

    const parsed = target.schema.safeParse(reconciled);
    if (!parsed.success) {
        const [issue] = parsed.error.issues;
        const path = issue?.path ?? [];
        throw new ValidationError(path, valueAt(reconciled, path), issue?.message ?? "Invalid value");
    }

    return parsed.data;
}

/**
 * Same as {@link reconcileResponse} but reports failure as a value.
 */
export function tryReconcileResponse<T extends z.ZodTypeAny>(
    raw: string,
    target: ReconciliationTarget<T>,
    options: ReconcileResponseOptions = {}
): ReconciliationOutcome<z.infer<T>> {
    try {
        return { success: true, data: reconcileResponse(raw, target, options) };
    } catch (error) {
        const exError = wrapError(error, "Reconciliation failed");
        logger.error("Reconciliation failed", { errorCode: exError.code, error: exError.message });
        return { success: false, error: exError };
    }
}
