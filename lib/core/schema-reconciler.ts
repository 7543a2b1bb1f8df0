/**
 * Schema Reconciler
 *
 * Maps a decoded, null-normalized value tree onto a tree of record schemas.
 * This is the only place that decides whether an input key is declared or
 * belongs to the overflow map of its level.
 *
 * ## Per level
 *
 * 1. Apply the level hook, if one is registered for the schema.
 * 2. Bind declared keys, recursing into nested records and record sequences.
 * 3. Wrap lone values given where a sequence is declared.
 * 4. Copy every undeclared key verbatim into `extra_fields`.
 *
 * The model is also prompted to emit its own `extra_fields` map at each level.
 * Its entries join the overflow map; an entry naming a declared field is
 * promoted into that field when the field itself is absent. An entry that
 * loses its key to a bound declared field or to an undeclared key of the
 * same name is kept under the overflow map's own `extra_fields` entry.
 *
 * The output still holds raw leaves. Scalar coercion is left to the record
 * schema's own parse.
 *
 * @module schema-reconciler
 */

import { z, type ZodTypeAny } from "zod";
import { SchemaMismatchError, formatPath } from "./errors";
import { createLogger } from "./logger";
import {
    OVERFLOW_KEY,
    type FieldPath,
    type JsonObject,
    type JsonValue,
    type Overflow,
    type ReconcileOptions,
    type RecordSchema,
} from "./types";

const logger = createLogger("schema-reconciler");

/** A reconciled level: declared fields plus `extra_fields`. */
export type ReconciledRecord = Record<string, unknown>;

type FieldShape =
    | { kind: "record"; schema: RecordSchema; optional: boolean }
    | { kind: "record-list"; schema: RecordSchema }
    | { kind: "list" }
    | { kind: "map" }
    | { kind: "scalar" };

interface LevelLayout {
    declared: ReadonlyMap<string, FieldShape>;
}

const layoutCache = new WeakMap<RecordSchema, LevelLayout>();

/**
 * Strip optional/default/effects wrappers, remembering whether the field
 * may be absent.
 */
function unwrap(type: ZodTypeAny): { inner: ZodTypeAny; optional: boolean } {
    let inner = type;
    let optional = false;

    for (;;) {
        if (inner instanceof z.ZodOptional) {
            optional = true;
            inner = inner.unwrap();
        } else if (inner instanceof z.ZodNullable) {
            inner = inner.unwrap();
        } else if (inner instanceof z.ZodDefault) {
            inner = inner.removeDefault();
        } else if (inner instanceof z.ZodEffects) {
            inner = inner.innerType();
        } else {
            return { inner, optional };
        }
    }
}

function describeField(type: ZodTypeAny): FieldShape {
    const { inner, optional } = unwrap(type);

    if (inner instanceof z.ZodObject) {
        return { kind: "record", schema: inner, optional };
    }
    if (inner instanceof z.ZodArray) {
        const element = unwrap(inner.element).inner;
        return element instanceof z.ZodObject
            ? { kind: "record-list", schema: element }
            : { kind: "list" };
    }
    if (inner instanceof z.ZodRecord) {
        return { kind: "map" };
    }
    // Scalars and string-or-map unions pass through as-is.
    return { kind: "scalar" };
}

function layoutOf(schema: RecordSchema): LevelLayout {
    const cached = layoutCache.get(schema);
    if (cached) return cached;

    const declared = new Map<string, FieldShape>();
    for (const [key, type] of Object.entries<ZodTypeAny>(schema.shape)) {
        if (key !== OVERFLOW_KEY) {
            declared.set(key, describeField(type));
        }
    }

    const layout = { declared };
    layoutCache.set(schema, layout);
    return layout;
}

/** Keys a record schema declares, overflow container included. */
export function declaredKeys(schema: RecordSchema): string[] {
    return Object.keys(schema.shape);
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Shape name used in mismatch messages. */
export function describeShape(value: JsonValue | undefined): string {
    if (value === undefined) return "nothing";
    if (value === null) return "null";
    if (Array.isArray(value)) return "array";
    return typeof value;
}

/** Own-property write; plain assignment treats `__proto__` as the prototype. */
function setEntry(target: Record<string, unknown>, key: string, value: unknown): void {
    Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

function copyEntries(target: Record<string, unknown>, source: object): void {
    for (const [key, value] of Object.entries(source)) {
        setEntry(target, key, value);
    }
}

/**
 * Park displaced model-supplied entries under the overflow map's own
 * `extra_fields` entry, one level deeper for each further clash.
 */
function stashDisplaced(overflow: Overflow, displaced: Overflow): void {
    if (Object.keys(displaced).length === 0) return;

    const existing = Object.hasOwn(overflow, OVERFLOW_KEY) ? overflow[OVERFLOW_KEY] : undefined;
    const container: Overflow = {};
    if (typeof existing === "object" && existing !== null && !Array.isArray(existing)) {
        copyEntries(container, existing);
    } else if (existing !== undefined) {
        setEntry(container, OVERFLOW_KEY, existing);
    }

    const clashing: Overflow = {};
    for (const [key, value] of Object.entries(displaced)) {
        setEntry(Object.hasOwn(container, key) ? clashing : container, key, value);
    }
    stashDisplaced(container, clashing);
    setEntry(overflow, OVERFLOW_KEY, container);
}

function toSequence(value: JsonValue | undefined): JsonValue[] {
    if (value === undefined || value === null) return [];
    return Array.isArray(value) ? [...value] : [value];
}

function reconcileField(
    shape: FieldShape,
    value: JsonValue | undefined,
    path: FieldPath,
    options: ReconcileOptions
): unknown {
    switch (shape.kind) {
        case "record": {
            if (value === undefined || value === null) {
                return shape.optional ? undefined : reconcileLevel(shape.schema, {}, path, options);
            }
            if (!isJsonObject(value)) {
                throw new SchemaMismatchError(path, "object", describeShape(value), value);
            }
            if (shape.optional && Object.keys(value).length === 0) {
                return undefined;
            }
            return reconcileLevel(shape.schema, value, path, options);
        }

        case "record-list":
            return toSequence(value).map((element, index) => {
                const elementPath = [...path, index];
                if (!isJsonObject(element)) {
                    throw new SchemaMismatchError(elementPath, "object", describeShape(element), element);
                }
                return reconcileLevel(shape.schema, element, elementPath, options);
            });

        case "list":
            return toSequence(value);

        case "map": {
            if (value === undefined || value === null) return {};
            if (!isJsonObject(value)) {
                throw new SchemaMismatchError(path, "object", describeShape(value), value);
            }
            return value;
        }

        case "scalar":
            return value;
    }
}

/**
 * Reconcile one record level.
 *
 * @throws {SchemaMismatchError} When a declared record, sequence of records or
 * map is given an irreconcilable shape
 */
export function reconcileLevel(
    schema: RecordSchema,
    input: JsonObject,
    path: FieldPath,
    options: ReconcileOptions = {}
): ReconciledRecord {
    const hook = options.levelHooks?.get(schema);
    const source = hook ? hook(input, path) : input;
    const { declared } = layoutOf(schema);

    const overflowPath = [...path, OVERFLOW_KEY];
    const supplied = Object.hasOwn(source, OVERFLOW_KEY) ? source[OVERFLOW_KEY] : null;
    let suppliedEntries: JsonObject = {};
    if (isJsonObject(supplied)) {
        suppliedEntries = supplied;
    } else if (supplied !== null) {
        throw new SchemaMismatchError(overflowPath, "object", describeShape(supplied), supplied);
    }

    const overflow: Overflow = {};
    const promoted: JsonObject = {};
    for (const [key, value] of Object.entries(suppliedEntries)) {
        setEntry(declared.has(key) ? promoted : overflow, key, value);
    }
    const displaced: Overflow = {};

    const result: ReconciledRecord = {};
    for (const [key, shape] of declared) {
        let value: JsonValue | undefined = Object.hasOwn(source, key) ? source[key] : undefined;

        if (Object.hasOwn(promoted, key)) {
            const entry = promoted[key];
            if (value === undefined || value === null) {
                value = entry;
                logger.debug("Promoted extra_fields entry to declared field", { path: formatPath([...path, key]) });
            } else if (entry !== value) {
                setEntry(displaced, key, entry);
                logger.warn("Kept extra_fields entry shadowed by declared field", {
                    path: formatPath(overflowPath),
                    field: key,
                });
            }
        }

        const reconciled = reconcileField(shape, value, [...path, key], options);
        if (reconciled !== undefined) {
            result[key] = reconciled;
        }
    }

    for (const [key, value] of Object.entries(source)) {
        if (key === OVERFLOW_KEY || declared.has(key)) continue;
        if (Object.hasOwn(overflow, key) && overflow[key] !== value) {
            setEntry(displaced, key, overflow[key]);
            logger.warn("Kept extra_fields entry displaced by undeclared key", {
                path: formatPath(overflowPath),
                field: key,
            });
        }
        setEntry(overflow, key, value);
    }

    stashDisplaced(overflow, displaced);
    if (Object.hasOwn(overflow, "__proto__")) {
        logger.warn("Overflow key __proto__ is not carried into the validated record", {
            path: formatPath(overflowPath),
        });
    }

    result[OVERFLOW_KEY] = overflow;
    return result;
}

/**
 * Reconcile a whole decoded tree against a root record schema.
 *
 * Besides the per-level routing, unknown top-level keys are reported once
 * and written into the root overflow map explicitly.
 *
 * @example
 * ```typescript
 * const record = reconcileRecord(InvoiceDataSchema, { page_count: 3 });
 * // record.extra_fields => { page_count: 3 }
 * ```
 */
export function reconcileRecord(
    schema: RecordSchema,
    root: JsonValue,
    options: ReconcileOptions = {}
): ReconciledRecord {
    if (!isJsonObject(root)) {
        throw new SchemaMismatchError([], "object", describeShape(root), root);
    }

    const record = reconcileLevel(schema, root, [], options);

    const known = new Set(declaredKeys(schema));
    const unknownTopLevel = Object.keys(root).filter((key) => !known.has(key));
    if (unknownTopLevel.length > 0) {
        logger.info("Unknown top-level fields detected", { fields: unknownTopLevel });
        const rootOverflow: Overflow = {};
        const existing = record[OVERFLOW_KEY];
        if (typeof existing === "object" && existing !== null) {
            copyEntries(rootOverflow, existing);
        }
        for (const key of unknownTopLevel) {
            setEntry(rootOverflow, key, root[key]);
        }
        record[OVERFLOW_KEY] = rootOverflow;
    }

    return record;
}
