/**
 * Error hierarchy for extraction and reconciliation.
 *
 * Every error carries a stable `code` so callers can branch without string
 * matching. Nothing raised by the reconciliation core is retryable: the same
 * input always fails the same way.
 *
 * @module errors
 */

import type { FieldPath } from "./types";

export type ExtractionErrorCode =
    | "API_KEY_MISSING"
    | "CONFIGURATION_INVALID"
    | "INVALID_DOCUMENT"
    | "MODEL_REQUEST_FAILED"
    | "MALFORMED_RESPONSE"
    | "SCHEMA_MISMATCH"
    | "VALIDATION_FAILED"
    | "ABORTED"
    | "UNKNOWN";

export interface ExtractionErrorOptions {
    retryable?: boolean;
    cause?: unknown;
}

/**
 * Base class for all errors surfaced by this package.
 */
export class ExtractionError extends Error {
    readonly code: ExtractionErrorCode;
    readonly retryable: boolean;

    constructor(message: string, code: ExtractionErrorCode = "UNKNOWN", options: ExtractionErrorOptions = {}) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = new.target.name;
        this.code = code;
        this.retryable = options.retryable ?? false;
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            retryable: this.retryable,
        };
    }
}

export class ApiKeyError extends ExtractionError {
    constructor(message: string) {
        super(message, "API_KEY_MISSING");
    }
}

export class ConfigurationError extends ExtractionError {
    constructor(message: string, readonly issues: string[] = []) {
        super(message, "CONFIGURATION_INVALID");
    }

    override toJSON(): Record<string, unknown> {
        return { ...super.toJSON(), issues: this.issues };
    }
}

export class InvalidDocumentError extends ExtractionError {
    constructor(message: string) {
        super(message, "INVALID_DOCUMENT");
    }
}

/** The upstream model call failed. Retry policy belongs to the caller. */
export class ModelRequestError extends ExtractionError {
    constructor(message: string, cause?: unknown) {
        super(message, "MODEL_REQUEST_FAILED", { retryable: true, cause });
    }
}

/** Formats a path like `invoice_metadata.vendor_details` or `line_items.2`. */
export function formatPath(path: FieldPath): string {
    return path.length === 0 ? "(root)" : path.join(".");
}

/**
 * The reply is not JSON even after repair.
 */
export class MalformedResponseError extends ExtractionError {
    constructor(
        readonly rawText: string,
        readonly reason: string,
        readonly position?: number
    ) {
        super(
            `Model response is not valid JSON${position === undefined ? "" : ` at position ${position}`}: ${reason}`,
            "MALFORMED_RESPONSE"
        );
    }

    /** 1-based line and column of `position`, when known. */
    get location(): { line: number; column: number } | undefined {
        if (this.position === undefined) return undefined;
        const before = this.rawText.slice(0, this.position).split("\n");
        return { line: before.length, column: (before[before.length - 1] ?? "").length + 1 };
    }

    /** A short window of the raw text around the failure point. */
    get snippet(): string {
        const at = this.position ?? 0;
        return this.rawText.slice(Math.max(0, at - 20), at + 20);
    }

    override toJSON(): Record<string, unknown> {
        return {
            ...super.toJSON(),
            reason: this.reason,
            position: this.position,
            location: this.location,
            snippet: this.snippet,
        };
    }
}

/**
 * A declared field's shape (record, sequence, map) conflicts with the input.
 */
export class SchemaMismatchError extends ExtractionError {
    readonly path: string;

    constructor(
        path: FieldPath,
        readonly expected: string,
        readonly actual: string,
        readonly value: unknown
    ) {
        super(`Expected ${expected} at "${formatPath(path)}" but received ${actual}`, "SCHEMA_MISMATCH");
        this.path = formatPath(path);
    }

    override toJSON(): Record<string, unknown> {
        return {
            ...super.toJSON(),
            path: this.path,
            expected: this.expected,
            actual: this.actual,
        };
    }
}

/**
 * A leaf value cannot be coerced to its declared scalar type.
 */
export class ValidationError extends ExtractionError {
    readonly path: string;

    constructor(
        path: FieldPath,
        readonly value: unknown,
        readonly reason: string
    ) {
        super(`Invalid value at "${formatPath(path)}": ${reason}`, "VALIDATION_FAILED");
        this.path = formatPath(path);
    }

    override toJSON(): Record<string, unknown> {
        return {
            ...super.toJSON(),
            path: this.path,
            value: this.value,
            reason: this.reason,
        };
    }
}

/**
 * Normalize any thrown value into an ExtractionError.
 *
 * Existing ExtractionErrors pass through untouched; aborts keep their own
 * code so callers can tell cancellation from failure.
 */
export function wrapError(error: unknown, context?: string): ExtractionError {
    if (error instanceof ExtractionError) {
        return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const prefixed = context ? `${context}: ${message}` : message;

    if (error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError")) {
        return new ExtractionError(prefixed, "ABORTED", { cause: error });
    }

    return new ExtractionError(prefixed, "UNKNOWN", { cause: error });
}
