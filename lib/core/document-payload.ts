/**
 * Decoding of base64 document uploads.
 *
 * PDFs are handed to the model as a file part, images as an image part; no
 * local rasterization happens.
 *
 * @module document-payload
 */

import { InvalidDocumentError } from "./errors";
import type { DocumentPayload } from "./types";

export const SUPPORTED_DOCUMENT_TYPES: Readonly<Record<string, string>> = {
    pdf: "application/pdf",
    png: "image/png",
    jpg: "image/jpeg",
    jpeg: "image/jpeg",
    webp: "image/webp",
};

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export interface DocumentUpload {
    /** Base64-encoded file content */
    data: string;
    /** File extension, with or without the leading dot */
    ext: string;
}

export function normalizeExtension(ext: string): string {
    return ext.trim().toLowerCase().replace(/^\.+/, "");
}

/**
 * Validate an upload and decode its content.
 *
 * @throws {InvalidDocumentError} Unsupported extension, invalid base64 or empty content
 */
export function decodeDocumentPayload(upload: DocumentUpload): DocumentPayload {
    const extension = normalizeExtension(upload.ext);
    const mimeType = Object.hasOwn(SUPPORTED_DOCUMENT_TYPES, extension)
        ? SUPPORTED_DOCUMENT_TYPES[extension]
        : undefined;

    if (!mimeType) {
        const allowed = Object.keys(SUPPORTED_DOCUMENT_TYPES).join(", ");
        throw new InvalidDocumentError(`Unsupported file extension "${upload.ext}". Allowed extensions: ${allowed}`);
    }

    const encoded = upload.data.replace(/\s+/g, "");
    if (encoded.length === 0) {
        throw new InvalidDocumentError("Document payload is empty.");
    }
    if (!BASE64_PATTERN.test(encoded)) {
        throw new InvalidDocumentError("Invalid base64-encoded file data.");
    }

    return {
        extension,
        mimeType,
        data: new Uint8Array(Buffer.from(encoded, "base64")),
    };
}

/** True when the payload should be sent as a file part rather than an image. */
export function isPdf(payload: DocumentPayload): boolean {
    return payload.mimeType === "application/pdf";
}
