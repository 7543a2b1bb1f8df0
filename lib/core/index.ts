export * from "./types";
export * from "./errors";
export * from "./logger";
export * from "./config";
export * from "./text-repair";
export * from "./json-decoder";
export * from "./null-normalizer";
export * from "./schema-reconciler";
export * from "./response-reconciliation";
export * from "./document-payload";
export * from "./extraction-pipeline";
