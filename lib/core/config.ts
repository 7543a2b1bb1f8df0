/**
 * Environment configuration for the extraction pipeline.
 *
 * The reconciliation core never reads this; only the model-facing pipeline
 * does. Values are validated with Zod so a typo in `.env` fails at startup
 * rather than on the first request.
 *
 * @module config
 */

import { z } from "zod";
import { ConfigurationError } from "./errors";
import type { LogLevel } from "./logger";

const optionalText = z
    .string()
    .trim()
    .transform((value) => (value === "" ? undefined : value))
    .optional();

export const ConfigSchema = z.object({
    GEMINI_API_KEY: optionalText,
    GEMINI_MODEL: z.string().trim().min(1).default("gemini-2.5-flash"),
    EXTRACTION_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
    EXTRACTION_MAX_TOKENS: z.coerce.number().int().positive().default(4095),
    LOG_LEVEL: z.preprocess(
        (value) => (typeof value === "string" ? value.trim().toLowerCase() : value),
        z.enum(["debug", "info", "warn", "error"]).default("info")
    ),
});

export interface ExtractionConfig {
    apiKey?: string;
    model: string;
    temperature: number;
    maxTokens: number;
    logLevel: LogLevel;
}

/**
 * Read and validate configuration from an environment map.
 *
 * @throws {ConfigurationError} When a variable is present but invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ExtractionConfig {
    const parsed = ConfigSchema.safeParse(env);

    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
        throw new ConfigurationError(`Invalid configuration (${issues.join("; ")})`, issues);
    }

    const { data } = parsed;
    return {
        apiKey: data.GEMINI_API_KEY,
        model: data.GEMINI_MODEL,
        temperature: data.EXTRACTION_TEMPERATURE,
        maxTokens: data.EXTRACTION_MAX_TOKENS,
        logLevel: data.LOG_LEVEL,
    };
}
