/**
 * Minimal structured logger.
 *
 * One line per event: timestamp, level, module, message, then the context
 * object as JSON. The threshold is read from `LOG_LEVEL` when a logger is
 * created, so tests can change it per case.
 *
 * @module logger
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

export interface Logger {
    debug(message: string, context?: LogContext): void;
    info(message: string, context?: LogContext): void;
    warn(message: string, context?: LogContext): void;
    error(message: string, context?: LogContext): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
    return Object.hasOwn(LEVEL_ORDER, value);
}

function resolveLevel(level?: LogLevel): LogLevel {
    if (level) return level;
    const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
    return fromEnv && isLogLevel(fromEnv) ? fromEnv : "info";
}

function formatLine(level: LogLevel, module: string, message: string, context?: LogContext): string {
    const line = `${new Date().toISOString()} ${level.toUpperCase()} [${module}] ${message}`;
    if (!context || Object.keys(context).length === 0) {
        return line;
    }
    return `${line} ${JSON.stringify(context)}`;
}

/**
 * Create a logger scoped to a module name.
 *
 * @example
 * ```typescript
 * const logger = createLogger("schema-reconciler");
 * logger.info("Unknown top-level fields detected", { fields: ["page_count"] });
 * ```
 */
export function createLogger(module: string, level?: LogLevel): Logger {
    const threshold = LEVEL_ORDER[resolveLevel(level)];

    const emit = (lvl: LogLevel, message: string, context?: LogContext) => {
        if (LEVEL_ORDER[lvl] < threshold) return;
        const line = formatLine(lvl, module, message, context);
        if (lvl === "error") console.error(line);
        else if (lvl === "warn") console.warn(line);
        else console.log(line);
    };

    return {
        debug: (message, context) => emit("debug", message, context),
        info: (message, context) => emit("info", message, context),
        warn: (message, context) => emit("warn", message, context),
        error: (message, context) => emit("error", message, context),
    };
}
