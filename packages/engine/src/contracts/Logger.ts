/**
 * Logger Contract
 *
 * Structured logger shared by the builder, the codec and the application.
 */

/**
 * Logger interface for engine components.
 */
export interface EngineLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const kLEVEL_ORDER: Record<LogLevel, number> = {
    debug : 10,
    info  : 20,
    warn  : 30,
    error : 40,
    silent: 100,
};

/**
 * Options for the console logger.
 */
export interface ConsoleLoggerOptions {
    /** Lowest level that is written (default: "info") */
    readonly level?: LogLevel;

    /** Tag prepended to every message, e.g. "builder" */
    readonly prefix?: string;
}

/**
 * Type guard for log level strings coming from env or CLI.
 */
export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === "string" && value in kLEVEL_ORDER;
}

/**
 * Create a console logger that drops messages below `level`.
 *
 * Every level writes to stderr; stdout is left to command output.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger({ level: "debug", prefix: "builder" });
 * logger.debug("Build", { size: 120 });
 * // [DEBUG] [builder] Build { size: 120 }
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): EngineLogger {
    const threshold = kLEVEL_ORDER[options.level ?? "info"];
    const tag = options.prefix ? `[${options.prefix}] ` : "";
    const enabled = (level: LogLevel): boolean => kLEVEL_ORDER[level] >= threshold;

    return {
        debug: (msg, data) => {
            if (enabled("debug")) console.error(`[DEBUG] ${tag}${msg}`, data ?? "");
        },
        info: (msg, data) => {
            if (enabled("info")) console.error(`[INFO] ${tag}${msg}`, data ?? "");
        },
        warn: (msg, data) => {
            if (enabled("warn")) console.error(`[WARN] ${tag}${msg}`, data ?? "");
        },
        error: (msg, data) => {
            if (enabled("error")) console.error(`[ERROR] ${tag}${msg}`, data ?? "");
        },
    };
}

/**
 * Logger that discards everything.
 */
export const silentLogger: EngineLogger = {
    debug: () => undefined,
    info : () => undefined,
    warn : () => undefined,
    error: () => undefined,
};
