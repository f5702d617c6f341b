/**
 * @fileoverview Logger Contract
 *
 * @module @spanwise/engine/contracts/Logger
 */

/**
 * Logger accepted by the engine, the event bus and the rule loader.
 */
export interface EngineLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Console logger with a level prefix and an optional scope.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger("RuleLoader");
 * logger.info("Loaded", { files: 3 }); // [INFO] [RuleLoader] Loaded { files: 3 }
 * ```
 */
export function createConsoleLogger(scope?: string): EngineLogger {
    const prefix = scope ? ` [${scope}]` : "";
    return {
        debug: (msg, data) => console.debug(`[DEBUG]${prefix} ${msg}`, data ?? ""),
        info : (msg, data) => console.info(`[INFO]${prefix} ${msg}`, data ?? ""),
        warn : (msg, data) => console.warn(`[WARN]${prefix} ${msg}`, data ?? ""),
        error: (msg, data) => console.error(`[ERROR]${prefix} ${msg}`, data ?? ""),
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
