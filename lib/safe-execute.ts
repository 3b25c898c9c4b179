import type { Logger } from "./logger"

export type SafeResult<T> = { ok: true; value: T } | { ok: false; error: Error }

function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error))
}

/**
 * Safely execute a function with error boundary.
 * If the function throws, logs the error and returns it instead of crashing.
 *
 * @param fn - The function to execute
 * @param logger - Logger instance for error reporting
 * @param context - Description of what's being executed (for error messages)
 */
export function safeExecute<T>(fn: () => T, logger: Logger, context: string): SafeResult<T> {
    try {
        return { ok: true, value: fn() }
    } catch (thrown) {
        const error = toError(thrown)
        logger.warn(`Error in ${context}: ${error.message}`, { stack: error.stack })
        return { ok: false, error }
    }
}
