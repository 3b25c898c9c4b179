import { describe, it, expect, vi } from "vitest"
import { safeExecute } from "../lib/safe-execute"
import { Logger } from "../lib/logger"

describe("safeExecute", () => {
    it("returns the function's value", () => {
        const logger = new Logger(false)
        expect(safeExecute(() => 42, logger, "answer")).toEqual({ ok: true, value: 42 })
    })

    it("captures a thrown error and logs a warning", () => {
        const logger = new Logger(false)
        const warn = vi.spyOn(logger, "warn")

        const result = safeExecute(
            () => {
                throw new Error("boom")
            },
            logger,
            "exploding task",
        )

        expect(result.ok).toBe(false)
        expect(!result.ok && result.error.message).toBe("boom")
        expect(warn).toHaveBeenCalledWith("Error in exploding task: boom", {
            stack: expect.stringContaining("boom"),
        })
    })

    it("wraps non-Error throws", () => {
        const logger = new Logger(false)

        const result = safeExecute(
            () => {
                throw "plain string"
            },
            logger,
            "string throw",
        )

        expect(!result.ok && result.error).toBeInstanceOf(Error)
        expect(!result.ok && result.error.message).toBe("plain string")
    })
})
