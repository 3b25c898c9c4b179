import { describe, it, expect, vi } from "vitest"
import { writeFile } from "fs/promises"
import { join } from "path"
import {
    CONFIG_FILE_NAME,
    DEFAULT_CONFIG,
    loadConfigFromDir,
    loadConfigFromFile,
    validateConfig,
} from "../../lib/config"
import { DEFAULT_BUFFER_SIZE } from "../../lib/digest"
import { Logger } from "../../lib/logger"
import { createTempDir } from "../fixtures/tmpdir"

function spyLogger() {
    const logger = new Logger(false)
    const warn = vi.spyOn(logger, "warn")
    return { logger, warn }
}

describe("config loader", () => {
    describe("validateConfig", () => {
        it("fills in defaults for an empty object", () => {
            expect(validateConfig({})).toEqual(DEFAULT_CONFIG)
        })

        it("defaults the digest buffer to the stream read size", () => {
            expect(validateConfig({ digest: {} }).digest.bufferSize).toBe(DEFAULT_BUFFER_SIZE)
        })

        it("treats a missing value as empty", () => {
            expect(validateConfig(undefined)).toEqual(DEFAULT_CONFIG)
        })

        it("keeps provided values", () => {
            const config = validateConfig({
                debug: true,
                logFormat: "json",
                logDir: "/var/log/extkit",
                digest: { bufferSize: 1024 },
            })

            expect(config).toEqual({
                debug: true,
                logFormat: "json",
                logDir: "/var/log/extkit",
                digest: { bufferSize: 1024 },
            })
        })

        it("falls back to defaults and warns on invalid values", () => {
            const { logger, warn } = spyLogger()

            const config = validateConfig({ digest: { bufferSize: -1 } }, logger)

            expect(config).toBe(DEFAULT_CONFIG)
            expect(warn).toHaveBeenCalledTimes(1)
            expect(warn.mock.calls[0][0]).toContain("Config validation failed: digest.bufferSize:")
        })

        it("rejects an unknown log format", () => {
            expect(validateConfig({ logFormat: "xml" })).toBe(DEFAULT_CONFIG)
        })
    })

    describe("loadConfigFromFile", () => {
        it("returns defaults when the file does not exist", async () => {
            const tmp = await createTempDir()
            try {
                const config = loadConfigFromFile(join(tmp.path, "missing.jsonc"))
                expect(config).toBe(DEFAULT_CONFIG)
            } finally {
                await tmp.cleanup()
            }
        })

        it("accepts comments and trailing commas", async () => {
            const tmp = await createTempDir()
            try {
                const path = join(tmp.path, CONFIG_FILE_NAME)
                await writeFile(
                    path,
                    [
                        "{",
                        "    // verbose logging while debugging",
                        '    "debug": true,',
                        '    "digest": { "bufferSize": 4096 },',
                        "}",
                    ].join("\n"),
                )

                const config = loadConfigFromFile(path)

                expect(config.debug).toBe(true)
                expect(config.logFormat).toBe("text")
                expect(config.digest.bufferSize).toBe(4096)
            } finally {
                await tmp.cleanup()
            }
        })

        it("returns defaults and warns on malformed JSONC", async () => {
            const tmp = await createTempDir()
            try {
                const path = join(tmp.path, CONFIG_FILE_NAME)
                await writeFile(path, '{ "debug": tru')
                const { logger, warn } = spyLogger()

                expect(loadConfigFromFile(path, logger)).toBe(DEFAULT_CONFIG)
                expect(warn).toHaveBeenCalledTimes(1)
                expect(warn.mock.calls[0][0]).toContain("is not valid JSONC")
            } finally {
                await tmp.cleanup()
            }
        })

        it("returns defaults and warns when the path is a directory", async () => {
            const tmp = await createTempDir()
            try {
                const { logger, warn } = spyLogger()

                expect(loadConfigFromFile(tmp.path, logger)).toBe(DEFAULT_CONFIG)
                expect(warn.mock.calls[0][0]).toBe(
                    `Failed to read config from ${tmp.path}, using defaults`,
                )
            } finally {
                await tmp.cleanup()
            }
        })
    })

    describe("loadConfigFromDir", () => {
        it("reads extension-kit.jsonc from the directory", async () => {
            const tmp = await createTempDir()
            try {
                await writeFile(join(tmp.path, "extension-kit.jsonc"), '{ "logFormat": "json" }')

                expect(loadConfigFromDir(tmp.path).logFormat).toBe("json")
            } finally {
                await tmp.cleanup()
            }
        })
    })
})
