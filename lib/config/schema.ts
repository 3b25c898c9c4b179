import { z } from "zod"
import { DEFAULT_BUFFER_SIZE } from "../digest/digest"

/**
 * Schema definitions for extension-kit configuration
 */

export const DigestSettingsSchema = z.object({
    bufferSize: z
        .number()
        .int()
        .positive()
        .default(DEFAULT_BUFFER_SIZE)
        .describe("Chunk size in bytes used when reading streams for digesting"),
})

export const ExtensionKitConfigSchema = z.object({
    debug: z.boolean().default(false).describe("Enable debug logging for troubleshooting"),
    logFormat: z
        .enum(["text", "json"])
        .default("text")
        .describe("Log line format: text (human-readable) or json (one entry per line)"),
    logDir: z
        .string()
        .min(1)
        .optional()
        .describe("Directory for log files. Defaults to ~/.config/extension-kit/logs"),
    digest: DigestSettingsSchema.default({}),
})

export type DigestSettings = z.infer<typeof DigestSettingsSchema>
export type ExtensionKitConfig = z.infer<typeof ExtensionKitConfigSchema>
