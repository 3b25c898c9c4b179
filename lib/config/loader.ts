import { existsSync, readFileSync } from "fs"
import { join } from "path"
import { parse, printParseErrorCode, type ParseError } from "jsonc-parser"
import { z } from "zod"
import { ExtensionKitConfigSchema, type ExtensionKitConfig } from "./schema"
import { CONFIG_FILE_NAME, DEFAULT_CONFIG } from "./defaults"
import { Logger } from "../logger"

const silentLogger = new Logger(false)

/**
 * Configuration loader with validation.
 * Never throws: unreadable, malformed or invalid files fall back to defaults.
 */

/**
 * Load and validate configuration from a JSONC file path
 */
export function loadConfigFromFile(
    configPath: string,
    logger: Logger = silentLogger,
): ExtensionKitConfig {
    if (!existsSync(configPath)) {
        logger.debug(`No config at ${configPath}, using defaults`)
        return DEFAULT_CONFIG
    }

    let text: string
    try {
        text = readFileSync(configPath, "utf-8")
    } catch (error) {
        logger.warn(`Failed to read config from ${configPath}, using defaults`, {
            error: error instanceof Error ? error.message : String(error),
        })
        return DEFAULT_CONFIG
    }

    const errors: ParseError[] = []
    const rawConfig: unknown = parse(text, errors, { allowTrailingComma: true })
    if (errors.length > 0) {
        const details = errors
            .map((e) => `${printParseErrorCode(e.error)} at offset ${e.offset}`)
            .join(", ")
        logger.warn(`Config ${configPath} is not valid JSONC: ${details}`)
        return DEFAULT_CONFIG
    }

    return validateConfig(rawConfig, logger)
}

/**
 * Load configuration from `extension-kit.jsonc` in a directory
 */
export function loadConfigFromDir(
    workspaceRoot: string,
    logger: Logger = silentLogger,
): ExtensionKitConfig {
    return loadConfigFromFile(join(workspaceRoot, CONFIG_FILE_NAME), logger)
}

/**
 * Validate raw configuration against schema
 */
export function validateConfig(
    rawConfig: unknown,
    logger: Logger = silentLogger,
): ExtensionKitConfig {
    try {
        return ExtensionKitConfigSchema.parse(rawConfig ?? {})
    } catch (error) {
        if (error instanceof z.ZodError) {
            const issues = error.issues
                .map((e: z.ZodIssue) => `${e.path.join(".")}: ${e.message}`)
                .join(", ")
            logger.warn(`Config validation failed: ${issues}`)
        } else {
            logger.warn(`Config validation failed: ${String(error)}`)
        }
        return DEFAULT_CONFIG
    }
}
