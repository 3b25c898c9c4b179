import type { DigestOptions } from "../digest/digest"
import { DEFAULT_LOG_DIR, Logger } from "../logger"
import type { ExtensionKitConfig } from "./schema"

export function createLogger(config: ExtensionKitConfig): Logger {
    return new Logger(config.debug, config.logFormat, config.logDir ?? DEFAULT_LOG_DIR)
}

export function digestOptionsFromConfig(
    config: ExtensionKitConfig,
    logger?: Logger,
): DigestOptions {
    return {
        bufferSize: config.digest.bufferSize,
        logger,
    }
}
