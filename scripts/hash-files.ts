import { randomUUID } from "node:crypto"
import { DEFAULT_CONFIG, createLogger, digestOptionsFromConfig } from "../lib/config"
import type { ExtensionKitConfig } from "../lib/config"
import { FileByteStream, md5FromStream, sha256FromStream } from "../lib/digest"
import type { DigestAlgorithm } from "../lib/digest"
import type { Logger } from "../lib/logger"
import { safeExecute } from "../lib/safe-execute"
import { toStandardisedPath, truncate } from "../lib/utils"

export type HashFileResult = { path: string; digest: string } | { path: string; error: string }

export interface HashFilesOptions {
    algorithm: DigestAlgorithm
    config?: ExtensionKitConfig
    logger?: Logger
}

const streamDigests = {
    sha256: sha256FromStream,
    md5: md5FromStream,
} as const

function batchLogger(config: ExtensionKitConfig): Logger {
    const logger = createLogger(config)
    logger.setCorrelationId(randomUUID())
    return logger
}

/**
 * Digests each file in turn. A file that cannot be read is reported in
 * its result entry and does not stop the rest of the batch.
 * Paths in the results use '/' separators.
 */
export function hashFiles(paths: readonly string[], options: HashFilesOptions): HashFileResult[] {
    const config = options.config ?? DEFAULT_CONFIG
    const logger = options.logger ?? batchLogger(config)
    const digestOptions = digestOptionsFromConfig(config, logger)
    const digestStream = streamDigests[options.algorithm]

    logger.info("Hashing files", { algorithm: options.algorithm, count: paths.length })

    return paths.map((path) => {
        const displayPath = toStandardisedPath(path)
        const result = safeExecute(
            () => {
                const stream = new FileByteStream(path)
                try {
                    return digestStream(stream, digestOptions)
                } finally {
                    stream.close()
                }
            },
            logger,
            `hashing ${displayPath}`,
        )

        return result.ok
            ? { path: displayPath, digest: result.value }
            : { path: displayPath, error: result.error.message }
    })
}

/**
 * Formats results one per line, like `sha256sum` output.
 */
export function formatHashResults(results: readonly HashFileResult[]): string {
    return results
        .map((result) =>
            "digest" in result
                ? `${result.digest}  ${result.path}`
                : `ERROR  ${result.path}: ${truncate(result.error, 80)}`,
        )
        .join("\n")
}
