/**
 * SHA-256 and MD5 content digests for streams and text.
 *
 * Each call builds its own hash object, so no hashing state is shared
 * between calls. Results are lower-case hex: 64 characters for SHA-256,
 * 32 for MD5.
 */

import { createHash, type Hash } from "node:crypto"
import { StreamNotSeekableError } from "../errors"
import type { Logger } from "../logger"
import type { ByteStream } from "./byte-stream"

export type DigestAlgorithm = "sha256" | "md5"

export const DEFAULT_BUFFER_SIZE = 81920

export interface DigestOptions {
    /** Read chunk size for stream digests */
    bufferSize?: number
    /** Receives one debug entry per stream digest */
    logger?: Logger
}

export type ChunkSource = Iterable<Uint8Array> | AsyncIterable<Uint8Array>

function finish(hash: Hash): string {
    return hash.digest("hex")
}

function rewind(stream: ByteStream, operation: string): void {
    if (!stream.canSeek) {
        throw new StreamNotSeekableError(operation)
    }
    stream.seek(0)
}

function digestStream(
    algorithm: DigestAlgorithm,
    stream: ByteStream,
    options: DigestOptions = {},
): string {
    const bufferSize = options.bufferSize ?? DEFAULT_BUFFER_SIZE
    if (!Number.isInteger(bufferSize) || bufferSize <= 0) {
        throw new RangeError(`bufferSize must be a positive integer, got ${bufferSize}`)
    }

    rewind(stream, `${algorithm} digest`)

    const hash = createHash(algorithm)
    const buffer = new Uint8Array(bufferSize)
    let total = 0
    for (let read = stream.read(buffer); read > 0; read = stream.read(buffer)) {
        hash.update(buffer.subarray(0, read))
        total += read
    }

    rewind(stream, `${algorithm} digest`)

    const digest = finish(hash)
    options.logger?.debug("Stream digested", { algorithm, bytes: total })
    return digest
}

function digestText(algorithm: DigestAlgorithm, text: string): string {
    return finish(createHash(algorithm).update(new TextEncoder().encode(text)))
}

async function digestChunks(algorithm: DigestAlgorithm, source: ChunkSource): Promise<string> {
    const hash = createHash(algorithm)
    for await (const chunk of source) {
        hash.update(chunk)
    }
    return finish(hash)
}

/**
 * SHA-256 of a stream's whole content. The stream is rewound to the
 * start before reading and again before returning.
 *
 * @throws StreamNotSeekableError if the stream cannot be rewound
 */
export function sha256FromStream(stream: ByteStream, options?: DigestOptions): string {
    return digestStream("sha256", stream, options)
}

/**
 * SHA-256 of the UTF-8 encoding of `text` (no byte order mark).
 */
export function sha256FromText(text: string): string {
    return digestText("sha256", text)
}

/**
 * SHA-256 of a forward-only source, consumed once. For sources that cannot be rewound.
 */
export function sha256FromChunks(source: ChunkSource): Promise<string> {
    return digestChunks("sha256", source)
}

/**
 * MD5 of a stream's whole content, rewinding before and after.
 *
 * @throws StreamNotSeekableError if the stream cannot be rewound
 */
export function md5FromStream(stream: ByteStream, options?: DigestOptions): string {
    return digestStream("md5", stream, options)
}

export function md5FromText(text: string): string {
    return digestText("md5", text)
}

export function md5FromChunks(source: ChunkSource): Promise<string> {
    return digestChunks("md5", source)
}
