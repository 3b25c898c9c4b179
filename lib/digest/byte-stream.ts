import { closeSync, fstatSync, openSync, readSync } from "fs"
import { StreamIoError, StreamNotSeekableError } from "../errors"

/**
 * Synchronous byte source with an explicit read cursor.
 */
export interface ByteStream {
    readonly canSeek: boolean
    readonly position: number
    /**
     * Reads up to `buffer.length` bytes at the current position.
     * Returns the number of bytes read, 0 at end of stream.
     */
    read(buffer: Uint8Array): number
    /**
     * Moves the read cursor to an absolute offset.
     * Throws StreamNotSeekableError when `canSeek` is false.
     */
    seek(offset: number): void
}

function assertOffset(offset: number): void {
    if (!Number.isInteger(offset) || offset < 0) {
        throw new StreamIoError(`Invalid seek offset: ${offset}`, "EINVAL")
    }
}

/**
 * Seekable stream over an in-memory byte array.
 */
export class MemoryByteStream implements ByteStream {
    readonly canSeek = true
    private cursor = 0

    constructor(private readonly bytes: Uint8Array) {}

    static fromText(text: string): MemoryByteStream {
        return new MemoryByteStream(new TextEncoder().encode(text))
    }

    get position(): number {
        return this.cursor
    }

    get length(): number {
        return this.bytes.length
    }

    read(buffer: Uint8Array): number {
        const count = Math.min(buffer.length, this.bytes.length - this.cursor)
        if (count <= 0) return 0
        buffer.set(this.bytes.subarray(this.cursor, this.cursor + count))
        this.cursor += count
        return count
    }

    seek(offset: number): void {
        assertOffset(offset)
        this.cursor = offset
    }
}

/**
 * Stream over a file opened for reading. Close it when done.
 *
 * Only regular files can seek; a named pipe or device is read forward-only.
 */
export class FileByteStream implements ByteStream {
    readonly canSeek: boolean
    private cursor = 0
    private fd: number | null

    constructor(readonly path: string) {
        this.fd = openSync(path, "r")
        this.canSeek = fstatSync(this.fd).isFile()
    }

    get position(): number {
        return this.cursor
    }

    get size(): number {
        return fstatSync(this.descriptor()).size
    }

    read(buffer: Uint8Array): number {
        const position = this.canSeek ? this.cursor : null
        const count = readSync(this.descriptor(), buffer, 0, buffer.length, position)
        this.cursor += count
        return count
    }

    seek(offset: number): void {
        assertOffset(offset)
        this.descriptor()
        if (!this.canSeek) {
            throw new StreamNotSeekableError("seek")
        }
        this.cursor = offset
    }

    close(): void {
        if (this.fd !== null) {
            closeSync(this.fd)
            this.fd = null
        }
    }

    private descriptor(): number {
        if (this.fd === null) {
            throw new StreamIoError(`Stream for ${this.path} is closed`, "EBADF")
        }
        return this.fd
    }
}

/**
 * Forward-only stream over a sequence of chunks, like a pipe or socket.
 * It cannot be rewound.
 */
export class SequentialByteStream implements ByteStream {
    readonly canSeek = false
    private cursor = 0
    private chunkIndex = 0
    private chunkOffset = 0

    constructor(private readonly chunks: readonly Uint8Array[]) {}

    get position(): number {
        return this.cursor
    }

    read(buffer: Uint8Array): number {
        let written = 0
        while (written < buffer.length && this.chunkIndex < this.chunks.length) {
            const chunk = this.chunks[this.chunkIndex]
            const count = Math.min(buffer.length - written, chunk.length - this.chunkOffset)

            buffer.set(chunk.subarray(this.chunkOffset, this.chunkOffset + count), written)
            written += count
            this.chunkOffset += count

            if (this.chunkOffset >= chunk.length) {
                this.chunkIndex++
                this.chunkOffset = 0
            }
        }
        this.cursor += written
        return written
    }

    seek(_offset: number): void {
        throw new StreamNotSeekableError("seek")
    }
}
