/**
 * I/O errors raised by byte streams and the stream digest functions.
 */

export class StreamIoError extends Error {
    constructor(
        message: string,
        public readonly code: string,
    ) {
        super(message)
        this.name = "StreamIoError"
    }
}

/**
 * Thrown when a stream has to be rewound but does not support seeking.
 * Callers can catch it and fall back to the `*FromChunks` digest functions.
 */
export class StreamNotSeekableError extends StreamIoError {
    constructor(operation: string) {
        super(`Stream does not support seeking (${operation})`, "ESPIPE")
        this.name = "StreamNotSeekableError"
    }
}
