export {
    MemoryByteStream,
    FileByteStream,
    SequentialByteStream,
    type ByteStream,
} from "./byte-stream"
export {
    sha256FromStream,
    sha256FromText,
    sha256FromChunks,
    md5FromStream,
    md5FromText,
    md5FromChunks,
    DEFAULT_BUFFER_SIZE,
    type DigestAlgorithm,
    type DigestOptions,
    type ChunkSource,
} from "./digest"
