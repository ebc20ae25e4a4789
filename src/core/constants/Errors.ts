// ======================================
//	Errors.ts
// ======================================
// Error messages

/** Stable codes carried by every ZipError. */
export type ZipErrorCode =
  | 'MALFORMED_SIGNATURE'
  | 'TRUNCATED_BUFFER'
  | 'UNSUPPORTED_COMPRESSION_METHOD'
  | 'DECOMPRESSION_FAILED'
  | 'CHECKSUM_MISMATCH'
  | 'TEXT_DECODE_FAILED'
  | 'UNSAFE_PATH';

/** Error raised by the record codecs, the decoders and the extraction engine. */
export class ZipError extends Error {
  readonly code: ZipErrorCode;
  /** Entry the error relates to, when known. */
  readonly entryName?: string;
  /** Byte offset in the archive (or in the record being read) where it happened. */
  readonly offset?: number;

  constructor(
    code: ZipErrorCode,
    message: string,
    options: { entryName?: string; offset?: number; cause?: unknown } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ZipError';
    this.code = code;
    this.entryName = options.entryName;
    this.offset = options.offset;
  }
}

/**
 * Render anything caught in a catch clause as a log-friendly message.
 * pako throws plain strings, so Error cannot be assumed.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export default {
    /* Header error messages */
    INVALID_LOC: "Invalid LOC header (bad signature)",
    INVALID_CEN: "Invalid CEN header (bad signature)",
    INVALID_END: "Invalid END header (bad signature)",
    INVALID_SIGNATURE: "Unexpected record signature 0x%s",

    /* Buffer error messages */
    TRUNCATED: "Buffer exhausted: needed %d bytes, %d remaining",
    CEN_OUT_OF_BOUNDS: "Central directory lies outside the archive",
    LOC_OUT_OF_BOUNDS: "Local header offset lies outside the archive",
    NO_DATA_DESCRIPTOR: "Could not locate the data descriptor for %s",
    MISSING_LOC: "Central directory entry %s has no local header",

    /* Extract error messages */
    UNKNOWN_METHOD: "Invalid/unsupported compression method: %d",
    DECOMPRESSION_ERROR: "Error occurred during decompression",
    INVALID_CRC: "CRC32 checksum does not match the expected value",
    INVALID_TEXT: "Entry is not valid UTF-8 text",
    TOO_MANY_ATTEMPTS: "Gave up after %d failed attempts",

    /* Zipstep error messages */
    INVALID_FORMAT: "Invalid or unsupported zip format. No END header found",
    UNSAFE_PATH: "Entry path escapes the target directory: %s",
};
