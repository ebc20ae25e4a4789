import type {
  CentralDirectoryHeader,
  EndOfCentralDirectory,
  LocalFileHeader,
} from '../core/constants/Headers';
import type { ZipErrorCode } from '../core/constants/Errors';

// ============================================================================
// Zipstep Version Info
// ============================================================================

export interface ZipstepInfo {
  version: string;
  releaseDate: string;
}

export const ZIPSTEP_INFO: ZipstepInfo = {
  version: '0.1.0',
  releaseDate: '2026-10-19'
};

// ============================================================================
// Encoder input
// ============================================================================

export interface TextEntry {
  kind: 'text';
  name: string;
  content: string;
}

export interface RawEntry {
  kind: 'raw';
  name: string;
  content: Uint8Array;
}

/** A logical file to add to an archive */
export type Entry = TextEntry | RawEntry;

export type CompressionChoice = 'store' | 'deflate';

/** One choice for every entry, or a per-entry decision */
export type CompressionPolicy = CompressionChoice | ((entry: Entry) => CompressionChoice);

/**
 * An entry after compression selection, ready to be laid out.
 * `compressedSize <= uncompressedSize` always holds.
 */
export interface EncodedFile {
  name: string;
  payload: Buffer;
  uncompressedSize: number;
  compressedSize: number;
  compressionMethod: number;
  crc32: number;
}

export interface BuildOptions {
  /** Timestamp written for every entry (default: 1980-01-01 00:00:00) */
  modified?: Date;
  /** Defer CRC and sizes to a signed data descriptor after each payload */
  useDataDescriptor?: boolean;
}

// ============================================================================
// Decoder output
// ============================================================================

export interface CompressedEntry {
  header: LocalFileHeader;
  compressedContent: Buffer;
  /** Failed decompression attempts so far */
  attempts: number;
}

/** An entry permanently taken out of extraction */
export interface DroppedEntry {
  header: LocalFileHeader;
  code: ZipErrorCode;
  message: string;
}

/**
 * A decoded archive. Each name from `centrals` is a key of exactly one of
 * `possiblyCompressed`, `uncompressed` and `dropped`.
 */
export interface ZipFile {
  possiblyCompressed: Map<string, CompressedEntry>;
  uncompressed: Map<string, Buffer>;
  dropped: Map<string, DroppedEntry>;
  centrals: CentralDirectoryHeader[];
  end: EndOfCentralDirectory;
}

export type DecodeStrategy = 'anchored' | 'sequential';

// ============================================================================
// Extraction
// ============================================================================

export type ExtractionContent =
  | { kind: 'text'; text: string }
  | { kind: 'binary'; data: Buffer }
  | { kind: 'failed'; data: Buffer };

export interface ExtractConfig {
  /** Deflate entries decompressed per step at most */
  maxEntriesPerStep: number;
  /** Compressed bytes inflated per step at most (no limit when undefined) */
  maxBytesPerStep?: number;
  classifyAsText: (name: string) => boolean;
  /** Failed decompressions after which an entry is dropped */
  maxAttempts: number;
  verifyChecksum: boolean;
}

export type ExtractionStep =
  | { kind: 'loop'; zip: ZipFile }
  | {
      kind: 'done';
      entries: Array<[string, ExtractionContent]>;
      dropped: Array<[string, DroppedEntry]>;
    };

export type ExtractionDone = Extract<ExtractionStep, { kind: 'done' }>;

export interface ExtractionProgress {
  uncompressedCount: number;
  possiblyCompressedCount: number;
  droppedCount: number;
  total: number;
}

// ============================================================================
// Overview
// ============================================================================

export interface EntryOverview {
  name: string;
  method: string;
  compressedSize: number;
  uncompressedSize: number;
  /** Space saved, in percent, one decimal */
  ratio: string;
  crc32: string;
  modified: Date | null;
  fileSystem: string;
  attributes: string;
  offset: number;
  comment: string;
}

export interface ArchiveOverview {
  comment: string;
  totalEntries: number;
  centralDirectorySize: number;
  centralDirectoryOffset: number;
  totalUncompressed: number;
  totalCompressed: number;
  entries: EntryOverview[];
}
