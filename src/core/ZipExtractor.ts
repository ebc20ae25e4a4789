// ======================================
//	ZipExtractor.ts - Incremental extraction
// ======================================
//
// extract() is a plain step function: it takes a ZipFile, does a bounded
// amount of inflating and returns either the next ZipFile ('loop') or the
// final contents ('done'). The caller decides when the next step runs.
//
// LOGGING INSTRUCTIONS:
// ---------------------
// Set ZipExtractor.loggingEnabled = true to trace every entry moved.
//

import { format, TextDecoder } from 'util';
import { Logger } from './components/Logger';
import { fromDosDateTime } from './components/DosDateTime';
import Errors, { ZipError, describeError } from './constants/Errors';
import { CMP_METHOD, DOS_FILE_ATTR, FILE_SYSTEM, GP_FLAG } from './constants/Headers';
import { ZipCodec, defaultCodec } from './ZipCodec';
import {
  ArchiveOverview,
  CompressedEntry,
  DroppedEntry,
  EntryOverview,
  ExtractConfig,
  ExtractionContent,
  ExtractionDone,
  ExtractionProgress,
  ExtractionStep,
  ZipFile,
} from '../types';

const TEXT_EXTENSIONS = [
  'txt', 'md', 'markdown', 'csv', 'tsv', 'json', 'xml', 'html', 'htm', 'css',
  'js', 'mjs', 'cjs', 'ts', 'tsx', 'jsx', 'yml', 'yaml', 'toml', 'ini', 'svg',
  'log', 'sh', 'py', 'rb', 'java', 'c', 'h', 'cpp', 'rs', 'go', 'sql',
];

/**
 * Default text classifier: decides by file extension
 */
export function isTextFile(name: string): boolean {
  const base = name.slice(name.lastIndexOf('/') + 1);
  const dot = base.lastIndexOf('.');
  if (dot <= 0) return false;
  return TEXT_EXTENSIONS.includes(base.slice(dot + 1).toLowerCase());
}

export const DEFAULT_EXTRACT_CONFIG: ExtractConfig = {
  maxEntriesPerStep: 8,
  maxBytesPerStep: undefined,
  classifyAsText: isTextFile,
  maxAttempts: 3,
  verifyChecksum: true,
};

/**
 * Fills in defaults; entry quotas and attempt limits below 1 are raised to 1
 */
export function resolveExtractConfig(config: Partial<ExtractConfig> = {}): ExtractConfig {
  return {
    maxEntriesPerStep: Math.max(1, Math.floor(config.maxEntriesPerStep ?? DEFAULT_EXTRACT_CONFIG.maxEntriesPerStep)),
    maxBytesPerStep: config.maxBytesPerStep ?? DEFAULT_EXTRACT_CONFIG.maxBytesPerStep,
    classifyAsText: config.classifyAsText ?? DEFAULT_EXTRACT_CONFIG.classifyAsText,
    maxAttempts: Math.max(1, Math.floor(config.maxAttempts ?? DEFAULT_EXTRACT_CONFIG.maxAttempts)),
    verifyChecksum: config.verifyChecksum ?? DEFAULT_EXTRACT_CONFIG.verifyChecksum,
  };
}

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Turns produced bytes into text, binary or failed content
 */
export function classify(name: string, data: Buffer, classifyAsText: (name: string) => boolean): ExtractionContent {
  if (!classifyAsText(name)) {
    return { kind: 'binary', data };
  }
  try {
    return { kind: 'text', text: utf8.decode(data) };
  } catch (error) {
    const failure = new ZipError('TEXT_DECODE_FAILED', Errors.INVALID_TEXT, { entryName: name, cause: error });
    Logger.warn(`[ZipExtractor] ${name}: ${failure.message} (${describeError(error)})`);
    return { kind: 'failed', data };
  }
}

export function progress(zip: ZipFile): ExtractionProgress {
  const uncompressedCount = zip.uncompressed.size;
  const possiblyCompressedCount = zip.possiblyCompressed.size;
  const droppedCount = zip.dropped.size;
  return {
    uncompressedCount,
    possiblyCompressedCount,
    droppedCount,
    total: uncompressedCount + possiblyCompressedCount + droppedCount,
  };
}

/**
 * Converts compression method code to human-readable string
 */
export function compressionMethodToString(method: number, flags: number = 0): string {
  switch (method) {
    case CMP_METHOD.STORED: return 'Stored';
    case CMP_METHOD.SHRUNK: return 'Shrunk';
    case CMP_METHOD.REDUCED1: return 'Reduced-1';
    case CMP_METHOD.REDUCED2: return 'Reduced-2';
    case CMP_METHOD.REDUCED3: return 'Reduced-3';
    case CMP_METHOD.REDUCED4: return 'Reduced-4';
    case CMP_METHOD.IMPLODED: return 'Imploded';
    case CMP_METHOD.DEFLATED:
      switch (flags & (GP_FLAG.COMPRESSION1 | GP_FLAG.COMPRESSION2)) {
        case 2: return 'Deflate-M';     // Deflate Maximum
        case 4: return 'Deflate-F';     // Deflate Fast
        case 6: return 'Deflate-S';     // Deflate Super Fast
        default: return 'Deflate-N';    // Deflate Normal
      }
    case CMP_METHOD.ENHANCED_DEFLATE: return 'Deflate-Enh';
    case CMP_METHOD.BZIP2: return 'BZip2';
    case CMP_METHOD.LZMA: return 'LZMA';
    case CMP_METHOD.ZSTD: return 'Zstandard';
    default: return 'Unknown';
  }
}

const FILE_SYSTEM_NAMES: Record<number, string> = {
  [FILE_SYSTEM.MSDOS]: 'MS-DOS',
  [FILE_SYSTEM.AMIGA]: 'Amiga',
  [FILE_SYSTEM.OPENVMS]: 'OpenVMS',
  [FILE_SYSTEM.UNIX]: 'Unix',
  [FILE_SYSTEM.VM_CMS]: 'VM/CMS',
  [FILE_SYSTEM.ATARI]: 'Atari ST',
  [FILE_SYSTEM.OS2]: 'OS/2 HPFS',
  [FILE_SYSTEM.MAC]: 'Macintosh',
  [FILE_SYSTEM.CP_M]: 'CP/M',
  [FILE_SYSTEM.NTFS]: 'Windows NTFS',
  [FILE_SYSTEM.MVS]: 'MVS (OS/390 - Z/OS)',
  [FILE_SYSTEM.VSE]: 'VSE',
  [FILE_SYSTEM.ACORN]: 'Acorn Risc',
  [FILE_SYSTEM.VFAT]: 'VFAT',
  [FILE_SYSTEM.ALTMVS]: 'Alternate MVS',
  [FILE_SYSTEM.BEOS]: 'BeOS',
  [FILE_SYSTEM.TANDEM]: 'Tandem',
  [FILE_SYSTEM.OS400]: 'OS/400',
  [FILE_SYSTEM.DARWIN]: 'Apple OS/X (Darwin)',
};

export function fileSystemToString(versionMadeBy: number): string {
  return FILE_SYSTEM_NAMES[versionMadeBy >> 8] ?? 'Unknown';
}

/**
 * MS-DOS attributes as "rhsda" flags, '-' where unset, 'none' when empty
 */
export function dosAttributesToString(externalAttributes: number): string {
  const dosAttr = externalAttributes & 0xffff;
  if (dosAttr === 0) return 'none';
  let attrs = '';
  attrs += (dosAttr & DOS_FILE_ATTR.READONLY) ? 'r' : '-';
  attrs += (dosAttr & DOS_FILE_ATTR.HIDDEN)   ? 'h' : '-';
  attrs += (dosAttr & DOS_FILE_ATTR.SYSTEM)   ? 's' : '-';
  attrs += (dosAttr & DOS_FILE_ATTR.DIRECTORY) ? 'd' : '-';
  attrs += (dosAttr & DOS_FILE_ATTR.ARCHIVE)  ? 'a' : '-';
  return attrs;
}

/**
 * Read-only summary of an archive taken from its central directory
 */
export function overview(zip: ZipFile): ArchiveOverview {
  const entries: EntryOverview[] = zip.centrals.map((central) => ({
    name: central.fileName,
    method: compressionMethodToString(central.compressionMethod, central.flags),
    compressedSize: central.compressedSize,
    uncompressedSize: central.uncompressedSize,
    ratio: central.uncompressedSize > 0
      ? ((1 - central.compressedSize / central.uncompressedSize) * 100).toFixed(1)
      : '0.0',
    crc32: central.crc32.toString(16).padStart(8, '0'),
    modified: fromDosDateTime(central.lastModTime, central.lastModDate),
    fileSystem: fileSystemToString(central.versionMadeBy),
    attributes: dosAttributesToString(central.externalAttributes),
    offset: central.relativeOffset,
    comment: central.fileComment,
  }));

  return {
    comment: zip.end.comment,
    totalEntries: zip.end.totalEntries,
    centralDirectorySize: zip.end.size,
    centralDirectoryOffset: zip.end.offset,
    totalUncompressed: entries.reduce((sum, entry) => sum + entry.uncompressedSize, 0),
    totalCompressed: entries.reduce((sum, entry) => sum + entry.compressedSize, 0),
    entries,
  };
}

/**
 * Incremental extraction engine
 */
export class ZipExtractor {
  // Class-level logging control - set to true to enable logging
  static loggingEnabled: boolean = false;

  constructor(private readonly codec: ZipCodec = defaultCodec) {}

  private log(...args: unknown[]): void {
    if (ZipExtractor.loggingEnabled) {
      Logger.debug(`[ZipExtractor]`, ...args);
    }
  }

  /**
   * Performs one bounded extraction step. The given ZipFile is not modified.
   */
  extract(config: ExtractConfig, zip: ZipFile): ExtractionStep {
    const pending = new Map<string, CompressedEntry>();
    const uncompressed = new Map(zip.uncompressed);
    const dropped = new Map(zip.dropped);

    let decompressed = 0;
    let remainingBytes = config.maxBytesPerStep;

    for (const [name, entry] of zip.possiblyCompressed) {
      const method = entry.header.compressionMethod;

      if (method === CMP_METHOD.STORED) {
        const failure = this.checksumFailure(name, entry, entry.compressedContent, config);
        if (failure) {
          dropped.set(name, this.toDropped(entry, failure));
        } else {
          uncompressed.set(name, entry.compressedContent);
          this.log(`${name}: stored, ${entry.compressedContent.length} bytes`);
        }
        continue;
      }

      if (method !== CMP_METHOD.DEFLATED) {
        const failure = new ZipError('UNSUPPORTED_COMPRESSION_METHOD', format(Errors.UNKNOWN_METHOD, method), { entryName: name });
        Logger.warn(`[ZipExtractor] ${name}: ${failure.message}`);
        dropped.set(name, this.toDropped(entry, failure));
        continue;
      }

      if (!this.isEligible(entry, decompressed, remainingBytes, config)) {
        pending.set(name, entry);
        continue;
      }

      decompressed++;
      try {
        const data = this.codec.inflate(entry.compressedContent);
        const failure = this.checksumFailure(name, entry, data, config);
        if (failure) throw failure;

        uncompressed.set(name, data);
        if (remainingBytes !== undefined) {
          remainingBytes -= entry.header.compressedSize;
        }
        this.log(`${name}: inflated ${entry.compressedContent.length} -> ${data.length} bytes`);
      } catch (error) {
        if (!(error instanceof ZipError)) throw error;

        const attempts = entry.attempts + 1;
        Logger.warn(`[ZipExtractor] ${name}: attempt ${attempts}/${config.maxAttempts} failed: ${error.message}`);
        if (attempts >= config.maxAttempts) {
          dropped.set(name, {
            header: entry.header,
            code: 'DECOMPRESSION_FAILED',
            message: `${format(Errors.TOO_MANY_ATTEMPTS, attempts)}: ${error.message}`,
          });
        } else {
          pending.set(name, { ...entry, attempts });
        }
      }
    }

    const next: ZipFile = {
      possiblyCompressed: pending,
      uncompressed,
      dropped,
      centrals: zip.centrals,
      end: zip.end,
    };

    if (pending.size > 0) {
      this.log(`step done: ${decompressed} inflated, ${pending.size} pending`);
      return { kind: 'loop', zip: next };
    }

    return this.finish(next, config);
  }

  /**
   * Drives extract() until it reports completion
   */
  extractAll(config: ExtractConfig, zip: ZipFile): ExtractionDone {
    let step = this.extract(config, zip);
    while (step.kind === 'loop') {
      step = this.extract(config, step.zip);
    }
    return step;
  }

  private isEligible(
    entry: CompressedEntry,
    decompressed: number,
    remainingBytes: number | undefined,
    config: ExtractConfig
  ): boolean {
    if (decompressed >= config.maxEntriesPerStep) return false;
    if (remainingBytes === undefined) return true;
    if (entry.header.compressedSize < remainingBytes) return true;
    // An entry larger than the whole budget still goes first in a step
    return decompressed === 0;
  }

  private checksumFailure(name: string, entry: CompressedEntry, data: Buffer, config: ExtractConfig): ZipError | null {
    if (!config.verifyChecksum) return null;
    const actual = this.codec.crc32(data);
    if (actual === entry.header.crc32) return null;
    return new ZipError(
      'CHECKSUM_MISMATCH',
      `${Errors.INVALID_CRC} (expected ${entry.header.crc32.toString(16).padStart(8, '0')}, got ${actual.toString(16).padStart(8, '0')})`,
      { entryName: name }
    );
  }

  private toDropped(entry: CompressedEntry, error: ZipError): DroppedEntry {
    return { header: entry.header, code: error.code, message: error.message };
  }

  private finish(zip: ZipFile, config: ExtractConfig): ExtractionStep {
    const entries: Array<[string, ExtractionContent]> = [];
    const seen = new Set<string>();
    for (const central of zip.centrals) {
      const name = central.fileName;
      const data = zip.uncompressed.get(name);
      if (data === undefined || seen.has(name)) continue;
      seen.add(name);
      entries.push([name, classify(name, data, config.classifyAsText)]);
    }

    this.log(`extraction complete: ${entries.length} entries, ${zip.dropped.size} dropped`);
    return { kind: 'done', entries, dropped: [...zip.dropped] };
  }
}

/**
 * One extraction step with the default codec
 */
export function extract(config: ExtractConfig, zip: ZipFile): ExtractionStep {
  return new ZipExtractor().extract(config, zip);
}

export default ZipExtractor;
