// ======================================
//	ZipEncoder.ts - Archive builder
// ======================================
//
// LOGGING INSTRUCTIONS:
// ---------------------
// Set ZipEncoder.loggingEnabled = true to trace entry selection and layout.
// Logging respects the global Logger level (debug, info, warn, error, silent).
//

import { Logger } from './components/Logger';
import { DOS_EPOCH, DosDateTime, toDosDateTime } from './components/DosDateTime';
import {
  CMP_METHOD,
  FILE_SYSTEM,
  GP_FLAG,
  UNIX_FILE_MODE,
  VERSION,
  LocalFileHeader,
} from './constants/Headers';
import { writeLocalFileHeader } from './records/LocalFileHeader';
import { writeDataDescriptor } from './records/DataDescriptor';
import { writeCentralDirectoryHeader } from './records/CentralDirectoryHeader';
import { writeEndOfCentralDirectory } from './records/EndOfCentralDirectory';
import { ZipCodec, defaultCodec } from './ZipCodec';
import {
  BuildOptions,
  CompressionChoice,
  CompressionPolicy,
  EncodedFile,
  Entry,
} from '../types';

/** Uncompressed bytes of an entry */
export function entryBytes(entry: Entry): Buffer {
  if (entry.kind === 'text') {
    return Buffer.from(entry.content, 'utf8');
  }
  return Buffer.from(entry.content.buffer, entry.content.byteOffset, entry.content.byteLength);
}

export function resolveChoice(policy: CompressionPolicy, entry: Entry): CompressionChoice {
  return typeof policy === 'function' ? policy(entry) : policy;
}

/**
 * Compresses one entry under the requested choice and keeps whichever of
 * the raw and the compressed bytes is smaller. Ties keep the raw bytes.
 */
export function encodeFile(entry: Entry, choice: CompressionChoice, codec: ZipCodec = defaultCodec): EncodedFile {
  const data = entryBytes(entry);
  const crc32 = codec.crc32(data);

  let payload = data;
  let compressionMethod: number = CMP_METHOD.STORED;

  if (choice === 'deflate') {
    const deflated = codec.deflate(data);
    if (deflated.length < data.length) {
      payload = deflated;
      compressionMethod = CMP_METHOD.DEFLATED;
    }
  }

  return {
    name: entry.name,
    payload,
    uncompressedSize: data.length,
    compressedSize: payload.length,
    compressionMethod,
    crc32,
  };
}

/**
 * Serializes entries into a ZIP byte stream:
 * local entries, then the central directory, then the end record.
 */
export class ZipEncoder {
  // Class-level logging control - set to true to enable logging
  static loggingEnabled: boolean = false;

  constructor(private readonly codec: ZipCodec = defaultCodec) {}

  private log(...args: unknown[]): void {
    if (ZipEncoder.loggingEnabled) {
      Logger.debug(`[ZipEncoder]`, ...args);
    }
  }

  /**
   * Runs compression selection for every entry, preserving input order
   */
  encodeFiles(entries: Entry[], policy: CompressionPolicy = 'deflate'): EncodedFile[] {
    return entries.map((entry) => {
      const file = encodeFile(entry, resolveChoice(policy, entry), this.codec);
      this.log(
        `${file.name}: ${file.uncompressedSize} -> ${file.compressedSize} bytes, ` +
        `method=${file.compressionMethod}, crc=0x${file.crc32.toString(16).padStart(8, '0')}`
      );
      return file;
    });
  }

  /**
   * Builds a complete archive
   * @param entries - Entries in archive order
   * @param policy - Compression choice for all entries, or per entry
   * @param options - Timestamp and data descriptor options
   * @returns Buffer containing the archive
   */
  build(entries: Entry[], policy: CompressionPolicy = 'deflate', options: BuildOptions = {}): Buffer {
    const files = this.encodeFiles(entries, policy);
    const stamp: DosDateTime = options.modified ? toDosDateTime(options.modified) : DOS_EPOCH;
    const useDataDescriptor = options.useDataDescriptor ?? false;

    const localRecords: Buffer[] = [];
    const centralRecords: Buffer[] = [];

    // Running offset of bytes already emitted; each entry's header starts there
    let offset = 0;
    for (const file of files) {
      const header = this.headerFor(file, stamp, useDataDescriptor);

      const local = this.localRecord(file, header, useDataDescriptor);
      localRecords.push(local);

      centralRecords.push(writeCentralDirectoryHeader({
        ...header,
        // Central headers always carry the real values
        crc32: file.crc32,
        compressedSize: file.compressedSize,
        uncompressedSize: file.uncompressedSize,
        versionMadeBy: (FILE_SYSTEM.UNIX << 8) | VERSION.MADE_BY,
        fileComment: '',
        diskNumberStart: 0,
        internalAttributes: 0,
        externalAttributes: (UNIX_FILE_MODE << 16) >>> 0,
        relativeOffset: offset,
      }));

      this.log(`${file.name}: local header at ${offset}, ${local.length} bytes`);
      offset += local.length;
    }

    const centralDirectory = Buffer.concat(centralRecords);
    const end = writeEndOfCentralDirectory({
      diskNumber: 0,
      centralDirectoryDisk: 0,
      diskEntries: files.length,
      totalEntries: files.length,
      size: centralDirectory.length,
      offset,
      comment: '',
    });

    this.log(`central directory: ${files.length} entries, ${centralDirectory.length} bytes at ${offset}`);
    return Buffer.concat([...localRecords, centralDirectory, end]);
  }

  private headerFor(file: EncodedFile, stamp: DosDateTime, useDataDescriptor: boolean): LocalFileHeader {
    // Stored payloads keep their sizes so readers walking the records need not search for the descriptor
    const deferred = useDataDescriptor && file.compressionMethod !== CMP_METHOD.STORED;
    return {
      versionNeeded: VERSION.EXTRACT,
      flags: GP_FLAG.EFS | (useDataDescriptor ? GP_FLAG.DATA_DESC : 0),
      compressionMethod: file.compressionMethod,
      lastModTime: stamp.time,
      lastModDate: stamp.date,
      crc32: deferred ? 0 : file.crc32,
      compressedSize: deferred ? 0 : file.compressedSize,
      uncompressedSize: deferred ? 0 : file.uncompressedSize,
      fileName: file.name,
      extraField: Buffer.alloc(0),
    };
  }

  private localRecord(file: EncodedFile, header: LocalFileHeader, useDataDescriptor: boolean): Buffer {
    const parts = [writeLocalFileHeader(header), file.payload];
    if (useDataDescriptor) {
      parts.push(writeDataDescriptor({
        signed: true,
        crc32: file.crc32,
        compressedSize: file.compressedSize,
        uncompressedSize: file.uncompressedSize,
      }));
    }
    return Buffer.concat(parts);
  }
}

export default ZipEncoder;
