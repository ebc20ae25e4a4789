// ======================================
//	ZipDecoder.ts - Archive readers
// ======================================
//
// Two interchangeable strategies behind one interface:
//   AnchoredDecoder   - end record -> central directory -> local headers
//   SequentialDecoder - signature by signature from the start of the buffer
//
// LOGGING INSTRUCTIONS:
// ---------------------
// Set decoderLogging.enabled = true to trace every record decoded.
//

import { format } from 'util';
import { ByteReader } from './components/ByteReader';
import { Logger } from './components/Logger';
import Errors, { ZipError } from './constants/Errors';
import {
  CENTRAL_DIR,
  CENTRAL_END,
  DATA_DESC,
  GP_FLAG,
  LOCAL_HDR,
  CentralDirectoryHeader,
  EndOfCentralDirectory,
  LocalFileHeader,
} from './constants/Headers';
import { readLocalFileHeader } from './records/LocalFileHeader';
import { readDataDescriptor } from './records/DataDescriptor';
import { readCentralDirectoryHeader } from './records/CentralDirectoryHeader';
import { readEndOfCentralDirectory } from './records/EndOfCentralDirectory';
import { CompressedEntry, DecodeStrategy, ZipFile } from '../types';

/**
 * A way of turning archive bytes into a ZipFile
 */
export interface ZipDecoder {
  readonly strategy: DecodeStrategy;
  /**
   * @throws ZipError on any structural inconsistency
   */
  decode(data: Buffer): ZipFile;
}

/** Logging switch shared by both strategies */
export const decoderLogging = {
  enabled: false,
};

export function hasDataDescriptor(header: Pick<LocalFileHeader, 'flags'>): boolean {
  return (header.flags & GP_FLAG.DATA_DESC) !== 0;
}

function log(...args: unknown[]): void {
  if (decoderLogging.enabled) {
    Logger.debug(`[ZipDecoder]`, ...args);
  }
}

/**
 * Builds the ZipFile value. Every central entry must have a local
 * counterpart; the first entry wins when a name appears twice.
 */
function assemble(
  centrals: CentralDirectoryHeader[],
  end: EndOfCentralDirectory,
  locals: Map<string, CompressedEntry>
): ZipFile {
  const possiblyCompressed = new Map<string, CompressedEntry>();
  for (const central of centrals) {
    const local = locals.get(central.fileName);
    if (!local) {
      throw new ZipError('MALFORMED_SIGNATURE', format(Errors.MISSING_LOC, central.fileName), {
        entryName: central.fileName,
        offset: central.relativeOffset,
      });
    }
    if (possiblyCompressed.has(central.fileName)) {
      Logger.warn(`[ZipDecoder] duplicate entry name ignored: ${central.fileName}`);
      continue;
    }
    possiblyCompressed.set(central.fileName, local);
  }

  return {
    possiblyCompressed,
    uncompressed: new Map(),
    dropped: new Map(),
    centrals,
    end,
  };
}

/**
 * Random-access decoding anchored on the end of central directory record.
 *
 * The end record is taken from the last 22 bytes, which only works when the
 * archive comment is empty. Archives with a trailing comment fail with
 * MALFORMED_SIGNATURE here; the sequential decoder reads them.
 */
export class AnchoredDecoder implements ZipDecoder {
  readonly strategy = 'anchored';

  decode(data: Buffer): ZipFile {
    if (data.length < CENTRAL_END.SIZE) {
      throw new ZipError('TRUNCATED_BUFFER', Errors.INVALID_FORMAT, { offset: 0 });
    }

    const endStart = data.length - CENTRAL_END.SIZE;
    const end = readEndOfCentralDirectory(new ByteReader(data.subarray(endStart), 0, endStart));
    log(`end record: ${end.totalEntries} entries, central directory ${end.size} bytes at ${end.offset}`);

    if (end.offset + end.size > endStart) {
      throw new ZipError('TRUNCATED_BUFFER', Errors.CEN_OUT_OF_BOUNDS, { offset: end.offset });
    }

    const centralReader = new ByteReader(data.subarray(end.offset, end.offset + end.size), 0, end.offset);
    const centrals: CentralDirectoryHeader[] = [];
    for (let i = 0; i < end.totalEntries; i++) {
      centrals.push(readCentralDirectoryHeader(centralReader));
    }

    const locals = new Map<string, CompressedEntry>();
    for (const central of centrals) {
      if (locals.has(central.fileName)) continue;
      locals.set(central.fileName, this.readLocal(data, central));
    }

    return assemble(centrals, end, locals);
  }

  private readLocal(data: Buffer, central: CentralDirectoryHeader): CompressedEntry {
    if (central.relativeOffset + LOCAL_HDR.SIZE > data.length) {
      throw new ZipError('TRUNCATED_BUFFER', Errors.LOC_OUT_OF_BOUNDS, {
        entryName: central.fileName,
        offset: central.relativeOffset,
      });
    }

    const reader = new ByteReader(data, central.relativeOffset);
    let header = readLocalFileHeader(reader);

    // Deferred sizes: the local header holds zeros, the central header the real values
    if (hasDataDescriptor(header)) {
      header = {
        ...header,
        crc32: central.crc32,
        compressedSize: central.compressedSize,
        uncompressedSize: central.uncompressedSize,
      };
    }

    const compressedContent = reader.readBytes(header.compressedSize);
    log(`${central.fileName}: local header at ${central.relativeOffset}, ${compressedContent.length} payload bytes`);
    return { header, compressedContent, attempts: 0 };
  }
}

/**
 * Streaming-style decoding: reads a signature, decodes the matching record,
 * repeats until the end record. Needs no offsets from the tail, so it also
 * reads archives carrying a trailing comment.
 */
export class SequentialDecoder implements ZipDecoder {
  readonly strategy = 'sequential';

  decode(data: Buffer): ZipFile {
    const reader = new ByteReader(data);
    const locals = new Map<string, CompressedEntry>();
    const centrals: CentralDirectoryHeader[] = [];

    for (;;) {
      const at = reader.position;
      const signature = reader.peekUInt32();

      switch (signature) {
        case LOCAL_HDR.SIGNATURE: {
          const entry = this.readLocal(data, reader);
          log(`${entry.header.fileName}: local header at ${at}, ${entry.compressedContent.length} payload bytes`);
          if (!locals.has(entry.header.fileName)) {
            locals.set(entry.header.fileName, entry);
          }
          break;
        }
        case CENTRAL_DIR.SIGNATURE: {
          const central = readCentralDirectoryHeader(reader);
          log(`${central.fileName}: central header at ${at}`);
          centrals.push(central);
          break;
        }
        case CENTRAL_END.SIGNATURE: {
          const end = readEndOfCentralDirectory(reader);
          log(`end record at ${at}: ${end.totalEntries} entries`);
          return assemble(centrals, end, locals);
        }
        default:
          throw new ZipError('MALFORMED_SIGNATURE', format(Errors.INVALID_SIGNATURE, signature.toString(16).padStart(8, '0')), {
            offset: at,
          });
      }
    }
  }

  private readLocal(data: Buffer, reader: ByteReader): CompressedEntry {
    const header = readLocalFileHeader(reader);

    if (!hasDataDescriptor(header)) {
      return { header, compressedContent: reader.readBytes(header.compressedSize), attempts: 0 };
    }

    // Sizes deferred: either the writer still filled them in, or the payload
    // ends where a matching data descriptor starts
    const start = reader.position;
    let compressedContent: Buffer;
    if (header.compressedSize > 0) {
      compressedContent = reader.readBytes(header.compressedSize);
    } else {
      const descriptorAt = locateDataDescriptor(data, start);
      if (descriptorAt < 0) {
        throw new ZipError('TRUNCATED_BUFFER', format(Errors.NO_DATA_DESCRIPTOR, header.fileName), {
          entryName: header.fileName,
          offset: start,
        });
      }
      compressedContent = reader.readBytes(descriptorAt - start);
    }

    const descriptor = readDataDescriptor(reader);
    return {
      header: {
        ...header,
        crc32: descriptor.crc32,
        compressedSize: descriptor.compressedSize,
        uncompressedSize: descriptor.uncompressedSize,
      },
      compressedContent,
      attempts: 0,
    };
  }
}

function isRecordSignature(word: number): boolean {
  return word === LOCAL_HDR.SIGNATURE || word === CENTRAL_DIR.SIGNATURE || word === CENTRAL_END.SIGNATURE;
}

/**
 * Finds the data descriptor following a payload of unknown length that starts
 * at `start`: the first position whose compressed-size field equals the
 * distance from `start`. A descriptor without signature must also be
 * followed by another record's signature.
 * @returns Offset of the descriptor, or -1
 */
export function locateDataDescriptor(data: Buffer, start: number): number {
  for (let p = start; p + DATA_DESC.UNSIGNED_SIZE <= data.length; p++) {
    const distance = p - start;

    if (
      p + DATA_DESC.SIZE <= data.length &&
      data.readUInt32LE(p) === DATA_DESC.SIGNATURE &&
      data.readUInt32LE(p + DATA_DESC.CMP_SIZE) === distance
    ) {
      return p;
    }

    if (
      p + DATA_DESC.UNSIGNED_SIZE + 4 <= data.length &&
      data.readUInt32LE(p + 4) === distance &&
      isRecordSignature(data.readUInt32LE(p + DATA_DESC.UNSIGNED_SIZE))
    ) {
      return p;
    }
  }
  return -1;
}

const decoders: Record<DecodeStrategy, ZipDecoder> = {
  anchored: new AnchoredDecoder(),
  sequential: new SequentialDecoder(),
};

export function getDecoder(strategy: DecodeStrategy): ZipDecoder {
  return decoders[strategy];
}

function toBuffer(bytes: Uint8Array): Buffer {
  return Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/**
 * Decodes an archive
 * @throws ZipError when the archive is malformed or truncated
 */
export function decode(bytes: Uint8Array, strategy: DecodeStrategy = 'anchored'): ZipFile {
  return getDecoder(strategy).decode(toBuffer(bytes));
}

/**
 * Decodes an archive
 * @returns The decoded archive, or null when it is malformed or truncated
 */
export function read(bytes: Uint8Array, strategy: DecodeStrategy = 'anchored'): ZipFile | null {
  try {
    return decode(bytes, strategy);
  } catch (error) {
    if (error instanceof ZipError) {
      Logger.warn(`[ZipDecoder] ${strategy} decode failed (${error.code}): ${error.message}`);
      return null;
    }
    throw error;
  }
}

