// ======================================
//	ZipCodec.ts - Byte transform service
// ======================================
//
// Raw DEFLATE via pako and a table-driven CRC-32. The encoder, the decoders
// and the extraction engine only ever see the ZipCodec interface, so tests
// can substitute a codec that fails on purpose.
//

import * as pako from 'pako';
import { Logger } from './components/Logger';
import Errors, { ZipError, describeError } from './constants/Errors';

export interface ZipCodec {
  /** Raw deflate (no zlib header) */
  deflate(data: Buffer): Buffer;
  /**
   * Raw inflate
   * @throws ZipError DECOMPRESSION_FAILED on a corrupt or truncated stream
   */
  inflate(data: Buffer): Buffer;
  crc32(data: Uint8Array): number;
}

export interface PakoCodecOptions {
  level?: 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;
}

/**
 * CRC32 lookup table (shared for all CRC32 operations)
 */
const CRC_TABLE: Uint32Array = (() => {
  const table = new Uint32Array(256);
  for (let n = 0; n < 256; n++) {
    let c = n;
    for (let k = 0; k < 8; k++) {
      c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
    }
    table[n] = c >>> 0;
  }
  return table;
})();

/**
 * CRC32 calculation for a full buffer
 * @returns CRC32 checksum as unsigned 32-bit integer
 */
export function crc32(buf: Uint8Array | string): number {
  const bytes = typeof buf === 'string' ? Buffer.from(buf, 'utf8') : buf;

  let crc = ~0;
  for (let off = 0; off < bytes.length; off++) {
    crc = CRC_TABLE[(crc ^ bytes[off]) & 0xff] ^ (crc >>> 8);
  }

  // Finalize: xor with ~0 and cast as uint32
  return ~crc >>> 0;
}

function toBuffer(result: Uint8Array): Buffer {
  return Buffer.from(result.buffer, result.byteOffset, result.byteLength);
}

/**
 * Default codec backed by pako
 */
export class PakoCodec implements ZipCodec {
  // Class-level logging control - set to true to enable logging
  static loggingEnabled: boolean = false;

  private readonly level: NonNullable<PakoCodecOptions['level']>;

  constructor(options: PakoCodecOptions = {}) {
    this.level = options.level ?? 6;
  }

  private log(...args: unknown[]): void {
    if (PakoCodec.loggingEnabled) {
      Logger.debug(`[PakoCodec]`, ...args);
    }
  }

  deflate(data: Buffer): Buffer {
    const result = pako.deflateRaw(data, { level: this.level });
    const ratio = data.length > 0 ? Math.round((result.length / data.length) * 100) : 0;
    this.log(`Deflate compression complete: ${result.length} bytes from ${data.length} bytes (ratio=${ratio}%)`);
    return toBuffer(result);
  }

  inflate(data: Buffer): Buffer {
    let result: Uint8Array | undefined;
    try {
      result = pako.inflateRaw(data);
    } catch (error) {
      throw new ZipError('DECOMPRESSION_FAILED', `${Errors.DECOMPRESSION_ERROR}: ${describeError(error)}`, { cause: error });
    }
    // pako yields no result when the input ends before the final block
    if (result === undefined) {
      throw new ZipError('DECOMPRESSION_FAILED', `${Errors.DECOMPRESSION_ERROR}: unexpected end of stream`);
    }
    this.log(`inflate() produced ${result.length} bytes from ${data.length}`);
    return toBuffer(result);
  }

  crc32(data: Uint8Array): number {
    return crc32(data);
  }
}

export const defaultCodec: ZipCodec = new PakoCodec();
