// ======================================
//	ByteReader.ts
// ======================================
// Little-endian cursor over an in-memory buffer

import { format } from 'util';
import Errors, { ZipError } from '../constants/Errors';

/**
 * Sequential reader used by every record decoder.
 * Each read checks the remaining length before touching the buffer and
 * advances the cursor only when it succeeds.
 */
export class ByteReader {
  private cursor: number;

  /**
   * @param data - Buffer to read from
   * @param start - Initial cursor position
   * @param base - Offset of `data` within the whole archive, used in error reports
   */
  constructor(private readonly data: Buffer, start: number = 0, private readonly base: number = 0) {
    this.cursor = start;
  }

  get position(): number {
    return this.cursor;
  }

  /** Position of the cursor relative to the start of the archive */
  get absolutePosition(): number {
    return this.base + this.cursor;
  }

  get remaining(): number {
    return Math.max(this.data.length - this.cursor, 0);
  }

  get length(): number {
    return this.data.length;
  }

  seek(position: number): void {
    if (position < 0 || position > this.data.length) {
      throw new ZipError('TRUNCATED_BUFFER', format(Errors.TRUNCATED, position, this.data.length), {
        offset: this.base + position
      });
    }
    this.cursor = position;
  }

  private ensure(count: number): void {
    if (count > this.remaining) {
      throw new ZipError('TRUNCATED_BUFFER', format(Errors.TRUNCATED, count, this.remaining), {
        offset: this.absolutePosition
      });
    }
  }

  readUInt16(): number {
    this.ensure(2);
    const value = this.data.readUInt16LE(this.cursor);
    this.cursor += 2;
    return value;
  }

  readUInt32(): number {
    this.ensure(4);
    const value = this.data.readUInt32LE(this.cursor);
    this.cursor += 4;
    return value;
  }

  /** Read a 32-bit word without moving the cursor */
  peekUInt32(): number {
    this.ensure(4);
    return this.data.readUInt32LE(this.cursor);
  }

  readBytes(count: number): Buffer {
    this.ensure(count);
    const bytes = this.data.subarray(this.cursor, this.cursor + count);
    this.cursor += count;
    return bytes;
  }

  readString(count: number): string {
    return this.readBytes(count).toString('utf8');
  }

  /**
   * Magic signature guard
   * @throws ZipError MALFORMED_SIGNATURE when the next word is not `signature`
   */
  expectSignature(signature: number, message: string = Errors.INVALID_SIGNATURE): void {
    const at = this.absolutePosition;
    const word = this.readUInt32();
    if (word !== signature) {
      this.cursor -= 4;
      throw new ZipError('MALFORMED_SIGNATURE', format(message, word.toString(16).padStart(8, '0')), {
        offset: at
      });
    }
  }
}
