/**
 * Unit tests for the little-endian reader and writer
 */

import { ByteReader } from '../../../../src/core/components/ByteReader';
import { ByteWriter } from '../../../../src/core/components/ByteWriter';
import { ZipError } from '../../../../src/core/constants/Errors';

describe('ByteReader', () => {
  it('should read little-endian words and advance the cursor', () => {
    const reader = new ByteReader(Buffer.from([0x34, 0x12, 0x78, 0x56, 0x34, 0x12]));

    expect(reader.readUInt16()).toBe(0x1234);
    expect(reader.readUInt32()).toBe(0x12345678);
    expect(reader.position).toBe(6);
    expect(reader.remaining).toBe(0);
  });

  it('should peek without moving the cursor', () => {
    const reader = new ByteReader(Buffer.from([1, 0, 0, 0]));

    expect(reader.peekUInt32()).toBe(1);
    expect(reader.position).toBe(0);
  });

  it('should fail with TRUNCATED_BUFFER and leave the cursor alone', () => {
    const reader = new ByteReader(Buffer.from([1, 2, 3]));

    let caught: unknown;
    try {
      reader.readUInt32();
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ZipError);
    if (caught instanceof ZipError) {
      expect(caught.code).toBe('TRUNCATED_BUFFER');
      expect(caught.message).toBe('Buffer exhausted: needed 4 bytes, 3 remaining');
      expect(caught.offset).toBe(0);
    }
    expect(reader.position).toBe(0);
  });

  it('should report absolute offsets using the base', () => {
    const data = Buffer.alloc(4);
    data.writeUInt32LE(0xdeadbeef, 0);
    const reader = new ByteReader(data, 0, 100);

    expect(() => reader.expectSignature(0x04034b50)).toThrow(
      expect.objectContaining({
        code: 'MALFORMED_SIGNATURE',
        message: 'Unexpected record signature 0xdeadbeef',
        offset: 100,
      })
    );
    expect(reader.position).toBe(0);
  });

  it('should consume a matching signature', () => {
    const data = Buffer.alloc(6);
    data.writeUInt32LE(0x06054b50, 0);
    const reader = new ByteReader(data);

    reader.expectSignature(0x06054b50);
    expect(reader.position).toBe(4);
  });

  it('should read UTF-8 strings', () => {
    const reader = new ByteReader(Buffer.from('añb', 'utf8'));
    expect(reader.readString(4)).toBe('añb');
  });

  it('should reject seeking past the end', () => {
    const reader = new ByteReader(Buffer.alloc(2));
    expect(() => reader.seek(3)).toThrow(expect.objectContaining({ code: 'TRUNCATED_BUFFER' }));
    reader.seek(2);
    expect(reader.remaining).toBe(0);
  });
});

describe('ByteWriter', () => {
  it('should write little-endian words and raw bytes in order', () => {
    const writer = new ByteWriter()
      .writeUInt16(0x1234)
      .writeUInt32(0xdeadbeef)
      .writeBytes(Uint8Array.of(1, 2));

    expect(writer.length).toBe(8);
    expect(writer.toBuffer()).toEqual(Buffer.from([0x34, 0x12, 0xef, 0xbe, 0xad, 0xde, 1, 2]));
  });

  it('should write negative numbers as their unsigned 32-bit form', () => {
    expect(new ByteWriter().writeUInt32(-1).toBuffer()).toEqual(Buffer.from([0xff, 0xff, 0xff, 0xff]));
  });
});
