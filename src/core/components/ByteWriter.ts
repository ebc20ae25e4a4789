// ======================================
//	ByteWriter.ts
// ======================================
// Little-endian writer for the record encoders

export class ByteWriter {
  private chunks: Buffer[] = [];
  private size: number = 0;

  get length(): number {
    return this.size;
  }

  writeUInt16(value: number): this {
    const buf = Buffer.alloc(2);
    buf.writeUInt16LE(value & 0xffff, 0);
    return this.writeBytes(buf);
  }

  writeUInt32(value: number): this {
    const buf = Buffer.alloc(4);
    buf.writeUInt32LE(value >>> 0, 0);
    return this.writeBytes(buf);
  }

  writeBytes(bytes: Uint8Array): this {
    const buf = Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    this.chunks.push(buf);
    this.size += buf.length;
    return this;
  }

  toBuffer(): Buffer {
    return Buffer.concat(this.chunks, this.size);
  }
}
