// ======================================
//	DataDescriptor.ts
// ======================================
// Data descriptor codec (general purpose bit 3)

import { ByteReader } from '../components/ByteReader';
import { ByteWriter } from '../components/ByteWriter';
import { DATA_DESC, DataDescriptor } from '../constants/Headers';

/**
 * Decodes a data descriptor at the reader's cursor.
 *
 * The leading signature is optional, so the first word is either the
 * signature or already the CRC-32. It is told apart by value: when it equals
 * 0x08074b50 three words follow, otherwise two.
 */
export function readDataDescriptor(reader: ByteReader): DataDescriptor {
  const first = reader.readUInt32();

  if (first === DATA_DESC.SIGNATURE) {
    const crc32 = reader.readUInt32();
    const compressedSize = reader.readUInt32();
    const uncompressedSize = reader.readUInt32();
    return { signed: true, crc32, compressedSize, uncompressedSize };
  }

  const compressedSize = reader.readUInt32();
  const uncompressedSize = reader.readUInt32();
  return { signed: false, crc32: first, compressedSize, uncompressedSize };
}

export function writeDataDescriptor(descriptor: DataDescriptor): Buffer {
  const writer = new ByteWriter();
  if (descriptor.signed) {
    writer.writeUInt32(DATA_DESC.SIGNATURE);
  }
  return writer
    .writeUInt32(descriptor.crc32)
    .writeUInt32(descriptor.compressedSize)
    .writeUInt32(descriptor.uncompressedSize)
    .toBuffer();
}

export function dataDescriptorLength(descriptor: Pick<DataDescriptor, 'signed'>): number {
  return descriptor.signed ? DATA_DESC.SIZE : DATA_DESC.UNSIGNED_SIZE;
}
