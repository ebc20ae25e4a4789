// ======================================
//	LocalFileHeader.ts
// ======================================
// Local file header codec

import { ByteReader } from '../components/ByteReader';
import { ByteWriter } from '../components/ByteWriter';
import Errors from '../constants/Errors';
import { LOCAL_HDR, LocalFileHeader } from '../constants/Headers';

/**
 * Decodes a local file header at the reader's cursor.
 * The two length fields at the end of the fixed body gate the variable reads,
 * so the field order below follows the on-disk order exactly.
 * @throws ZipError MALFORMED_SIGNATURE or TRUNCATED_BUFFER
 */
export function readLocalFileHeader(reader: ByteReader): LocalFileHeader {
  reader.expectSignature(LOCAL_HDR.SIGNATURE, Errors.INVALID_LOC);

  const versionNeeded = reader.readUInt16();
  const flags = reader.readUInt16();
  const compressionMethod = reader.readUInt16();
  const lastModTime = reader.readUInt16();
  const lastModDate = reader.readUInt16();
  const crc32 = reader.readUInt32();
  const compressedSize = reader.readUInt32();
  const uncompressedSize = reader.readUInt32();
  const fileNameLength = reader.readUInt16();
  const extraFieldLength = reader.readUInt16();

  const fileName = reader.readString(fileNameLength);
  const extraField = reader.readBytes(extraFieldLength);

  return {
    versionNeeded,
    flags,
    compressionMethod,
    lastModTime,
    lastModDate,
    crc32,
    compressedSize,
    uncompressedSize,
    fileName,
    extraField,
  };
}

/**
 * Creates the local header bytes for an entry
 */
export function writeLocalFileHeader(header: LocalFileHeader): Buffer {
  const fileName = Buffer.from(header.fileName, 'utf8');

  return new ByteWriter()
    .writeUInt32(LOCAL_HDR.SIGNATURE)
    .writeUInt16(header.versionNeeded)
    .writeUInt16(header.flags)
    .writeUInt16(header.compressionMethod)
    .writeUInt16(header.lastModTime)
    .writeUInt16(header.lastModDate)
    .writeUInt32(header.crc32)
    .writeUInt32(header.compressedSize)
    .writeUInt32(header.uncompressedSize)
    .writeUInt16(fileName.length)
    .writeUInt16(header.extraField.length)
    .writeBytes(fileName)
    .writeBytes(header.extraField)
    .toBuffer();
}

/** Encoded size of a local header, without writing it */
export function localFileHeaderLength(header: Pick<LocalFileHeader, 'fileName' | 'extraField'>): number {
  return LOCAL_HDR.SIZE + Buffer.byteLength(header.fileName, 'utf8') + header.extraField.length;
}
