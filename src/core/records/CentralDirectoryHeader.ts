// ======================================
//	CentralDirectoryHeader.ts
// ======================================
// Central directory file header codec

import { ByteReader } from '../components/ByteReader';
import { ByteWriter } from '../components/ByteWriter';
import Errors from '../constants/Errors';
import { CENTRAL_DIR, CentralDirectoryHeader } from '../constants/Headers';

/**
 * Decodes one central directory header at the reader's cursor.
 * Same two-phase layout as the local header: the fixed 42-byte body carries
 * the name, extra and comment lengths, which are then read in that order.
 * @throws ZipError MALFORMED_SIGNATURE or TRUNCATED_BUFFER
 */
export function readCentralDirectoryHeader(reader: ByteReader): CentralDirectoryHeader {
  reader.expectSignature(CENTRAL_DIR.SIGNATURE, Errors.INVALID_CEN);

  const versionMadeBy = reader.readUInt16();
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
  const fileCommentLength = reader.readUInt16();
  const diskNumberStart = reader.readUInt16();
  const internalAttributes = reader.readUInt16();
  const externalAttributes = reader.readUInt32();
  const relativeOffset = reader.readUInt32();

  const fileName = reader.readString(fileNameLength);
  const extraField = reader.readBytes(extraFieldLength);
  const fileComment = reader.readString(fileCommentLength);

  return {
    versionMadeBy,
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
    fileComment,
    diskNumberStart,
    internalAttributes,
    externalAttributes,
    relativeOffset,
  };
}

/**
 * Creates a central directory entry
 */
export function writeCentralDirectoryHeader(header: CentralDirectoryHeader): Buffer {
  const fileName = Buffer.from(header.fileName, 'utf8');
  const fileComment = Buffer.from(header.fileComment, 'utf8');

  return new ByteWriter()
    .writeUInt32(CENTRAL_DIR.SIGNATURE)
    .writeUInt16(header.versionMadeBy)
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
    .writeUInt16(fileComment.length)
    .writeUInt16(header.diskNumberStart)
    .writeUInt16(header.internalAttributes)
    .writeUInt32(header.externalAttributes)
    .writeUInt32(header.relativeOffset)
    .writeBytes(fileName)
    .writeBytes(header.extraField)
    .writeBytes(fileComment)
    .toBuffer();
}
