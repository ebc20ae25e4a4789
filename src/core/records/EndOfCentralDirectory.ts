// ======================================
//	EndOfCentralDirectory.ts
// ======================================
// End of central directory record codec

import { ByteReader } from '../components/ByteReader';
import { ByteWriter } from '../components/ByteWriter';
import Errors from '../constants/Errors';
import { CENTRAL_END, EndOfCentralDirectory } from '../constants/Headers';

/**
 * Decodes the end record: 18 fixed bytes after the signature, the last
 * of which is the length of the trailing archive comment.
 * @throws ZipError MALFORMED_SIGNATURE or TRUNCATED_BUFFER
 */
export function readEndOfCentralDirectory(reader: ByteReader): EndOfCentralDirectory {
  reader.expectSignature(CENTRAL_END.SIGNATURE, Errors.INVALID_END);

  const diskNumber = reader.readUInt16();
  const centralDirectoryDisk = reader.readUInt16();
  const diskEntries = reader.readUInt16();
  const totalEntries = reader.readUInt16();
  const size = reader.readUInt32();
  const offset = reader.readUInt32();
  const commentLength = reader.readUInt16();
  const comment = reader.readString(commentLength);

  return { diskNumber, centralDirectoryDisk, diskEntries, totalEntries, size, offset, comment };
}

export function writeEndOfCentralDirectory(end: EndOfCentralDirectory): Buffer {
  const comment = Buffer.from(end.comment, 'utf8');

  return new ByteWriter()
    .writeUInt32(CENTRAL_END.SIGNATURE)
    .writeUInt16(end.diskNumber)              // Number of this disk
    .writeUInt16(end.centralDirectoryDisk)    // Disk with the start of the central directory
    .writeUInt16(end.diskEntries)             // Entries on this disk
    .writeUInt16(end.totalEntries)            // Total number of entries
    .writeUInt32(end.size)                    // Size of central directory
    .writeUInt32(end.offset)                  // Offset of start of central directory
    .writeUInt16(comment.length)
    .writeBytes(comment)
    .toBuffer();
}
