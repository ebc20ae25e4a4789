// ======================================
//	Headers.ts
// ======================================
// Zip File Format Constants

// Local file header
export const LOCAL_HDR = {
  SIZE:       30,     // LOC header size in bytes
  SIGNATURE:  0x04034b50,  // "PK\003\004"
};

// Data descriptor
export const DATA_DESC = {
  SIGNATURE:  0x08074b50,  // "PK\007\008"
  SIZE:       16,     // with signature
  UNSIGNED_SIZE: 12,  // without signature
  CMP_SIZE:   8,      // compressed size (offset)
};

// The central directory file header
export const CENTRAL_DIR = {
  SIGNATURE:  0x02014b50,  // "PK\001\002"
};

// End of central directory record
export const CENTRAL_END = {
  SIZE:       22,         // END header size (empty comment)
  SIGNATURE:  0x06054b50, // "PK\005\006"
};

// Compression methods
export const CMP_METHOD = {
  STORED:           0,  // no compression
  SHRUNK:           1,  // shrunk
  REDUCED1:         2,  // reduced with compression factor 1
  REDUCED2:         3,  // reduced with compression factor 2
  REDUCED3:         4,  // reduced with compression factor 3
  REDUCED4:         5,  // reduced with compression factor 4
  IMPLODED:         6,  // imploded
  DEFLATED:         8,  // deflated
  ENHANCED_DEFLATE: 9,  // enhanced deflated
  BZIP2:            12, // compressed using BZIP2
  LZMA:             14, // LZMA
  ZSTD:             93, // Zstandard compression
} as const;

// General purpose bit flag
export const GP_FLAG = {
  COMPRESSION1:   2,    // Bit 1, compression option
  COMPRESSION2:   4,    // Bit 2, compression option
  DATA_DESC:      8,    // Bit 3, sizes and crc follow the data
  EFS:            2048, // Bit 11: Language encoding flag (EFS)
} as const;

// Version numbers written by the encoder
export const VERSION = {
  EXTRACT: 20,          // 2.0: deflate
  MADE_BY: 20,
} as const;

// File System
export const FILE_SYSTEM = {
  MSDOS:           0,   // MS-DOS and OS/2 (FAT / VFAT / FAT32 file systems)
  AMIGA:           1,   // Amiga
  OPENVMS:         2,   // OpenVMS
  UNIX:            3,   // UNIX
  VM_CMS:          4,   // VM/CMS
  ATARI:           5,   // Atari ST
  OS2:             6,   // OS/2 H.P.F.S.
  MAC:             7,   // Macintosh
  CP_M:            9,   // CP/M
  NTFS:            10,  // Windows NTFS
  MVS:             11,  // MVS (OS/390 - Z/OS)
  VSE:             12,  // VSE
  ACORN:           13,  // Acorn Risc
  VFAT:            14,  // VFAT
  ALTMVS:          15,  // Alternate MVS
  BEOS:            16,  // BeOS
  TANDEM:          17,  // Tandem
  OS400:           18,  // OS/400
  DARWIN:          19   // Apple OS/X (Darwin)
};

// DOS File Attributes
export const DOS_FILE_ATTR = {
  READONLY:        0x01,
  HIDDEN:          0x02,
  SYSTEM:          0x04,
  DIRECTORY:       0x10,
  ARCHIVE:         0x20
};

// Unix mode for a regular rw-r--r-- file, stored in the high word of the external attributes
export const UNIX_FILE_MODE = 0o100644;

// ============================================================================
// Type Definitions for ZIP Structures
// ============================================================================

/**
 * Local file header, as stored in front of each entry's payload.
 * Name and extra-field lengths are implied by `fileName` and `extraField`.
 */
export interface LocalFileHeader {
  versionNeeded: number;    // 2 bytes: version needed to extract
  flags: number;            // 2 bytes: general purpose bit flag
  compressionMethod: number; // 2 bytes: compression method
  lastModTime: number;      // 2 bytes: modification time (DOS format)
  lastModDate: number;      // 2 bytes: modification date (DOS format)
  crc32: number;            // 4 bytes: uncompressed file CRC-32 value
  compressedSize: number;   // 4 bytes: compressed size
  uncompressedSize: number; // 4 bytes: uncompressed size
  fileName: string;
  extraField: Buffer;
}

/**
 * Trailing record written when general purpose bit 3 is set.
 */
export interface DataDescriptor {
  signed: boolean;          // whether the optional "PK\007\008" word was present
  crc32: number;
  compressedSize: number;
  uncompressedSize: number;
}

/**
 * Central directory entry
 */
export interface CentralDirectoryHeader extends LocalFileHeader {
  versionMadeBy: number;    // 2 bytes: version made by
  fileComment: string;
  diskNumberStart: number;  // 2 bytes: volume number start
  internalAttributes: number; // 2 bytes: internal file attributes
  externalAttributes: number; // 4 bytes: external file attributes (host system dependent)
  relativeOffset: number;   // 4 bytes: offset of local file header
}

/**
 * End of central directory record
 */
export interface EndOfCentralDirectory {
  diskNumber: number;       // 2 bytes: number of this disk
  centralDirectoryDisk: number; // 2 bytes: number of the disk with start of central directory
  diskEntries: number;      // 2 bytes: number of entries on this disk
  totalEntries: number;     // 2 bytes: total number of entries
  size: number;             // 4 bytes: central directory size in bytes
  offset: number;           // 4 bytes: offset of first central directory entry
  comment: string;
}
