#!/usr/bin/env node

/**
 * List ZIP Example
 *
 * Prints the central directory of an archive using overview().
 * Usage: list-zip.ts [archive.zip]
 */

import ZipstepNode from '../src/node';
import * as fs from 'fs';
import * as path from 'path';

/**
 * Helper function to pad string to the right
 */
function padRight(str: string, length: number): string {
  return (str + ' '.repeat(length)).slice(0, length);
}

/**
 * Helper function to pad string to the left
 */
function padLeft(str: string, length: number): string {
  return (' '.repeat(length) + str).slice(-length);
}

async function main() {
  const archivePath = process.argv[2] ?? path.join(__dirname, 'output', 'example.zip');

  if (!fs.existsSync(archivePath)) {
    console.error(`❌ ZIP file not found: ${archivePath}`);
    console.error('💡 Tip: Run create-zip.ts first to create a test ZIP file.');
    process.exit(1);
  }

  // The sequential reader also accepts archives with a trailing comment
  const zip = new ZipstepNode({ strategy: 'sequential' });
  const archive = await zip.loadZipFile(archivePath);
  if (!archive) {
    console.error(`❌ Not a readable ZIP archive: ${archivePath}`);
    process.exit(1);
  }

  const info = zip.overview(archive);
  console.log(`Archive: ${archivePath}`);
  console.log(`Total entries: ${info.totalEntries}\n`);

  console.log('─'.repeat(80));
  console.log(
    padRight('Filename', 30) +
    padLeft('Original', 10) +
    padLeft('Compressed', 12) +
    padLeft('Ratio', 8) +
    '   ' +
    padRight('Method', 10) +
    padRight('CRC-32', 10)
  );
  console.log('─'.repeat(80));

  for (const entry of info.entries) {
    console.log(
      padRight(entry.name, 30) +
      padLeft(String(entry.uncompressedSize), 10) +
      padLeft(String(entry.compressedSize), 12) +
      padLeft(`${entry.ratio}%`, 8) +
      '   ' +
      padRight(entry.method, 10) +
      padRight(entry.crc32, 10)
    );
  }

  console.log('─'.repeat(80));
  console.log(
    padRight(`${info.entries.length} file(s)`, 30) +
    padLeft(String(info.totalUncompressed), 10) +
    padLeft(String(info.totalCompressed), 12)
  );
  if (info.comment) {
    console.log(`\nComment: ${info.comment}`);
  }
}

main().catch((error: unknown) => {
  console.error('❌ Failed to list archive:', error);
  process.exit(1);
});
