#!/usr/bin/env node

/**
 * Create ZIP Example
 *
 * Builds an archive from a few in-memory entries with ZipstepNode and
 * writes it to examples/output/example.zip.
 */

import ZipstepNode from '../src/node';
import type { Entry } from '../src/node';
import * as path from 'path';

/**
 * Helper function to format bytes
 */
function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB'];
  const i = Math.floor(Math.log(bytes) / Math.log(k));
  return (bytes / Math.pow(k, i)).toFixed(1) + ' ' + sizes[i];
}

async function main() {
  console.log('Creating ZIP archive example...\n');

  const entries: Entry[] = [
    { kind: 'text', name: 'readme.txt', content: 'Archives built one entry at a time.\n' },
    { kind: 'text', name: 'notes/repeated.md', content: '# Notes\n\n' + '- the same line, again\n'.repeat(200) },
    { kind: 'raw', name: 'data/ramp.bin', content: Uint8Array.from({ length: 256 }, (_, i) => i) },
  ];

  console.log('Source entries:');
  entries.forEach(entry => {
    const size = entry.kind === 'text' ? Buffer.byteLength(entry.content) : entry.content.length;
    console.log(`  - ${entry.name} (${size} bytes)`);
  });
  console.log();

  const zip = new ZipstepNode();
  const outputZip = path.join(__dirname, 'output', 'example.zip');

  // Text is deflated, binary entries are stored
  const saved = await zip.saveZip(entries, outputZip, (entry) => (entry.kind === 'text' ? 'deflate' : 'store'), {
    modified: new Date(),
  });

  console.log(`✅ ZIP archive created: ${saved.path}`);
  console.log(`   Size: ${formatBytes(saved.size)}`);
}

main().catch((error: unknown) => {
  console.error('❌ Failed to create archive:', error);
  process.exit(1);
});
