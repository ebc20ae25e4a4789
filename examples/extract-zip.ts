#!/usr/bin/env node

/**
 * Extract ZIP Example
 *
 * Extracts an archive step by step, two entries per step, reporting
 * progress between steps. Ctrl+C stops between steps.
 * Usage: extract-zip.ts [archive.zip] [output-dir]
 */

import ZipstepNode, { ProgressTracker } from '../src/node';
import * as path from 'path';

async function main() {
  const archivePath = process.argv[2] ?? path.join(__dirname, 'output', 'example.zip');
  const outputDir = process.argv[3] ?? path.join(__dirname, 'output', 'extracted');

  const zip = new ZipstepNode({ extract: { maxEntriesPerStep: 2 } });
  const archive = await zip.loadZipFile(archivePath);
  if (!archive) {
    console.error(`❌ Not a readable ZIP archive: ${archivePath}`);
    process.exit(1);
  }

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  const tracker = new ProgressTracker(path.basename(archivePath));
  tracker.update(zip.progress(archive));
  const result = await zip.extractToDirectory(archive, outputDir, {
    signal: controller.signal,
    onProgress: (progress) => tracker.update(progress),
  });
  tracker.complete();

  for (const file of result.written) {
    console.log(`  ✅ ${path.relative(outputDir, file)}`);
  }
  for (const [name, dropped] of result.dropped) {
    console.log(`  ❌ ${name}: ${dropped.message}`);
  }
}

main().catch((error: unknown) => {
  console.error('❌ Extraction failed:', error);
  process.exit(1);
});
