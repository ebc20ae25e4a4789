// ======================================
//	ZipstepNode.ts - Node.js file-based ZIP operations
// ======================================

import * as fs from 'fs';
import * as path from 'path';
import { format } from 'util';
import Zipstep, { ZipstepConfig } from '../core/Zipstep';
import Errors, { ZipError } from '../core/constants/Errors';
import { Logger } from '../core/components/Logger';
import {
  BuildOptions,
  CompressionPolicy,
  Entry,
  ExtractionContent,
  ExtractionDone,
  ExtractionProgress,
  ZipFile,
} from '../types';

/**
 * Result of writing an archive to disk
 */
export interface SavedZip {
  path: string;
  fileName: string;
  mimeType: 'application/zip';
  size: number;
}

export interface ExtractAllOptions {
  /** Called after every step with the current counts, the last time with the final ones */
  onProgress?: (progress: ExtractionProgress) => void;
  /** Stops the loop between steps; the promise rejects with the signal's reason */
  signal?: AbortSignal;
}

export interface ExtractToDirectoryResult {
  /** Absolute paths of the files written, in central directory order */
  written: string[];
  dropped: ExtractionDone['dropped'];
}

const nextTick = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

/**
 * ZipstepNode - Zipstep with file I/O and an event-loop-friendly extraction loop
 *
 * @example
 * ```typescript
 * const zip = new ZipstepNode();
 * const archive = await zip.loadZipFile('archive.zip');
 * if (archive) await zip.extractToDirectory(archive, './output');
 * ```
 */
export default class ZipstepNode extends Zipstep {
  constructor(config?: ZipstepConfig) {
    super(config);
  }

  // ============================================================================
  // File Loading Methods
  // ============================================================================

  /**
   * Reads and decodes an archive file
   * @returns The decoded archive, or null when the file is not a valid archive
   */
  async loadZipFile(filePath: string): Promise<ZipFile | null> {
    const data = await fs.promises.readFile(filePath);
    Logger.debug(`[ZipstepNode] loaded ${filePath} (${data.length} bytes)`);
    return this.read(data);
  }

  /**
   * Builds an archive and writes it to `filePath`, creating parent directories
   */
  async saveZip(
    entries: Entry[],
    filePath: string,
    policy?: CompressionPolicy,
    options?: BuildOptions
  ): Promise<SavedZip> {
    const data = this.build(entries, policy, options);
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    await fs.promises.writeFile(filePath, data);
    Logger.debug(`[ZipstepNode] wrote ${entries.length} entries to ${filePath}`);
    return {
      path: filePath,
      fileName: path.basename(filePath),
      mimeType: 'application/zip',
      size: data.length,
    };
  }

  // ============================================================================
  // Extraction Methods
  // ============================================================================

  /**
   * Runs extraction steps until done, yielding to the event loop between steps
   */
  async extractAll(zip: ZipFile, options: ExtractAllOptions = {}): Promise<ExtractionDone> {
    options.signal?.throwIfAborted();
    let step = this.extract(zip);
    while (step.kind === 'loop') {
      options.onProgress?.(this.progress(step.zip));
      await nextTick();
      options.signal?.throwIfAborted();
      step = this.extract(step.zip);
    }
    options.onProgress?.({
      uncompressedCount: step.entries.length,
      possiblyCompressedCount: 0,
      droppedCount: step.dropped.length,
      total: step.entries.length + step.dropped.length,
    });
    return step;
  }

  /**
   * Extracts every entry below `outputDir`. Directory entries (names ending
   * in '/') become directories; text is written as UTF-8.
   * @throws ZipError when an entry name resolves outside `outputDir`
   */
  async extractToDirectory(
    zip: ZipFile,
    outputDir: string,
    options: ExtractAllOptions = {}
  ): Promise<ExtractToDirectoryResult> {
    const root = path.resolve(outputDir);
    // Check every name before anything is written
    const targets = zip.centrals.map((central) => resolveEntryPath(root, central.fileName));

    const done = await this.extractAll(zip, options);
    await fs.promises.mkdir(root, { recursive: true });

    const written: string[] = [];
    for (const [name, content] of done.entries) {
      const target = resolveEntryPath(root, name);
      if (name.endsWith('/')) {
        await fs.promises.mkdir(target, { recursive: true });
        continue;
      }
      await fs.promises.mkdir(path.dirname(target), { recursive: true });
      await fs.promises.writeFile(target, contentBytes(content));
      written.push(target);
    }

    Logger.debug(`[ZipstepNode] extracted ${written.length} of ${targets.length} entries to ${root}`);
    return { written, dropped: done.dropped };
  }
}

function contentBytes(content: ExtractionContent): Buffer {
  return content.kind === 'text' ? Buffer.from(content.text, 'utf8') : content.data;
}

/**
 * Resolves an entry name against `root`
 * @throws ZipError when the result is not inside `root`
 */
export function resolveEntryPath(root: string, name: string): string {
  const target = path.resolve(root, name);
  const relative = path.relative(root, target);
  if (relative === '' || relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    throw new ZipError('UNSAFE_PATH', format(Errors.UNSAFE_PATH, name), { entryName: name });
  }
  return target;
}

export { ZipstepNode };
