// ======================================
//	Zipstep.ts - Archive codec facade
// ======================================

import { Logger } from './components/Logger';
import { ZipCodec, defaultCodec } from './ZipCodec';
import { ZipEncoder } from './ZipEncoder';
import { decode, read } from './ZipDecoder';
import { ZipExtractor, overview, progress, resolveExtractConfig } from './ZipExtractor';
import {
  ArchiveOverview,
  BuildOptions,
  CompressionPolicy,
  DecodeStrategy,
  Entry,
  ExtractConfig,
  ExtractionDone,
  ExtractionProgress,
  ExtractionStep,
  ZipFile,
  ZIPSTEP_INFO,
} from '../types';

/**
 * Configuration options for Zipstep instances
 *
 * @example
 * const zip = new Zipstep({
 *   strategy: 'sequential',
 *   extract: { maxEntriesPerStep: 4, maxBytesPerStep: 1024 * 1024 },
 *   debug: true
 * });
 */
export interface ZipstepConfig {
  /** Sets the Logger level to 'debug' */
  debug?: boolean;
  /** Decoder used by read() and decode() (default: 'anchored') */
  strategy?: DecodeStrategy;
  /** Overrides for the extraction quotas and classifier */
  extract?: Partial<ExtractConfig>;
  codec?: ZipCodec;
}

/**
 * Zipstep - in-memory ZIP encoding, decoding and step-wise extraction
 */
export default class Zipstep {
  static readonly version = ZIPSTEP_INFO.version;
  static readonly releaseDate = ZIPSTEP_INFO.releaseDate;

  protected readonly strategy: DecodeStrategy;
  protected readonly extractConfig: ExtractConfig;
  protected readonly codec: ZipCodec;

  // Private components (lazy-loaded)
  private _encoder: ZipEncoder | null = null;
  private _extractor: ZipExtractor | null = null;

  constructor(config: ZipstepConfig = {}) {
    this.strategy = config.strategy ?? 'anchored';
    this.extractConfig = resolveExtractConfig(config.extract);
    this.codec = config.codec ?? defaultCodec;

    if (config.debug) {
      Logger.setLevel('debug');
    }
  }

  private getEncoder(): ZipEncoder {
    if (!this._encoder) {
      this._encoder = new ZipEncoder(this.codec);
    }
    return this._encoder;
  }

  private getExtractor(): ZipExtractor {
    if (!this._extractor) {
      this._extractor = new ZipExtractor(this.codec);
    }
    return this._extractor;
  }

  /**
   * Effective extraction settings
   */
  getExtractConfig(): ExtractConfig {
    return { ...this.extractConfig };
  }

  /**
   * Builds an archive from entries
   * @param policy - 'store', 'deflate' or a per-entry decision (default: 'deflate')
   */
  build(entries: Entry[], policy: CompressionPolicy = 'deflate', options: BuildOptions = {}): Buffer {
    return this.getEncoder().build(entries, policy, options);
  }

  /**
   * Decodes an archive, returning null when it is malformed
   */
  read(bytes: Uint8Array): ZipFile | null {
    return read(bytes, this.strategy);
  }

  /**
   * Decodes an archive
   * @throws ZipError when it is malformed
   */
  decode(bytes: Uint8Array): ZipFile {
    return decode(bytes, this.strategy);
  }

  /**
   * One bounded extraction step
   */
  extract(zip: ZipFile): ExtractionStep {
    return this.getExtractor().extract(this.extractConfig, zip);
  }

  /**
   * Runs extraction steps back to back until done
   */
  extractSync(zip: ZipFile): ExtractionDone {
    return this.getExtractor().extractAll(this.extractConfig, zip);
  }

  progress(zip: ZipFile): ExtractionProgress {
    return progress(zip);
  }

  overview(zip: ZipFile): ArchiveOverview {
    return overview(zip);
  }
}

export { Zipstep };
