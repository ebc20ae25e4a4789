/**
 * Unit tests for step-wise extraction
 */

import {
  DEFAULT_EXTRACT_CONFIG,
  ZipExtractor,
  compressionMethodToString,
  dosAttributesToString,
  extract,
  fileSystemToString,
  isTextFile,
  overview,
  progress,
  resolveExtractConfig,
} from '../../../src/core/ZipExtractor';
import { ZipEncoder } from '../../../src/core/ZipEncoder';
import { decode } from '../../../src/core/ZipDecoder';
import { ZipCodec, crc32, defaultCodec } from '../../../src/core/ZipCodec';
import { CMP_METHOD } from '../../../src/core/constants/Headers';
import { Logger } from '../../../src/core/components/Logger';
import {
  CompressedEntry,
  CompressionPolicy,
  Entry,
  ExtractConfig,
  ExtractionDone,
  ZipFile,
} from '../../../src/types';

class CountingCodec implements ZipCodec {
  inflations = 0;

  deflate(data: Buffer): Buffer {
    return defaultCodec.deflate(data);
  }

  inflate(data: Buffer): Buffer {
    this.inflations++;
    return defaultCodec.inflate(data);
  }

  crc32(data: Uint8Array): number {
    return defaultCodec.crc32(data);
  }
}

const encoder = new ZipEncoder();

function zipOf(entries: Entry[], policy: CompressionPolicy = 'deflate'): ZipFile {
  return decode(encoder.build(entries, policy));
}

function repetitive(name: string, seed: string): Entry {
  return { kind: 'text', name, content: `${seed} `.repeat(60) };
}

function withEntry(zip: ZipFile, name: string, change: (entry: CompressedEntry) => CompressedEntry): ZipFile {
  const possiblyCompressed = new Map(zip.possiblyCompressed);
  const entry = possiblyCompressed.get(name);
  if (!entry) throw new Error(`no entry named ${name}`);
  possiblyCompressed.set(name, change(entry));
  return { ...zip, possiblyCompressed };
}

const corrupt = (entry: CompressedEntry): CompressedEntry => ({
  header: { ...entry.header, compressionMethod: CMP_METHOD.DEFLATED, compressedSize: 3 },
  compressedContent: Buffer.from([0xff, 0xff, 0xff]),
  attempts: 0,
});

/** Runs steps until done, recording the ZipFile after every loop step */
function drive(extractor: ZipExtractor, config: ExtractConfig, zip: ZipFile): { done: ExtractionDone; loops: ZipFile[] } {
  const loops: ZipFile[] = [];
  let step = extractor.extract(config, zip);
  while (step.kind === 'loop') {
    loops.push(step.zip);
    step = extractor.extract(config, step.zip);
  }
  return { done: step, loops };
}

describe('ZipExtractor', () => {
  const level = Logger.getConfig().level;

  beforeAll(() => {
    Logger.setLevel('silent');
  });

  afterAll(() => {
    Logger.setLevel(level);
  });

  describe('quotas', () => {
    const entries = ['a', 'b', 'c', 'd', 'e'].map((seed) => repetitive(`${seed}.txt`, seed));

    it('should inflate at most maxEntriesPerStep entries per call', () => {
      const codec = new CountingCodec();
      const extractor = new ZipExtractor(codec);
      const config = resolveExtractConfig({ maxEntriesPerStep: 2 });

      let zip = zipOf(entries);
      const perStep: number[] = [];
      let step = extractor.extract(config, zip);
      perStep.push(codec.inflations);
      while (step.kind === 'loop') {
        zip = step.zip;
        const before = codec.inflations;
        step = extractor.extract(config, zip);
        perStep.push(codec.inflations - before);
      }

      expect(perStep).toEqual([2, 2, 1]);
      expect(step.entries.map(([name]) => name)).toEqual(['a.txt', 'b.txt', 'c.txt', 'd.txt', 'e.txt']);
      expect(step.entries[0][1]).toEqual({ kind: 'text', text: 'a '.repeat(60) });
    });

    it('should move stored entries without using the quota', () => {
      const zip = zipOf([
        { kind: 'raw', name: 's1.bin', content: Uint8Array.of(1, 2, 3) },
        repetitive('d1.txt', 'one'),
        repetitive('d2.txt', 'two'),
        { kind: 'text', name: 's2.txt', content: 'stored' },
      ], (entry) => (entry.name.startsWith('s') ? 'store' : 'deflate'));
      const config = resolveExtractConfig({ maxEntriesPerStep: 1 });

      const first = extract(config, zip);

      expect(first.kind).toBe('loop');
      if (first.kind === 'loop') {
        expect([...first.zip.uncompressed.keys()]).toEqual(['s1.bin', 'd1.txt', 's2.txt']);
        expect([...first.zip.possiblyCompressed.keys()]).toEqual(['d2.txt']);

        const second = extract(config, first.zip);
        expect(second.kind).toBe('done');
        if (second.kind === 'done') {
          expect(second.entries).toEqual([
            ['s1.bin', { kind: 'binary', data: Buffer.from([1, 2, 3]) }],
            ['d1.txt', { kind: 'text', text: 'one '.repeat(60) }],
            ['d2.txt', { kind: 'text', text: 'two '.repeat(60) }],
            ['s2.txt', { kind: 'text', text: 'stored' }],
          ]);
          expect(second.dropped).toEqual([]);
        }
      }
    });

    it('should respect the byte budget', () => {
      const zip = zipOf([repetitive('f0.txt', 'same'), repetitive('f1.txt', 'same'), repetitive('f2.txt', 'same')]);
      const size = zip.centrals[0].compressedSize;
      const extractor = new ZipExtractor();

      const { loops } = drive(extractor, resolveExtractConfig({ maxEntriesPerStep: 10, maxBytesPerStep: 2 * size + 1 }), zip);

      expect(loops).toHaveLength(1);
      expect(progress(loops[0])).toEqual({ uncompressedCount: 2, possiblyCompressedCount: 1, droppedCount: 0, total: 3 });
    });

    it('should still make progress when an entry exceeds the byte budget', () => {
      const zip = zipOf([repetitive('f0.txt', 'big'), repetitive('f1.txt', 'big'), repetitive('f2.txt', 'big')]);
      const extractor = new ZipExtractor();

      const { done, loops } = drive(extractor, resolveExtractConfig({ maxEntriesPerStep: 10, maxBytesPerStep: 1 }), zip);

      expect(loops.map((z) => z.uncompressed.size)).toEqual([1, 2]);
      expect(done.entries).toHaveLength(3);
    });

    it('should leave its input untouched', () => {
      const zip = zipOf(entries);
      const step = extract(resolveExtractConfig({ maxEntriesPerStep: 2 }), zip);

      expect(step.kind).toBe('loop');
      expect(zip.possiblyCompressed.size).toBe(5);
      expect(zip.uncompressed.size).toBe(0);
      expect(zip.dropped.size).toBe(0);
    });
  });

  describe('failures', () => {
    const archive = zipOf([repetitive('good.txt', 'fine'), { kind: 'raw', name: 'bad.bin', content: Uint8Array.of(0) }]);

    it('should isolate a corrupt entry and drop it after maxAttempts', () => {
      const zip = withEntry(archive, 'bad.bin', corrupt);
      const { done, loops } = drive(new ZipExtractor(), resolveExtractConfig({ maxEntriesPerStep: 10, maxAttempts: 3 }), zip);

      expect(loops.map((z) => z.possiblyCompressed.get('bad.bin')?.attempts)).toEqual([1, 2]);
      expect(loops[0].uncompressed.get('good.txt')?.toString()).toBe('fine '.repeat(60));
      expect(done.entries).toEqual([['good.txt', { kind: 'text', text: 'fine '.repeat(60) }]]);
      expect(done.dropped).toHaveLength(1);

      const [name, dropped] = done.dropped[0];
      expect(name).toBe('bad.bin');
      expect(dropped.code).toBe('DECOMPRESSION_FAILED');
      expect(dropped.message.startsWith('Gave up after 3 failed attempts: Error occurred during decompression')).toBe(true);
    });

    it('should reach done when a failing entry keeps taking the quota', () => {
      const zip = withEntry(
        zipOf([{ kind: 'raw', name: 'bad.bin', content: Uint8Array.of(0) }, repetitive('good.txt', 'fine')]),
        'bad.bin',
        corrupt
      );
      const { done, loops } = drive(new ZipExtractor(), resolveExtractConfig({ maxEntriesPerStep: 1, maxAttempts: 2 }), zip);

      expect(loops).toHaveLength(2);
      expect(done.entries.map(([name]) => name)).toEqual(['good.txt']);
      expect(done.dropped.map(([name]) => name)).toEqual(['bad.bin']);
    });

    it('should drop entries with an unsupported method at once', () => {
      const zip = withEntry(archive, 'bad.bin', (entry) => ({
        ...entry,
        header: { ...entry.header, compressionMethod: CMP_METHOD.BZIP2 },
      }));

      const step = extract(resolveExtractConfig(), zip);

      expect(step.kind).toBe('done');
      if (step.kind === 'done') {
        expect(step.entries.map(([name]) => name)).toEqual(['good.txt']);
        expect(step.dropped[0][1].code).toBe('UNSUPPORTED_COMPRESSION_METHOD');
        expect(step.dropped[0][1].message).toBe('Invalid/unsupported compression method: 12');
      }
    });

    it('should drop a stored entry with a bad checksum at once', () => {
      const zip = withEntry(archive, 'bad.bin', (entry) => ({
        ...entry,
        header: { ...entry.header, crc32: (entry.header.crc32 ^ 1) >>> 0 },
      }));

      const step = extract(resolveExtractConfig(), zip);

      expect(step.kind).toBe('done');
      if (step.kind === 'done') {
        expect(step.dropped[0][0]).toBe('bad.bin');
        expect(step.dropped[0][1].code).toBe('CHECKSUM_MISMATCH');
        expect(step.dropped[0][1].message.startsWith('CRC32 checksum does not match the expected value')).toBe(true);
      }
    });

    it('should accept a bad checksum when verification is off', () => {
      const zip = withEntry(archive, 'bad.bin', (entry) => ({
        ...entry,
        header: { ...entry.header, crc32: 0 },
      }));

      const step = extract(resolveExtractConfig({ verifyChecksum: false }), zip);

      expect(step.kind).toBe('done');
      if (step.kind === 'done') {
        expect(step.entries.map(([name]) => name)).toEqual(['good.txt', 'bad.bin']);
        expect(step.dropped).toEqual([]);
      }
    });

    it('should retry a deflated entry whose checksum does not match', () => {
      const zip = withEntry(archive, 'good.txt', (entry) => ({
        ...entry,
        header: { ...entry.header, crc32: 0 },
      }));

      const step = extract(resolveExtractConfig({ maxAttempts: 1 }), zip);

      expect(step.kind).toBe('done');
      if (step.kind === 'done') {
        expect(step.entries.map(([name]) => name)).toEqual(['bad.bin']);
        expect(step.dropped[0][1].code).toBe('DECOMPRESSION_FAILED');
        expect(step.dropped[0][1].message).toContain('CRC32 checksum does not match');
      }
    });
  });

  describe('classification', () => {
    const zip = zipOf([
      { kind: 'text', name: 'greeting.txt', content: 'héllo' },
      { kind: 'raw', name: 'notes.txt', content: Uint8Array.of(0xff, 0xfe, 0x41) },
      { kind: 'raw', name: 'photo.png', content: Uint8Array.of(0x89, 0x50, 0x4e, 0x47) },
    ], 'store');

    it('should decode text, keep binaries and downgrade invalid text', () => {
      const step = extract(DEFAULT_EXTRACT_CONFIG, zip);

      expect(step).toEqual({
        kind: 'done',
        entries: [
          ['greeting.txt', { kind: 'text', text: 'héllo' }],
          ['notes.txt', { kind: 'failed', data: Buffer.from([0xff, 0xfe, 0x41]) }],
          ['photo.png', { kind: 'binary', data: Buffer.from([0x89, 0x50, 0x4e, 0x47]) }],
        ],
        dropped: [],
      });
    });

    it('should use a custom classifier', () => {
      const step = extract(resolveExtractConfig({ classifyAsText: () => false }), zip);

      expect(step.kind).toBe('done');
      if (step.kind === 'done') {
        expect(step.entries.map(([, content]) => content.kind)).toEqual(['binary', 'binary', 'binary']);
      }
    });

    it('should keep a leading byte order mark in text', () => {
      const step = extract(DEFAULT_EXTRACT_CONFIG, zipOf([{ kind: 'text', name: 'bom.txt', content: '\uFEFFhello' }], 'store'));

      expect(step).toEqual({
        kind: 'done',
        entries: [['bom.txt', { kind: 'text', text: '\uFEFFhello' }]],
        dropped: [],
      });
    });

    it('should finish an empty archive in one step', () => {
      expect(extract(DEFAULT_EXTRACT_CONFIG, zipOf([]))).toEqual({ kind: 'done', entries: [], dropped: [] });
    });
  });

  describe('progress and overview', () => {
    it('should count entries in every state', () => {
      const zip = withEntry(
        zipOf([repetitive('a.txt', 'a'), repetitive('b.txt', 'b'), { kind: 'raw', name: 'c.bin', content: Uint8Array.of(1) }]),
        'c.bin',
        (entry) => ({ ...entry, header: { ...entry.header, compressionMethod: 99 } })
      );

      expect(progress(zip)).toEqual({ uncompressedCount: 0, possiblyCompressedCount: 3, droppedCount: 0, total: 3 });

      const step = extract(resolveExtractConfig({ maxEntriesPerStep: 1 }), zip);
      expect(step.kind).toBe('loop');
      if (step.kind === 'loop') {
        expect(progress(step.zip)).toEqual({ uncompressedCount: 1, possiblyCompressedCount: 1, droppedCount: 1, total: 3 });
      }
    });

    it('should describe the test.txt archive', () => {
      const zip = zipOf([{ kind: 'text', name: 'test.txt', content: 'foo bar baz\n' }], 'store');

      expect(overview(zip)).toEqual({
        comment: '',
        totalEntries: 1,
        centralDirectorySize: 54,
        centralDirectoryOffset: 50,
        totalUncompressed: 12,
        totalCompressed: 12,
        entries: [{
          name: 'test.txt',
          method: 'Stored',
          compressedSize: 12,
          uncompressedSize: 12,
          ratio: '0.0',
          crc32: crc32('foo bar baz\n').toString(16).padStart(8, '0'),
          modified: new Date(1980, 0, 1),
          fileSystem: 'Unix',
          attributes: 'none',
          offset: 0,
          comment: '',
        }],
      });
    });

    it('should return the same overview when called twice', () => {
      const zip = zipOf([repetitive('a.txt', 'a'), { kind: 'text', name: 'b.txt', content: 'b' }]);
      const first = overview(zip);

      expect(overview(zip)).toEqual(first);
      expect(first.entries[0].method).toBe('Deflate-N');
      expect(first.entries[0].ratio).toMatch(/^\d+\.\d$/);
    });
  });
});

describe('label helpers', () => {
  it('should name compression methods', () => {
    expect(compressionMethodToString(CMP_METHOD.STORED)).toBe('Stored');
    expect(compressionMethodToString(CMP_METHOD.DEFLATED)).toBe('Deflate-N');
    expect(compressionMethodToString(CMP_METHOD.DEFLATED, 2)).toBe('Deflate-M');
    expect(compressionMethodToString(99)).toBe('Unknown');
  });

  it('should name the host file system', () => {
    expect(fileSystemToString(0x0314)).toBe('Unix');
    expect(fileSystemToString(0x0a14)).toBe('Windows NTFS');
    expect(fileSystemToString(0x0814)).toBe('Unknown');
  });

  it('should render DOS attributes', () => {
    expect(dosAttributesToString(0x21)).toBe('r---a');
    expect(dosAttributesToString(0x10)).toBe('---d-');
    expect(dosAttributesToString(0x81a40000)).toBe('none');
  });
});

describe('isTextFile', () => {
  it.each([
    ['notes.txt', true],
    ['README.MD', true],
    ['dir/config.json', true],
    ['archive.zip', false],
    ['.bashrc', false],
    ['Makefile', false],
    ['dir.txt/file', false],
  ])('%s -> %s', (name, expected) => {
    expect(isTextFile(name)).toBe(expected);
  });
});

describe('resolveExtractConfig', () => {
  it('should fill in defaults', () => {
    const config = resolveExtractConfig();

    expect(config.maxEntriesPerStep).toBe(8);
    expect(config.maxBytesPerStep).toBeUndefined();
    expect(config.maxAttempts).toBe(3);
    expect(config.verifyChecksum).toBe(true);
    expect(config.classifyAsText).toBe(isTextFile);
  });

  it('should raise limits below one', () => {
    const config = resolveExtractConfig({ maxEntriesPerStep: 0, maxAttempts: -2 });

    expect(config.maxEntriesPerStep).toBe(1);
    expect(config.maxAttempts).toBe(1);
  });
});
