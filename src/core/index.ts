/**
 * Core Module Exports
 * Core ZIP functionality (platform-agnostic)
 */

// Facade
import Zipstep from './Zipstep';
export * from './Zipstep';
export default Zipstep;

// Codec, encoder, decoders, extraction
export * from './ZipCodec';
export { ZipEncoder, encodeFile, entryBytes, resolveChoice } from './ZipEncoder';
export {
  AnchoredDecoder,
  SequentialDecoder,
  decode,
  read,
  getDecoder,
  hasDataDescriptor,
  locateDataDescriptor,
  decoderLogging,
} from './ZipDecoder';
export type { ZipDecoder } from './ZipDecoder';
export {
  ZipExtractor,
  extract,
  progress,
  overview,
  classify,
  isTextFile,
  resolveExtractConfig,
  DEFAULT_EXTRACT_CONFIG,
  compressionMethodToString,
  fileSystemToString,
  dosAttributesToString,
} from './ZipExtractor';

// Record codecs
export * from './records/LocalFileHeader';
export * from './records/DataDescriptor';
export * from './records/CentralDirectoryHeader';
export * from './records/EndOfCentralDirectory';

// Shared components
export { ByteReader } from './components/ByteReader';
export { ByteWriter } from './components/ByteWriter';
export * from './components/DosDateTime';
export { ProgressTracker } from './components/ProgressTracker';
export type { ProgressWriter } from './components/ProgressTracker';

// Types and constants
export * from '../types';
export * from './constants/Headers';
export { ZipError, describeError } from './constants/Errors';
export type { ZipErrorCode } from './constants/Errors';
export { default as Errors } from './constants/Errors';

// Logger utility
export { Logger, configureLoggerFromEnvironment } from './components/Logger';
export type { LogLevel, LoggerConfig } from './components/Logger';
