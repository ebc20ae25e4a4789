// =============================================================================
// Zipstep - Unified Package Exports
// =============================================================================

// Core shared exports (from core module)
export * from './core';
import Zipstep from './core';
export default Zipstep;

// Node.js file operations
export {
  ZipstepNode,
  resolveEntryPath,
} from './node/ZipstepNode';
export type {
  SavedZip,
  ExtractAllOptions,
  ExtractToDirectoryResult,
} from './node/ZipstepNode';
