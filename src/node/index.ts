/**
 * Node Module Exports
 *
 * Entry point for Node.js-only imports:
 * import ZipstepNode from 'zipstep/node';
 */

// Core ZIP functionality (re-exported from core module, but NOT the default)
export * from '../core';
import Zipstep from '../core';
export { Zipstep };

import ZipstepNodeDefault from './ZipstepNode';
export { default as ZipstepNode, resolveEntryPath } from './ZipstepNode';
export default ZipstepNodeDefault;
export type { SavedZip, ExtractAllOptions, ExtractToDirectoryResult } from './ZipstepNode';
