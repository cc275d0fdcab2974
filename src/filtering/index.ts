export { FilterEngine } from './FilterEngine.js';
export type { PreviewOptions } from './FilterEngine.js';
export { globToRegex, matchesGlob, matchesAnyGlob } from './glob.js';
export { parseSizeToBytes, formatBytes } from './sizeParser.js';
