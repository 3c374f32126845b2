/**
 * navindex - Resolver Module
 *
 * @module resolver
 */

export { ResolutionContext, DEFAULT_MANIFEST_MARKERS } from './resolution-context.js';
export type { ContextFile, ResolutionContextOptions } from './resolution-context.js';
export { ImportResolver } from './import-resolver.js';
export type { Resolution } from './import-resolver.js';
