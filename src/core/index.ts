/**
 * navindex - Core Module
 *
 * @module core
 */

export { assembleIndex, validateIndex, INDEX_SCHEMA_VERSION, type AssemblyInput } from './assembler.js';
