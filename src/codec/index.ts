/**
 * Timeline codec: compact binary form of a snapshot timeline.
 */

export * from './format.js';
export * from './types.js';
export * from './encode.js';
export * from './decode.js';
export { KeyDictionary } from './key-dict.js';
