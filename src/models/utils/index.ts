/**
 * @module utils
 * @description Unit conversion and statistics helpers
 */

export * from './conversion';
export * from './statistics';
