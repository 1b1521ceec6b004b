/**
 * Compression module - one Encoder/Decoder interface over every archive format
 *
 * This module provides:
 * - Format dispatch from the output or input filename suffix
 * - Manifest building with include/exclude globs
 * - Background execution with cooperative progress polling
 * - sha256 digests computed off the main thread
 */

export * from './types';
export * from '../errors';
export * from './driver';
export * from './status';
export * from './background';
export * from './digest';
export * from './manifest';
export * from './encoder';
export * from './decoder';
export * from './detector';
export * from './factory';
export * from './formats';
