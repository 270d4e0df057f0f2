/**
 * Platform decoders - native notifications to raw events
 */

export * from './macos';
export * from './windows';
export * from './browser';
