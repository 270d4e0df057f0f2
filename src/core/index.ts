/**
 * Core - Press tracking and snapshot publishing
 */

export * from './constants';
export * from './codes';
export * from './press-tracker';
export * from './publisher';
export * from './snapshot';
