/**
 * @fileoverview Package entry point.
 * @module now-playing-sync
 */

export * from './modules/playback';
export * from './modules/ui/metadata-sync';
export * from './utils';
export * from './types';
