/**
 * @fileoverview Playback model exports.
 * @module modules/playback
 */

export { PlaybackModel } from './PlaybackModel';
export { metadataEquals } from './metadata';
export type { IPlaybackModel, IPlaybackObserver } from './interfaces';
export type { MediaMetadata, PlaybackSource } from './types';
