/**
 * @fileoverview Playback model contract consumed by display controllers.
 * @module modules/playback/interfaces
 */

import type { MediaMetadata } from './types';

/**
 * Receives change notifications from an {@link IPlaybackModel}.
 */
export interface IPlaybackObserver {
    /** Play/pause/buffering transition. */
    onPlaybackStateChanged(): void;
    /** The session switched to a different source. */
    onSourceChanged(): void;
    onMetadataChanged(): void;
}

export interface IPlaybackModel {
    getMetadata(): MediaMetadata | null;
    isPlaying(): boolean;
    /** Current position in milliseconds. */
    getProgress(): number;
    /** Duration in milliseconds; zero or less when unknown (live content). */
    getMaxProgress(): number;
    registerObserver(observer: IPlaybackObserver): void;
    unregisterObserver(observer: IPlaybackObserver): void;
}
