/**
 * @fileoverview In-memory playback model for hosts that push session state.
 * @module modules/playback/PlaybackModel
 */

import { EventEmitter } from '../../utils/EventEmitter';
import type { IDisposable } from '../../utils/interfaces';
import type { IPlaybackModel, IPlaybackObserver } from './interfaces';
import { metadataEquals } from './metadata';
import type { MediaMetadata, PlaybackSource } from './types';

interface PlaybackModelEvents {
    playbackStateChanged: undefined;
    sourceChanged: undefined;
    metadataChanged: undefined;
    [key: string]: unknown;
}

/**
 * Mutable playback state with observer fan-out.
 *
 * Position updates are silent: observers are expected to poll
 * {@link PlaybackModel.getProgress} while playing.
 */
export class PlaybackModel implements IPlaybackModel {
    private _metadata: MediaMetadata | null = null;
    private _playing = false;
    private _progressMs = 0;
    private _maxProgressMs = 0;
    private readonly _emitter = new EventEmitter<PlaybackModelEvents>();
    private readonly _subscriptions = new Map<IPlaybackObserver, IDisposable[]>();

    constructor(initial?: PlaybackSource) {
        if (initial) {
            this._applySource(initial);
        }
    }

    getMetadata(): MediaMetadata | null {
        return this._metadata;
    }

    isPlaying(): boolean {
        return this._playing;
    }

    getProgress(): number {
        return this._progressMs;
    }

    getMaxProgress(): number {
        return this._maxProgressMs;
    }

    registerObserver(observer: IPlaybackObserver): void {
        if (this._subscriptions.has(observer)) {
            return;
        }
        this._subscriptions.set(observer, [
            this._emitter.on('playbackStateChanged', () => observer.onPlaybackStateChanged()),
            this._emitter.on('sourceChanged', () => observer.onSourceChanged()),
            this._emitter.on('metadataChanged', () => observer.onMetadataChanged()),
        ]);
    }

    unregisterObserver(observer: IPlaybackObserver): void {
        const subscriptions = this._subscriptions.get(observer);
        if (!subscriptions) {
            return;
        }
        this._subscriptions.delete(observer);
        for (const subscription of subscriptions) {
            subscription.dispose();
        }
    }

    observerCount(): number {
        return this._subscriptions.size;
    }

    setPlaying(playing: boolean): void {
        if (this._playing === playing) {
            return;
        }
        this._playing = playing;
        this._emitter.emit('playbackStateChanged', undefined);
    }

    setMetadata(metadata: MediaMetadata | null): void {
        if (metadataEquals(this._metadata, metadata)) {
            return;
        }
        this._metadata = metadata ? { ...metadata } : null;
        this._emitter.emit('metadataChanged', undefined);
    }

    setProgress(progressMs: number, maxProgressMs?: number): void {
        this._progressMs = sanitizeMs(progressMs, this._progressMs);
        if (maxProgressMs !== undefined) {
            this._maxProgressMs = sanitizeMs(maxProgressMs, this._maxProgressMs);
        }
    }

    /**
     * Replace the whole session state. Always notifies, even when nothing differs.
     */
    setSource(source: PlaybackSource): void {
        this._applySource(source);
        this._emitter.emit('sourceChanged', undefined);
    }

    private _applySource(source: PlaybackSource): void {
        this._metadata = source.metadata ? { ...source.metadata } : null;
        this._progressMs = sanitizeMs(source.progressMs ?? 0, 0);
        this._maxProgressMs = sanitizeMs(source.maxProgressMs ?? 0, 0);
        this._playing = source.playing ?? false;
    }
}

function sanitizeMs(value: number, fallback: number): number {
    if (!Number.isFinite(value)) {
        console.warn('[PlaybackModel] Ignoring non-finite time value:', value);
        return fallback;
    }
    return value;
}
