/**
 * @fileoverview Mirrors a playback model's metadata and progress into display targets.
 * @module modules/ui/metadata-sync/MetadataSyncController
 */

import { AppErrorCode, toAppError } from '../../../types/app-errors';
import { EventEmitter } from '../../../utils/EventEmitter';
import type { IDisposable, ITaskScheduler } from '../../../utils/interfaces';
import { TimeoutTaskScheduler } from '../../../utils/TaskScheduler';
import { formatMinutesSeconds } from '../../../utils/timeFormat';
import type { IPlaybackModel, IPlaybackObserver } from '../../playback/interfaces';
import { metadataEquals } from '../../playback/metadata';
import type { MediaMetadata } from '../../playback/types';
import { METADATA_SYNC_DEFAULTS } from './constants';
import type { MetadataSyncConfig, MetadataSyncEvents, MetadataSyncTargets } from './types';

/**
 * Keeps title, subtitle, time, progress and artwork targets in step with a
 * {@link IPlaybackModel}.
 *
 * While the attached model reports playing, a self-rescheduling task refreshes
 * progress every `progressIntervalMs`. Metadata writes are skipped when the new
 * value equals the last one rendered, except after a source change.
 *
 * @example
 * ```typescript
 * const controller = new MetadataSyncController(view.getTargets());
 * controller.attach(model);
 * // ...
 * controller.attach(null);
 * ```
 */
export class MetadataSyncController {
    private _model: IPlaybackModel | null = null;
    private _currentMetadata: MediaMetadata | null = null;
    private _progressTask: IDisposable | null = null;
    private _disposed = false;

    private readonly _progressIntervalMs: number;
    private readonly _syncOnAttach: boolean;
    private readonly _scheduler: ITaskScheduler;
    private readonly _emitter = new EventEmitter<MetadataSyncEvents>();

    private readonly _observer: IPlaybackObserver = {
        onPlaybackStateChanged: (): void => {
            this._updateState();
        },
        onSourceChanged: (): void => {
            this._updateState();
            this._updateMetadata(true);
        },
        onMetadataChanged: (): void => {
            this._updateMetadata(false);
        },
    };

    constructor(
        private readonly targets: MetadataSyncTargets,
        config: MetadataSyncConfig = {}
    ) {
        this._progressIntervalMs = sanitizeIntervalMs(config.progressIntervalMs);
        this._syncOnAttach = config.syncOnAttach ?? METADATA_SYNC_DEFAULTS.syncOnAttach;
        this._scheduler = config.scheduler ?? new TimeoutTaskScheduler();
    }

    /**
     * Follow `model`, or stop following anything when `null`.
     * The previous model is always unsubscribed before the new one is subscribed.
     */
    attach(model: IPlaybackModel | null): void {
        if (this._disposed) {
            console.warn('[MetadataSync] attach() called after dispose()');
            return;
        }
        if (this._model) {
            this._model.unregisterObserver(this._observer);
        }
        // A pending tick belongs to the previous model.
        this._stopProgressLoop();
        this._model = model;
        if (this._model) {
            this._model.registerObserver(this._observer);
        }

        if (this._syncOnAttach) {
            this._updateState();
            this._updateMetadata(true);
        }
    }

    getModel(): IPlaybackModel | null {
        return this._model;
    }

    isProgressLoopActive(): boolean {
        return this._progressTask !== null;
    }

    on<K extends keyof MetadataSyncEvents>(
        event: K,
        handler: (payload: MetadataSyncEvents[K]) => void
    ): IDisposable {
        return this._emitter.on(event, handler);
    }

    /**
     * Push the model's current position and duration to the time and progress targets.
     * Both are hidden when no model is attached or the duration is unknown.
     */
    updateProgress(): void {
        const { time, progress } = this.targets;
        const model = this._model;
        if (!model) {
            time?.setVisible(false);
            progress.setVisible(false);
            return;
        }

        const maxProgress = model.getMaxProgress();
        const position = model.getProgress();
        const visible = maxProgress > 0;

        if (time) {
            time.setVisible(visible);
            time.setText(`${formatMinutesSeconds(position)} / ${formatMinutesSeconds(maxProgress)}`);
        }
        progress.setVisible(visible);
        progress.setMax(Math.trunc(maxProgress));
        progress.setValue(Math.trunc(position));
    }

    /**
     * Detach from the model, cancel the progress loop and drop event listeners.
     * Targets keep whatever they last displayed.
     */
    dispose(): void {
        if (this._disposed) return;
        if (this._model) {
            this._model.unregisterObserver(this._observer);
            this._model = null;
        }
        this._stopProgressLoop();
        this._emitter.removeAllListeners();
        this._disposed = true;
    }

    private _updateState(): void {
        this.updateProgress();

        if (this._model && this._model.isPlaying()) {
            this._startProgressLoop();
        } else {
            this._stopProgressLoop();
        }
    }

    private _updateMetadata(force: boolean): void {
        const metadata = this._model ? this._model.getMetadata() : null;
        if (!force && metadataEquals(this._currentMetadata, metadata)) {
            return;
        }
        this._currentMetadata = metadata ? { ...metadata } : null;

        this.targets.title.setText(metadata?.title ?? null);
        this.targets.subtitle.setText(metadata?.subtitle ?? null);
        this._renderArtwork(metadata);

        this._emitter.emit('metadataRendered', { metadata: this._currentMetadata });
    }

    private _renderArtwork(metadata: MediaMetadata | null): void {
        const artwork = this.targets.artwork;
        if (!artwork) return;

        let pending: Promise<void>;
        try {
            pending = artwork.render(metadata);
        } catch (error) {
            this._reportArtworkError(error, metadata);
            return;
        }
        pending.catch((error: unknown) => this._reportArtworkError(error, metadata));
    }

    private _reportArtworkError(error: unknown, metadata: MediaMetadata | null): void {
        console.warn('[MetadataSync] Artwork render failed:', error);
        const appError = toAppError(AppErrorCode.ARTWORK_LOAD_FAILED, error, true, {
            artworkUri: metadata?.artworkUri ?? null,
        });
        this._emitter.emit('artworkError', { error: appError });
    }

    private _startProgressLoop(): void {
        if (this._progressTask !== null) {
            return;
        }
        this._scheduleProgressTick();
    }

    private _stopProgressLoop(): void {
        if (this._progressTask !== null) {
            this._progressTask.dispose();
            this._progressTask = null;
        }
    }

    private _scheduleProgressTick(): void {
        this._progressTask = this._scheduler.schedule(
            () => this._onProgressTick(),
            this._progressIntervalMs
        );
    }

    private _onProgressTick(): void {
        this._progressTask = null;
        // A tick that outlives a detach or pause ends the loop here.
        if (!this._model || !this._model.isPlaying()) {
            return;
        }
        this.updateProgress();
        this._scheduleProgressTick();
    }
}

function sanitizeIntervalMs(value: number | undefined): number {
    if (value === undefined || !Number.isFinite(value) || value <= 0) {
        return METADATA_SYNC_DEFAULTS.progressIntervalMs;
    }
    return Math.floor(value);
}
