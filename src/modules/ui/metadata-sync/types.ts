/**
 * @fileoverview Metadata sync types.
 * @module modules/ui/metadata-sync/types
 */

import type { AppError } from '../../../types/app-errors';
import type { ITaskScheduler } from '../../../utils/interfaces';
import type { MediaMetadata } from '../../playback/types';
import type { IArtworkTarget, IRangeTarget, ITextTarget } from './interfaces';

/**
 * Elements the controller writes to. Owned by the surrounding UI layer.
 */
export interface MetadataSyncTargets {
    title: ITextTarget;
    subtitle: ITextTarget;
    time?: ITextTarget | null;
    progress: IRangeTarget;
    artwork?: IArtworkTarget | null;
}

export interface MetadataSyncConfig {
    /** Delay between progress refreshes while playing. */
    progressIntervalMs?: number;
    /**
     * Render the attached model's current state from `attach()` instead of
     * waiting for its first notification.
     */
    syncOnAttach?: boolean;
    scheduler?: ITaskScheduler;
}

export interface MetadataSyncEvents {
    metadataRendered: { metadata: MediaMetadata | null };
    artworkError: { error: AppError };
    [key: string]: unknown;
}

export interface NowPlayingViewConfig {
    containerId: string;
    /** Defaults to true. */
    showTime?: boolean;
    /** Defaults to true. */
    showArtwork?: boolean;
    resolveArtworkUrl?: ArtworkUrlResolver;
}

/**
 * Maps metadata to an image URL. `null` means no artwork.
 */
export type ArtworkUrlResolver = (metadata: MediaMetadata) => Promise<string | null>;
