/**
 * @fileoverview Playback model value types.
 * @module modules/playback/types
 */

/**
 * Display metadata of the current media item.
 */
export interface MediaMetadata {
    title: string | null;
    subtitle: string | null;
    /** Artwork location, resolved by the artwork target */
    artworkUri: string | null;
}

/**
 * Full replacement state delivered with a source switch.
 */
export interface PlaybackSource {
    metadata: MediaMetadata | null;
    progressMs?: number;
    maxProgressMs?: number;
    playing?: boolean;
}
