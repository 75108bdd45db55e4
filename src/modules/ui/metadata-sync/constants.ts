/**
 * @fileoverview Metadata sync constants.
 * @module modules/ui/metadata-sync/constants
 */

export const METADATA_SYNC_DEFAULTS = {
    progressIntervalMs: 1000,
    syncOnAttach: true,
} as const;

export const NOW_PLAYING_VIEW_CLASSES = {
    CONTAINER: 'now-playing-view',
    ARTWORK: 'now-playing-view-artwork',
    CONTENT: 'now-playing-view-content',
    TITLE: 'now-playing-view-title',
    SUBTITLE: 'now-playing-view-subtitle',
    PROGRESS: 'now-playing-view-progress',
    TIME: 'now-playing-view-time',
} as const;
