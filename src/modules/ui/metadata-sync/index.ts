/**
 * @fileoverview Metadata sync exports.
 * @module modules/ui/metadata-sync
 */

export { MetadataSyncController } from './MetadataSyncController';
export { NowPlayingView } from './NowPlayingView';
export { DomRangeTarget, DomTextTarget } from './DomTargets';
export { ImageArtworkTarget } from './ImageArtworkTarget';
export type { ImageArtworkTargetOptions } from './ImageArtworkTarget';
export { METADATA_SYNC_DEFAULTS, NOW_PLAYING_VIEW_CLASSES } from './constants';
export type { IArtworkTarget, IRangeTarget, ITextTarget } from './interfaces';
export type {
    ArtworkUrlResolver,
    MetadataSyncConfig,
    MetadataSyncEvents,
    MetadataSyncTargets,
    NowPlayingViewConfig,
} from './types';
