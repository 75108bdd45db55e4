/**
 * @fileoverview Value equality for media metadata.
 * @module modules/playback/metadata
 */

import type { MediaMetadata } from './types';

export function metadataEquals(
    a: MediaMetadata | null | undefined,
    b: MediaMetadata | null | undefined
): boolean {
    if (a === b) return true;
    if (!a || !b) return false;
    return a.title === b.title
        && a.subtitle === b.subtitle
        && a.artworkUri === b.artworkUri;
}
