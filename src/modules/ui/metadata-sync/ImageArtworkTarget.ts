/**
 * @fileoverview Artwork target rendering into an `<img>` element.
 * @module modules/ui/metadata-sync/ImageArtworkTarget
 */

import type { MediaMetadata } from '../../playback/types';
import type { IArtworkTarget } from './interfaces';
import type { ArtworkUrlResolver } from './types';

export interface ImageArtworkTargetOptions {
    resolveArtworkUrl?: ArtworkUrlResolver;
}

const defaultResolver: ArtworkUrlResolver = (metadata) => Promise.resolve(metadata.artworkUri);

/**
 * Resolves artwork URLs asynchronously. Only the latest `render()` call may
 * write to the image or reject; superseded calls resolve quietly.
 */
export class ImageArtworkTarget implements IArtworkTarget {
    private _requestId = 0;
    private readonly _resolve: ArtworkUrlResolver;
    private readonly _onImageError = (): void => {
        this._clear();
    };

    constructor(
        private readonly image: HTMLImageElement,
        options: ImageArtworkTargetOptions = {}
    ) {
        this._resolve = options.resolveArtworkUrl ?? defaultResolver;
        this.image.addEventListener('error', this._onImageError);
    }

    async render(metadata: MediaMetadata | null): Promise<void> {
        const requestId = ++this._requestId;
        if (!metadata) {
            this._clear();
            return;
        }

        let url: string | null;
        try {
            url = await this._resolve(metadata);
        } catch (error) {
            if (requestId !== this._requestId) {
                return;
            }
            this._clear();
            throw error;
        }

        if (requestId !== this._requestId) {
            return;
        }
        if (!url) {
            this._clear();
            return;
        }
        this.image.src = url;
        this.image.alt = metadata.title ?? '';
        this.image.style.visibility = '';
    }

    destroy(): void {
        this._requestId++;
        this.image.removeEventListener('error', this._onImageError);
    }

    private _clear(): void {
        this.image.removeAttribute('src');
        this.image.alt = '';
        this.image.style.visibility = 'hidden';
    }
}
