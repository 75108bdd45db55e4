/**
 * @fileoverview Now Playing view: renders the display elements and exposes them as sync targets.
 * @module modules/ui/metadata-sync/NowPlayingView
 */

import { NOW_PLAYING_VIEW_CLASSES } from './constants';
import { DomRangeTarget, DomTextTarget } from './DomTargets';
import { ImageArtworkTarget } from './ImageArtworkTarget';
import type { MetadataSyncTargets, NowPlayingViewConfig } from './types';

type NowPlayingViewElements = {
    artwork: HTMLImageElement | null;
    title: HTMLElement | null;
    subtitle: HTMLElement | null;
    progress: HTMLInputElement | null;
    time: HTMLElement | null;
};

const EMPTY_ELEMENTS: NowPlayingViewElements = {
    artwork: null,
    title: null,
    subtitle: null,
    progress: null,
    time: null,
};

export class NowPlayingView {
    private containerElement: HTMLElement | null = null;
    private config: NowPlayingViewConfig | null = null;
    private elements: NowPlayingViewElements = { ...EMPTY_ELEMENTS };
    private artworkTarget: ImageArtworkTarget | null = null;

    initialize(config: NowPlayingViewConfig): void {
        const container = document.getElementById(config.containerId);
        if (!container) {
            throw new Error(`Now Playing container #${config.containerId} not found`);
        }
        this.artworkTarget?.destroy();
        this.artworkTarget = null;
        this.config = config;
        this.containerElement = container;
        this.containerElement.classList.add(NOW_PLAYING_VIEW_CLASSES.CONTAINER);
        this.containerElement.innerHTML = this.createTemplate(
            config.showTime ?? true,
            config.showArtwork ?? true
        );
        this.cacheElements();
    }

    /**
     * Build sync targets over the rendered elements. Disabled elements are omitted.
     */
    getTargets(): MetadataSyncTargets {
        const { title, subtitle, progress, time, artwork } = this.elements;
        if (!this.config || !title || !subtitle || !progress) {
            throw new Error('NowPlayingView.getTargets() called before initialize()');
        }

        if (artwork && !this.artworkTarget) {
            this.artworkTarget = new ImageArtworkTarget(artwork, {
                resolveArtworkUrl: this.config.resolveArtworkUrl,
            });
        }

        return {
            title: new DomTextTarget(title),
            subtitle: new DomTextTarget(subtitle),
            time: time ? new DomTextTarget(time) : null,
            progress: new DomRangeTarget(progress),
            artwork: this.artworkTarget,
        };
    }

    destroy(): void {
        this.artworkTarget?.destroy();
        this.artworkTarget = null;
        if (this.containerElement) {
            this.containerElement.innerHTML = '';
            this.containerElement.classList.remove(NOW_PLAYING_VIEW_CLASSES.CONTAINER);
        }
        this.containerElement = null;
        this.config = null;
        this.elements = { ...EMPTY_ELEMENTS };
    }

    private cacheElements(): void {
        if (!this.containerElement) return;
        const root = this.containerElement;
        this.elements = {
            artwork: root.querySelector<HTMLImageElement>(`img.${NOW_PLAYING_VIEW_CLASSES.ARTWORK}`),
            title: root.querySelector<HTMLElement>(`.${NOW_PLAYING_VIEW_CLASSES.TITLE}`),
            subtitle: root.querySelector<HTMLElement>(`.${NOW_PLAYING_VIEW_CLASSES.SUBTITLE}`),
            progress: root.querySelector<HTMLInputElement>(`input.${NOW_PLAYING_VIEW_CLASSES.PROGRESS}`),
            time: root.querySelector<HTMLElement>(`.${NOW_PLAYING_VIEW_CLASSES.TIME}`),
        };
    }

    private createTemplate(showTime: boolean, showArtwork: boolean): string {
        const artwork = showArtwork
            ? `<img class="${NOW_PLAYING_VIEW_CLASSES.ARTWORK}" alt="" style="visibility: hidden">`
            : '';
        const time = showTime
            ? `<div class="${NOW_PLAYING_VIEW_CLASSES.TIME}"></div>`
            : '';
        return `
      ${artwork}
      <div class="${NOW_PLAYING_VIEW_CLASSES.CONTENT}">
        <div class="${NOW_PLAYING_VIEW_CLASSES.TITLE}"></div>
        <div class="${NOW_PLAYING_VIEW_CLASSES.SUBTITLE}"></div>
        <input type="range" class="${NOW_PLAYING_VIEW_CLASSES.PROGRESS}" min="0" max="0" value="0" disabled>
        ${time}
      </div>
    `;
    }
}
