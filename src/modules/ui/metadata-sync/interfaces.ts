/**
 * @fileoverview Display target contracts written by the metadata sync controller.
 * @module modules/ui/metadata-sync/interfaces
 */

import type { MediaMetadata } from '../../playback/types';

export interface ITextTarget {
    /** `null` clears the text. */
    setText(text: string | null): void;
    setVisible(visible: boolean): void;
}

export interface IRangeTarget {
    setMax(max: number): void;
    setValue(value: number): void;
    setVisible(visible: boolean): void;
}

/**
 * Asynchronous image sink. `null` clears the surface.
 * A rejected render is reported by the controller and never rethrown.
 */
export interface IArtworkTarget {
    render(metadata: MediaMetadata | null): Promise<void>;
}
