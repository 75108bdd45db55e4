/**
 * @fileoverview DOM-backed text and range targets.
 * @module modules/ui/metadata-sync/DomTargets
 */

import type { IRangeTarget, ITextTarget } from './interfaces';

// Hidden targets keep their layout box so surrounding rows do not shift.
function applyVisibility(element: HTMLElement, visible: boolean): void {
    element.style.visibility = visible ? '' : 'hidden';
}

export class DomTextTarget implements ITextTarget {
    constructor(private readonly element: HTMLElement) {}

    setText(text: string | null): void {
        this.element.textContent = text ?? '';
    }

    setVisible(visible: boolean): void {
        applyVisibility(this.element, visible);
    }
}

/**
 * Drives an `<input type="range">` or a `<progress>` element.
 * Set the maximum before the value: range inputs clamp the value to the current max.
 */
export class DomRangeTarget implements IRangeTarget {
    constructor(private readonly element: HTMLInputElement | HTMLProgressElement) {}

    setMax(max: number): void {
        if (this.element instanceof HTMLProgressElement) {
            this.element.max = max;
            return;
        }
        this.element.max = String(max);
    }

    setValue(value: number): void {
        if (this.element instanceof HTMLProgressElement) {
            this.element.value = value;
            return;
        }
        this.element.value = String(value);
    }

    setVisible(visible: boolean): void {
        applyVisibility(this.element, visible);
    }
}
