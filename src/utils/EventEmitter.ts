/**
 * @fileoverview Typed event emitter with per-handler error isolation.
 * @module utils/EventEmitter
 */

import type { IDisposable, IEventEmitter } from './interfaces';

type AnyHandler = (payload: unknown) => void;

/**
 * Typed event emitter. A handler that throws is logged and skipped;
 * the remaining handlers still receive the payload.
 *
 * @example
 * ```typescript
 * const emitter = new EventEmitter<{ tick: { positionMs: number } }>();
 * const sub = emitter.on('tick', ({ positionMs }) => render(positionMs));
 * emitter.emit('tick', { positionMs: 1000 });
 * sub.dispose();
 * ```
 */
export class EventEmitter<TEventMap extends Record<string, unknown>>
    implements IEventEmitter<TEventMap> {
    private _handlers: Map<keyof TEventMap, Set<AnyHandler>> = new Map();

    public on<K extends keyof TEventMap>(
        event: K,
        handler: (payload: TEventMap[K]) => void
    ): IDisposable {
        let handlerSet = this._handlers.get(event);
        if (!handlerSet) {
            handlerSet = new Set();
            this._handlers.set(event, handlerSet);
        }
        handlerSet.add(handler as AnyHandler);

        return {
            dispose: (): void => this.off(event, handler),
        };
    }

    public off<K extends keyof TEventMap>(
        event: K,
        handler: (payload: TEventMap[K]) => void
    ): void {
        const handlerSet = this._handlers.get(event);
        if (!handlerSet) {
            return;
        }
        handlerSet.delete(handler as AnyHandler);
        if (handlerSet.size === 0) {
            this._handlers.delete(event);
        }
    }

    public emit<K extends keyof TEventMap>(event: K, payload: TEventMap[K]): void {
        const handlerSet = this._handlers.get(event);
        if (!handlerSet) {
            return;
        }

        // Snapshot: handlers may subscribe or unsubscribe while being notified.
        for (const handler of Array.from(handlerSet)) {
            try {
                handler(payload);
            } catch (error) {
                console.error(`[EventEmitter] Handler for '${String(event)}' threw:`, error);
            }
        }
    }

    public removeAllListeners(event?: keyof TEventMap): void {
        if (event === undefined) {
            this._handlers.clear();
            return;
        }
        this._handlers.delete(event);
    }

    public listenerCount(event: keyof TEventMap): number {
        return this._handlers.get(event)?.size ?? 0;
    }
}
