/**
 * @fileoverview Shared utility contracts.
 * @module utils/interfaces
 */

/**
 * Handle returned by subscriptions and scheduled tasks.
 * Calling `dispose()` more than once is harmless.
 */
export interface IDisposable {
    dispose(): void;
}

/**
 * Typed event emitter surface.
 *
 * @template TEventMap - Maps event names to payload types
 */
export interface IEventEmitter<TEventMap extends Record<string, unknown>> {
    on<K extends keyof TEventMap>(
        event: K,
        handler: (payload: TEventMap[K]) => void
    ): IDisposable;

    off<K extends keyof TEventMap>(
        event: K,
        handler: (payload: TEventMap[K]) => void
    ): void;

    /**
     * Deliver a payload to every handler of `event`.
     * A throwing handler is logged and does not stop delivery to the rest.
     */
    emit<K extends keyof TEventMap>(event: K, payload: TEventMap[K]): void;

    removeAllListeners(event?: keyof TEventMap): void;
    listenerCount(event: keyof TEventMap): number;
}

/**
 * Schedules one-shot delayed tasks.
 * The returned handle cancels the task if it has not run yet.
 */
export interface ITaskScheduler {
    schedule(task: () => void, delayMs: number): IDisposable;
}
