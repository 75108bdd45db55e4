/**
 * @fileoverview Cancellable one-shot delayed tasks backed by the global timer.
 * @module utils/TaskScheduler
 */

import type { IDisposable, ITaskScheduler } from './interfaces';

export class TimeoutTaskScheduler implements ITaskScheduler {
    schedule(task: () => void, delayMs: number): IDisposable {
        let settled = false;
        const timer = globalThis.setTimeout(() => {
            settled = true;
            task();
        }, delayMs);

        return {
            dispose: (): void => {
                if (settled) return;
                settled = true;
                globalThis.clearTimeout(timer);
            },
        };
    }
}
