/**
 * @fileoverview Public exports for the utils module.
 * @module utils
 */

export { EventEmitter } from './EventEmitter';
export { TimeoutTaskScheduler } from './TaskScheduler';
export { formatMinutesSeconds } from './timeFormat';
export type { IEventEmitter, IDisposable, ITaskScheduler } from './interfaces';
