/**
 * @fileoverview Shared application types.
 */

export { AppErrorCode, toAppError } from './app-errors';
export type { AppError } from './app-errors';
