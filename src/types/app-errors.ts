/**
 * @fileoverview Application error taxonomy and base error shape.
 * @module types/app-errors
 */

/**
 * Error codes surfaced by the sync layer and its DOM collaborators.
 */
export enum AppErrorCode {
    // Artwork
    ARTWORK_LOAD_FAILED = 'ARTWORK_LOAD_FAILED',
}

/**
 * Base application error structure.
 */
export interface AppError {
    /** Error code from the taxonomy above */
    code: AppErrorCode;
    /** Technical error message */
    message: string;
    /** Whether a later attempt might succeed */
    recoverable: boolean;
    /** Additional context for debugging */
    context?: Record<string, unknown>;
}

/**
 * Normalize an unknown thrown value into an {@link AppError}.
 */
export function toAppError(
    code: AppErrorCode,
    error: unknown,
    recoverable: boolean,
    context?: Record<string, unknown>
): AppError {
    const message = error instanceof Error
        ? error.message
        : typeof error === 'string'
            ? error
            : 'Unknown error';
    return {
        code,
        message,
        recoverable,
        ...(context ? { context } : {}),
    };
}
