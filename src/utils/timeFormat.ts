/**
 * @fileoverview Clock-style duration formatting.
 * @module utils/timeFormat
 */

/**
 * Format a millisecond offset as `m:ss`, read as a UTC time of day after the epoch.
 * Minutes carry no leading zero and wrap at 60 since the format has no hour field.
 *
 * @example
 * formatMinutesSeconds(7_000);   // '0:07'
 * formatMinutesSeconds(225_000); // '3:45'
 */
export function formatMinutesSeconds(ms: number): string {
    const date = new Date(ms);
    const minutes = date.getUTCMinutes();
    const seconds = date.getUTCSeconds();
    return `${minutes}:${String(seconds).padStart(2, '0')}`;
}
