/**
 * Date Helpers
 *
 * Notes are stamped with the server's local wall-clock time as a plain string,
 * so the stored value reads the same whatever the database's timezone is.
 */

const pad2 = (value: number): string => String(value).padStart(2, '0');

/**
 * Format a date as `YYYY-MM-DD HH:MM:SS` in local time.
 */
export function formatNoteTimestamp(date: Date): string {
    const day = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
    const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
    return `${day} ${time}`;
}

/** Matches strings produced by formatNoteTimestamp */
export const NOTE_TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/;
