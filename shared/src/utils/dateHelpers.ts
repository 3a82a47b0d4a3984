/**
 * Date Utilities
 *
 * Stored timestamps are UTC ISO-8601 strings; business dates (sale, damage,
 * invoice) are local calendar dates as YYYY-MM-DD.
 */

function pad2(n: number): string {
    return String(n).padStart(2, '0');
}

/** Current instant as an ISO-8601 string */
export function nowIso(date: Date = new Date()): string {
    return date.toISOString();
}

/** Local calendar date, e.g. 2024-03-09 */
export function toDateOnly(date: Date = new Date()): string {
    return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
}

/**
 * Compact local timestamp used in generated document numbers.
 * Example: 2024-03-09 14:05:07 → "2024-03-09-140507"
 */
export function toCompactTimestamp(date: Date = new Date()): string {
    return `${toDateOnly(date)}-${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`;
}

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const ISO_INSTANT = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}/;

/**
 * Lower bound for a timestamp filter.
 * A bare YYYY-MM-DD means local midnight of that day; an ISO-8601 timestamp
 * is taken as written. Anything else, including impossible dates, is null.
 */
export function parseDateBound(value: string): Date | null {
    const day = DATE_ONLY.exec(value);
    if (day) {
        const [year, month, date] = [Number(day[1]), Number(day[2]), Number(day[3])];
        const midnight = new Date(year, month - 1, date);
        return midnight.getFullYear() === year && midnight.getMonth() === month - 1 && midnight.getDate() === date
            ? midnight
            : null;
    }

    if (!ISO_INSTANT.test(value)) return null;
    const instant = new Date(value);
    return Number.isNaN(instant.getTime()) ? null : instant;
}
