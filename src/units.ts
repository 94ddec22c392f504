const UNITS = ['B', 'KB', 'MB', 'GB', 'TB', 'PB', 'EB'];

/**
 * Formats a byte count with the largest binary unit that keeps the
 * mantissa under 1024, e.g. `1536` becomes `"1.50 KB"`.
 * Returns an empty string for 0, negatives and anything that is not a number
 * (such as the literal `max` found in limit files).
 */
export function humanBytes(value: number | string | null | undefined): string {
    if (value === null || value === undefined) {
        return '';
    }
    const bytes = typeof value === 'number' ? value : Number(value.trim());
    if (!Number.isFinite(bytes) || bytes <= 0) {
        return '';
    }

    let index = 0;
    let threshold = 1;
    while (index < UNITS.length - 1 && bytes >= threshold * 1024) {
        threshold *= 1024;
        index++;
    }
    return `${(bytes / threshold).toFixed(2)} ${UNITS[index]}`;
}
