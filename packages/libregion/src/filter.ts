// libregion/src/filter.ts
// Drop subscription "announcement" entries that are not real servers.

/**
 * Markers providers put in the remarks of placeholder entries:
 * latest URL, remaining traffic, expiry date.
 */
export const INFO_MARKERS: readonly string[] = ['最新网址', '剩余流量', '过期时间'];

export interface FilterResult<T> {
    valid: T[];
    droppedCount: number;
}

export function isInfoLabel(label: string, markers: readonly string[] = INFO_MARKERS): boolean {
    return markers.some(marker => label.includes(marker));
}

/**
 * Keep records with a non-empty label that carries none of the info
 * markers. Case-sensitive substring match; input order preserved.
 */
export function filterInfoNodes<T extends { remarks?: unknown }>(
    records: readonly T[],
    markers: readonly string[] = INFO_MARKERS,
): FilterResult<T> {
    const valid = records.filter(record =>
        typeof record.remarks === 'string' &&
        record.remarks !== '' &&
        !isInfoLabel(record.remarks, markers),
    );
    return { valid, droppedCount: records.length - valid.length };
}
