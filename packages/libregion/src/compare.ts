// libregion/src/compare.ts
// Locale-independent string ordering.

/**
 * Compare two strings by Unicode code point.
 *
 * `<` compares UTF-16 code units and puts astral characters (flag emoji)
 * before the upper BMP; `localeCompare` depends on host ICU data.
 */
export function compareCodePoints(a: string, b: string): number {
    let i = 0;
    let j = 0;
    while (i < a.length && j < b.length) {
        const ca = a.codePointAt(i) ?? 0;
        const cb = b.codePointAt(j) ?? 0;
        if (ca !== cb) return ca < cb ? -1 : 1;
        i += ca > 0xffff ? 2 : 1;
        j += cb > 0xffff ? 2 : 1;
    }
    const restA = a.length - i;
    const restB = b.length - j;
    if (restA === restB) return 0;
    return restA < restB ? -1 : 1;
}

/** Sorted copy of `values`, by code point. */
export function sortByCodePoint(values: Iterable<string>): string[] {
    return [...values].sort(compareCodePoints);
}
