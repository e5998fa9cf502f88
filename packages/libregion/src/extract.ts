// libregion/src/extract.ts
// Build the region vocabulary from the batch itself.

import { sortByCodePoint } from './compare.js';
import { patternMatcher } from './matcher.js';
import type { RegionMatcher, RegionName, ServerRecord } from './types.js';

/**
 * Collect every region the matcher infers from the batch's labels.
 *
 * The result is deduplicated and sorted by code point, so it is a function
 * of the batch contents alone and not of record order.
 */
export function extractRegions(
    records: readonly ServerRecord[],
    matcher: RegionMatcher = patternMatcher,
): RegionName[] {
    const regions = new Set<RegionName>();
    for (const { remarks } of records) {
        const region = matcher.inferRegion(remarks);
        if (region) regions.add(region);
    }
    return sortByCodePoint(regions);
}
