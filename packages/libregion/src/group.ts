// libregion/src/group.ts
// Assign every record to exactly one region bucket.

import { compareCodePoints, sortByCodePoint } from './compare.js';
import { patternMatcher } from './matcher.js';
import { OTHER_REGION } from './types.js';
import type {
    BucketEntry,
    PipelineLogger,
    RegionBuckets,
    RegionMatcher,
    RegionName,
    ServerRecord,
} from './types.js';

export interface GroupOptions {
    matcher?: RegionMatcher;
    logger?: PipelineLogger;
}

/**
 * Group records by the first candidate region (in code-point order) that
 * occurs in their label.
 *
 * Records matching no candidate get one more chance through the matcher's
 * prefix stage on their own label; the rest land in `Other`.
 *
 * The returned map iterates its buckets in code-point order of the bucket
 * name, `Other` included.
 */
export function groupByRegion<T extends ServerRecord>(
    records: readonly T[],
    regions: Iterable<RegionName>,
    options: GroupOptions = {},
): RegionBuckets<T> {
    const matcher = options.matcher ?? patternMatcher;
    const candidates = sortByCodePoint(regions);
    const buckets = new Map<RegionName, BucketEntry<T>[]>();

    const assign = (region: RegionName, entry: BucketEntry<T>): void => {
        const bucket = buckets.get(region);
        if (bucket) bucket.push(entry);
        else buckets.set(region, [entry]);
    };

    for (const record of records) {
        const label = record.remarks;

        const region = candidates.find(candidate => label.includes(candidate));
        if (region !== undefined) {
            assign(region, { record, startsWithRegion: label.startsWith(region) });
            continue;
        }

        const fallback = matcher.inferPrefixRegion(label);
        if (fallback) {
            assign(fallback, { record, startsWithRegion: true });
            continue;
        }

        assign(OTHER_REGION, { record, startsWithRegion: false });
        options.logger?.info(`Node with remarks '${label}' assigned to '${OTHER_REGION}' region`);
    }

    return new Map(
        [...buckets.entries()].sort(([a], [b]) => compareCodePoints(a, b)),
    );
}
