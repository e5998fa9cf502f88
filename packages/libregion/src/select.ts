// libregion/src/select.ts
// Pick representative nodes per region bucket.

import { compareCodePoints } from './compare.js';
import type { BucketEntry, PipelineLogger, RegionBuckets, ServerRecord } from './types.js';

/**
 * Order a bucket: labels starting with the region name first, then by
 * label. Stable, so equal labels keep their input order.
 */
export function sortBucket<T extends ServerRecord>(entries: readonly BucketEntry<T>[]): BucketEntry<T>[] {
    return [...entries].sort((a, b) => {
        if (a.startsWithRegion !== b.startsWithRegion) return a.startsWithRegion ? -1 : 1;
        return compareCodePoints(a.record.remarks, b.record.remarks);
    });
}

/**
 * First and last of the sorted bucket, or the single entry.
 *
 * Two selections are made for any bucket with two or more entries, even if
 * both ends carry identical records.
 */
export function selectFromBucket<T extends ServerRecord>(entries: readonly BucketEntry<T>[]): T[] {
    if (entries.length === 0) return [];
    const sorted = sortBucket(entries);
    if (sorted.length === 1) return [sorted[0].record];
    return [sorted[0].record, sorted[sorted.length - 1].record];
}

/**
 * Representatives of every bucket, in the map's iteration order.
 */
export function selectRepresentatives<T extends ServerRecord>(
    buckets: RegionBuckets<T>,
    logger?: PipelineLogger,
): T[] {
    const selected: T[] = [];
    for (const [region, entries] of buckets) {
        const picks = selectFromBucket(entries);
        for (const record of picks) {
            logger?.info(`  - Selected node from ${region}: ${record.remarks}`);
        }
        if (picks.length > 1) {
            logger?.info(`  - Total: Selected ${picks.length} nodes from ${region}`);
        }
        selected.push(...picks);
    }
    return selected;
}
