// libregion/src/pipeline.ts
// filter → extract → group → select, over one in-memory batch.

import { extractRegions } from './extract.js';
import { filterInfoNodes, INFO_MARKERS } from './filter.js';
import { groupByRegion } from './group.js';
import { patternMatcher } from './matcher.js';
import { selectRepresentatives } from './select.js';
import type { PipelineLogger, RegionBuckets, RegionMatcher, RegionName, ServerRecord } from './types.js';

export interface SelectOptions {
    matcher?: RegionMatcher;
    markers?: readonly string[];
    logger?: PipelineLogger;
}

export interface SelectionResult<T extends ServerRecord> {
    selected: T[];
    buckets: RegionBuckets<T>;
    /** Candidate regions inferred from labels, code-point sorted. */
    regions: RegionName[];
    /** Records removed by the info-node filter. */
    droppedCount: number;
}

export function selectNodes<T extends ServerRecord>(
    records: readonly T[],
    options: SelectOptions = {},
): SelectionResult<T> {
    const { logger } = options;
    const matcher = options.matcher ?? patternMatcher;

    const { valid, droppedCount } = filterInfoNodes(records, options.markers ?? INFO_MARKERS);
    logger?.info(`Found ${valid.length} valid nodes after filtering info nodes`);
    if (droppedCount > 0) logger?.debug(`Dropped ${droppedCount} info nodes`);

    const regions = extractRegions(valid, matcher);
    logger?.info(`Detected ${regions.length} possible regions from node names`);
    if (regions.length > 0) logger?.info(`  - Detected regions: ${regions.join(', ')}`);

    const buckets = groupByRegion(valid, regions, { matcher, logger });
    logger?.info(`Grouped nodes into ${buckets.size} regions`);
    for (const [region, entries] of buckets) {
        logger?.info(`  - ${region}: ${entries.length} nodes`);
    }

    const selected = selectRepresentatives(buckets, logger);
    return { selected, buckets, regions, droppedCount };
}
