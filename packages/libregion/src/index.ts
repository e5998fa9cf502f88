// libregion/src/index.ts
// Public API — region inference and representative node selection.

// Types
export type {
    ServerRecord,
    RegionName,
    BucketEntry,
    RegionBuckets,
    RegionMatcher,
    PipelineLogger,
} from './types.js';
export { OTHER_REGION } from './types.js';

// Ordering
export { compareCodePoints, sortByCodePoint } from './compare.js';

// Info-node filter
export { INFO_MARKERS, isInfoLabel, filterInfoNodes } from './filter.js';
export type { FilterResult } from './filter.js';

// Region inference
export {
    PREFIX_PATTERN,
    EMBEDDED_PATTERN,
    matchPrefixRegion,
    matchEmbeddedRegion,
    patternMatcher,
    createMatcher,
} from './matcher.js';
export { extractRegions } from './extract.js';

// Grouping and selection
export { groupByRegion } from './group.js';
export type { GroupOptions } from './group.js';
export { sortBucket, selectFromBucket, selectRepresentatives } from './select.js';

// Pipeline
export { selectNodes } from './pipeline.js';
export type { SelectOptions, SelectionResult } from './pipeline.js';
