// libregion/src/types.ts
// Shared types for region inference and node selection.

/**
 * A Shadowsocks credential record as it appears in the subscription export.
 * Extra keys are carried through untouched.
 */
export interface ServerRecord {
    readonly remarks: string;
    readonly server: string;
    readonly server_port: number;
    readonly method: string;
    readonly password: string;
    readonly [key: string]: unknown;
}

/** Region label inferred from node remarks. Compared by exact string equality. */
export type RegionName = string;

/** Fallback bucket for records no region could be inferred for. */
export const OTHER_REGION: RegionName = 'Other';

export interface BucketEntry<T extends ServerRecord = ServerRecord> {
    record: T;
    startsWithRegion: boolean;
}

export type RegionBuckets<T extends ServerRecord = ServerRecord> = Map<RegionName, BucketEntry<T>[]>;

/**
 * Pluggable region inference.
 *
 * `inferRegion` is the full matcher used to build the candidate set;
 * `inferPrefixRegion` is the stricter stage the grouper retries on a
 * single label when no candidate occurs in it.
 */
export interface RegionMatcher {
    inferRegion(label: string): RegionName | undefined;
    inferPrefixRegion(label: string): RegionName | undefined;
}

/** Minimal logger surface — satisfied by winston and by `console`. */
export interface PipelineLogger {
    info(message: string): unknown;
    debug(message: string): unknown;
}
