// libregion/src/matcher.ts
// Two-stage label pattern matcher.
//
// Stage 1 (prefix):   leading run of letters/spaces ended by a hyphen or digit
//                     "HK-01" → "HK", "Hong Kong 02" → "Hong Kong"
// Stage 2 (embedded): run of letters/spaces followed by hyphen-or-space + digits,
//                     anywhere in the label — "🇯🇵 JP 03" → "JP"
//
// A candidate is kept only when it is longer than one character after trimming.

import type { RegionMatcher, RegionName } from './types.js';

export const PREFIX_PATTERN = /^([A-Za-z\s]+)[-\d]/;
export const EMBEDDED_PATTERN = /([A-Za-z\s]+)[-\s]\d+/;

function acceptCandidate(match: RegExpMatchArray | null): RegionName | undefined {
    const region = match?.[1]?.trim();
    return region && region.length > 1 ? region : undefined;
}

export function matchPrefixRegion(label: string): RegionName | undefined {
    return acceptCandidate(label.match(PREFIX_PATTERN));
}

export function matchEmbeddedRegion(label: string): RegionName | undefined {
    return acceptCandidate(label.match(EMBEDDED_PATTERN));
}

/**
 * Default matcher: prefix stage, then embedded stage.
 */
export const patternMatcher: RegionMatcher = {
    inferRegion: label => matchPrefixRegion(label) ?? matchEmbeddedRegion(label),
    inferPrefixRegion: matchPrefixRegion,
};

/**
 * Build a matcher from an ordered list of stages. The first stage doubles
 * as the single-label fallback used while grouping.
 */
export function createMatcher(
    stages: ReadonlyArray<(label: string) => RegionName | undefined>,
): RegionMatcher {
    if (stages.length === 0) throw new Error('createMatcher requires at least one stage');
    const [first] = stages;
    return {
        inferRegion(label) {
            for (const stage of stages) {
                const region = stage(label);
                if (region) return region;
            }
            return undefined;
        },
        inferPrefixRegion: label => first(label),
    };
}
