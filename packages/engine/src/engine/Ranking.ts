/**
 * @fileoverview Ranking & deduplication
 *
 * 1. A candidate strictly inside another candidate of the same dimension
 *    is dropped ("two" inside "two hundred").
 * 2. Unless latent results were asked for, a latent candidate overlapping
 *    a non-latent one is dropped.
 * 3. The rest are grouped by equal range ("exact") or by connected overlap
 *    ("overlapping"), and each group keeps its first member in
 *    ResolvedToken order.
 *
 * The winners come back sorted. Input order never affects the result.
 *
 * @module @spanwise/engine/engine/Ranking
 */

import {
    rangeEquals,
    rangesOverlap,
    rangeStrictlyContains,
} from "../contracts/Range.js";
import { compareResolvedTokens, type ResolvedToken } from "../contracts/Resolved.js";

export type OverlapPolicy = "exact" | "overlapping";

export interface RankOptions {
    readonly withLatent: boolean;

    /** Default: "exact" */
    readonly overlap?: OverlapPolicy;
}

function groupByRange(candidates: readonly ResolvedToken[]): ResolvedToken[][] {
    const groups: ResolvedToken[][] = [];
    for (const candidate of candidates) {
        const last = groups[groups.length - 1];
        if (last && rangeEquals(last[0].range, candidate.range)) {
            last.push(candidate);
        }
        else {
            groups.push([candidate]);
        }
    }
    return groups;
}

function groupByOverlap(candidates: readonly ResolvedToken[]): ResolvedToken[][] {
    const groups: ResolvedToken[][] = [];
    let reach = -1;
    for (const candidate of candidates) {
        const last = groups[groups.length - 1];
        if (last && candidate.range.start < reach) {
            last.push(candidate);
            reach = Math.max(reach, candidate.range.end);
        }
        else {
            groups.push([candidate]);
            reach = candidate.range.end;
        }
    }
    return groups;
}

export function rank(candidates: readonly ResolvedToken[], options: RankOptions): ResolvedToken[] {
    const sorted = [...candidates].sort(compareResolvedTokens);

    const outermost = sorted.filter((candidate) =>
        !sorted.some((other) =>
            other.rval.dimension === candidate.rval.dimension &&
            rangeStrictlyContains(other.range, candidate.range)
        )
    );

    const confident = options.withLatent
        ? outermost
        : outermost.filter((candidate) =>
            !candidate.isLatent ||
            !outermost.some((other) => !other.isLatent && rangesOverlap(other.range, candidate.range))
        );

    const groups = (options.overlap ?? "exact") === "overlapping"
        ? groupByOverlap(confident)
        : groupByRange(confident);

    // Groups are built from sorted input, so each group's head is its minimum
    return groups.map((group) => group[0]);
}
