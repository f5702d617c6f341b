/**
 * @fileoverview Resolved value & resolved token
 *
 * A resolved token is a candidate entity: its range, the derivation node
 * behind it, its resolved value and whether it is latent. Candidates are
 * totally ordered by range, then by the canonical JSON of the value, then
 * non-latent before latent; remaining ties (distinct candidates with the
 * same value text) fall back to dimension name and payload key.
 *
 * @module @spanwise/engine/contracts/Resolved
 */

import { stableStringify, type JsonValue } from "../util/json.js";
import type { Dimension } from "./Dimension.js";
import type { Node } from "./Node.js";
import { compareRanges, type Range } from "./Range.js";
import { tokenKey } from "./Token.js";

export interface ResolvedVal<R extends JsonValue = JsonValue> {
    readonly dimension: Dimension<unknown, R>;
    readonly value: R;
}

export interface ResolvedToken {
    readonly range: Range;
    readonly node: Node;
    readonly rval: ResolvedVal;
    readonly isLatent: boolean;
}

/**
 * Canonical JSON text of a resolved value.
 */
export function resolvedValText(rval: ResolvedVal): string {
    return stableStringify(rval.value);
}

export function resolvedValEquals(a: ResolvedVal, b: ResolvedVal): boolean {
    return a.dimension === b.dimension && resolvedValText(a) === resolvedValText(b);
}

export function showResolvedVal(rval: ResolvedVal): string {
    return `${rval.dimension.name} ${resolvedValText(rval)}`;
}

function compareText(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

export function compareResolvedTokens(a: ResolvedToken, b: ResolvedToken): number {
    return (
        compareRanges(a.range, b.range) ||
        compareText(resolvedValText(a.rval), resolvedValText(b.rval)) ||
        Number(a.isLatent) - Number(b.isLatent) ||
        compareText(a.rval.dimension.name, b.rval.dimension.name) ||
        compareText(tokenKey(a.node.token), tokenKey(b.node.token))
    );
}
