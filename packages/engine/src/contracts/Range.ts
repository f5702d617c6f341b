/**
 * @fileoverview Range Contract
 *
 * Half-open interval `[start, end)` of UTF-16 offsets into the input text.
 * Ordered by start, then end.
 *
 * @module @spanwise/engine/contracts/Range
 */

export interface Range {
    readonly start: number;
    readonly end: number;
}

/**
 * Create a frozen Range.
 *
 * @throws RangeError if the offsets are not integers with `0 <= start <= end`
 */
export function createRange(start: number, end: number): Range {
    if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || start > end) {
        throw new RangeError(`Invalid range [${start}, ${end})`);
    }
    return Object.freeze({ start, end });
}

export function compareRanges(a: Range, b: Range): number {
    return a.start - b.start || a.end - b.end;
}

export function rangeEquals(a: Range, b: Range): boolean {
    return a.start === b.start && a.end === b.end;
}

export function rangesOverlap(a: Range, b: Range): boolean {
    return a.start < b.end && b.start < a.end;
}

export function rangeContains(outer: Range, inner: Range): boolean {
    return outer.start <= inner.start && inner.end <= outer.end;
}

/** `outer` contains `inner` and is wider than it. */
export function rangeStrictlyContains(outer: Range, inner: Range): boolean {
    return rangeContains(outer, inner) && !rangeEquals(outer, inner);
}

export function showRange(range: Range): string {
    return `[${range.start}, ${range.end})`;
}
