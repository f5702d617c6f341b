/**
 * @fileoverview Unit tests for candidate ranking
 *
 * @module @spanwise/engine/__tests__/Ranking
 */

import { describe, it, expect } from "vitest";
import { rank } from "../engine/Ranking.js";
import type { Dimension } from "../contracts/Dimension.js";
import { createRange } from "../contracts/Range.js";
import type { ResolvedToken } from "../contracts/Resolved.js";
import { createToken } from "../contracts/Token.js";
import { Numeral, numeralToken } from "../dimensions/Numeral.js";
import { Ordinal } from "../dimensions/Ordinal.js";
import { isRecord } from "../util/json.js";

function candidate(
    start: number,
    end: number,
    value: number,
    options: { dimension?: Dimension; latent?: boolean } = {}
): ResolvedToken {
    const dimension = options.dimension ?? Numeral;
    const range = createRange(start, end);
    const token = dimension === Ordinal ? createToken(Ordinal, { value }) : numeralToken(value);
    return {
        range,
        node    : { range, token, children: [], rule: "test" },
        rval    : { dimension, value: { type: "value", value } },
        isLatent: options.latent ?? false,
    };
}

/**
 * [start, end, resolved value] of each token.
 */
function spans(tokens: readonly ResolvedToken[]): [number, number, number | null][] {
    return tokens.map(({ range, rval }) => {
        const resolved = rval.value;
        return [range.start, range.end, isRecord(resolved) && typeof resolved.value === "number" ? resolved.value : null];
    });
}

describe("rank", () => {
    // Scenario: "two" inside "two hundred"
    it("should drop candidates strictly inside another of the same dimension", () => {
        const winners = rank([candidate(0, 3, 2), candidate(0, 11, 200), candidate(4, 11, 100)], { withLatent: false });

        expect(spans(winners)).toEqual([[0, 11, 200]]);
    });

    it("should keep contained candidates of other dimensions", () => {
        const winners = rank([candidate(0, 11, 200), candidate(0, 3, 2, { dimension: Ordinal })], { withLatent: false });

        expect(winners.map((token) => token.rval.dimension)).toEqual([Ordinal, Numeral]);
    });

    it("should keep an equal-range candidate of the same dimension in its group", () => {
        const winners = rank([candidate(0, 3, 3), candidate(0, 3, 12)], { withLatent: false });

        // Canonical value text '{"type":"value","value":12}' sorts first
        expect(spans(winners)).toEqual([[0, 3, 12]]);
    });

    describe("latent candidates", () => {
        it("should drop a latent candidate overlapping a confident one", () => {
            const winners = rank([candidate(0, 5, 1, { latent: true }), candidate(3, 8, 2, { dimension: Ordinal })], { withLatent: false });

            expect(spans(winners)).toEqual([[3, 8, 2]]);
        });

        it("should keep a latent candidate with nothing confident around it", () => {
            const winners = rank([candidate(0, 5, 1, { latent: true }), candidate(6, 8, 2)], { withLatent: false });

            expect(spans(winners)).toEqual([[0, 5, 1], [6, 8, 2]]);
        });

        it("should keep overlapping latent candidates when asked", () => {
            const winners = rank([candidate(0, 5, 1, { latent: true }), candidate(3, 8, 2, { dimension: Ordinal })], { withLatent: true });

            expect(spans(winners)).toEqual([[0, 5, 1], [3, 8, 2]]);
        });

        it("should prefer the confident candidate among equal values", () => {
            const latent = candidate(0, 5, 1, { latent: true, dimension: Ordinal });
            const confident = candidate(0, 5, 1, { dimension: Ordinal });

            expect(rank([latent, confident], { withLatent: true })).toEqual([confident]);
        });
    });

    describe("overlap policy", () => {
        const chained = [candidate(4, 7, 3, { dimension: Ordinal }), candidate(2, 5, 2), candidate(0, 3, 1, { dimension: Ordinal })];

        it("should group only equal ranges by default", () => {
            expect(spans(rank(chained, { withLatent: false }))).toEqual([[0, 3, 1], [2, 5, 2], [4, 7, 3]]);
        });

        it("should collapse chains of overlapping candidates", () => {
            expect(spans(rank(chained, { withLatent: false, overlap: "overlapping" }))).toEqual([[0, 3, 1]]);
        });

        it("should not group touching candidates", () => {
            const touching = [candidate(0, 3, 1), candidate(3, 5, 2)];

            expect(spans(rank(touching, { withLatent: false, overlap: "overlapping" }))).toEqual([[0, 3, 1], [3, 5, 2]]);
        });
    });

    it("should not depend on input order", () => {
        const tokens = [candidate(6, 8, 5), candidate(0, 3, 3), candidate(0, 3, 12), candidate(0, 5, 1, { latent: true })];

        expect(rank([...tokens].reverse(), { withLatent: true })).toEqual(rank(tokens, { withLatent: true }));
    });

    it("should return nothing for no candidates", () => {
        expect(rank([], { withLatent: false })).toEqual([]);
    });
});
