/**
 * @fileoverview Numeral dimension
 *
 * @module @spanwise/engine/dimensions/Numeral
 */

import { defineDimension } from "../contracts/Dimension.js";
import { createToken, type Token } from "../contracts/Token.js";
import { isRecord } from "../util/json.js";

export interface NumeralData {
    readonly value: number;

    /** Power of ten of a multiplier word or of a product ("two hundred" -> 2), else null */
    readonly grain: number | null;

    /** Can be scaled by a following multiplier ("two" in "two hundred") */
    readonly multipliable: boolean;

    /** Is itself a multiplier word ("hundred"); products are not */
    readonly multiplier: boolean;
}

export type NumeralValue = {
    type: "value";
    value: number;
};

export function isNumeralData(raw: unknown): raw is NumeralData {
    return (
        isRecord(raw) &&
        typeof raw.value === "number" &&
        Number.isFinite(raw.value) &&
        (raw.grain === null || (typeof raw.grain === "number" && Number.isInteger(raw.grain))) &&
        typeof raw.multipliable === "boolean" &&
        typeof raw.multiplier === "boolean"
    );
}

export const Numeral = defineDimension<NumeralData, NumeralValue>({
    name     : "Numeral",
    wireName : "number",
    show     : ({ value, grain }) => (grain === null ? `Numeral ${value}` : `Numeral ${value} (grain ${grain})`),
    resolve  : ({ value }) => ({ value: { type: "value", value }, latent: false }),
    isPayload: isNumeralData,
});

/**
 * Numeral token helper.
 *
 * @example
 * ```typescript
 * numeralToken(2, { multipliable: true });
 * numeralToken(100, { grain: 2, multiplier: true });
 * ```
 */
export function numeralToken(
    value: number,
    options: { grain?: number | null; multipliable?: boolean; multiplier?: boolean } = {}
): Token<NumeralData> {
    return createToken(Numeral, {
        value,
        grain       : options.grain ?? null,
        multipliable: options.multipliable ?? false,
        multiplier  : options.multiplier ?? false,
    });
}
