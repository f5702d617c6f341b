/**
 * @fileoverview Ordinal dimension
 *
 * @module @spanwise/engine/dimensions/Ordinal
 */

import { defineDimension, seal } from "../contracts/Dimension.js";
import { isRecord } from "../util/json.js";
import { Numeral } from "./Numeral.js";

export interface OrdinalData {
    readonly value: number;
}

export type OrdinalValue = {
    type: "value";
    value: number;
};

export const Ordinal = defineDimension<OrdinalData, OrdinalValue>({
    name        : "Ordinal",
    wireName    : "ordinal",
    dependencies: [seal(Numeral)],
    resolve     : ({ value }) => ({ value: { type: "value", value }, latent: false }),
    isPayload   : (raw: unknown): raw is OrdinalData => isRecord(raw) && typeof raw.value === "number" && Number.isInteger(raw.value),
});
