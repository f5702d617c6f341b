/**
 * @fileoverview Duration dimension
 *
 * @module @spanwise/engine/dimensions/Duration
 */

import { defineDimension, seal } from "../contracts/Dimension.js";
import { isRecord } from "../util/json.js";
import { Numeral } from "./Numeral.js";
import { TimeGrain, grainSeconds, isGrain, type Grain } from "./TimeGrain.js";

export interface DurationData {
    readonly value: number;
    readonly grain: Grain;
}

export type DurationValue = {
    type: "value";
    value: number;
    unit: Grain;
    normalized: {
        value: number;
        unit: "second";
    };
};

export const Duration = defineDimension<DurationData, DurationValue>({
    name        : "Duration",
    wireName    : "duration",
    dependencies: [seal(Numeral), seal(TimeGrain)],
    show        : ({ value, grain }) => `Duration ${value} ${grain}`,
    resolve     : ({ value, grain }) => {
        if (!Number.isFinite(value) || value < 0) {
            return null;
        }
        return {
            value: {
                type      : "value",
                value,
                unit      : grain,
                normalized: { value: value * grainSeconds(grain), unit: "second" },
            },
            latent: false,
        };
    },
    isPayload: (raw: unknown): raw is DurationData => isRecord(raw) && typeof raw.value === "number" && isGrain(raw.grain),
});
