/**
 * @fileoverview TimeGrain dimension
 *
 * Units of time ("minute", "week", ...). Building block for Duration and
 * Time rules; never resolves on its own.
 *
 * @module @spanwise/engine/dimensions/TimeGrain
 */

import { defineDimension } from "../contracts/Dimension.js";

export type Grain = "second" | "minute" | "hour" | "day" | "week" | "month" | "quarter" | "year";

/** Finest first */
export const GRAINS: readonly Grain[] = Object.freeze([
    "second",
    "minute",
    "hour",
    "day",
    "week",
    "month",
    "quarter",
    "year",
]);

const kSECONDS: Readonly<Record<Grain, number>> = {
    second : 1,
    minute : 60,
    hour   : 3600,
    day    : 86400,
    week   : 604800,
    month  : 2592000,
    quarter: 7776000,
    year   : 31536000,
};

export function isGrain(raw: unknown): raw is Grain {
    return typeof raw === "string" && GRAINS.some((grain) => grain === raw);
}

/**
 * Length of one grain in seconds (months are 30 days, years 365).
 */
export function grainSeconds(grain: Grain): number {
    return kSECONDS[grain];
}

export const TimeGrain = defineDimension<Grain, never>({
    name     : "TimeGrain",
    wireName : "time-grain",
    key      : (grain) => grain,
    show     : (grain) => `TimeGrain ${grain}`,
    resolve  : () => null,
    isPayload: isGrain,
});
