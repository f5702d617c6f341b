/**
 * @fileoverview Measured quantities
 *
 * AmountOfMoney, Distance, Quantity, Temperature and Volume share one
 * payload shape: a value or an interval, plus an optional unit. A payload
 * without a unit only resolves for Temperature, and then as latent ("20"
 * may be a temperature, but nothing says so).
 *
 * @module @spanwise/engine/dimensions/Measure
 */

import { defineDimension, seal, type Dimension } from "../contracts/Dimension.js";
import { isRecord } from "../util/json.js";
import { Numeral } from "./Numeral.js";

export interface MeasureData {
    readonly value: number | null;
    readonly unit: string | null;
    readonly minValue: number | null;
    readonly maxValue: number | null;
}

export type MeasureValue =
    | { type: "value"; value: number; unit: string | null }
    | { type: "interval"; from: number | null; to: number | null; unit: string | null };

export function isMeasureData(raw: unknown): raw is MeasureData {
    const nullableNumber = (field: unknown): boolean => field === null || (typeof field === "number" && Number.isFinite(field));
    return (
        isRecord(raw) &&
        nullableNumber(raw.value) &&
        (raw.unit === null || typeof raw.unit === "string") &&
        nullableNumber(raw.minValue) &&
        nullableNumber(raw.maxValue)
    );
}

/**
 * Measure payload helper; unspecified fields are null.
 */
export function measureData(fields: Partial<MeasureData>): MeasureData {
    return {
        value   : fields.value ?? null,
        unit    : fields.unit ?? null,
        minValue: fields.minValue ?? null,
        maxValue: fields.maxValue ?? null,
    };
}

function defineMeasure(name: string, wireName: string, latentWithoutUnit: boolean): Dimension<MeasureData, MeasureValue> {
    return defineDimension<MeasureData, MeasureValue>({
        name,
        wireName,
        dependencies: [seal(Numeral)],
        resolve     : ({ value, unit, minValue, maxValue }) => {
            if (unit === null && !latentWithoutUnit) {
                return null;
            }
            const latent = unit === null;

            if (value !== null) {
                return { value: { type: "value", value, unit }, latent };
            }
            if (minValue === null && maxValue === null) {
                return null;
            }
            if (minValue !== null && maxValue !== null && minValue > maxValue) {
                return null;
            }
            return { value: { type: "interval", from: minValue, to: maxValue, unit }, latent };
        },
        isPayload: isMeasureData,
    });
}

export const AmountOfMoney = defineMeasure("AmountOfMoney", "amount-of-money", false);
export const Distance = defineMeasure("Distance", "distance", false);
export const Quantity = defineMeasure("Quantity", "quantity", false);
export const Temperature = defineMeasure("Temperature", "temperature", true);
export const Volume = defineMeasure("Volume", "volume", false);
