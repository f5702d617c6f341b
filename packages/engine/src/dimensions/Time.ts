/**
 * @fileoverview Time dimension
 *
 * A time payload pins some calendar fields (year, month, day, hour, minute)
 * and leaves the rest open. Resolution picks the first instant, at the
 * payload's grain, that agrees with every pinned field and is not before
 * the reference time. A pinned year lifts the reference bound: "March 3
 * 2020" is March 3rd, 2020 whatever the reference. Fields finer than the
 * finest pinned one take their minimum ("March" -> March 1st, 00:00).
 * All arithmetic is in UTC.
 *
 * @module @spanwise/engine/dimensions/Time
 */

import { defineDimension, seal } from "../contracts/Dimension.js";
import { isRecord } from "../util/json.js";
import { Duration } from "./Duration.js";
import { Numeral } from "./Numeral.js";
import { Ordinal } from "./Ordinal.js";
import { TimeGrain, isGrain, type Grain } from "./TimeGrain.js";

export interface TimeData {
    readonly year: number | null;

    /** 1-12 */
    readonly month: number | null;

    /** 1-31 */
    readonly dayOfMonth: number | null;

    /** 0-23 */
    readonly hour: number | null;

    /** 0-59 */
    readonly minute: number | null;

    readonly grain: Grain;

    /** Plausible but unconfirmed on its own (a bare month name) */
    readonly latent: boolean;
}

export type TimeValue = {
    type: "value";
    value: string;
    grain: Grain;
};

/** How many years ahead an open year may roll (covers February 29th) */
const kYEAR_HORIZON = 8;

const kFIELD_BOUNDS: readonly (readonly [number, number])[] = [
    [1, 9999],
    [1, 12],
    [1, 31],
    [0, 23],
    [0, 59],
];

function fieldsOf(data: TimeData): readonly (number | null)[] {
    return [data.year, data.month, data.dayOfMonth, data.hour, data.minute];
}

function daysInMonth(year: number, month: number): number {
    return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Start of the grain containing `instant`. Weeks start on Monday.
 */
export function truncateToGrain(instant: Date, grain: Grain): Date {
    const year = instant.getUTCFullYear();
    const month = instant.getUTCMonth();
    const day = instant.getUTCDate();

    switch (grain) {
        case "second":
            return new Date(Math.floor(instant.getTime() / 1000) * 1000);
        case "minute":
            return new Date(Date.UTC(year, month, day, instant.getUTCHours(), instant.getUTCMinutes()));
        case "hour":
            return new Date(Date.UTC(year, month, day, instant.getUTCHours()));
        case "day":
            return new Date(Date.UTC(year, month, day));
        case "week": {
            const sinceMonday = (instant.getUTCDay() + 6) % 7;
            return new Date(Date.UTC(year, month, day - sinceMonday));
        }
        case "month":
            return new Date(Date.UTC(year, month, 1));
        case "quarter":
            return new Date(Date.UTC(year, month - (month % 3), 1));
        case "year":
            return new Date(Date.UTC(year, 0, 1));
    }
}

/**
 * End (exclusive) of the period named by the leading `parts`
 * (year, month, day, hour, minute).
 */
function periodEnd(parts: readonly number[]): number {
    const [year, month = 1, day = 1, hour = 0, minute = 0] = parts;
    switch (parts.length) {
        case 1:
            return Date.UTC(year + 1, 0, 1);
        case 2:
            return Date.UTC(year, month, 1);
        case 3:
            return Date.UTC(year, month - 1, day + 1);
        case 4:
            return Date.UTC(year, month - 1, day, hour + 1);
        default:
            return Date.UTC(year, month - 1, day, hour, minute + 1);
    }
}

/**
 * First instant matching the payload at or after the reference time
 * (any time within a pinned year), or null when no such instant exists
 * within the horizon.
 */
export function nextMatchingInstant(data: TimeData, reference: Date): Date | null {
    const fields = fieldsOf(data);

    for (let i = 0; i < fields.length; i++) {
        const field = fields[i];
        const [min, max] = kFIELD_BOUNDS[i];
        if (field !== null && (!Number.isInteger(field) || field < min || field > max)) {
            return null;
        }
    }

    let finest = -1;
    for (let i = 0; i < fields.length; i++) {
        if (fields[i] !== null) {
            finest = i;
        }
    }
    if (finest < 0) {
        return null;
    }

    const threshold = data.year === null
        ? truncateToGrain(reference, data.grain).getTime()
        : Number.NEGATIVE_INFINITY;
    const referenceYear = reference.getUTCFullYear();

    const valuesAt = (level: number, parts: readonly number[]): number[] => {
        const pinned = fields[level];
        if (level === 2) {
            const limit = daysInMonth(parts[0], parts[1]);
            if (pinned !== null) {
                return pinned <= limit ? [pinned] : [];
            }
            return level > finest ? [1] : Array.from({ length: limit }, (_, i) => i + 1);
        }
        if (pinned !== null) {
            return [pinned];
        }
        const [min, max] = kFIELD_BOUNDS[level];
        if (level === 0) {
            return Array.from({ length: kYEAR_HORIZON + 1 }, (_, i) => referenceYear + i);
        }
        if (level > finest) {
            return [min];
        }
        return Array.from({ length: max - min + 1 }, (_, i) => min + i);
    };

    const search = (level: number, parts: readonly number[]): number | null => {
        if (level === fields.length) {
            const [year, month, day, hour, minute] = parts;
            const instant = Date.UTC(year, month - 1, day, hour, minute);
            return instant >= threshold ? instant : null;
        }
        for (const value of valuesAt(level, parts)) {
            const next = [...parts, value];
            if (periodEnd(next) <= threshold) {
                continue;
            }
            const found = search(level + 1, next);
            if (found !== null) {
                return found;
            }
        }
        return null;
    };

    const found = search(0, []);
    return found === null ? null : new Date(found);
}

export function isTimeData(raw: unknown): raw is TimeData {
    const nullableInteger = (field: unknown): boolean => field === null || (typeof field === "number" && Number.isInteger(field));
    return (
        isRecord(raw) &&
        nullableInteger(raw.year) &&
        nullableInteger(raw.month) &&
        nullableInteger(raw.dayOfMonth) &&
        nullableInteger(raw.hour) &&
        nullableInteger(raw.minute) &&
        isGrain(raw.grain) &&
        typeof raw.latent === "boolean"
    );
}

export const Time = defineDimension<TimeData, TimeValue>({
    name        : "Time",
    wireName    : "time",
    dependencies: [seal(Numeral), seal(Ordinal), seal(Duration), seal(TimeGrain)],
    resolve     : (data, context) => {
        const instant = nextMatchingInstant(data, context.referenceTime);
        if (!instant) {
            return null;
        }
        return {
            value : { type: "value", value: instant.toISOString(), grain: data.grain },
            latent: data.latent,
        };
    },
    isPayload: isTimeData,
});

/**
 * Time payload helper; unspecified fields are open.
 */
export function timeData(fields: Partial<TimeData> & { grain: Grain }): TimeData {
    return {
        year      : fields.year ?? null,
        month     : fields.month ?? null,
        dayOfMonth: fields.dayOfMonth ?? null,
        hour      : fields.hour ?? null,
        minute    : fields.minute ?? null,
        grain     : fields.grain,
        latent    : fields.latent ?? false,
    };
}
