/**
 * @fileoverview Calendar dates
 *
 * Month names come from rules/system/months.yml as latent month-grain
 * times. A day of month (or year) attached to one pins it down.
 *
 * @module grammar/time
 */

import {
    Numeral,
    Ordinal,
    Time,
    createRule,
    createToken,
    defineRuleSet,
    dimensionWhere,
    payloadOf,
    regex,
    type TimeData,
} from "@spanwise/engine";

const isBareMonth = (t: TimeData): boolean =>
    t.month !== null && t.dayOfMonth === null && t.year === null && t.grain === "month";

const isMonthDay = (t: TimeData): boolean =>
    t.month !== null && t.dayOfMonth !== null && t.year === null && t.grain === "day";

const isDayNumber = (value: number): boolean => Number.isInteger(value) && value >= 1 && value <= 31;

function onDay(month: TimeData, day: number): TimeData {
    return { ...month, dayOfMonth: day, grain: "day", latent: false };
}

export const ruleMonthDay = createRule(
    "<named-month> <day-of-month>",
    [
        dimensionWhere(Time, isBareMonth, "named month"),
        dimensionWhere(Numeral, (n) => n.grain === null && isDayNumber(n.value), "day of month"),
    ],
    ([first, second]) => {
        const month = payloadOf(Time, first);
        const day = payloadOf(Numeral, second);
        return month && day ? createToken(Time, onDay(month, day.value)) : null;
    }
);

export const ruleOrdinalOfMonth = createRule(
    "<ordinal> of <named-month>",
    [
        dimensionWhere(Ordinal, (o) => isDayNumber(o.value), "day ordinal"),
        regex("of"),
        dimensionWhere(Time, isBareMonth, "named month"),
    ],
    ([first, , third]) => {
        const day = payloadOf(Ordinal, first);
        const month = payloadOf(Time, third);
        return month && day ? createToken(Time, onDay(month, day.value)) : null;
    }
);

export const ruleDateYear = createRule(
    "<month-day> <year>",
    [
        dimensionWhere(Time, isMonthDay, "month day"),
        dimensionWhere(Numeral, (n) => Number.isInteger(n.value) && n.value >= 1000 && n.value <= 2999, "year"),
    ],
    ([first, second]) => {
        const date = payloadOf(Time, first);
        const year = payloadOf(Numeral, second);
        return date && year ? createToken(Time, { ...date, year: year.value }) : null;
    }
);

export const timeRules = defineRuleSet(Time, {
    langRules: {
        EN: [ruleMonthDay, ruleOrdinalOfMonth, ruleDateYear],
    },
});
