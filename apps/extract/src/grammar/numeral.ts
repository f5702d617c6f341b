/**
 * @fileoverview Numeral composition
 *
 * Word lookups live in rules/system/numerals.yml; these rules combine them:
 * "two hundred" (multiplication), "twenty one" (tens + units) and
 * "two hundred five" (a multiple plus a smaller number).
 *
 * Only the multiplier words themselves ("hundred", "thousand") scale a
 * number. A product keeps the multiplier's grain but is not a multiplier,
 * so "one hundred" is never multiplied again.
 *
 * @module grammar/numeral
 */

import {
    Numeral,
    createRule,
    defineRuleSet,
    dimensionWhere,
    numeralToken,
    payloadOf,
    type NumeralData,
} from "@spanwise/engine";

const isTens = (n: NumeralData): boolean =>
    n.grain === null && Number.isInteger(n.value) && n.value >= 20 && n.value <= 90 && n.value % 10 === 0;

const isUnit = (n: NumeralData): boolean =>
    n.grain === null && Number.isInteger(n.value) && n.value >= 1 && n.value <= 9;

export const ruleMultiply = createRule(
    "compose by multiplication",
    [
        dimensionWhere(Numeral, (n) => n.multipliable, "multipliable numeral"),
        dimensionWhere(Numeral, (n) => n.multiplier, "power of ten"),
    ],
    ([first, second]) => {
        const factor = payloadOf(Numeral, first);
        const multiplier = payloadOf(Numeral, second);
        if (!factor || !multiplier || factor.value >= multiplier.value) {
            return null;
        }
        return numeralToken(factor.value * multiplier.value, { grain: multiplier.grain });
    }
);

export const ruleTensAndUnits = createRule(
    "integer 21..99",
    [
        dimensionWhere(Numeral, isTens, "tens"),
        dimensionWhere(Numeral, isUnit, "unit"),
    ],
    ([first, second]) => {
        const tens = payloadOf(Numeral, first);
        const units = payloadOf(Numeral, second);
        if (!tens || !units) {
            return null;
        }
        return numeralToken(tens.value + units.value, { multipliable: true });
    }
);

export const ruleSumWithMultiple = createRule(
    "intersect (multiple + smaller)",
    [
        dimensionWhere(Numeral, (n) => n.grain !== null && !n.multipliable, "multiple"),
        dimensionWhere(Numeral, (n) => !n.multiplier, "numeral"),
    ],
    ([first, second]) => {
        const multiple = payloadOf(Numeral, first);
        const rest = payloadOf(Numeral, second);
        if (!multiple || multiple.grain === null || !rest || rest.value >= 10 ** multiple.grain) {
            return null;
        }
        if (rest.grain !== null && rest.grain >= multiple.grain) {
            return null;
        }
        return numeralToken(multiple.value + rest.value);
    }
);

export const numeralRules = defineRuleSet(Numeral, {
    langRules: {
        EN: [ruleMultiply, ruleTensAndUnits, ruleSumWithMultiple],
    },
});
