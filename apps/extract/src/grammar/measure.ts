/**
 * @fileoverview Money and temperature
 *
 * @module grammar/measure
 */

import {
    AmountOfMoney,
    Numeral,
    Temperature,
    createRule,
    createToken,
    defineRuleSet,
    dimension,
    measureData,
    payloadOf,
    regex,
    regexGroups,
} from "@spanwise/engine";

const kCURRENCY_SYMBOLS: Readonly<Record<string, string>> = {
    "$": "USD",
    "€": "EUR",
    "£": "GBP",
};

const kCURRENCY_WORDS: Readonly<Record<string, string>> = {
    dollar: "USD",
    euro  : "EUR",
    pound : "GBP",
};

export const ruleSymbolAmount = createRule(
    "<currency-symbol> <amount>",
    [regex("(\\$|€|£)"), dimension(Numeral)],
    ([first, second]) => {
        const unit = kCURRENCY_SYMBOLS[regexGroups(first)?.[0] ?? ""];
        const amount = payloadOf(Numeral, second);
        return unit && amount ? createToken(AmountOfMoney, measureData({ value: amount.value, unit })) : null;
    }
);

export const ruleAmountWord = createRule(
    "<amount> <currency-word>",
    [dimension(Numeral), regex("(dollar|euro|pound)s?")],
    ([first, second]) => {
        const amount = payloadOf(Numeral, first);
        const unit = kCURRENCY_WORDS[(regexGroups(second)?.[0] ?? "").toLowerCase()];
        return unit && amount ? createToken(AmountOfMoney, measureData({ value: amount.value, unit })) : null;
    }
);

export const ruleDegrees = createRule(
    "<amount> degrees [celsius|fahrenheit]",
    [dimension(Numeral), regex("(?:degrees?|°)(?:[ \\t]*(celsius|fahrenheit|c|f)(?![\\p{L}]))?")],
    ([first, second]) => {
        const amount = payloadOf(Numeral, first);
        const scale = (regexGroups(second)?.[0] ?? "").toLowerCase();
        if (!amount) {
            return null;
        }
        const unit = scale === "" ? null : scale.startsWith("c") ? "celsius" : "fahrenheit";
        return createToken(Temperature, measureData({ value: amount.value, unit }));
    }
);

export const measureRules = [
    defineRuleSet(AmountOfMoney, { rules: [ruleSymbolAmount], langRules: { EN: [ruleAmountWord] } }),
    defineRuleSet(Temperature, { langRules: { EN: [ruleDegrees] } }),
];
