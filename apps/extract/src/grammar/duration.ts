/**
 * @fileoverview Durations
 *
 * @module grammar/duration
 */

import {
    Duration,
    Numeral,
    TimeGrain,
    createRule,
    createToken,
    defineRuleSet,
    dimension,
    dimensionWhere,
    payloadOf,
} from "@spanwise/engine";

export const ruleNumeralGrain = createRule(
    "<integer> <unit-of-duration>",
    [
        dimensionWhere(Numeral, (n) => !n.multiplier && n.value >= 0, "amount"),
        dimension(TimeGrain),
    ],
    ([first, second]) => {
        const amount = payloadOf(Numeral, first);
        const grain = payloadOf(TimeGrain, second);
        return amount && grain ? createToken(Duration, { value: amount.value, grain }) : null;
    }
);

export const durationRules = defineRuleSet(Duration, {
    langRules: {
        EN: [ruleNumeralGrain],
    },
});
