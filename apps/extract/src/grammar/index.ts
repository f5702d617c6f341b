/**
 * @fileoverview Sample English grammar (code rules)
 *
 * @module grammar
 */

import type { RuleSetRegistration } from "@spanwise/engine";
import { durationRules } from "./duration.js";
import { measureRules } from "./measure.js";
import { numeralRules } from "./numeral.js";
import { timeRules } from "./time.js";

export { numeralRules, ruleMultiply, ruleTensAndUnits, ruleSumWithMultiple } from "./numeral.js";
export { timeRules, ruleMonthDay, ruleOrdinalOfMonth, ruleDateYear } from "./time.js";
export { durationRules, ruleNumeralGrain } from "./duration.js";
export { measureRules, ruleSymbolAmount, ruleAmountWord, ruleDegrees } from "./measure.js";

/**
 * Every code rule set of the sample grammar.
 */
export const grammarRuleSets: readonly RuleSetRegistration[] = [
    numeralRules,
    timeRules,
    durationRules,
    ...measureRules,
];
