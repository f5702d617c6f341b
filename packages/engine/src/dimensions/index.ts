/**
 * @fileoverview Built-in dimensions
 *
 * @module @spanwise/engine/dimensions
 */

import type { Dimension } from "../contracts/Dimension.js";
import { Duration } from "./Duration.js";
import { AmountOfMoney, Distance, Quantity, Temperature, Volume } from "./Measure.js";
import { Numeral } from "./Numeral.js";
import { Ordinal } from "./Ordinal.js";
import { RegexMatch } from "./RegexMatch.js";
import { CreditCardNumber, Email, PhoneNumber, Url } from "./Text.js";
import { Time } from "./Time.js";
import { TimeGrain } from "./TimeGrain.js";

export { RegexMatch, type GroupMatch } from "./RegexMatch.js";
export { Numeral, numeralToken, isNumeralData, type NumeralData, type NumeralValue } from "./Numeral.js";
export { Ordinal, type OrdinalData, type OrdinalValue } from "./Ordinal.js";
export { TimeGrain, GRAINS, grainSeconds, isGrain, type Grain } from "./TimeGrain.js";
export { Duration, type DurationData, type DurationValue } from "./Duration.js";
export {
    Time,
    timeData,
    isTimeData,
    nextMatchingInstant,
    truncateToGrain,
    type TimeData,
    type TimeValue,
} from "./Time.js";
export {
    AmountOfMoney,
    Distance,
    Quantity,
    Temperature,
    Volume,
    measureData,
    isMeasureData,
    type MeasureData,
    type MeasureValue,
} from "./Measure.js";
export {
    Email,
    Url,
    PhoneNumber,
    CreditCardNumber,
    formatPhoneNumber,
    type EmailData,
    type EmailValue,
    type UrlData,
    type UrlValue,
    type PhoneNumberData,
    type PhoneNumberValue,
    type CreditCardNumberData,
    type CreditCardNumberValue,
} from "./Text.js";

/**
 * The closed set of built-in dimensions.
 */
export const BUILTIN_DIMENSIONS: readonly Dimension[] = Object.freeze([
    RegexMatch,
    AmountOfMoney,
    CreditCardNumber,
    Distance,
    Duration,
    Email,
    Numeral,
    Ordinal,
    PhoneNumber,
    Quantity,
    Temperature,
    Time,
    TimeGrain,
    Url,
    Volume,
]);
