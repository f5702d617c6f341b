/**
 * @fileoverview Contract barrel exports
 *
 * The data model shared by the registry, the derivation engine and
 * callers: dimensions, tokens, rules, nodes, resolved tokens, entities.
 *
 * @module @spanwise/engine/contracts
 */

// Errors
export {
    SpanwiseError,
    RegistryError,
    DerivationLimitError,
    EntityFormatError,
    RuleLoadError,
} from "./Errors.js";

// Range
export {
    createRange,
    compareRanges,
    rangeEquals,
    rangesOverlap,
    rangeContains,
    rangeStrictlyContains,
    showRange,
    type Range,
} from "./Range.js";

// Locale & context
export {
    makeLocale,
    makeContext,
    showLocale,
    type Lang,
    type Region,
    type Locale,
    type Context,
    type Options,
} from "./Locale.js";

// Dimension
export type {
    Dimension,
    DimensionKind,
    DimensionCapabilities,
    DimensionSpec,
    CustomDimension,
    CustomDimensionSpec,
    Resolution,
    Seal,
} from "./Dimension.js";
export {
    defineDimension,
    defineCustomDimension,
    isCustomDimension,
    dimensionEquals,
    dimensionHash,
    seal,
    withSeal,
    sealEquals,
    sealHash,
    showSeal,
} from "./Dimension.js";

// Token
export type { Token } from "./Token.js";
export {
    createToken,
    isDimension,
    payloadOf,
    tokenKey,
    tokenEquals,
    tokenHash,
    showToken,
} from "./Token.js";

// Pattern & rule
export type {
    Production,
    Predicate,
    RegexItem,
    PredicateItem,
    PatternItem,
    Pattern,
    Rule,
    RuleSet,
    RuleSetRegistration,
} from "./Rule.js";
export {
    regex,
    predicate,
    dimension,
    dimensionWhere,
    createRule,
    defineRuleSet,
    regexGroups,
    lookupRule,
    showRule,
    isRule,
    isRuleSetRegistration,
} from "./Rule.js";

// Node
export type { Node } from "./Node.js";
export { formatNode } from "./Node.js";

// Resolved
export type { ResolvedVal, ResolvedToken } from "./Resolved.js";
export {
    resolvedValText,
    resolvedValEquals,
    showResolvedVal,
    compareResolvedTokens,
} from "./Resolved.js";

// Entity
export type { Entity, EntityJSON } from "./Entity.js";
export { createEntity, entityToJSON, decodeEntityJSON } from "./Entity.js";

// EventBus
export type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    ParseEventType,
    Subscription,
} from "./EventBus.js";
export { createEvent } from "./EventBus.js";

// Logger
export type { EngineLogger } from "./Logger.js";
export { createConsoleLogger, silentLogger } from "./Logger.js";
