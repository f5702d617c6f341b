/**
 * @fileoverview Pattern & Rule Contract
 *
 * A rule is a named pattern plus a production. The pattern is an ordered
 * list of items, each either a lexical regex over the raw text or a
 * predicate over an already-produced token. When every item is satisfied
 * by a contiguous run, the production receives the matched tokens in
 * pattern order and returns a new token, or null to decline.
 *
 * Regex items are compiled when the registry is built, not here, so a
 * malformed pattern is reported for the whole rule table at once.
 *
 * @module @spanwise/engine/contracts/Rule
 */

import type { JsonValue } from "../util/json.js";
import { RegexMatch } from "../dimensions/RegexMatch.js";
import type { Dimension } from "./Dimension.js";
import { SpanwiseError } from "./Errors.js";
import type { Lang, Region } from "./Locale.js";
import { isDimension, payloadOf, type Token } from "./Token.js";

export type Production = (tokens: readonly Token[]) => Token | null;

export type Predicate = (token: Token) => boolean;

/**
 * Lexical item. Matches case-insensitively and Unicode-aware; yields a
 * RegexMatch token holding the capture groups.
 */
export interface RegexItem {
    readonly kind: "regex";
    readonly source: string;
}

/**
 * Token item. Matches an already-produced token.
 */
export interface PredicateItem {
    readonly kind: "predicate";
    readonly test: Predicate;

    /** Shown in debug output */
    readonly label: string;
}

export type PatternItem = RegexItem | PredicateItem;

export type Pattern = readonly PatternItem[];

export interface Rule {
    readonly name: string;
    readonly pattern: Pattern;
    readonly production: Production;
}

/**
 * Rules contributed for one dimension. Language rules apply when the parse
 * locale has that language; region rules when it has that region.
 */
export interface RuleSet {
    readonly rules?: readonly Rule[];
    readonly langRules?: Readonly<Record<Lang, readonly Rule[]>>;
    readonly regionRules?: Readonly<Record<Region, readonly Rule[]>>;
}

/**
 * A rule set bound to its dimension, as exported by rule modules.
 */
export interface RuleSetRegistration {
    readonly kind: "rule-set";
    readonly dimension: Dimension;
    readonly ruleSet: RuleSet;
}

// ----------------------------------------------------------------------------
// Pattern helpers
// ----------------------------------------------------------------------------

export function regex(source: string): RegexItem {
    return Object.freeze({ kind: "regex", source });
}

export function predicate(test: Predicate, label = "predicate"): PredicateItem {
    return Object.freeze({ kind: "predicate", test, label });
}

/**
 * Item matching any token of the dimension.
 */
export function dimension<P, R extends JsonValue>(target: Dimension<P, R>): PredicateItem {
    return predicate((token) => isDimension(target, token), target.name);
}

/**
 * Item matching tokens of the dimension whose payload passes `test`.
 */
export function dimensionWhere<P, R extends JsonValue>(
    target: Dimension<P, R>,
    test: (payload: P) => boolean,
    label = target.name
): PredicateItem {
    return predicate((token) => isDimension(target, token) && test(token.value), label);
}

// ----------------------------------------------------------------------------
// Rule construction
// ----------------------------------------------------------------------------

export function createRule(name: string, pattern: Pattern, production: Production): Rule {
    return Object.freeze({
        name,
        pattern: Object.freeze([...pattern]),
        production,
    });
}

export function defineRuleSet<P, R extends JsonValue>(target: Dimension<P, R>, ruleSet: RuleSet): RuleSetRegistration {
    return Object.freeze({ kind: "rule-set", dimension: target, ruleSet });
}

/**
 * Capture groups of a regex-matched token, or null for any other token.
 */
export function regexGroups(token: Token | undefined): readonly string[] | null {
    return token ? payloadOf(RegexMatch, token) : null;
}

function escapeRegex(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Build a single-regex rule from a phrase table.
 *
 * The regex alternates every phrase, longest first; on a match the
 * lower-cased phrase is looked up and handed to `production`.
 *
 * @example
 * ```typescript
 * const units = lookupRule("integer (0..3)", { zero: 0, one: 1, two: 2, three: 3 },
 *     (value) => numeralToken(value));
 * ```
 */
export function lookupRule<T>(
    name: string,
    table: Readonly<Record<string, T>>,
    production: (entry: T) => Token | null
): Rule {
    const entries = new Map<string, T>();
    for (const [phrase, entry] of Object.entries(table)) {
        entries.set(phrase.toLowerCase(), entry);
    }

    if (entries.size === 0) {
        throw new SpanwiseError(`Lookup rule "${name}" has an empty table`);
    }

    const alternatives = [...entries.keys()]
        .sort((a, b) => b.length - a.length || (a < b ? -1 : a > b ? 1 : 0))
        .map(escapeRegex);

    return createRule(name, [regex(`(${alternatives.join("|")})`)], (tokens) => {
        const match = regexGroups(tokens[0])?.[0];
        if (match === undefined) {
            return null;
        }
        const entry = entries.get(match.toLowerCase());
        return entry === undefined ? null : production(entry);
    });
}

export function showRule(rule: Rule): string {
    return JSON.stringify(rule.name);
}

/**
 * Type guard for rules exported from rule modules.
 */
export function isRule(obj: unknown): obj is Rule {
    return (
        typeof obj === "object" &&
        obj !== null &&
        "name" in obj &&
        typeof obj.name === "string" &&
        "pattern" in obj &&
        Array.isArray(obj.pattern) &&
        "production" in obj &&
        typeof obj.production === "function"
    );
}

/**
 * Type guard for rule set registrations exported from rule modules.
 */
export function isRuleSetRegistration(obj: unknown): obj is RuleSetRegistration {
    return (
        typeof obj === "object" &&
        obj !== null &&
        "kind" in obj &&
        obj.kind === "rule-set" &&
        "dimension" in obj &&
        typeof obj.dimension === "object" &&
        "ruleSet" in obj &&
        typeof obj.ruleSet === "object"
    );
}
