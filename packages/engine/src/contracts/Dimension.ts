/**
 * @fileoverview Dimension Contract
 *
 * A dimension is an extraction category (Numeral, Time, ...). Each dimension
 * is bound to exactly one payload type `P` and one resolved type `R`, and
 * carries the capability table that generic code dispatches through:
 *
 * - `key`: canonical identity of a payload. Token equality and hashing both
 *   derive from it, so equal tokens always hash alike.
 * - `show`: human-readable rendering
 * - `resolve`: payload + context -> final value (or nothing)
 * - `isPayload`: optional guard admitting plain data as a payload
 *
 * Dimensions compare by identity. Built-ins are pairwise distinct objects;
 * a custom dimension equals only itself, whatever its name.
 *
 * @module @spanwise/engine/contracts/Dimension
 */

import { fnv1a, stableStringify, type JsonValue } from "../util/json.js";
import type { Context, Lang, Options, Region } from "./Locale.js";
import type { Rule } from "./Rule.js";

/**
 * Successful resolution of a payload.
 */
export interface Resolution<R extends JsonValue> {
    readonly value: R;

    /** Detected, but not confident without surrounding context */
    readonly latent: boolean;
}

/**
 * Per-dimension capabilities.
 *
 * Declared as methods so that a `Dimension<NumeralData>` can sit in a
 * `Dimension[]` next to every other dimension.
 */
export interface DimensionCapabilities<P, R extends JsonValue> {
    key(payload: P): string;
    show(payload: P): string;
    resolve(payload: P, context: Context, options: Options): Resolution<R> | null;
    isPayload?(raw: unknown): raw is P;
}

export type DimensionKind = "builtin" | "custom";

export interface Dimension<P = unknown, R extends JsonValue = JsonValue> extends DimensionCapabilities<P, R> {
    readonly kind: DimensionKind;

    /** Registry name, e.g. "AmountOfMoney" */
    readonly name: string;

    /** Name used in the entity wire format, e.g. "amount-of-money" */
    readonly wireName: string;

    /** Dimensions whose tokens this one is built from */
    readonly dependencies: readonly Seal[];

    /**
     * Type-level marker binding the dimension to its payload type.
     * Never set at run time.
     */
    readonly payloadType?: P;
}

/**
 * A user-defined dimension. Carries its own rules.
 */
export interface CustomDimension<P = unknown, R extends JsonValue = JsonValue> extends Dimension<P, R> {
    readonly kind: "custom";
    readonly rules: readonly Rule[];
    readonly langRules: Readonly<Record<Lang, readonly Rule[]>>;
    readonly regionRules: Readonly<Record<Region, readonly Rule[]>>;
}

/**
 * Definition accepted by {@link defineDimension}.
 */
export interface DimensionSpec<P, R extends JsonValue> {
    readonly name: string;
    readonly wireName: string;
    readonly dependencies?: readonly Seal[];
    readonly resolve: (payload: P, context: Context, options: Options) => Resolution<R> | null;
    readonly key?: (payload: P) => string;
    readonly show?: (payload: P) => string;
    readonly isPayload?: (raw: unknown) => raw is P;
}

/**
 * Definition accepted by {@link defineCustomDimension}.
 */
export interface CustomDimensionSpec<P, R extends JsonValue> extends Omit<DimensionSpec<P, R>, "wireName"> {
    /** Defaults to `name` */
    readonly wireName?: string;
    readonly rules?: readonly Rule[];
    readonly langRules?: Readonly<Record<Lang, readonly Rule[]>>;
    readonly regionRules?: Readonly<Record<Region, readonly Rule[]>>;
}

/**
 * Define a built-in dimension.
 */
export function defineDimension<P, R extends JsonValue>(spec: DimensionSpec<P, R>): Dimension<P, R> {
    const dimension: Dimension<P, R> = {
        kind        : "builtin",
        name        : spec.name,
        wireName    : spec.wireName,
        dependencies: Object.freeze([...(spec.dependencies ?? [])]),
        key         : spec.key ?? ((payload) => stableStringify(payload)),
        show        : spec.show ?? ((payload) => `${spec.name} ${stableStringify(payload)}`),
        resolve     : spec.resolve,
        isPayload   : spec.isPayload,
    };

    return Object.freeze(dimension);
}

/**
 * Define a custom dimension.
 *
 * @example
 * ```typescript
 * interface ScoreData { got: number; total: number }
 *
 * const Score = defineCustomDimension<ScoreData, { value: number }>({
 *     name        : "Score",
 *     dependencies: [seal(Numeral)],
 *     rules       : [scoreRule],
 *     resolve     : ({ got, total }) => ({ value: { value: got / total }, latent: false }),
 * });
 * ```
 */
export function defineCustomDimension<P, R extends JsonValue>(
    spec: CustomDimensionSpec<P, R>
): CustomDimension<P, R> {
    const dimension: CustomDimension<P, R> = {
        kind        : "custom",
        name        : spec.name,
        wireName    : spec.wireName ?? spec.name,
        dependencies: Object.freeze([...(spec.dependencies ?? [])]),
        key         : spec.key ?? ((payload) => stableStringify(payload)),
        show        : spec.show ?? ((payload) => `${spec.name} ${stableStringify(payload)}`),
        resolve     : spec.resolve,
        isPayload   : spec.isPayload,
        rules       : Object.freeze([...(spec.rules ?? [])]),
        langRules   : Object.freeze({ ...(spec.langRules ?? {}) }),
        regionRules : Object.freeze({ ...(spec.regionRules ?? {}) }),
    };

    return Object.freeze(dimension);
}

/**
 * Type guard for custom dimensions (e.g. exported from a rule module).
 */
export function isCustomDimension(obj: unknown): obj is CustomDimension {
    return (
        typeof obj === "object" &&
        obj !== null &&
        "kind" in obj &&
        obj.kind === "custom" &&
        "name" in obj &&
        typeof obj.name === "string" &&
        "resolve" in obj &&
        typeof obj.resolve === "function" &&
        "rules" in obj &&
        Array.isArray(obj.rules)
    );
}

export function dimensionEquals(a: Dimension, b: Dimension): boolean {
    return a === b;
}

export function dimensionHash(dimension: Dimension): number {
    return fnv1a(`${dimension.kind}:${dimension.name}`);
}

// ----------------------------------------------------------------------------
// Seal
// ----------------------------------------------------------------------------

/**
 * A dimension with its payload type erased, for homogeneous collections
 * such as dependency sets.
 */
export interface Seal {
    readonly dimension: Dimension;
}

export function seal<P, R extends JsonValue>(dimension: Dimension<P, R>): Seal {
    return Object.freeze({ dimension });
}

/**
 * Open a seal.
 */
export function withSeal<T>(sealed: Seal, fn: (dimension: Dimension) => T): T {
    return fn(sealed.dimension);
}

export function sealEquals(a: Seal, b: Seal): boolean {
    return a.dimension === b.dimension;
}

export function sealHash(sealed: Seal): number {
    return dimensionHash(sealed.dimension);
}

export function showSeal(sealed: Seal): string {
    return `Seal ${sealed.dimension.name}`;
}
