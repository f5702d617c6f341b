/**
 * @fileoverview Token Contract
 *
 * A token pairs a dimension with a payload of that dimension's type.
 * The payload is only reachable after dispatching on the dimension:
 *
 * ```typescript
 * if (isDimension(Numeral, token)) {
 *     token.value.value; // NumeralData
 * }
 * ```
 *
 * @module @spanwise/engine/contracts/Token
 */

import { fnv1a, type JsonValue } from "../util/json.js";
import type { Dimension } from "./Dimension.js";

export interface Token<P = unknown> {
    readonly dimension: Dimension<P, JsonValue>;
    readonly value: P;
}

/**
 * Create a frozen token. The payload must match the dimension's payload type.
 */
export function createToken<P, R extends JsonValue>(dimension: Dimension<P, R>, value: P): Token<P> {
    return Object.freeze({ dimension, value });
}

/**
 * Does the token belong to the dimension? Narrows the payload type.
 */
export function isDimension<P, R extends JsonValue>(dimension: Dimension<P, R>, token: Token): token is Token<P> {
    return token.dimension === dimension;
}

/**
 * The token's payload if it belongs to the dimension, else null.
 */
export function payloadOf<P, R extends JsonValue>(dimension: Dimension<P, R>, token: Token): P | null {
    return isDimension(dimension, token) ? token.value : null;
}

export function tokenKey(token: Token): string {
    return token.dimension.key(token.value);
}

/**
 * Tokens of different dimensions are never equal.
 */
export function tokenEquals(a: Token, b: Token): boolean {
    return a.dimension === b.dimension && tokenKey(a) === tokenKey(b);
}

export function tokenHash(token: Token): number {
    return fnv1a(`${token.dimension.kind}:${token.dimension.name}\u0000${tokenKey(token)}`);
}

export function showToken(token: Token): string {
    return token.dimension.show(token.value);
}
