/**
 * @fileoverview RegexMatch dimension
 *
 * Leaf tokens synthesized by regex pattern items. The payload is the list of
 * capture groups (a group that did not participate is ""). Never resolves.
 *
 * @module @spanwise/engine/dimensions/RegexMatch
 */

import { defineDimension } from "../contracts/Dimension.js";

export type GroupMatch = readonly string[];

export const RegexMatch = defineDimension<GroupMatch, never>({
    name     : "RegexMatch",
    wireName : "regex",
    resolve  : () => null,
    isPayload: (raw: unknown): raw is GroupMatch =>
        Array.isArray(raw) && raw.every((group: unknown) => typeof group === "string"),
});
