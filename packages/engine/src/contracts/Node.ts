/**
 * @fileoverview Node Contract
 *
 * A derivation-tree node: the range it covers, the token it produced, the
 * nodes it was built from (in order, disjoint, empty for leaves) and the
 * rule that produced it (null for regex leaves).
 *
 * @module @spanwise/engine/contracts/Node
 */

import { showRange, type Range } from "./Range.js";
import { showToken, type Token } from "./Token.js";

export interface Node {
    readonly range: Range;
    readonly token: Token;
    readonly children: readonly Node[];
    readonly rule: string | null;
}

/**
 * Render a derivation tree, one node per line, children indented.
 *
 * @example
 * ```text
 * intersect (200) [0, 11) Numeral 200
 *   integer (0..19) [0, 3) Numeral 2
 *     <regex> [0, 3) RegexMatch ["two"]
 *   ...
 * ```
 */
export function formatNode(node: Node, indent = ""): string {
    const lines = [`${indent}${node.rule ?? "<regex>"} ${showRange(node.range)} ${showToken(node.token)}`];
    for (const child of node.children) {
        lines.push(formatNode(child, `${indent}  `));
    }
    return lines.join("\n");
}
