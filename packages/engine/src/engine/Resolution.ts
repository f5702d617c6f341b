/**
 * @fileoverview Resolution
 *
 * Turns saturated nodes into candidate resolved tokens. Resolvers are pure
 * over (payload, context, options); a null result drops the node.
 *
 * @module @spanwise/engine/engine/Resolution
 */

import type { Dimension, Resolution } from "../contracts/Dimension.js";
import type { Context, Options } from "../contracts/Locale.js";
import type { EngineLogger } from "../contracts/Logger.js";
import type { Node } from "../contracts/Node.js";
import type { ResolvedToken } from "../contracts/Resolved.js";
import type { JsonValue } from "../util/json.js";

/**
 * Resolve one node. A resolver that throws is logged and treated as null.
 */
export function resolveNode(node: Node, context: Context, options: Options, logger: EngineLogger): ResolvedToken | null {
    const { dimension, value } = node.token;

    let resolution: Resolution<JsonValue> | null;
    try {
        resolution = dimension.resolve(value, context, options);
    }
    catch (error) {
        logger.error(`Resolver for ${dimension.name} failed`, {
            range: [node.range.start, node.range.end],
            error: error instanceof Error ? error.message : String(error),
        });
        return null;
    }

    if (resolution === null) {
        return null;
    }

    return Object.freeze({
        range   : node.range,
        node,
        rval    : Object.freeze({ dimension, value: resolution.value }),
        isLatent: resolution.latent,
    });
}

/**
 * Resolve every node of a target dimension (every node when `targets` is
 * empty), in node order.
 */
export function resolveNodes(
    nodes: readonly Node[],
    targets: readonly Dimension[],
    context: Context,
    options: Options,
    logger: EngineLogger
): ResolvedToken[] {
    const wanted = new Set(targets);
    const resolved: ResolvedToken[] = [];
    for (const node of nodes) {
        if (wanted.size > 0 && !wanted.has(node.token.dimension)) {
            continue;
        }
        const candidate = resolveNode(node, context, options, logger);
        if (candidate) {
            resolved.push(candidate);
        }
    }
    return resolved;
}
