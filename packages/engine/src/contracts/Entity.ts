/**
 * @fileoverview Entity Contract
 *
 * The externally visible result. Built only at the output boundary; never
 * fed back into the engine.
 *
 * @module @spanwise/engine/contracts/Entity
 */

import { isJsonValue, isRecord, type JsonValue } from "../util/json.js";
import { EntityFormatError } from "./Errors.js";
import type { Node } from "./Node.js";
import type { ResolvedToken } from "./Resolved.js";

export interface Entity {
    /** Dimension wire name */
    readonly dim: string;

    /** Matched substring */
    readonly body: string;

    readonly value: JsonValue;
    readonly start: number;
    readonly end: number;
    readonly latent: boolean;

    /** Derivation behind the entity */
    readonly enode: Node;
}

/**
 * Wire form of an entity.
 */
export interface EntityJSON {
    readonly dim: string;
    readonly body: string;
    readonly value: JsonValue;
    readonly start: number;
    readonly end: number;
    readonly latent: boolean;
}

export function createEntity(text: string, resolved: ResolvedToken): Entity {
    const { range, node, rval, isLatent } = resolved;
    return Object.freeze({
        dim   : rval.dimension.wireName,
        body  : text.slice(range.start, range.end),
        value : rval.value,
        start : range.start,
        end   : range.end,
        latent: isLatent,
        enode : node,
    });
}

export function entityToJSON(entity: Entity): EntityJSON {
    return {
        dim   : entity.dim,
        body  : entity.body,
        value : entity.value,
        start : entity.start,
        end   : entity.end,
        latent: entity.latent,
    };
}

/**
 * Validate a parsed wire object.
 *
 * @throws EntityFormatError naming the first offending field
 */
export function decodeEntityJSON(raw: unknown): EntityJSON {
    if (!isRecord(raw)) {
        throw new EntityFormatError("Entity must be an object");
    }

    const { dim, body, value, start, end, latent } = raw;

    if (typeof dim !== "string" || dim === "") {
        throw new EntityFormatError("Entity field 'dim' must be a non-empty string");
    }
    if (typeof body !== "string") {
        throw new EntityFormatError("Entity field 'body' must be a string");
    }
    if (!isJsonValue(value)) {
        throw new EntityFormatError("Entity field 'value' must be JSON data");
    }
    if (typeof start !== "number" || !Number.isInteger(start) || start < 0) {
        throw new EntityFormatError("Entity field 'start' must be a non-negative integer");
    }
    if (typeof end !== "number" || !Number.isInteger(end) || end < start) {
        throw new EntityFormatError("Entity field 'end' must be an integer not less than 'start'");
    }
    if (typeof latent !== "boolean") {
        throw new EntityFormatError("Entity field 'latent' must be a boolean");
    }

    return { dim, body, value, start, end, latent };
}
