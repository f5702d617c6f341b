/**
 * @fileoverview Derivation
 *
 * The per-parse arena of derivation nodes and the engine that fills it.
 *
 * A parse moves from seeded to expanding to saturated. Each pass applies
 * every active rule to every contiguous placement against the stash as it
 * stood when the pass began, and a success is kept only if its
 * (range, dimension, payload key) triple is new. Passes are semi-naive:
 * after a rule's first pass it only revisits placements that use at least
 * one node added by the previous pass.
 *
 * Rules run stage by stage; stage `s` saturates with every rule of stage
 * `<= s` active, so a custom dimension sees its dependencies complete.
 *
 * @module @spanwise/engine/engine/Derivation
 */

import { DerivationLimitError } from "../contracts/Errors.js";
import type { EngineLogger } from "../contracts/Logger.js";
import type { Node } from "../contracts/Node.js";
import { createRange, type Range } from "../contracts/Range.js";
import type { PatternItem } from "../contracts/Rule.js";
import { createToken, tokenKey, type Token } from "../contracts/Token.js";
import { RegexMatch } from "../dimensions/RegexMatch.js";
import type { CompiledRule } from "../registry/DimensionRegistry.js";
import type { Document, LexicalMatch } from "./Document.js";

export interface DerivationLimits {
    /** Passes across all stages (default: 64) */
    readonly maxPasses: number;

    /** Nodes in the stash (default: 10000) */
    readonly maxNodes: number;
}

export const DEFAULT_LIMITS: DerivationLimits = Object.freeze({
    maxPasses: 64,
    maxNodes : 10_000,
});

export type DerivationState = "seeded" | "expanding" | "saturated";

/**
 * Arena entry. Children are handles into the same arena.
 */
export interface NodeRecord {
    readonly handle: number;
    readonly range: Range;
    readonly token: Token;
    readonly children: readonly number[];
    readonly rule: string | null;

    /** Pass that created the node; 0 for regex leaves */
    readonly generation: number;
}

/**
 * Node arena of one parse.
 *
 * Regex leaves live in the arena so trees can reference them, but only
 * rule-produced nodes are in the stash that predicates see.
 */
export class Derivation {
    readonly text: string;

    private readonly records: NodeRecord[] = [];
    private readonly stash: number[] = [];
    private readonly stashKeys: Map<Token["dimension"], Set<string>> = new Map();
    private readonly byStart: Map<number, number[]> = new Map();
    private readonly leaves: Map<string, number> = new Map();
    private readonly materialized: Map<number, Node> = new Map();

    private currentState: DerivationState = "seeded";
    private passCount = 0;

    constructor(text: string) {
        this.text = text;
    }

    get state(): DerivationState {
        return this.currentState;
    }

    /** Passes run so far */
    get passes(): number {
        return this.passCount;
    }

    /** Nodes in the stash (regex leaves excluded) */
    get size(): number {
        return this.stash.length;
    }

    record(handle: number): NodeRecord {
        const record = this.records[handle];
        if (!record) {
            throw new RangeError(`Unknown node handle ${handle}`);
        }
        return record;
    }

    /**
     * Stash records in insertion order.
     */
    stashed(): NodeRecord[] {
        return this.stash.map((handle) => this.record(handle));
    }

    /**
     * Stash records whose range starts at `start`.
     */
    startingAt(start: number): NodeRecord[] {
        return (this.byStart.get(start) ?? []).map((handle) => this.record(handle));
    }

    /**
     * Materialize a node and its subtree. Subtrees are shared between
     * parents and built once.
     */
    node(handle: number): Node {
        const cached = this.materialized.get(handle);
        if (cached) {
            return cached;
        }
        const record = this.record(handle);
        const node: Node = Object.freeze({
            range   : record.range,
            token   : record.token,
            children: Object.freeze(record.children.map((child) => this.node(child))),
            rule    : record.rule,
        });
        this.materialized.set(handle, node);
        return node;
    }

    /**
     * Every stash node, materialized, in insertion order.
     */
    nodes(): Node[] {
        return this.stash.map((handle) => this.node(handle));
    }

    /** @internal */
    leaf(match: LexicalMatch): number {
        const key = `${match.range.start}:${match.range.end}\u0000${JSON.stringify(match.groups)}`;
        const existing = this.leaves.get(key);
        if (existing !== undefined) {
            return existing;
        }
        const handle = this.append({
            range     : match.range,
            token     : createToken(RegexMatch, match.groups),
            children  : [],
            rule      : null,
            generation: 0,
        });
        this.leaves.set(key, handle);
        return handle;
    }

    /**
     * Add a rule-produced node unless its triple is already stashed.
     *
     * @internal
     */
    insert(range: Range, token: Token, children: readonly number[], rule: string, generation: number): number | null {
        let keys = this.stashKeys.get(token.dimension);
        if (!keys) {
            keys = new Set();
            this.stashKeys.set(token.dimension, keys);
        }
        const key = `${range.start}:${range.end}\u0000${tokenKey(token)}`;
        if (keys.has(key)) {
            return null;
        }
        keys.add(key);

        const handle = this.append({ range, token, children, rule, generation });
        this.stash.push(handle);
        const starting = this.byStart.get(range.start);
        if (starting) {
            starting.push(handle);
        }
        else {
            this.byStart.set(range.start, [handle]);
        }
        return handle;
    }

    /** @internal */
    advance(state: DerivationState, passes: number): void {
        this.currentState = state;
        this.passCount = passes;
    }

    private append(record: Omit<NodeRecord, "handle">): number {
        const handle = this.records.length;
        this.records.push(Object.freeze({ handle, ...record }));
        return handle;
    }
}

/**
 * A pattern item satisfied at some span: a stash node or a regex match
 * whose leaf is created only if the whole pattern succeeds.
 */
type Part =
    | { readonly kind: "node"; readonly record: NodeRecord }
    | { readonly kind: "match"; readonly match: LexicalMatch };

function partRange(part: Part): Range {
    return part.kind === "node" ? part.record.range : part.match.range;
}

function partToken(part: Part): Token {
    return part.kind === "node" ? part.record.token : createToken(RegexMatch, part.match.groups);
}

/**
 * Configuration for {@link DerivationEngine}.
 */
export interface DerivationEngineConfig {
    readonly limits?: Partial<DerivationLimits>;

    /** Receives production failures */
    readonly logger: EngineLogger;

    /** Called after every pass with the number of nodes it added */
    readonly onPass?: (pass: number, stage: number, added: number) => void;
}

/**
 * Runs a rule table over a document until nothing new can be derived.
 *
 * @example
 * ```typescript
 * const engine = new DerivationEngine(new Document("two hundred"), registry.rulesFor(locale), { logger });
 * const derivation = engine.saturate();
 * derivation.nodes().map((node) => formatNode(node));
 * ```
 */
export class DerivationEngine {
    readonly derivation: Derivation;

    private readonly document: Document;
    private readonly rules: readonly CompiledRule[];
    private readonly limits: DerivationLimits;
    private readonly logger: EngineLogger;
    private readonly onPass?: (pass: number, stage: number, added: number) => void;
    private readonly started: Set<CompiledRule> = new Set();

    constructor(document: Document, rules: readonly CompiledRule[], config: DerivationEngineConfig) {
        this.document = document;
        this.rules = rules;
        this.limits = { ...DEFAULT_LIMITS, ...config.limits };
        this.logger = config.logger;
        this.onPass = config.onPass;
        this.derivation = new Derivation(document.text);
    }

    /**
     * Run every stage to saturation.
     *
     * @throws DerivationLimitError when a pass or node limit is exceeded
     */
    saturate(): Derivation {
        if (this.derivation.state === "saturated") {
            return this.derivation;
        }

        const stages = [...new Set(this.rules.map((rule) => rule.stage))].sort((a, b) => a - b);
        for (const stage of stages) {
            const active = this.rules.filter((rule) => rule.stage <= stage);
            let added = -1;
            while (added !== 0) {
                const pass = this.derivation.passes + 1;
                if (pass > this.limits.maxPasses) {
                    throw new DerivationLimitError("passes", this.derivation.passes, this.derivation.size);
                }
                this.derivation.advance("expanding", pass);
                added = this.runPass(active, pass, false);
                this.onPass?.(pass, stage, added);
            }
        }

        this.derivation.advance("saturated", this.derivation.passes);
        return this.derivation;
    }

    /**
     * One extra pass trying every placement of every rule, ignoring the
     * semi-naive restriction. Returns the number of nodes added, which is
     * 0 on a saturated derivation.
     */
    expandOnce(): number {
        const pass = this.derivation.passes + 1;
        const added = this.runPass(this.rules, pass, true);
        this.derivation.advance(added === 0 ? this.derivation.state : "expanding", pass);
        return added;
    }

    private runPass(rules: readonly CompiledRule[], pass: number, exhaustive: boolean): number {
        let added = 0;
        for (const rule of rules) {
            const full = exhaustive || !this.started.has(rule);
            this.started.add(rule);

            for (const parts of this.placements(rule.items, pass, full)) {
                const node = this.apply(rule, parts, pass);
                if (node !== null) {
                    added++;
                    if (this.derivation.size > this.limits.maxNodes) {
                        throw new DerivationLimitError("nodes", pass, this.derivation.size);
                    }
                }
            }
        }
        return added;
    }

    /**
     * Every contiguous run satisfying `items` against nodes older than
     * `pass`. Unless `full`, a run must use a node from the previous pass.
     */
    private placements(items: readonly PatternItem[], pass: number, full: boolean): Part[][] {
        const results: Part[][] = [];
        const fresh = (record: NodeRecord): boolean => record.generation === pass - 1;
        const visible = (record: NodeRecord): boolean => record.generation < pass;
        const predicatesFrom = (index: number): boolean =>
            items.slice(index).some((item) => item.kind === "predicate");

        const extend = (index: number, parts: Part[], usedFresh: boolean): void => {
            if (index === items.length) {
                if (full || usedFresh) {
                    results.push(parts);
                }
                return;
            }
            if (!full && !usedFresh && !predicatesFrom(index)) {
                return;
            }

            for (const part of this.candidates(items[index], index, parts, visible)) {
                const isFresh = part.kind === "node" && fresh(part.record);
                extend(index + 1, [...parts, part], usedFresh || isFresh);
            }
        };

        extend(0, [], false);
        return results;
    }

    private candidates(
        item: PatternItem,
        index: number,
        parts: readonly Part[],
        visible: (record: NodeRecord) => boolean
    ): Part[] {
        const matches = (record: NodeRecord): boolean => {
            if (!visible(record) || item.kind !== "predicate") {
                return false;
            }
            return item.test(record.token);
        };

        if (index === 0) {
            if (item.kind === "regex") {
                return this.document.regexMatches(item.source).map((match) => ({ kind: "match", match }));
            }
            return this.derivation.stashed().filter(matches).map((record) => ({ kind: "node", record }));
        }

        const previous = parts[parts.length - 1];
        const starts = this.document.adjacentStarts(previous ? partRange(previous).end : 0);
        const found: Part[] = [];
        for (const start of starts) {
            if (item.kind === "regex") {
                const match = this.document.regexMatchAt(item.source, start);
                if (match) {
                    found.push({ kind: "match", match });
                }
            }
            else {
                for (const record of this.derivation.startingAt(start)) {
                    if (matches(record)) {
                        found.push({ kind: "node", record });
                    }
                }
            }
        }
        return found;
    }

    private apply(rule: CompiledRule, parts: readonly Part[], pass: number): number | null {
        let token: Token | null;
        try {
            token = rule.production(parts.map(partToken));
        }
        catch (error) {
            this.logger.error(`[engine:${rule.name}] Production failed`, {
                error: error instanceof Error ? error.message : String(error),
            });
            return null;
        }
        if (token === null) {
            return null;
        }

        const first = parts[0];
        const last = parts[parts.length - 1];
        if (!first || !last) {
            return null;
        }
        const range = createRange(partRange(first).start, partRange(last).end);
        const children = parts.map((part) => (part.kind === "node" ? part.record.handle : this.derivation.leaf(part.match)));

        return this.derivation.insert(range, token, children, rule.name, pass);
    }
}
