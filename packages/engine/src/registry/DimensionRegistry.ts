/**
 * @fileoverview Dimension Registry
 *
 * Collects dimensions and the rules contributed for them, validates the
 * whole table once, and freezes it. A registry that exists is valid: every
 * regex compiles, every dependency is known and acyclic, names are unique.
 *
 * Rule stages follow the custom-dimension dependency graph. Built-in rules
 * and rules of custom dimensions without dependencies are stage 0; any
 * other custom dimension sits one stage above its highest dependency.
 *
 * @module @spanwise/engine/registry/DimensionRegistry
 */

import type { CustomDimension, Dimension } from "../contracts/Dimension.js";
import { RegistryError } from "../contracts/Errors.js";
import type { Locale } from "../contracts/Locale.js";
import {
    showRule,
    type PatternItem,
    type Production,
    type Rule,
    type RuleSet,
    type RuleSetRegistration,
} from "../contracts/Rule.js";
import type { JsonValue } from "../util/json.js";
import { BUILTIN_DIMENSIONS, RegexMatch } from "../dimensions/index.js";

/**
 * A validated rule, bound to the dimension it was registered for.
 */
export interface CompiledRule {
    readonly name: string;
    readonly dimension: Dimension;
    readonly items: readonly PatternItem[];
    readonly production: Production;
    readonly stage: number;
}

interface RuleGroups {
    readonly rules: Rule[];
    readonly langRules: Map<string, Rule[]>;
    readonly regionRules: Map<string, Rule[]>;
}

function emptyGroups(): RuleGroups {
    return { rules: [], langRules: new Map(), regionRules: new Map() };
}

function appendRuleSet(groups: RuleGroups, ruleSet: RuleSet): void {
    groups.rules.push(...(ruleSet.rules ?? []));
    for (const [lang, rules] of Object.entries(ruleSet.langRules ?? {})) {
        const key = lang.toUpperCase();
        groups.langRules.set(key, [...(groups.langRules.get(key) ?? []), ...rules]);
    }
    for (const [region, rules] of Object.entries(ruleSet.regionRules ?? {})) {
        const key = region.toUpperCase();
        groups.regionRules.set(key, [...(groups.regionRules.get(key) ?? []), ...rules]);
    }
}

function allRules(groups: RuleGroups): Rule[] {
    return [
        ...groups.rules,
        ...[...groups.langRules.values()].flat(),
        ...[...groups.regionRules.values()].flat(),
    ];
}

/**
 * Regex items are compiled in both modes the engine uses.
 */
function regexProblem(source: string): string | null {
    try {
        new RegExp(source, "giu");
        new RegExp(source, "yiu");
        return null;
    }
    catch (error) {
        return error instanceof Error ? error.message : String(error);
    }
}

/**
 * Accumulates dimensions and rule sets; {@link build} validates them.
 *
 * @example
 * ```typescript
 * const registry = new RegistryBuilder()
 *     .addRules(Numeral, { rules: [integerRule], langRules: { EN: [englishNumbers] } })
 *     .addCustomDimension(Score)
 *     .build();
 * ```
 */
export class RegistryBuilder {
    private readonly builtins: readonly Dimension[];
    private readonly customs: CustomDimension[] = [];
    private readonly groups: Map<Dimension, RuleGroups> = new Map();

    constructor(builtins: readonly Dimension[] = BUILTIN_DIMENSIONS) {
        this.builtins = builtins;
    }

    /**
     * Contribute rules for a dimension. May be called repeatedly.
     */
    addRules<P, R extends JsonValue>(dimension: Dimension<P, R>, ruleSet: RuleSet): this {
        let groups = this.groups.get(dimension);
        if (!groups) {
            groups = emptyGroups();
            this.groups.set(dimension, groups);
        }
        appendRuleSet(groups, ruleSet);
        return this;
    }

    add(registration: RuleSetRegistration): this {
        return this.addRules(registration.dimension, registration.ruleSet);
    }

    /**
     * Register a custom dimension together with the rules it carries.
     */
    addCustomDimension<P, R extends JsonValue>(custom: CustomDimension<P, R>): this {
        if (!this.customs.includes(custom)) {
            this.customs.push(custom);
        }
        return this.addRules(custom, {
            rules      : custom.rules,
            langRules  : custom.langRules,
            regionRules: custom.regionRules,
        });
    }

    /**
     * Validate and freeze.
     *
     * @throws RegistryError listing every problem found
     */
    build(): DimensionRegistry {
        const problems: string[] = [];
        const dimensions = [...this.builtins, ...this.customs];
        const known = new Set<Dimension>(dimensions);

        const names = new Map<string, Dimension>();
        for (const dimension of dimensions) {
            for (const name of new Set([dimension.name, dimension.wireName])) {
                const existing = names.get(name);
                if (existing && existing !== dimension) {
                    problems.push(`Duplicate dimension name "${name}"`);
                }
                names.set(name, dimension);
            }
        }

        for (const dimension of this.groups.keys()) {
            if (!known.has(dimension)) {
                problems.push(`Rules registered for unknown dimension "${dimension.name}"`);
            }
        }

        for (const dimension of dimensions) {
            for (const dependency of dimension.dependencies) {
                if (!known.has(dependency.dimension)) {
                    problems.push(`Dimension "${dimension.name}" depends on unknown dimension "${dependency.dimension.name}"`);
                }
            }
        }

        const stages = computeStages(this.customs, known, problems);

        for (const [dimension, groups] of this.groups) {
            for (const rule of allRules(groups)) {
                if (rule.pattern.length === 0) {
                    problems.push(`Rule ${showRule(rule)} (${dimension.name}) has an empty pattern`);
                }
                rule.pattern.forEach((item, index) => {
                    if (item.kind !== "regex") {
                        return;
                    }
                    const problem = regexProblem(item.source);
                    if (problem) {
                        problems.push(`Rule ${showRule(rule)} (${dimension.name}) item ${index}: ${problem}`);
                    }
                });
            }
        }

        if (problems.length > 0) {
            throw new RegistryError(problems);
        }

        return new DimensionRegistry(dimensions, names, this.groups, stages);
    }
}

/**
 * Stage of each custom dimension. Reports cycles into `problems`.
 */
function computeStages(
    customs: readonly CustomDimension[],
    known: ReadonlySet<Dimension>,
    problems: string[]
): Map<Dimension, number> {
    const stages = new Map<Dimension, number>();
    const visiting = new Set<Dimension>();
    const isCustom = (dimension: Dimension): boolean => dimension.kind === "custom" && known.has(dimension);

    const visit = (dimension: Dimension): number => {
        const done = stages.get(dimension);
        if (done !== undefined) {
            return done;
        }
        if (!isCustom(dimension)) {
            return 0;
        }
        if (visiting.has(dimension)) {
            problems.push(`Dependency cycle through "${dimension.name}"`);
            return 0;
        }

        visiting.add(dimension);
        let stage = 0;
        for (const dependency of dimension.dependencies) {
            stage = Math.max(stage, visit(dependency.dimension) + 1);
        }
        visiting.delete(dimension);

        stages.set(dimension, stage);
        return stage;
    };

    for (const custom of customs) {
        visit(custom);
    }
    return stages;
}

/**
 * The validated, frozen rule table.
 */
export class DimensionRegistry {
    /** Every dimension, built-ins first */
    readonly dimensions: readonly Dimension[];

    private readonly names: ReadonlyMap<string, Dimension>;
    private readonly groups: ReadonlyMap<Dimension, RuleGroups>;
    private readonly stages: ReadonlyMap<Dimension, number>;

    constructor(
        dimensions: readonly Dimension[],
        names: ReadonlyMap<string, Dimension>,
        groups: ReadonlyMap<Dimension, RuleGroups>,
        stages: ReadonlyMap<Dimension, number>
    ) {
        this.dimensions = Object.freeze([...dimensions]);
        this.names = new Map(names);
        this.groups = new Map(
            [...groups].map(([dimension, group]) => [dimension, {
                rules      : [...group.rules],
                langRules  : new Map(group.langRules),
                regionRules: new Map(group.regionRules),
            }])
        );
        this.stages = new Map(stages);
        Object.freeze(this);
    }

    /**
     * Look a dimension up by name or wire name.
     */
    find(name: string): Dimension | null {
        return this.names.get(name) ?? null;
    }

    stageOf(dimension: Dimension): number {
        return this.stages.get(dimension) ?? 0;
    }

    /**
     * The targets plus everything they transitively depend on.
     */
    dependenciesOf(targets: readonly Dimension[]): Dimension[] {
        const closure = new Set<Dimension>();
        const pending = [...targets];
        let next = pending.pop();
        while (next !== undefined) {
            if (!closure.has(next)) {
                closure.add(next);
                pending.push(...next.dependencies.map((dependency) => dependency.dimension));
            }
            next = pending.pop();
        }
        return this.dimensions.filter((dimension) => closure.has(dimension));
    }

    /**
     * Rules active for the locale, restricted to the targets' dependency
     * closure when targets are given. Ordered by stage, then registration.
     */
    rulesFor(locale: Locale, targets?: readonly Dimension[]): CompiledRule[] {
        const selected = targets && targets.length > 0 ? this.dependenciesOf(targets) : this.dimensions;
        const compiled: CompiledRule[] = [];

        for (const dimension of selected) {
            const groups = this.groups.get(dimension);
            if (!groups) {
                continue;
            }
            const stage = this.stageOf(dimension);
            const rules = [
                ...groups.rules,
                ...(groups.langRules.get(locale.lang) ?? []),
                ...(locale.region ? groups.regionRules.get(locale.region) ?? [] : []),
            ];
            for (const rule of rules) {
                compiled.push({
                    name      : rule.name,
                    dimension,
                    items     : rule.pattern,
                    production: rule.production,
                    stage,
                });
            }
        }

        // Array.prototype.sort is stable
        return compiled.sort((a, b) => a.stage - b.stage);
    }

    /**
     * Dimensions that have at least one rule for the locale (every locale
     * when omitted). RegexMatch is internal and never listed.
     */
    supportedDimensions(locale?: Locale): Dimension[] {
        return this.dimensions.filter((dimension) => {
            const groups = this.groups.get(dimension);
            if (!groups || dimension === RegexMatch) {
                return false;
            }
            if (!locale) {
                return allRules(groups).length > 0;
            }
            return (
                groups.rules.length > 0 ||
                (groups.langRules.get(locale.lang)?.length ?? 0) > 0 ||
                (locale.region !== null && (groups.regionRules.get(locale.region)?.length ?? 0) > 0)
            );
        });
    }
}
