/**
 * @fileoverview Engine wiring
 *
 * Rule loading order:
 * 1. Code grammar (./src/grammar) - composition rules
 * 2. Rule directories from the configuration, in order; by default
 *    system rules (./rules/system) then user rules (./user/rules)
 *
 * @module createEngine
 */

import { isAbsolute, join } from "path";
import {
    ExtractionEngine,
    RegistryBuilder,
    RuleLoader,
    applyLoadedRules,
    type Dimension,
    type DimensionRegistry,
    type EngineLogger,
} from "@spanwise/engine";
import type { ExtractConfig } from "./config/index.js";
import { grammarRuleSets } from "./grammar/index.js";

export interface AppEngine {
    engine: ExtractionEngine;
    registry: DimensionRegistry;
}

/**
 * Build the registry and engine for a configuration.
 *
 * @param config - Application configuration
 * @param appDir - Directory relative rule paths are resolved against
 * @param logger - Logger for loading and parsing
 */
export async function createEngine(config: ExtractConfig, appDir: string, logger: EngineLogger): Promise<AppEngine> {
    const loader = new RuleLoader({ logger });
    const ruleDirs = config.ruleDirs.map((dir) => (isAbsolute(dir) ? dir : join(appDir, dir)));
    const loaded = await loader.loadFromDirectories(ruleDirs);

    const builder = new RegistryBuilder();
    for (const ruleSet of grammarRuleSets) {
        builder.add(ruleSet);
    }
    const registry = applyLoadedRules(builder, loaded).build();

    logger.info("Registry built", {
        dimensions      : registry.dimensions.length,
        customDimensions: loaded.customDimensions.map((custom) => custom.name),
    });

    return {
        engine: new ExtractionEngine({ registry, limits: config.limits, logger }),
        registry,
    };
}

/**
 * Look up target dimensions by name or wire name.
 *
 * @throws Error naming the first unknown dimension
 */
export function resolveTargets(registry: DimensionRegistry, names: readonly string[]): Dimension[] {
    return names.map((name) => {
        const found = registry.find(name);
        if (!found) {
            throw new Error(`Unknown dimension: ${name}`);
        }
        return found;
    });
}
