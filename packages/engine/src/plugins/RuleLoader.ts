/**
 * @fileoverview Rule Loader
 *
 * Loads rule sets and custom dimensions from:
 * - YAML files (phrase lookups and regex rules with a payload template)
 * - Code files (JS/TS exporting RuleSetRegistration or CustomDimension)
 *
 * A directory is loaded code first, then YAML, each in file-name order, so
 * YAML files may target custom dimensions defined in code. Every file is
 * attempted; failures are collected and thrown together.
 *
 * @module @spanwise/engine/plugins/RuleLoader
 */

import { readFileSync, readdirSync, existsSync, statSync } from "fs";
import { join, extname } from "path";
import { pathToFileURL } from "url";
import { parse as parseYaml } from "yaml";
import type { CustomDimension, Dimension } from "../contracts/Dimension.js";
import { isCustomDimension } from "../contracts/Dimension.js";
import { RuleLoadError } from "../contracts/Errors.js";
import { createConsoleLogger, type EngineLogger } from "../contracts/Logger.js";
import {
    createRule,
    defineRuleSet,
    isRuleSetRegistration,
    lookupRule,
    regex,
    regexGroups,
    type Rule,
    type RuleSetRegistration,
} from "../contracts/Rule.js";
import { createToken } from "../contracts/Token.js";
import { BUILTIN_DIMENSIONS } from "../dimensions/index.js";
import type { RegistryBuilder } from "../registry/DimensionRegistry.js";
import { isRecord } from "../util/json.js";

/**
 * YAML rule file.
 *
 * @example
 * ```yaml
 * dimension: Numeral
 * lang: EN
 * rules:
 *   - name: integer (0..2)
 *     lookup:
 *       zero: { value: 0, grain: null, multipliable: false, multiplier: false }
 *       one:  { value: 1, grain: null, multipliable: true, multiplier: false }
 *       two:  { value: 2, grain: null, multipliable: true, multiplier: false }
 *   - name: integer (numeric)
 *     regex: "(\\d{1,9})"
 *     payload: { value: "#1", grain: null, multipliable: false, multiplier: false }
 * ```
 */
export interface YamlRuleFile {
    /** Dimension name or wire name */
    dimension: string;

    /** Restrict the rules to one language */
    lang?: string;

    /** Restrict the rules to one region */
    region?: string;

    rules: YamlRuleDefinition[];
}

/**
 * One YAML rule: either a phrase lookup or a regex with a payload template.
 *
 * In a template, a string "$n" becomes capture group n and "#n" becomes
 * capture group n read as a number.
 */
export type YamlRuleDefinition =
    | { name: string; lookup: Record<string, unknown> }
    | { name: string; regex: string; payload: unknown };

/**
 * Loaded rules result.
 */
export interface LoadedRules {
    ruleSets: RuleSetRegistration[];
    customDimensions: CustomDimension[];
}

/**
 * Rule loader configuration.
 */
export interface RuleLoaderConfig {
    /** Dimensions YAML files may name (default: built-ins) */
    dimensions?: readonly Dimension[];

    /** Logger for rule loading */
    logger?: EngineLogger;
}

const kTEMPLATE_REF = /^([$#])(\d)$/;

/**
 * Fill a payload template with capture groups.
 *
 * @returns null when a numeric reference is not a number
 */
export function fillTemplate(template: unknown, groups: readonly string[]): unknown {
    if (typeof template === "string") {
        const ref = kTEMPLATE_REF.exec(template);
        if (!ref) {
            return template;
        }
        const group = groups[Number(ref[2]) - 1] ?? "";
        if (ref[1] === "$") {
            return group;
        }
        const value = Number(group.replace(/[,\s]/g, ""));
        return group !== "" && Number.isFinite(value) ? value : null;
    }
    if (Array.isArray(template)) {
        return template.map((item: unknown) => fillTemplate(item, groups));
    }
    if (isRecord(template)) {
        return Object.fromEntries(
            Object.entries(template).map(([key, value]) => [key, fillTemplate(value, groups)])
        );
    }
    return template;
}

/**
 * Create a Rule from a YAML definition.
 *
 * @throws Error if the dimension cannot check payloads, or a lookup entry
 * is not a payload of the dimension
 */
export function createRuleFromYaml(target: Dimension, def: YamlRuleDefinition): Rule {
    const isPayload = target.isPayload;
    if (!isPayload) {
        throw new Error(`Dimension "${target.name}" does not accept payloads from rule files`);
    }

    if ("lookup" in def) {
        for (const [phrase, entry] of Object.entries(def.lookup)) {
            if (!isPayload(entry)) {
                throw new Error(`Rule "${def.name}": entry "${phrase}" is not a ${target.name} payload`);
            }
        }
        return lookupRule(def.name, def.lookup, (entry) => (isPayload(entry) ? createToken(target, entry) : null));
    }

    return createRule(def.name, [regex(def.regex)], (tokens) => {
        const groups = regexGroups(tokens[0]);
        if (!groups) {
            return null;
        }
        const payload = fillTemplate(def.payload, groups);
        return isPayload(payload) ? createToken(target, payload) : null;
    });
}

/**
 * Rule Loader
 *
 * @example
 * ```typescript
 * const loader = new RuleLoader();
 * const loaded = await loader.loadFromDirectories(["./rules/system", "./user/rules"]);
 *
 * const registry = applyLoadedRules(new RegistryBuilder(), loaded).build();
 * ```
 */
export class RuleLoader {
    private readonly logger: EngineLogger;
    private readonly dimensions: Dimension[];

    constructor(config: RuleLoaderConfig = {}) {
        this.logger = config.logger ?? createConsoleLogger("RuleLoader");
        this.dimensions = [...(config.dimensions ?? BUILTIN_DIMENSIONS)];
    }

    /**
     * Load all rule files from a directory.
     *
     * @throws RuleLoadError listing every file that failed
     */
    async loadFromDirectory(dirPath: string): Promise<LoadedRules> {
        const result: LoadedRules = {
            ruleSets        : [],
            customDimensions: [],
        };

        if (!existsSync(dirPath)) {
            this.logger.warn("Rule directory does not exist", { dirPath });
            return result;
        }

        const stat = statSync(dirPath);
        if (!stat.isDirectory()) {
            this.logger.warn("Rule path is not a directory", { dirPath });
            return result;
        }

        const files = readdirSync(dirPath).sort();
        const codeFiles = files.filter((file) => [".js", ".mjs", ".ts"].includes(extname(file).toLowerCase()) && !file.endsWith(".d.ts"));
        const yamlFiles = files.filter((file) => [".yml", ".yaml"].includes(extname(file).toLowerCase()));
        const failures: { filePath: string; error: string }[] = [];

        for (const file of codeFiles) {
            const filePath = join(dirPath, file);
            try {
                const loaded = await this.loadCodeFile(filePath);
                result.ruleSets.push(...loaded.ruleSets);
                result.customDimensions.push(...loaded.customDimensions);
            }
            catch (error) {
                failures.push({ filePath, error: error instanceof Error ? error.message : String(error) });
            }
        }

        for (const file of yamlFiles) {
            const filePath = join(dirPath, file);
            try {
                result.ruleSets.push(...this.loadYamlFile(filePath).ruleSets);
            }
            catch (error) {
                failures.push({ filePath, error: error instanceof Error ? error.message : String(error) });
            }
        }

        if (failures.length > 0) {
            for (const failure of failures) {
                this.logger.error("Failed to load rule file", failure);
            }
            throw new RuleLoadError(failures);
        }

        this.logger.info("Rules loaded from directory", {
            dirPath,
            ruleSets        : result.ruleSets.length,
            customDimensions: result.customDimensions.length,
        });

        return result;
    }

    /**
     * Load a rule set from a YAML file.
     */
    loadYamlFile(filePath: string): LoadedRules {
        const content = readFileSync(filePath, "utf-8");
        const parsed: unknown = parseYaml(content);

        if (!parsed) {
            return { ruleSets: [], customDimensions: [] };
        }

        const file = this.validateYamlFile(parsed);
        const target = this.findDimension(file.dimension);
        if (!target) {
            throw new Error(`Unknown dimension: ${file.dimension}`);
        }

        const rules = file.rules.map((def) => createRuleFromYaml(target, def));
        const ruleSet = file.lang
            ? { langRules: { [file.lang.toUpperCase()]: rules } }
            : file.region
                ? { regionRules: { [file.region.toUpperCase()]: rules } }
                : { rules };

        this.logger.debug("Loaded YAML rules", { filePath, dimension: target.name, rules: rules.length });
        return { ruleSets: [defineRuleSet(target, ruleSet)], customDimensions: [] };
    }

    /**
     * Load rule sets and custom dimensions from a code file (JS/TS).
     *
     * Looks at every named export and at the default export, which may
     * also be an array.
     */
    async loadCodeFile(filePath: string): Promise<LoadedRules> {
        const result: LoadedRules = {
            ruleSets        : [],
            customDimensions: [],
        };

        // Dynamic import
        const module: Record<string, unknown> = await import(pathToFileURL(filePath).href);

        const collect = (exported: unknown, name: string): void => {
            if (isCustomDimension(exported)) {
                if (!result.customDimensions.includes(exported)) {
                    result.customDimensions.push(exported);
                    this.dimensions.push(exported);
                    this.logger.debug("Loaded custom dimension", { name: exported.name, export: name });
                }
            }
            else if (isRuleSetRegistration(exported)) {
                result.ruleSets.push(exported);
                this.logger.debug("Loaded rule set", { dimension: exported.dimension.name, export: name });
            }
        };

        for (const [key, exported] of Object.entries(module)) {
            if (key === "default" && Array.isArray(exported)) {
                exported.forEach((item: unknown, index) => collect(item, `default[${index}]`));
            }
            else {
                collect(exported, key);
            }
        }

        return result;
    }

    /**
     * Load rules from multiple directories.
     */
    async loadFromDirectories(dirPaths: string[]): Promise<LoadedRules> {
        const result: LoadedRules = {
            ruleSets        : [],
            customDimensions: [],
        };

        for (const dirPath of dirPaths) {
            const loaded = await this.loadFromDirectory(dirPath);
            result.ruleSets.push(...loaded.ruleSets);
            result.customDimensions.push(...loaded.customDimensions);
        }

        return result;
    }

    private findDimension(name: string): Dimension | undefined {
        return this.dimensions.find((dimension) => dimension.name === name || dimension.wireName === name);
    }

    private validateYamlFile(parsed: unknown): YamlRuleFile {
        if (!isRecord(parsed)) {
            throw new Error("Invalid rule file format: expected { dimension, rules: [...] }");
        }
        const { dimension, lang, region, rules: rawRules } = parsed;
        if (typeof dimension !== "string" || !Array.isArray(rawRules)) {
            throw new Error("Invalid rule file format: expected { dimension, rules: [...] }");
        }
        if (lang !== undefined && typeof lang !== "string") {
            throw new Error("Invalid rule file: 'lang' must be a string");
        }
        if (region !== undefined && typeof region !== "string") {
            throw new Error("Invalid rule file: 'region' must be a string");
        }

        const rules = rawRules.map((raw: unknown, index): YamlRuleDefinition => {
            if (!isRecord(raw) || typeof raw.name !== "string" || raw.name === "") {
                throw new Error(`Invalid rule at index ${index}: missing or invalid 'name'`);
            }
            if (isRecord(raw.lookup)) {
                return { name: raw.name, lookup: raw.lookup };
            }
            if (typeof raw.regex === "string" && "payload" in raw) {
                return { name: raw.name, regex: raw.regex, payload: raw.payload };
            }
            throw new Error(`Invalid rule at index ${index}: expected 'lookup' or 'regex' with 'payload'`);
        });

        return { dimension, lang, region, rules };
    }
}

/**
 * Register loaded rules with a builder: custom dimensions first, then
 * rule sets.
 */
export function applyLoadedRules(builder: RegistryBuilder, loaded: LoadedRules): RegistryBuilder {
    for (const custom of loaded.customDimensions) {
        builder.addCustomDimension(custom);
    }
    for (const registration of loaded.ruleSets) {
        builder.add(registration);
    }
    return builder;
}
