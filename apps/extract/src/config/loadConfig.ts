/**
 * @fileoverview Configuration Loader
 *
 * Loads extraction settings from a YAML file and applies environment
 * overrides on top.
 *
 * @module config/loadConfig
 */

import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import type { DerivationLimits, OverlapPolicy } from "@spanwise/engine";

/**
 * Application configuration
 */
export interface ExtractConfig {
    /** Upper-case language code */
    lang: string;

    /** Upper-case region code, if any */
    region: string | null;

    /** Keep latent candidates that overlap confident ones */
    withLatent: boolean;

    /** Candidate grouping */
    overlap: OverlapPolicy;

    /** Dimension names to extract; empty means all */
    targets: string[];

    /** Reference instant; null means "now" */
    referenceTime: Date | null;

    /** Rule directories, relative to the application directory */
    ruleDirs: string[];

    /** Per-parse derivation limits */
    limits: DerivationLimits;
}

function isOverlapPolicy(raw: unknown): raw is OverlapPolicy {
    return raw === "exact" || raw === "overlapping";
}

function isStringArray(raw: unknown): raw is string[] {
    return Array.isArray(raw) && raw.every((item: unknown) => typeof item === "string");
}

function isPositiveInteger(raw: unknown): raw is number {
    return typeof raw === "number" && Number.isInteger(raw) && raw > 0;
}

/**
 * Get the default configuration.
 */
export function getDefaultConfig(): ExtractConfig {
    return {
        lang         : "EN",
        region       : null,
        withLatent   : false,
        overlap      : "exact",
        targets      : [],
        referenceTime: null,
        ruleDirs     : ["rules/system", "user/rules"],
        limits       : {
            maxPasses: 64,
            maxNodes : 10000,
        },
    };
}

/**
 * Load configuration from a YAML file. Missing keys take their defaults.
 *
 * @param filePath - Path to the extract.yml file
 * @throws Error if the file doesn't exist or a field is invalid
 *
 * @example
 * ```typescript
 * const config = loadConfig("./config/extract.yml");
 * console.log(config.lang); // "EN"
 * ```
 */
export function loadConfig(filePath: string): ExtractConfig {
    if (!existsSync(filePath)) {
        throw new Error(`Configuration file not found: ${filePath}`);
    }

    const content = readFileSync(filePath, "utf-8");
    const parsed: unknown = parseYaml(content);

    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
        throw new Error("Invalid configuration file format: expected a mapping");
    }

    const config = getDefaultConfig();
    const raw: Record<string, unknown> = { ...parsed };

    if (raw.locale !== undefined) {
        if (typeof raw.locale !== "object" || raw.locale === null) {
            throw new Error("Invalid configuration: 'locale' must be a mapping");
        }
        const locale: Record<string, unknown> = { ...raw.locale };
        if (locale.lang !== undefined) {
            if (typeof locale.lang !== "string" || locale.lang === "") {
                throw new Error("Invalid configuration: 'locale.lang' must be a non-empty string");
            }
            config.lang = locale.lang.toUpperCase();
        }
        if (locale.region !== undefined && locale.region !== null) {
            if (typeof locale.region !== "string") {
                throw new Error("Invalid configuration: 'locale.region' must be a string or null");
            }
            config.region = locale.region.toUpperCase();
        }
    }

    if (raw.withLatent !== undefined) {
        if (typeof raw.withLatent !== "boolean") {
            throw new Error("Invalid configuration: 'withLatent' must be a boolean");
        }
        config.withLatent = raw.withLatent;
    }

    if (raw.overlap !== undefined) {
        if (!isOverlapPolicy(raw.overlap)) {
            throw new Error("Invalid configuration: 'overlap' must be \"exact\" or \"overlapping\"");
        }
        config.overlap = raw.overlap;
    }

    if (raw.targets !== undefined) {
        if (!isStringArray(raw.targets)) {
            throw new Error("Invalid configuration: 'targets' must be a list of dimension names");
        }
        config.targets = raw.targets;
    }

    if (raw.ruleDirs !== undefined) {
        if (!isStringArray(raw.ruleDirs)) {
            throw new Error("Invalid configuration: 'ruleDirs' must be a list of paths");
        }
        config.ruleDirs = raw.ruleDirs;
    }

    if (raw.limits !== undefined) {
        if (typeof raw.limits !== "object" || raw.limits === null) {
            throw new Error("Invalid configuration: 'limits' must be a mapping");
        }
        const limits: Record<string, unknown> = { ...raw.limits };
        for (const key of ["maxPasses", "maxNodes"] as const) {
            const value = limits[key];
            if (value === undefined) {
                continue;
            }
            if (!isPositiveInteger(value)) {
                throw new Error(`Invalid configuration: 'limits.${key}' must be a positive integer`);
            }
            config.limits = { ...config.limits, [key]: value };
        }
    }

    return config;
}

/**
 * Load configuration with fallback to the defaults.
 *
 * @param filePath - Path to the extract.yml file
 */
export function loadConfigWithFallback(filePath: string): ExtractConfig {
    try {
        return loadConfig(filePath);
    }
    catch (error) {
        console.warn(`[WARN] Failed to load configuration from ${filePath}:`, error instanceof Error ? error.message : String(error));
        return getDefaultConfig();
    }
}

/**
 * Apply SPANWISE_* environment overrides.
 *
 * @throws Error if a variable holds an unusable value
 */
export function applyEnvironment(config: ExtractConfig, env: NodeJS.ProcessEnv = process.env): ExtractConfig {
    const result = { ...config };

    if (env.SPANWISE_LANG) {
        result.lang = env.SPANWISE_LANG.toUpperCase();
    }
    if (env.SPANWISE_REGION !== undefined) {
        result.region = env.SPANWISE_REGION === "" ? null : env.SPANWISE_REGION.toUpperCase();
    }
    if (env.SPANWISE_WITH_LATENT !== undefined) {
        result.withLatent = ["1", "true", "yes"].includes(env.SPANWISE_WITH_LATENT.toLowerCase());
    }
    if (env.SPANWISE_REFERENCE_TIME) {
        const referenceTime = new Date(env.SPANWISE_REFERENCE_TIME);
        if (Number.isNaN(referenceTime.getTime())) {
            throw new Error(`Invalid SPANWISE_REFERENCE_TIME: ${env.SPANWISE_REFERENCE_TIME}`);
        }
        result.referenceTime = referenceTime;
    }

    return result;
}
