/**
 * @fileoverview Command-line arguments
 *
 * Flags override both the configuration file and the environment.
 *
 * @module config/cliArgs
 */

import type { ExtractConfig } from "./loadConfig.js";

export interface CliArgs {
    lang?: string;
    region?: string;
    latent: boolean;
    debug: boolean;
    overlap: boolean;

    /** Dimension names from repeated --dim flags */
    targets: string[];

    /** Everything that is not a flag, joined by spaces */
    text: string;
}

const kVALUE_FLAGS = new Set(["--lang", "--region", "--dim"]);

/**
 * Parse `process.argv.slice(2)`.
 *
 * @throws Error on an unknown flag or a flag missing its value
 *
 * @example
 * ```typescript
 * parseCliArgs(["--lang", "en", "--latent", "two", "hundred"]);
 * // => { lang: "en", latent: true, debug: false, overlap: false, targets: [], text: "two hundred" }
 * ```
 */
export function parseCliArgs(args: readonly string[]): CliArgs {
    const result: CliArgs = {
        latent : false,
        debug  : false,
        overlap: false,
        targets: [],
        text   : "",
    };
    const words: string[] = [];

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];

        if (kVALUE_FLAGS.has(arg)) {
            const value = args[i + 1];
            if (value === undefined || value.startsWith("--")) {
                throw new Error(`Missing value for ${arg}`);
            }
            i++;
            if (arg === "--lang") {
                result.lang = value;
            }
            else if (arg === "--region") {
                result.region = value;
            }
            else {
                result.targets.push(value);
            }
        }
        else if (arg === "--latent") {
            result.latent = true;
        }
        else if (arg === "--debug") {
            result.debug = true;
        }
        else if (arg === "--overlap") {
            result.overlap = true;
        }
        else if (arg.startsWith("--")) {
            throw new Error(`Unknown flag: ${arg}`);
        }
        else {
            words.push(arg);
        }
    }

    result.text = words.join(" ");
    return result;
}

/**
 * Apply parsed flags on top of a configuration.
 */
export function applyCliArgs(config: ExtractConfig, args: CliArgs): ExtractConfig {
    return {
        ...config,
        lang      : args.lang ? args.lang.toUpperCase() : config.lang,
        region    : args.region ? args.region.toUpperCase() : config.region,
        withLatent: args.latent || config.withLatent,
        overlap   : args.overlap ? "overlapping" : config.overlap,
        targets   : args.targets.length > 0 ? args.targets : config.targets,
    };
}
