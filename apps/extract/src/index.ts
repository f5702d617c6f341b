/**
 * @fileoverview Spanwise Extract - Main Entry Point
 *
 * Reads text from the command line (or stdin), extracts entities with the
 * sample English grammar and prints them as JSON.
 *
 * Settings come from config/extract.yml, then SPANWISE_* environment
 * variables, then flags:
 *
 * ```text
 * npm run extract -- [--lang en] [--region gb] [--dim time] [--latent] [--overlap] [--debug] <text>
 * ```
 *
 * @module spanwise-extract
 */

// Load .env before reading SPANWISE_* variables
import "dotenv/config";

import { join, dirname } from "path";
import { fileURLToPath } from "url";

import {
    createConsoleLogger,
    entityToJSON,
    formatNode,
    makeContext,
    makeLocale,
    type EngineLogger,
} from "@spanwise/engine";

import {
    applyCliArgs,
    applyEnvironment,
    loadConfigWithFallback,
    parseCliArgs,
} from "./config/index.js";
import { createEngine, resolveTargets } from "./createEngine.js";

// Get directory of this file
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const kAPP_DIR = join(__dirname, "..");

/**
 * Console logger; debug and info only with --debug.
 */
function createAppLogger(debug: boolean): EngineLogger {
    const logger = createConsoleLogger("extract");
    return {
        debug: (msg, data) => (debug ? logger.debug(msg, data) : undefined),
        info : (msg, data) => (debug ? logger.info(msg, data) : undefined),
        warn : logger.warn,
        error: logger.error,
    };
}

async function readStdin(): Promise<string> {
    if (process.stdin.isTTY) {
        return "";
    }
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
        chunks.push(Buffer.from(chunk));
    }
    return Buffer.concat(chunks).toString("utf-8").trim();
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
    const args = parseCliArgs(process.argv.slice(2));
    const config = applyCliArgs(
        applyEnvironment(loadConfigWithFallback(join(kAPP_DIR, "config", "extract.yml"))),
        args
    );
    const logger = createAppLogger(args.debug);

    const { engine, registry } = await createEngine(config, kAPP_DIR, logger);

    if (args.debug) {
        engine.eventBus.subscribe("*", (event) => {
            logger.debug(`[EVENT] ${event.type}`, event.data);
        });
    }

    const text = args.text || await readStdin();
    if (text === "") {
        console.error("Usage: spanwise-extract [--lang xx] [--region yy] [--dim name] [--latent] [--overlap] [--debug] <text>");
        process.exitCode = 2;
        return;
    }

    const context = makeContext(config.referenceTime ?? new Date(), makeLocale(config.lang, config.region));
    const entities = engine.parse(text, context, {
        targets   : resolveTargets(registry, config.targets),
        withLatent: config.withLatent,
        overlap   : config.overlap,
    });

    console.log(JSON.stringify(entities.map(entityToJSON), null, 2));

    if (args.debug) {
        for (const entity of entities) {
            console.error(formatNode(entity.enode));
        }
    }
}

main().catch((error: unknown) => {
    console.error("[FATAL]", error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
});
