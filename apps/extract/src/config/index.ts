/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export {
    loadConfig,
    loadConfigWithFallback,
    getDefaultConfig,
    applyEnvironment,
    type ExtractConfig,
} from "./loadConfig.js";
export { parseCliArgs, applyCliArgs, type CliArgs } from "./cliArgs.js";
