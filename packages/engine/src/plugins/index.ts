/**
 * @fileoverview Rule loader barrel exports
 *
 * @module @spanwise/engine/plugins
 */

export {
    RuleLoader,
    applyLoadedRules,
    createRuleFromYaml,
    fillTemplate,
    type YamlRuleFile,
    type YamlRuleDefinition,
    type LoadedRules,
    type RuleLoaderConfig,
} from "./RuleLoader.js";
