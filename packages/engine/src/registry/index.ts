/**
 * @fileoverview Registry barrel exports
 *
 * @module @spanwise/engine/registry
 */

export { RegistryBuilder, DimensionRegistry, type CompiledRule } from "./DimensionRegistry.js";
