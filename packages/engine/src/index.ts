/**
 * @fileoverview Spanwise Engine
 *
 * Rule-based, multi-dimension information extraction.
 *
 * The engine provides:
 * - Typed dimensions and tokens, with built-in and custom dimensions
 * - Pattern rules over raw text and previously derived tokens
 * - Staged, saturating derivation with provenance trees
 * - Context-dependent resolution, ranking and deduplication
 *
 * @module @spanwise/engine
 * @example
 * ```typescript
 * import {
 *     ExtractionEngine,
 *     RegistryBuilder,
 *     Numeral,
 *     lookupRule,
 *     numeralToken,
 *     makeContext,
 *     makeLocale,
 * } from "@spanwise/engine";
 *
 * const registry = new RegistryBuilder()
 *     .addRules(Numeral, {
 *         langRules: { EN: [lookupRule("integer (1..3)", { one: 1, two: 2, three: 3 }, (n) => numeralToken(n))] },
 *     })
 *     .build();
 *
 * const engine = new ExtractionEngine({ registry });
 * engine.parse("two", makeContext(new Date(), makeLocale("en")));
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

export * from "./contracts/index.js";

// ============================================================================
// Built-in dimensions
// ============================================================================

export * from "./dimensions/index.js";

// ============================================================================
// Registry
// ============================================================================

export * from "./registry/index.js";

// ============================================================================
// Implementation exports
// ============================================================================

export { InMemoryEventBus, type InMemoryEventBusConfig } from "./impl/index.js";

// ============================================================================
// Engine exports
// ============================================================================

export * from "./engine/index.js";

// ============================================================================
// Rule loading
// ============================================================================

export * from "./plugins/index.js";

// ============================================================================
// Utilities
// ============================================================================

export { stableStringify, fnv1a, isJsonValue, isRecord, type JsonValue } from "./util/json.js";
