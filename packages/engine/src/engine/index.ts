/**
 * @fileoverview Engine barrel exports
 *
 * @module @spanwise/engine/engine
 */

export {
    ExtractionEngine,
    type ExtractionEngineConfig,
    type ParseOptions,
} from "./ExtractionEngine.js";
export {
    Derivation,
    DerivationEngine,
    DEFAULT_LIMITS,
    type DerivationEngineConfig,
    type DerivationLimits,
    type DerivationState,
    type NodeRecord,
} from "./Derivation.js";
export { Document, type LexicalMatch } from "./Document.js";
export { resolveNode, resolveNodes } from "./Resolution.js";
export { rank, type OverlapPolicy, type RankOptions } from "./Ranking.js";
