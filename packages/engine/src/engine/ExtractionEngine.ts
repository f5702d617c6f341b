/**
 * @fileoverview ExtractionEngine
 *
 * Orchestrates one parse over a frozen registry.
 *
 * Pipeline flow:
 * 1. Rules for the locale (and the targets' dependency closure) are selected
 * 2. The derivation engine saturates the document stage by stage
 * 3. Nodes of the target dimensions are resolved against the context
 * 4. Candidates are ranked and deduplicated
 * 5. Winners become entities
 *
 * Every step is synchronous. The engine holds no per-parse state, so one
 * instance serves any number of parses.
 *
 * @module @spanwise/engine/engine/ExtractionEngine
 */

import type { Dimension } from "../contracts/Dimension.js";
import { createEntity, type Entity } from "../contracts/Entity.js";
import type { EventBus, EventPayload } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import { showLocale, type Context, type Locale } from "../contracts/Locale.js";
import { createConsoleLogger, type EngineLogger } from "../contracts/Logger.js";
import type { ResolvedToken } from "../contracts/Resolved.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import type { DimensionRegistry } from "../registry/DimensionRegistry.js";
import { DerivationEngine, type Derivation, type DerivationLimits } from "./Derivation.js";
import { Document } from "./Document.js";
import { rank, type OverlapPolicy } from "./Ranking.js";
import { resolveNodes } from "./Resolution.js";

/**
 * Engine configuration options.
 */
export interface ExtractionEngineConfig {
    /** Validated rule table */
    readonly registry: DimensionRegistry;

    /** Pass and node limits per parse */
    readonly limits?: Partial<DerivationLimits>;

    /** Custom EventBus (default: InMemoryEventBus) */
    readonly eventBus?: EventBus;

    /** Logger for engine operations */
    readonly logger?: EngineLogger;
}

/**
 * Per-call parse options.
 */
export interface ParseOptions {
    /** Dimensions to extract (default: all) */
    readonly targets?: readonly Dimension[];

    /** Keep latent candidates that overlap confident ones (default: false) */
    readonly withLatent?: boolean;

    /** Candidate grouping (default: "exact") */
    readonly overlap?: OverlapPolicy;
}

/**
 * Generate a unique trace ID for one parse.
 */
function generateTraceId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 8);
    return `tr_${timestamp}_${random}`;
}

/**
 * ExtractionEngine - text in, ranked entities out.
 *
 * @example
 * ```typescript
 * const engine = new ExtractionEngine({ registry });
 *
 * engine.eventBus.subscribe("parse:completed", (event) => {
 *     console.log("Parsed:", event.data);
 * });
 *
 * const context = makeContext(new Date(), makeLocale("en"));
 * engine.parse("two hundred", context);
 * // => [{ dim: "number", body: "two hundred", value: { type: "value", value: 200 }, ... }]
 * ```
 */
export class ExtractionEngine {
    private readonly registry: DimensionRegistry;
    private readonly limits: Partial<DerivationLimits>;
    private readonly logger: EngineLogger;

    /** Public access to the event bus for external subscriptions */
    public readonly eventBus: EventBus;

    constructor(config: ExtractionEngineConfig) {
        this.registry = config.registry;
        this.limits = { ...config.limits };
        this.logger = config.logger ?? createConsoleLogger();
        this.eventBus = config.eventBus ?? new InMemoryEventBus({ logger: this.logger });
    }

    /**
     * Extract entities from `text`.
     */
    parse(text: string, context: Context, options: ParseOptions = {}): Entity[] {
        return this.analyze(text, context, options).map((resolved) => createEntity(text, resolved));
    }

    /**
     * Ranked resolved tokens for `text`.
     *
     * @throws DerivationLimitError when the parse exceeds its limits
     */
    analyze(text: string, context: Context, options: ParseOptions = {}): ResolvedToken[] {
        const traceId = generateTraceId();
        const startTime = Date.now();
        const targets = options.targets ?? [];
        const logger = this.traceLogger(traceId);

        this.emit(createEvent("parse:started", {
            length : text.length,
            locale : showLocale(context.locale),
            targets: targets.map((target) => target.name),
        }, traceId));

        try {
            const derivation = this.runDerivation(text, context.locale, targets, traceId, logger);

            this.emit(createEvent("parse:saturated", {
                passes: derivation.passes,
                nodes : derivation.size,
            }, traceId));

            const candidates = resolveNodes(derivation.nodes(), targets, context, {
                withLatent: options.withLatent ?? false,
            }, logger);

            this.emit(createEvent("parse:resolved", {
                candidates: candidates.length,
            }, traceId));

            const winners = rank(candidates, {
                withLatent: options.withLatent ?? false,
                overlap   : options.overlap,
            });

            const duration = Date.now() - startTime;
            this.emit(createEvent("parse:completed", {
                entities: winners.length,
                duration,
            }, traceId));

            logger.debug("Parse completed", {
                passes    : derivation.passes,
                nodes     : derivation.size,
                candidates: candidates.length,
                entities  : winners.length,
                duration,
            });

            return winners;
        }
        catch (error) {
            this.emit(createEvent("parse:error", {
                error: error instanceof Error ? error.message : String(error),
            }, traceId));

            logger.error("Parse error", {
                error: error instanceof Error ? error.message : String(error),
            });
            throw error;
        }
    }

    /**
     * Saturated derivation of `text`, without resolution or ranking.
     */
    derive(text: string, locale: Locale, targets: readonly Dimension[] = []): Derivation {
        const traceId = generateTraceId();
        return this.runDerivation(text, locale, targets, traceId, this.traceLogger(traceId));
    }

    /**
     * Dimensions with at least one rule for the locale.
     */
    supportedDimensions(locale?: Locale): Dimension[] {
        return this.registry.supportedDimensions(locale);
    }

    private runDerivation(
        text: string,
        locale: Locale,
        targets: readonly Dimension[],
        traceId: string,
        logger: EngineLogger
    ): Derivation {
        const rules = this.registry.rulesFor(locale, targets);
        const engine = new DerivationEngine(new Document(text), rules, {
            limits: this.limits,
            logger,
            onPass: (pass, stage, added) => {
                this.emit(createEvent("parse:pass", { pass, stage, added }, traceId));
            },
        });
        return engine.saturate();
    }

    /**
     * Emit an event to the event bus.
     */
    private emit(event: EventPayload): void {
        this.eventBus.emit(event);
    }

    /**
     * Logger that tags every entry with the parse's trace ID.
     */
    private traceLogger(traceId: string): EngineLogger {
        const base = this.logger;
        return {
            debug: (msg, data) => base.debug(msg, { ...data, traceId }),
            info : (msg, data) => base.info(msg, { ...data, traceId }),
            warn : (msg, data) => base.warn(msg, { ...data, traceId }),
            error: (msg, data) => base.error(msg, { ...data, traceId }),
        };
    }
}
