/**
 * @fileoverview Unit tests for ExtractionEngine
 *
 * Tests cover:
 * - Composition of numbers from words ("two hundred")
 * - Latent results and failed resolutions
 * - Custom dimensions running after their dependencies
 * - Determinism, targets, overlap policy
 * - Event emission and error handling
 *
 * @module @spanwise/engine/__tests__/ExtractionEngine
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { ExtractionEngine } from "../engine/ExtractionEngine.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import { RegistryBuilder, type DimensionRegistry } from "../registry/DimensionRegistry.js";
import { defineCustomDimension, seal, type CustomDimension } from "../contracts/Dimension.js";
import { entityToJSON } from "../contracts/Entity.js";
import { DerivationLimitError } from "../contracts/Errors.js";
import { makeContext, makeLocale } from "../contracts/Locale.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { formatNode } from "../contracts/Node.js";
import { createRule, dimension, regex } from "../contracts/Rule.js";
import { createToken, payloadOf } from "../contracts/Token.js";
import { Distance, measureData } from "../dimensions/Measure.js";
import { Numeral, numeralToken } from "../dimensions/Numeral.js";
import { Time } from "../dimensions/Time.js";
import { createMockLogger, digits, hundred, monthNames, multiply, numberWords } from "./testGrammar.js";

const kREFERENCE = new Date("2026-10-19T12:00:00.000Z");
const context = makeContext(kREFERENCE, makeLocale("en"));

interface RatioData {
    got: number;
    total: number;
}

const Ratio: CustomDimension<RatioData, { got: number; total: number }> = defineCustomDimension<RatioData, { got: number; total: number }>({
    name        : "Ratio",
    dependencies: [seal(Numeral)],
    resolve     : ({ got, total }) => ({ value: { got, total }, latent: false }),
    rules       : [
        createRule("<number> out of <number>", [dimension(Numeral), regex("out of"), dimension(Numeral)], ([first, , third]) => {
            const got = payloadOf(Numeral, first);
            const total = payloadOf(Numeral, third);
            return got && total ? createToken(Ratio, { got: got.value, total: total.value }) : null;
        }),
    ],
});

/**
 * "march" also read as a distance without a unit, which never resolves.
 */
const unresolvableMarch = createRule("march as a distance", [regex("(march)")], () =>
    createToken(Distance, measureData({ value: 3 }))
);

function createRegistry(): DimensionRegistry {
    return new RegistryBuilder()
        .addRules(Numeral, { rules: [digits], langRules: { EN: [numberWords, hundred, multiply] } })
        .addRules(Time, { langRules: { EN: [monthNames] } })
        .addRules(Distance, { langRules: { EN: [unresolvableMarch] } })
        .addCustomDimension(Ratio)
        .build();
}

describe("ExtractionEngine", () => {
    let logger: EngineLogger;
    let engine: ExtractionEngine;

    beforeEach(() => {
        logger = createMockLogger();
        engine = new ExtractionEngine({ registry: createRegistry(), logger });
    });

    describe("parse", () => {
        // Scenario: "two hundred" composes into one number spanning the input
        it("should compose number words into a single entity", () => {
            const entities = engine.parse("two hundred", context);

            expect(entities.map(entityToJSON)).toEqual([
                {
                    dim   : "number",
                    body  : "two hundred",
                    value : { type: "value", value: 200 },
                    start : 0,
                    end   : 11,
                    latent: false,
                },
            ]);
        });

        // Scenario: a bare digit is a confident number
        it("should extract digits as a number", () => {
            const [entity] = engine.parse("3", context);

            expect(entityToJSON(entity)).toEqual({
                dim   : "number",
                body  : "3",
                value : { type: "value", value: 3 },
                start : 0,
                end   : 1,
                latent: false,
            });
        });

        // Scenario: only the latent month survives; the distance reading does not resolve
        it("should keep a latent result when nothing else resolves", () => {
            const entities = engine.parse("March", context);

            expect(entities.map(entityToJSON)).toEqual([
                {
                    dim   : "time",
                    body  : "March",
                    value : { type: "value", value: "2027-03-01T00:00:00.000Z", grain: "month" },
                    start : 0,
                    end   : 5,
                    latent: true,
                },
            ]);
        });

        // Scenario: custom dimension sees the completed numbers
        it("should run custom dimension rules after their dependencies saturate", () => {
            const passes: [number, number, number][] = [];
            engine.eventBus.subscribe("parse:pass", (event) => {
                const data = event.data ?? {};
                passes.push([Number(data.pass), Number(data.stage), Number(data.added)]);
            });

            const entities = engine.parse("two hundred out of three hundred", context, { targets: [Ratio] });

            expect(passes).toEqual([
                [1, 0, 4],
                [2, 0, 2],
                [3, 0, 0],
                [4, 1, 4],
                [5, 1, 0],
            ]);
            expect(entities.map(entityToJSON)).toEqual([
                {
                    dim   : "Ratio",
                    body  : "two hundred out of three hundred",
                    value : { got: 200, total: 300 },
                    start : 0,
                    end   : 32,
                    latent: false,
                },
            ]);
        });

        // Scenario: the same input twice gives the same output
        it("should be deterministic", () => {
            const text = "three hundred or 7 in May";

            const first = engine.parse(text, context, { withLatent: true }).map(entityToJSON);
            const second = engine.parse(text, context, { withLatent: true }).map(entityToJSON);

            expect(second).toEqual(first);
            expect(first.map((entity) => entity.body)).toEqual(["three hundred", "7", "May"]);
        });

        // Scenario: empty input yields nothing
        it("should return no entities for empty text", () => {
            expect(engine.parse("", context)).toEqual([]);
        });
    });

    describe("analyze", () => {
        // Scenario: targets restrict resolution to the named dimensions
        it("should only resolve target dimensions", () => {
            const resolved = engine.analyze("two hundred in March", context, { targets: [Time] });

            expect(resolved).toHaveLength(1);
            expect(resolved[0].rval.dimension).toBe(Time);
            expect(resolved[0].range).toEqual({ start: 15, end: 20 });
        });

        // Scenario: a latent candidate overlapping a confident one is dropped unless asked for
        it("should drop overlapped latent candidates unless withLatent is set", () => {
            const mayFifth = createRule("may <digit>", [regex("may (\\d)")], () => numeralToken(5));
            const registry = new RegistryBuilder()
                .addRules(Time, { rules: [monthNames] })
                .addRules(Numeral, { rules: [mayFifth] })
                .build();
            const local = new ExtractionEngine({ registry, logger });
            const dims = (options: { withLatent?: boolean; overlap?: "exact" | "overlapping" }): string[] =>
                local.parse("may 5", context, options).map((entity) => entity.dim);

            expect(dims({})).toEqual(["number"]);
            expect(dims({ withLatent: true })).toEqual(["time", "number"]);
            expect(dims({ withLatent: true, overlap: "overlapping" })).toEqual(["time"]);
        });

        // Scenario: overlapping policy keeps one candidate per overlap group
        it("should collapse overlapping candidates under the overlapping policy", () => {
            const text = "two hundred out of three hundred";

            const exact = engine.analyze(text, context);
            const overlapping = engine.analyze(text, context, { overlap: "overlapping" });

            expect(exact.map((token) => [token.range.start, token.range.end])).toEqual([
                [0, 11],
                [0, 32],
                [19, 32],
            ]);
            expect(overlapping.map((token) => [token.range.start, token.range.end])).toEqual([[0, 11]]);
        });
    });

    describe("derive", () => {
        // Scenario: the derivation tree records rules and leaves
        it("should expose the saturated derivation", () => {
            const derivation = engine.derive("two hundred", makeLocale("en"), [Numeral]);

            expect(derivation.state).toBe("saturated");
            expect(derivation.size).toBe(3);

            const composed = derivation.nodes().find((node) => node.rule === "compose by multiplication");
            expect(composed && formatNode(composed)).toBe([
                "compose by multiplication [0, 11) Numeral 200 (grain 2)",
                "  integer (1..9) [0, 3) Numeral 2",
                "    <regex> [0, 3) RegexMatch [\"two\"]",
                "  powers of ten [4, 11) Numeral 100 (grain 2)",
                "    <regex> [4, 11) RegexMatch [\"hundred\"]",
            ].join("\n"));
        });
    });

    describe("events", () => {
        // Scenario: a parse emits its lifecycle events under one trace ID
        it("should emit lifecycle events with a shared trace ID", () => {
            const eventBus = new InMemoryEventBus({ logger });
            const local = new ExtractionEngine({ registry: createRegistry(), logger, eventBus });
            const events: { type: string; traceId?: string }[] = [];
            eventBus.subscribe("*", (event) => {
                events.push({ type: event.type, traceId: event.traceId });
            });

            local.parse("3", context);

            expect(events.map((event) => event.type)).toEqual([
                "parse:started",
                "parse:pass",
                "parse:pass",
                "parse:pass",
                "parse:saturated",
                "parse:resolved",
                "parse:completed",
            ]);
            expect(new Set(events.map((event) => event.traceId)).size).toBe(1);
            expect(events[0].traceId).toMatch(/^tr_[0-9a-z]+_[0-9a-z]*$/);
        });
    });

    describe("error handling", () => {
        // Scenario: a runaway grammar hits the pass limit
        it("should throw DerivationLimitError and emit parse:error", () => {
            const successor = createRule("successor", [dimension(Numeral)], ([token]) => {
                const n = payloadOf(Numeral, token);
                return n ? numeralToken(n.value + 1) : null;
            });
            const registry = new RegistryBuilder().addRules(Numeral, { rules: [digits, successor] }).build();
            const local = new ExtractionEngine({ registry, logger, limits: { maxPasses: 5 } });
            const onError = vi.fn();
            local.eventBus.subscribe("parse:error", onError);

            expect(() => local.parse("1", context)).toThrow(DerivationLimitError);
            expect(onError).toHaveBeenCalledTimes(1);
            expect(logger.error).toHaveBeenCalledWith("Parse error", expect.objectContaining({
                error: "Derivation exceeded its passes limit after 5 passes and 5 nodes",
            }));
        });

        // Scenario: a throwing production is logged and skipped
        it("should log a failing production and keep parsing", () => {
            const broken = createRule("broken", [regex("(\\d+)")], () => {
                throw new Error("production broke");
            });
            const registry = new RegistryBuilder().addRules(Numeral, { rules: [broken, digits] }).build();
            const local = new ExtractionEngine({ registry, logger });

            const entities = local.parse("42", context);

            expect(entities.map((entity) => entity.value)).toEqual([{ type: "value", value: 42 }]);
            expect(logger.error).toHaveBeenCalledWith("[engine:broken] Production failed", expect.objectContaining({
                error: "production broke",
            }));
        });

        // Scenario: a throwing resolver is logged and its token dropped
        it("should log a failing resolver and drop the token", () => {
            const Fragile: CustomDimension<number, number> = defineCustomDimension<number, number>({
                name   : "Fragile",
                resolve: () => {
                    throw new Error("resolver broke");
                },
                rules: [createRule("fragile", [regex("(x)")], () => createToken(Fragile, 1))],
            });
            const registry = new RegistryBuilder().addCustomDimension(Fragile).build();
            const local = new ExtractionEngine({ registry, logger });

            expect(local.parse("x", context)).toEqual([]);
            expect(logger.error).toHaveBeenCalledWith("Resolver for Fragile failed", expect.objectContaining({
                error: "resolver broke",
            }));
        });
    });

    describe("supportedDimensions", () => {
        // Scenario: only dimensions with rules for the locale are listed
        it("should list dimensions with rules for the locale", () => {
            expect(engine.supportedDimensions(makeLocale("en")).map((d) => d.name)).toEqual([
                "Distance",
                "Numeral",
                "Time",
                "Ratio",
            ]);
            expect(engine.supportedDimensions(makeLocale("fr")).map((d) => d.name)).toEqual([
                "Numeral",
                "Ratio",
            ]);
        });
    });
});
