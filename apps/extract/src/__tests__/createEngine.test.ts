/**
 * @fileoverview Integration tests for the sample English grammar
 *
 * Builds the engine the way the CLI does: code grammar, then the YAML
 * rules in rules/system, then the custom dimension in user/rules.
 *
 * @module __tests__/createEngine
 */

import { describe, it, expect, vi, beforeAll } from "vitest";
import { fileURLToPath } from "url";
import {
    entityToJSON,
    makeContext,
    makeLocale,
    type EngineLogger,
    type EntityJSON,
    type ParseOptions,
} from "@spanwise/engine";
import { getDefaultConfig } from "../config/loadConfig.js";
import { createEngine, resolveTargets, type AppEngine } from "../createEngine.js";

const kAPP_DIR = fileURLToPath(new URL("../..", import.meta.url));
const context = makeContext(new Date("2026-10-19T12:00:00.000Z"), makeLocale("en"));

function createMockLogger(): EngineLogger {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

describe("createEngine", () => {
    let app: AppEngine;
    let logger: EngineLogger;

    beforeAll(async () => {
        logger = createMockLogger();
        app = await createEngine(getDefaultConfig(), kAPP_DIR, logger);
    });

    function extract(text: string, targets: string[] = [], options: Omit<ParseOptions, "targets"> = {}): EntityJSON[] {
        return app.engine
            .parse(text, context, { ...options, targets: resolveTargets(app.registry, targets) })
            .map(entityToJSON);
    }

    it("should register the custom dimension from user rules", () => {
        expect(app.registry.find("score")?.name).toBe("Score");
        expect(logger.info).toHaveBeenCalledWith("Registry built", expect.objectContaining({
            customDimensions: ["Score"],
        }));
    });

    it("should reject unknown target names", () => {
        expect(() => resolveTargets(app.registry, ["weather"])).toThrow("Unknown dimension: weather");
    });

    describe("numbers", () => {
        // Scenario: multiplication
        it("should read \"two hundred\"", () => {
            expect(extract("two hundred")).toEqual([
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

        // Scenario: tens and units
        it("should read \"twenty one\"", () => {
            expect(extract("twenty one").map((entity) => entity.value)).toEqual([{ type: "value", value: 21 }]);
        });

        // Scenario: a multiple plus a smaller number
        it("should read \"two hundred five\"", () => {
            expect(extract("two hundred five").map((entity) => entity.value)).toEqual([{ type: "value", value: 205 }]);
        });

        // Scenario: a product is not scaled again by the multiplier inside it
        it("should read \"twenty one hundred\" as 2100", () => {
            expect(extract("twenty one hundred").map((entity) => [entity.body, entity.value])).toEqual([
                ["twenty one hundred", { type: "value", value: 2100 }],
            ]);
        });

        // Scenario: a smaller product adds onto a larger multiple
        it("should read \"two thousand two hundred\" as one number", () => {
            expect(extract("two thousand two hundred").map((entity) => [entity.body, entity.value])).toEqual([
                ["two thousand two hundred", { type: "value", value: 2200 }],
            ]);
        });

        it("should read digits with thousands separators", () => {
            expect(extract("1,250").map((entity) => [entity.body, entity.value])).toEqual([
                ["1,250", { type: "value", value: 1250 }],
            ]);
        });
    });

    describe("time", () => {
        // Scenario: a month name plus a day pins a date
        it("should resolve \"March 3\" to the next March 3rd", () => {
            expect(extract("March 3", [], { overlap: "overlapping" })).toEqual([
                {
                    dim   : "time",
                    body  : "March 3",
                    value : { type: "value", value: "2027-03-03T00:00:00.000Z", grain: "day" },
                    start : 0,
                    end   : 7,
                    latent: false,
                },
            ]);
        });

        it("should also report the day number under the exact policy", () => {
            expect(extract("March 3").map((entity) => [entity.dim, entity.body])).toEqual([
                ["time", "March 3"],
                ["number", "3"],
            ]);
        });

        // Scenario: an explicit past year wins over the reference time
        it("should resolve \"March 3 2020\" in 2020", () => {
            expect(extract("March 3 2020", ["time"])).toEqual([
                {
                    dim   : "time",
                    body  : "March 3 2020",
                    value : { type: "value", value: "2020-03-03T00:00:00.000Z", grain: "day" },
                    start : 0,
                    end   : 12,
                    latent: false,
                },
            ]);
        });

        it("should resolve an ordinal day of a month", () => {
            expect(extract("3rd of March", ["time"]).map((entity) => [entity.body, entity.value])).toEqual([
                ["3rd of March", { type: "value", value: "2027-03-03T00:00:00.000Z", grain: "day" }],
            ]);
        });

        // Scenario: a bare month is latent and survives on its own
        it("should keep a bare month as latent", () => {
            expect(extract("see you in october")).toEqual([
                {
                    dim   : "time",
                    body  : "october",
                    value : { type: "value", value: "2026-10-01T00:00:00.000Z", grain: "month" },
                    start : 11,
                    end   : 18,
                    latent: true,
                },
            ]);
        });
    });

    describe("measures", () => {
        it("should read amounts of money", () => {
            expect(extract("$20", ["amount-of-money"]).map((entity) => entity.value)).toEqual([
                { type: "value", value: 20, unit: "USD" },
            ]);
        });

        it("should read durations", () => {
            expect(extract("3 hours", ["duration"]).map((entity) => entity.value)).toEqual([
                {
                    type      : "value",
                    value     : 3,
                    unit      : "hour",
                    normalized: { value: 10800, unit: "second" },
                },
            ]);
        });

        // Scenario: a composed number counts a duration
        it("should read \"two hundred days\"", () => {
            expect(extract("two hundred days").map((entity) => [entity.dim, entity.body])).toEqual([
                ["number", "two hundred"],
                ["duration", "two hundred days"],
            ]);
            expect(extract("two hundred days", ["duration"]).map((entity) => entity.value)).toEqual([
                {
                    type      : "value",
                    value     : 200,
                    unit      : "day",
                    normalized: { value: 17280000, unit: "second" },
                },
            ]);
        });
    });

    describe("custom dimension", () => {
        // Scenario: Score runs after every number is derived
        it("should read \"seven out of ten\"", () => {
            expect(extract("seven out of ten", ["score"])).toEqual([
                {
                    dim   : "score",
                    body  : "seven out of ten",
                    value : { value: 0.7, got: 7, total: 10 },
                    start : 0,
                    end   : 16,
                    latent: false,
                },
            ]);
        });

        it("should read \"20/50\"", () => {
            expect(extract("20/50", ["score"]).map((entity) => entity.value)).toEqual([{ value: 0.4, got: 20, total: 50 }]);
        });
    });

    it("should find contact details", () => {
        expect(extract("write to someone@example.org").map((entity) => [entity.dim, entity.value])).toEqual([
            ["email", { value: "someone@example.org" }],
        ]);
    });
});
