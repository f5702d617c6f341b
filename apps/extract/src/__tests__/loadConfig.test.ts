/**
 * @fileoverview Unit tests for the configuration loader
 *
 * Tests cover:
 * - loadConfig function
 * - loadConfigWithFallback function
 * - getDefaultConfig function
 * - applyEnvironment overrides
 *
 * @module config/__tests__/loadConfig
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
    applyEnvironment,
    getDefaultConfig,
    loadConfig,
    loadConfigWithFallback,
} from "../config/loadConfig.js";

// Mock the fs module
vi.mock("fs", () => ({
    readFileSync: vi.fn(),
    existsSync  : vi.fn(),
}));

import { readFileSync, existsSync } from "fs";

const mockExistsSync = vi.mocked(existsSync);
const mockReadFileSync = vi.mocked(readFileSync);

describe("loadConfig", () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    describe("loadConfig", () => {
        // Scenario: every setting given
        it("should load and normalize a complete file", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue(`
locale:
  lang: fr
  region: ca
withLatent: true
overlap: overlapping
targets: [time, number]
ruleDirs:
  - rules
limits:
  maxPasses: 10
`);

            const config = loadConfig("/path/to/extract.yml");

            expect(config).toEqual({
                lang         : "FR",
                region       : "CA",
                withLatent   : true,
                overlap      : "overlapping",
                targets      : ["time", "number"],
                referenceTime: null,
                ruleDirs     : ["rules"],
                limits       : {
                    maxPasses: 10,
                    maxNodes : 10000,
                },
            });
        });

        // Scenario: missing keys take their defaults
        it("should fill in defaults for missing keys", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue("locale:\n  region: null\n");

            expect(loadConfig("/path/to/extract.yml")).toEqual(getDefaultConfig());
        });

        it("should throw error when file does not exist", () => {
            mockExistsSync.mockReturnValue(false);

            expect(() => loadConfig("/nonexistent/extract.yml")).toThrow(
                "Configuration file not found: /nonexistent/extract.yml"
            );
        });

        it("should throw error when the file is not a mapping", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue("- just\n- a list\n");

            expect(() => loadConfig("/path/to/extract.yml")).toThrow(
                "Invalid configuration file format: expected a mapping"
            );
        });

        it("should throw error for a non-boolean withLatent", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue("withLatent: sometimes\n");

            expect(() => loadConfig("/path/to/extract.yml")).toThrow(
                "Invalid configuration: 'withLatent' must be a boolean"
            );
        });

        it("should throw error for an unknown overlap policy", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue("overlap: greedy\n");

            expect(() => loadConfig("/path/to/extract.yml")).toThrow(
                "Invalid configuration: 'overlap' must be \"exact\" or \"overlapping\""
            );
        });

        it("should throw error for a non-positive limit", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue("limits:\n  maxNodes: 0\n");

            expect(() => loadConfig("/path/to/extract.yml")).toThrow(
                "Invalid configuration: 'limits.maxNodes' must be a positive integer"
            );
        });

        it("should throw error for targets that are not a list", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue("targets: time\n");

            expect(() => loadConfig("/path/to/extract.yml")).toThrow(
                "Invalid configuration: 'targets' must be a list of dimension names"
            );
        });
    });

    describe("loadConfigWithFallback", () => {
        // Scenario: a missing file falls back to the defaults with a warning
        it("should return defaults and warn when loading fails", () => {
            const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
            mockExistsSync.mockReturnValue(false);

            const config = loadConfigWithFallback("/nonexistent/extract.yml");

            expect(config).toEqual(getDefaultConfig());
            expect(warn).toHaveBeenCalledWith(
                "[WARN] Failed to load configuration from /nonexistent/extract.yml:",
                "Configuration file not found: /nonexistent/extract.yml"
            );
        });
    });

    describe("applyEnvironment", () => {
        it("should apply SPANWISE_* variables", () => {
            const config = applyEnvironment(getDefaultConfig(), {
                SPANWISE_LANG          : "de",
                SPANWISE_REGION        : "at",
                SPANWISE_WITH_LATENT   : "TRUE",
                SPANWISE_REFERENCE_TIME: "2026-10-19T08:00:00Z",
            });

            expect(config.lang).toBe("DE");
            expect(config.region).toBe("AT");
            expect(config.withLatent).toBe(true);
            expect(config.referenceTime?.toISOString()).toBe("2026-10-19T08:00:00.000Z");
        });

        it("should clear the region when SPANWISE_REGION is empty", () => {
            const base = { ...getDefaultConfig(), region: "GB" };

            const config = applyEnvironment(base, { SPANWISE_REGION: "", SPANWISE_WITH_LATENT: "no" });

            expect(config.region).toBeNull();
            expect(config.withLatent).toBe(false);
            expect(base.region).toBe("GB");
        });

        it("should leave the configuration alone without variables", () => {
            expect(applyEnvironment(getDefaultConfig(), {})).toEqual(getDefaultConfig());
        });

        it("should reject an unparseable reference time", () => {
            expect(() => applyEnvironment(getDefaultConfig(), { SPANWISE_REFERENCE_TIME: "soon" })).toThrow(
                "Invalid SPANWISE_REFERENCE_TIME: soon"
            );
        });
    });
});
