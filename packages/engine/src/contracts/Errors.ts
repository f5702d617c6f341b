/**
 * @fileoverview Error types
 *
 * Every fault raised by the engine derives from SpanwiseError. Declined
 * productions and failed resolutions are not faults and never surface here.
 *
 * @module @spanwise/engine/contracts/Errors
 */

/**
 * Base class for engine errors.
 */
export class SpanwiseError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * The registry could not be built: malformed rule patterns, duplicate
 * dimension names, unknown or cyclic dependencies.
 */
export class RegistryError extends SpanwiseError {
    /** One line per problem found */
    readonly problems: readonly string[];

    constructor(problems: readonly string[]) {
        super(`Invalid rule table (${problems.length} problem${problems.length === 1 ? "" : "s"}):\n- ${problems.join("\n- ")}`);
        this.problems = Object.freeze([...problems]);
    }
}

/**
 * A parse exceeded its pass or node budget.
 */
export class DerivationLimitError extends SpanwiseError {
    readonly limit: "passes" | "nodes";
    readonly passes: number;
    readonly nodes: number;

    constructor(limit: "passes" | "nodes", passes: number, nodes: number) {
        super(`Derivation exceeded its ${limit} limit after ${passes} passes and ${nodes} nodes`);
        this.limit = limit;
        this.passes = passes;
        this.nodes = nodes;
    }
}

/**
 * A value read back from the wire is not a well-formed entity.
 */
export class EntityFormatError extends SpanwiseError {}

/**
 * One or more rule files could not be loaded.
 */
export class RuleLoadError extends SpanwiseError {
    readonly failures: readonly { readonly filePath: string; readonly error: string }[];

    constructor(failures: readonly { readonly filePath: string; readonly error: string }[]) {
        super(`Failed to load ${failures.length} rule file${failures.length === 1 ? "" : "s"}:\n- ${failures.map((f) => `${f.filePath}: ${f.error}`).join("\n- ")}`);
        this.failures = Object.freeze([...failures]);
    }
}
