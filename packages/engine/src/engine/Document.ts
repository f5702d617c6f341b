/**
 * @fileoverview Document
 *
 * The raw text of one parse plus the lexical lookups rules need: word
 * boundaries, separator skipping, and cached regex matches. Offsets are
 * UTF-16 code units, as everywhere in JavaScript strings.
 *
 * @module @spanwise/engine/engine/Document
 */

import { createRange, type Range } from "../contracts/Range.js";

/**
 * One regex match: its span and capture groups (missing groups are "").
 */
export interface LexicalMatch {
    readonly range: Range;
    readonly groups: readonly string[];
}

type CharClass = "letter" | "digit" | "other";

const kSEPARATORS = new Set([" ", "\t", "-"]);
const kLETTER = /^[\p{L}\p{M}]$/u;
const kDIGIT = /^\p{Nd}$/u;

function classify(char: string | undefined): CharClass {
    if (char === undefined) {
        return "other";
    }
    if (kLETTER.test(char)) {
        return "letter";
    }
    return kDIGIT.test(char) ? "digit" : "other";
}

function groupsOf(match: RegExpExecArray): string[] {
    return match.slice(1).map((group) => group ?? "");
}

export class Document {
    readonly text: string;

    /** nextContent[i]: first index >= i that is not a separator */
    private readonly nextContent: readonly number[];

    private readonly globalMatches: Map<string, readonly LexicalMatch[]> = new Map();
    private readonly stickyMatches: Map<string, Map<number, LexicalMatch | null>> = new Map();
    private readonly stickyRegexes: Map<string, RegExp> = new Map();

    constructor(text: string) {
        this.text = text;

        const nextContent = new Array<number>(text.length + 1);
        nextContent[text.length] = text.length;
        for (let i = text.length - 1; i >= 0; i--) {
            nextContent[i] = kSEPARATORS.has(text[i]) ? nextContent[i + 1] : i;
        }
        this.nextContent = nextContent;
    }

    get length(): number {
        return this.text.length;
    }

    /**
     * Positions where an item adjacent to `end` may start.
     */
    adjacentStarts(end: number): number[] {
        const last = this.nextContent[end] ?? end;
        return Array.from({ length: last - end + 1 }, (_, i) => end + i);
    }

    /**
     * Is `index` a word boundary? Text edges always are.
     */
    isBoundary(index: number): boolean {
        if (index <= 0 || index >= this.text.length) {
            return true;
        }
        const before = classify(String.fromCodePoint(this.codePointBefore(index)));
        const after = classify(String.fromCodePoint(this.text.codePointAt(index) ?? 0));
        return before !== after || before === "other";
    }

    /**
     * Non-empty, and neither edge falls inside a word.
     */
    isRangeValid(start: number, end: number): boolean {
        return start < end && this.isBoundary(start) && this.isBoundary(end);
    }

    /**
     * All non-overlapping valid matches of `source` over the document.
     */
    regexMatches(source: string): readonly LexicalMatch[] {
        const cached = this.globalMatches.get(source);
        if (cached) {
            return cached;
        }

        const matches: LexicalMatch[] = [];
        const global = new RegExp(source, "giu");
        let match = global.exec(this.text);
        while (match) {
            const start = match.index;
            const end = start + match[0].length;
            if (start === end) {
                // Step over the code point so an empty match cannot loop
                global.lastIndex = start + ((this.text.codePointAt(start) ?? 0) > 0xffff ? 2 : 1);
            }
            else if (this.isRangeValid(start, end)) {
                matches.push({ range: createRange(start, end), groups: groupsOf(match) });
            }
            match = global.exec(this.text);
        }

        this.globalMatches.set(source, matches);
        return matches;
    }

    /**
     * The valid match of `source` starting exactly at `start`, if any.
     */
    regexMatchAt(source: string, start: number): LexicalMatch | null {
        let byStart = this.stickyMatches.get(source);
        if (!byStart) {
            byStart = new Map();
            this.stickyMatches.set(source, byStart);
        }
        const cached = byStart.get(start);
        if (cached !== undefined) {
            return cached;
        }

        let sticky = this.stickyRegexes.get(source);
        if (!sticky) {
            sticky = new RegExp(source, "yiu");
            this.stickyRegexes.set(source, sticky);
        }
        sticky.lastIndex = start;
        const match = sticky.exec(this.text);

        let found: LexicalMatch | null = null;
        if (match && this.isRangeValid(start, start + match[0].length)) {
            found = { range: createRange(start, start + match[0].length), groups: groupsOf(match) };
        }
        byStart.set(start, found);
        return found;
    }

    private codePointBefore(index: number): number {
        const low = this.text.charCodeAt(index - 1);
        if (low >= 0xdc00 && low <= 0xdfff && index >= 2) {
            const high = this.text.charCodeAt(index - 2);
            if (high >= 0xd800 && high <= 0xdbff) {
                return this.text.codePointAt(index - 2) ?? low;
            }
        }
        return low;
    }
}
