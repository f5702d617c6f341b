/**
 * @fileoverview Locale and resolution context
 *
 * Inputs the core consumes but does not own: the target language/region,
 * the reference instant, and whether latent results are wanted.
 *
 * @module @spanwise/engine/contracts/Locale
 */

import { SpanwiseError } from "./Errors.js";

/** Upper-case ISO 639-1 language code, e.g. "EN" */
export type Lang = string;

/** Upper-case ISO 3166 region code, e.g. "GB" */
export type Region = string;

export interface Locale {
    readonly lang: Lang;
    readonly region: Region | null;
}

/**
 * Resolution context. Resolvers read nothing else.
 */
export interface Context {
    /** Instant that relative expressions ("March", "3pm") resolve against */
    readonly referenceTime: Date;

    readonly locale: Locale;
}

/**
 * Resolution options.
 */
export interface Options {
    /** Keep latent results even where a confident candidate overlaps them */
    readonly withLatent: boolean;
}

const kLANG_PATTERN = /^[A-Z]{2,3}$/;
const kREGION_PATTERN = /^[A-Z]{2}$|^\d{3}$/;

/**
 * Create a normalized, frozen Locale.
 *
 * @example
 * ```typescript
 * makeLocale("en", "gb"); // => { lang: "EN", region: "GB" }
 * makeLocale("fr");       // => { lang: "FR", region: null }
 * ```
 */
export function makeLocale(lang: string, region?: string | null): Locale {
    const normalizedLang = lang.trim().toUpperCase();
    if (!kLANG_PATTERN.test(normalizedLang)) {
        throw new SpanwiseError(`Invalid language code: ${lang}`);
    }

    let normalizedRegion: Region | null = null;
    if (region !== undefined && region !== null && region.trim() !== "") {
        normalizedRegion = region.trim().toUpperCase();
        if (!kREGION_PATTERN.test(normalizedRegion)) {
            throw new SpanwiseError(`Invalid region code: ${region}`);
        }
    }

    return Object.freeze({ lang: normalizedLang, region: normalizedRegion });
}

/**
 * Create a frozen resolution Context.
 *
 * @throws SpanwiseError if the reference time is an invalid Date
 */
export function makeContext(referenceTime: Date, locale: Locale): Context {
    if (Number.isNaN(referenceTime.getTime())) {
        throw new SpanwiseError("Reference time is not a valid date");
    }
    return Object.freeze({ referenceTime: new Date(referenceTime.getTime()), locale });
}

export function showLocale(locale: Locale): string {
    return locale.region ? `${locale.lang}_${locale.region}` : locale.lang;
}
