/**
 * Example User Dimension
 * ======================
 *
 * A custom dimension with its own rules, loaded automatically from the
 * user/rules/ directory. Use it as a template for your own.
 *
 * "Score" recognizes "7 out of 10" and "7/10" and resolves to the ratio.
 * It depends on Numeral, so its rule runs only after every number in the
 * text has been derived; "twenty out of fifty" works as well as "20/50".
 *
 * To create your own dimension:
 * 1. Copy this file and rename it (e.g., my-dimension.ts)
 * 2. Pick a name, a payload type and a resolved value type
 * 3. Write rules producing tokens of the new dimension
 * 4. List every dimension those rules read in `dependencies`
 *
 * YAML files in the same directory may add rules for it by name
 * (`dimension: Score`), provided its payload has an `isPayload` guard.
 */

import {
    Numeral,
    createRule,
    createToken,
    defineCustomDimension,
    dimension,
    isRecord,
    payloadOf,
    regex,
    seal,
    type CustomDimension,
} from "@spanwise/engine";

export interface ScoreData {
    got: number;
    total: number;
}

export type ScoreValue = {
    value: number;
    got: number;
    total: number;
};

export const Score: CustomDimension<ScoreData, ScoreValue> = defineCustomDimension<ScoreData, ScoreValue>({
    name        : "Score",
    wireName    : "score",
    dependencies: [seal(Numeral)],
    show        : ({ got, total }) => `Score ${got}/${total}`,
    resolve     : ({ got, total }) => {
        if (total <= 0 || got < 0 || got > total) {
            return null;
        }
        return { value: { value: got / total, got, total }, latent: false };
    },
    isPayload: (raw: unknown): raw is ScoreData =>
        isRecord(raw) && typeof raw.got === "number" && typeof raw.total === "number",

    rules: [
        createRule(
            "<number> out of <number>",
            [dimension(Numeral), regex("(?:out of|/)"), dimension(Numeral)],
            ([first, , third]) => {
                const got = payloadOf(Numeral, first);
                const total = payloadOf(Numeral, third);
                return got && total ? createToken(Score, { got: got.value, total: total.value }) : null;
            }
        ),
    ],
});
