import type { NormalizedScoreMap, RawScoreMap } from "../types";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

/** Characters trimmed from both ends of a word before lookup */
export const STRIP_CHARS = ".,;:?!()[]{}\"'";

const POSSESSIVE_SUFFIX = "'s";

/**
 * Remove leading and trailing characters from STRIP_CHARS
 */
export function stripPunctuation(word: string): string {
    let start = 0;
    let end = word.length;

    while (start < end && STRIP_CHARS.includes(word.charAt(start))) start++;
    while (end > start && STRIP_CHARS.includes(word.charAt(end - 1))) end--;

    return word.slice(start, end);
}

/**
 * Validate one probability as returned by the scorer.
 * Accepts finite numbers and numeric strings in [0, 1].
 */
export function parseProbability(value: unknown): number | null {
    let parsed: number;

    if (typeof value === "number") {
        parsed = value;
    } else if (typeof value === "string" && value.trim() !== "") {
        parsed = Number(value.trim());
    } else {
        return null;
    }

    if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
        return null;
    }
    return parsed;
}

function putMax(map: Map<string, number>, key: string, probability: number): void {
    const existing = map.get(key);
    if (existing === undefined || probability > existing) {
        map.set(key, probability);
    }
}

/**
 * Expand a raw scorer mapping into lowercase, punctuation-stripped and
 * possessive-stripped keys. Colliding keys keep the highest probability.
 * Invalid entries are dropped with a warning.
 */
export function normalizeProbabilities(raw: RawScoreMap): NormalizedScoreMap {
    const normalized = new Map<string, number>();

    for (const [word, value] of Object.entries(raw)) {
        const probability = parseProbability(value);
        if (probability === null) {
            logger.warn(`Invalid probability for word '${word}': ${JSON.stringify(value) ?? String(value)}`);
            continue;
        }

        const key = word.toLowerCase();
        putMax(normalized, key, probability);

        const stripped = stripPunctuation(key);
        if (stripped.length > 0 && stripped !== key) {
            putMax(normalized, stripped, probability);
        }

        if (key.endsWith(POSSESSIVE_SUFFIX) && key.length > POSSESSIVE_SUFFIX.length) {
            putMax(normalized, key.slice(0, -POSSESSIVE_SUFFIX.length), probability);
        }
    }

    return normalized;
}
