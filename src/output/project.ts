import type { AnnotatedToken, ReadonlyWordScoreList, SupportTier, Thresholds, TierSummary, Token } from "../types";

/** Highest support first */
export const SUPPORT_TIERS: readonly SupportTier[] = ["high", "partial", "low"];

export const TIER_LABELS: Record<SupportTier, string> = {
    high: "High support",
    partial: "Partial support",
    low: "Low/No support",
};

export const DEFAULT_THRESHOLDS: Thresholds = {
    high: 0.7,
    partial: 0.35,
};

/**
 * Map a probability to a support tier. Both thresholds are exclusive.
 */
export function classifyProbability(probability: number, thresholds: Thresholds = DEFAULT_THRESHOLDS): SupportTier {
    if (probability > thresholds.high) return "high";
    if (probability > thresholds.partial) return "partial";
    return "low";
}

/**
 * Attach a score to every word token: the Nth occurrence of a word (case
 * insensitive) takes the Nth entry of its score list. Words with no list,
 * or more occurrences than scores, are unscored and rendered as low support.
 *
 * Occurrences are counted from the first token, so `tokens` must be the
 * whole article that was analyzed, not a slice of it.
 */
export function projectScores(
    tokens: readonly Token[],
    wordScores: ReadonlyWordScoreList,
    thresholds: Thresholds = DEFAULT_THRESHOLDS
): AnnotatedToken[] {
    const seen = new Map<string, number>();

    return tokens.map((token): AnnotatedToken => {
        if (token.kind !== "word") {
            return { token, probability: null, tier: null };
        }

        const key = token.text.toLowerCase();
        const occurrence = seen.get(key) ?? 0;
        seen.set(key, occurrence + 1);

        const probability = wordScores.get(key)?.[occurrence];
        if (probability === undefined) {
            return { token, probability: null, tier: "low" };
        }

        return { token, probability, tier: classifyProbability(probability, thresholds) };
    });
}

/**
 * Count word tokens per tier
 */
export function summarizeTiers(annotated: readonly AnnotatedToken[]): TierSummary {
    const summary: TierSummary = { high: 0, partial: 0, low: 0, unscored: 0, totalWords: 0 };

    for (const { tier, probability } of annotated) {
        if (tier === null) continue;
        summary[tier]++;
        summary.totalWords++;
        if (probability === null) {
            summary.unscored++;
        }
    }

    return summary;
}
