export type TokenClass = "word" | "punctuation" | "space";

export interface Token {
    readonly text: string;
    readonly kind: TokenClass;
}

/** Whole sentences joined with single spaces */
export type Block = string;

/**
 * Word-to-probability mapping as returned by the scorer.
 * Values are untrusted until validated entry by entry.
 */
export type RawScoreMap = Readonly<Record<string, unknown>>;

/** Canonical (lowercased, stripped) word -> highest probability seen for it */
export type NormalizedScoreMap = ReadonlyMap<string, number>;

/** Lowercase word -> one score per occurrence, in processing order */
export type WordScoreList = Map<string, number[]>;

export type ReadonlyWordScoreList = ReadonlyMap<string, readonly number[]>;

/** Per-source score lists, in source load order */
export type SourceScores = ReadonlyMap<string, ReadonlyWordScoreList>;

export type SupportTier = "high" | "partial" | "low";

export interface Thresholds {
    high: number;
    partial: number;
}

export interface AnnotatedToken {
    token: Token;
    probability: number | null; // null = unscored
    tier: SupportTier | null;   // null for punctuation and space
}

export interface TierSummary {
    high: number;
    partial: number;
    low: number;
    unscored: number; // subset of low
    totalWords: number;
}

export interface SourceDocument {
    name: string;
    text: string;
}
