import type { NormalizedScoreMap, ReadonlyWordScoreList, SourceScores, WordScoreList } from "../types";
import { stripPunctuation } from "./normalize";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

/** Score recorded for a word the scorer gave no probability for */
export const UNMATCHED_SCORE = 0.0;

/**
 * Accumulates per-occurrence word scores for every source of one run.
 *
 * Each source owns its own WordScoreList. The Nth entry for a word is the
 * score of its Nth occurrence across all blocks reconciled for that source,
 * so blocks must be fed in article order.
 */
export class ScoreReconciler {
    private readonly lists = new Map<string, WordScoreList>();
    // Shared across sources: each unmatched word is reported once per run
    private readonly warnedWords = new Set<string>();

    constructor(sourceNames: readonly string[]) {
        for (const name of sourceNames) {
            this.lists.set(name, new Map());
        }
    }

    /**
     * Append one score per word, in order, to the source's lists
     */
    reconcileBlock(sourceName: string, words: readonly string[], scores: NormalizedScoreMap): void {
        const list = this.lists.get(sourceName);
        if (list === undefined) {
            throw new Error(`Unknown source: ${sourceName}`);
        }

        for (const word of words) {
            const key = word.toLowerCase();
            const score = lookupScore(scores, key);

            if (score === undefined && !this.warnedWords.has(key)) {
                logger.warn(`No probability found for word '${word}'`);
                this.warnedWords.add(key);
            }

            appendScore(list, key, score ?? UNMATCHED_SCORE);
        }
    }

    /** Distinct words that never matched, lowercase, in first-seen order */
    unmatchedWords(): string[] {
        return [...this.warnedWords];
    }

    results(): SourceScores {
        return this.lists;
    }
}

function lookupScore(scores: NormalizedScoreMap, key: string): number | undefined {
    return scores.get(key) ?? scores.get(stripPunctuation(key));
}

function appendScore(list: WordScoreList, key: string, score: number): void {
    const existing = list.get(key);
    if (existing === undefined) {
        list.set(key, [score]);
    } else {
        existing.push(score);
    }
}

/**
 * Merge all sources into one list per word by concatenation, in source order
 */
export function combineSourceScores(scores: SourceScores): ReadonlyWordScoreList {
    const combined: WordScoreList = new Map();

    for (const list of scores.values()) {
        for (const [word, values] of list) {
            const existing = combined.get(word);
            if (existing === undefined) {
                combined.set(word, [...values]);
            } else {
                existing.push(...values);
            }
        }
    }

    return combined;
}
