import type { Block } from "../types";
import { countWords } from "./tokenize";

// Whitespace preceded by sentence-ending punctuation
const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/u;

/**
 * Split text into sentences on `.`, `!` or `?` followed by whitespace.
 * Sentence text is kept as-is; whitespace-only pieces are dropped.
 * Trailing text without terminal punctuation is the last sentence.
 */
export function splitIntoSentences(text: string): string[] {
    if (text.length === 0) return [];

    return text
        .split(SENTENCE_BOUNDARY)
        .filter(sentence => sentence.trim().length > 0);
}

/**
 * Greedily pack whole sentences into blocks of at most `targetWords` words.
 * A sentence longer than the target becomes a block of its own; sentences
 * are never split.
 */
export function splitIntoBlocks(text: string, targetWords: number): Block[] {
    if (!Number.isInteger(targetWords) || targetWords < 1) {
        throw new RangeError(`Block size must be a positive integer, got ${targetWords}`);
    }

    const blocks: Block[] = [];
    let current: string[] = [];
    let currentWords = 0;

    for (const sentence of splitIntoSentences(text)) {
        const sentenceWords = countWords(sentence);

        if (currentWords + sentenceWords <= targetWords) {
            current.push(sentence);
            currentWords += sentenceWords;
            continue;
        }

        if (current.length > 0) {
            blocks.push(current.join(" "));
        }
        current = [sentence];
        currentWords = sentenceWords;
    }

    if (current.length > 0) {
        blocks.push(current.join(" "));
    }

    return blocks;
}
