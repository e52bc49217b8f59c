import type { Token } from "../types";

/** Word characters: letters, combining marks, digits, underscore */
const WORD_CHARS = "\\p{L}\\p{M}\\p{N}_";

// Each code point falls into exactly one alternative, so matches tile the input
const TOKEN_PATTERN = new RegExp(`([${WORD_CHARS}]+)|([^${WORD_CHARS}\\s])|(\\s+)`, "gu");
const WORD_PATTERN = new RegExp(`[${WORD_CHARS}]+`, "gu");

/**
 * Split text into word, punctuation and space tokens.
 * Concatenating the token texts reproduces the input exactly.
 */
export function tokenizeText(text: string): Token[] {
    const tokens: Token[] = [];

    for (const match of text.matchAll(TOKEN_PATTERN)) {
        const [, word, punctuation, space] = match;
        if (word !== undefined) {
            tokens.push({ text: word, kind: "word" });
        } else if (punctuation !== undefined) {
            tokens.push({ text: punctuation, kind: "punctuation" });
        } else if (space !== undefined) {
            tokens.push({ text: space, kind: "space" });
        }
    }

    return tokens;
}

/**
 * Word token texts in order, original casing preserved
 */
export function extractWords(text: string): string[] {
    return text.match(WORD_PATTERN) ?? [];
}

/**
 * Number of maximal word-character runs in text
 */
export function countWords(text: string): number {
    return extractWords(text).length;
}
