export const SYSTEM_PROMPT = "You are an expert fact-checker. You compare article text against reference sources word by word.";

/** Response shape shown to the model */
export const RESPONSE_STRUCTURE = `{
    "probabilities": {
        "word1": 0.9,
        "word2": 0.5,
        "word3": 0.0
    }
}`;

export const ARTICLE_MARKER = "========= ARTICLE TEXT =========";
export const SOURCE_MARKER = "========= SOURCE TEXT =========";

/**
 * User prompt asking for a support probability for every word of the block
 */
export function buildFactCheckPrompt(articleBlock: string, sourceText: string): string {
    return `Compare the article text below against the provided source and verify its accuracy.

For EACH WORD in the article text, assign a probability (0.0 to 1.0) that indicates how well it is supported by the source:
- 1.0: the word is directly supported by information in the source
- 0.7-0.9: supported, with minor differences in context
- 0.4-0.6: partial support, or ambiguous
- 0.1-0.3: minimal support, or only tangentially related
- 0.0: contradicts the source, or has no support

Ignore punctuation when naming words. For example:
- for "Germany's" give a probability for "Germany"
- for "(USA)" give a probability for "USA"

Score EVERY SINGLE WORD, including articles (the, a, an), prepositions and conjunctions.

Return ONLY a valid JSON object with this structure:
${RESPONSE_STRUCTURE}

${ARTICLE_MARKER}
${articleBlock}
${SOURCE_MARKER}
${sourceText}
`;
}
