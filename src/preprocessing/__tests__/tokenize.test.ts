import { describe, it, expect } from "vitest";
import { tokenizeText, extractWords, countWords } from "../tokenize";

describe("tokenizeText", () => {
    it("splits words, punctuation and spaces", () => {
        const tokens = tokenizeText("Hello, world!");

        expect(tokens).toEqual([
            { text: "Hello", kind: "word" },
            { text: ",", kind: "punctuation" },
            { text: " ", kind: "space" },
            { text: "world", kind: "word" },
            { text: "!", kind: "punctuation" },
        ]);
    });

    it("emits each punctuation character as its own token", () => {
        const tokens = tokenizeText("(USA)...");

        expect(tokens.map(t => t.text)).toEqual(["(", "USA", ")", ".", ".", "."]);
        expect(tokens.map(t => t.kind)).toEqual([
            "punctuation", "word", "punctuation", "punctuation", "punctuation", "punctuation",
        ]);
    });

    it("keeps whitespace runs as single tokens", () => {
        const tokens = tokenizeText("  a\tb\n\n");

        expect(tokens).toEqual([
            { text: "  ", kind: "space" },
            { text: "a", kind: "word" },
            { text: "\t", kind: "space" },
            { text: "b", kind: "word" },
            { text: "\n\n", kind: "space" },
        ]);
    });

    it("splits possessives at the apostrophe", () => {
        const tokens = tokenizeText("Germany's");

        expect(tokens.map(t => [t.text, t.kind])).toEqual([
            ["Germany", "word"],
            ["'", "punctuation"],
            ["s", "word"],
        ]);
    });

    it("treats digits and underscores as word characters", () => {
        const tokens = tokenizeText("snake_case 1932");

        expect(tokens.filter(t => t.kind === "word").map(t => t.text)).toEqual(["snake_case", "1932"]);
    });

    it("keeps accented letters inside words", () => {
        expect(extractWords("café naïve")).toEqual(["café", "naïve"]);
        // e followed by a combining acute accent
        expect(extractWords("café")).toEqual(["café"]);
    });

    it("returns an empty array for empty input", () => {
        expect(tokenizeText("")).toEqual([]);
    });

    it("reproduces the input when token texts are concatenated", () => {
        const inputs = [
            "",
            "plain",
            "The bridge opened in 1932. It spans the river.",
            "  leading and trailing  \n",
            "Quotes: \"double\" and 'single' (nested [brackets] {too}).",
            "Mixed\r\nline\tendings and nbsp",
            "Emoji 👍 and symbols © ® ™ — dashes – too",
            "über-straße, Ελληνικά, русский; 東京!",
            "a...b???c!!!",
        ];

        for (const input of inputs) {
            expect(tokenizeText(input).map(t => t.text).join("")).toBe(input);
        }
    });

    it("is deterministic", () => {
        const text = "Same input, same output.";

        expect(tokenizeText(text)).toEqual(tokenizeText(text));
    });
});

describe("countWords", () => {
    it("counts maximal word-character runs", () => {
        expect(countWords("It's a test, isn't it?")).toBe(7);
    });

    it("returns 0 for punctuation-only text", () => {
        expect(countWords("... !? --")).toBe(0);
    });
});
