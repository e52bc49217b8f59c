import { describe, it, expect } from "vitest";
import * as cheerio from "cheerio";
import { renderHtmlReport, type ReportView } from "../html";
import { projectScores, summarizeTiers, DEFAULT_THRESHOLDS } from "../project";
import { tokenizeText } from "../../preprocessing/tokenize";

function view(name: string, text: string, scores: Map<string, number[]>): ReportView {
    const annotated = projectScores(tokenizeText(text), scores);
    return { name, annotated, summary: summarizeTiers(annotated) };
}

describe("renderHtmlReport", () => {
    const views = [
        view("source1.txt", "Cats <purr> & sleep.", new Map([["cats", [0.9]], ["purr", [0.5]], ["sleep", [0.1]]])),
        view("source2.txt", "Cats <purr> & sleep.", new Map([["cats", [0.2]]])),
    ];

    it("sets the title and heading", () => {
        const $ = cheerio.load(renderHtmlReport(views, { title: "Fact-check: article.txt", thresholds: DEFAULT_THRESHOLDS }));

        expect($("title").text()).toBe("Fact-check: article.txt");
        expect($("h1").text()).toBe("Fact-check: article.txt");
    });

    it("uses a default title", () => {
        const $ = cheerio.load(renderHtmlReport(views, { thresholds: DEFAULT_THRESHOLDS }));

        expect($("title").text()).toBe("Fact-check report");
    });

    it("adds one switcher option and one view per source", () => {
        const $ = cheerio.load(renderHtmlReport(views, { thresholds: DEFAULT_THRESHOLDS }));

        const options = $("#source-select option").toArray().map(el => [$(el).attr("value"), $(el).text()]);
        expect(options).toEqual([["0", "source1.txt"], ["1", "source2.txt"]]);
        expect($("section.view").toArray().map(el => $(el).attr("data-view"))).toEqual(["0", "1"]);
        expect($("section.view h2").toArray().map(el => $(el).text())).toEqual(["source1.txt", "source2.txt"]);
    });

    it("wraps words in tier spans with their probability", () => {
        const $ = cheerio.load(renderHtmlReport(views, { thresholds: DEFAULT_THRESHOLDS }));
        const spans = $("section[data-view='0'] .article span").toArray().map(el => [
            $(el).text(),
            $(el).attr("class"),
            $(el).attr("title"),
        ]);

        expect(spans).toEqual([
            ["Cats", "tier-high", "0.90"],
            ["purr", "tier-partial", "0.50"],
            ["sleep", "tier-low", "0.10"],
        ]);
    });

    it("marks words without a score as unscored", () => {
        const $ = cheerio.load(renderHtmlReport(views, { thresholds: DEFAULT_THRESHOLDS }));

        expect($("section[data-view='1'] .article span").eq(1).attr("title")).toBe("unscored");
    });

    it("escapes article text and keeps it whole", () => {
        const html = renderHtmlReport(views, { thresholds: DEFAULT_THRESHOLDS });
        const $ = cheerio.load(html);

        expect($("section[data-view='0'] .article").text()).toBe("Cats <purr> & sleep.");
        expect($("section[data-view='0'] .article purr").length).toBe(0);
        expect(html).toContain("&lt;");
    });

    it("shows each view's summary", () => {
        const $ = cheerio.load(renderHtmlReport(views, { thresholds: DEFAULT_THRESHOLDS }));

        expect($("section[data-view='1'] .summary").text()).toBe("3 words: 0 high, 0 partial, 3 low (2 unscored)");
    });

    it("states the thresholds in the legend", () => {
        const $ = cheerio.load(renderHtmlReport(views, { thresholds: { high: 0.8, partial: 0.4 } }));

        expect($(".legend span").toArray().map(el => $(el).text())).toEqual([
            "High support (p > 0.8)",
            "Partial support (0.4 < p ≤ 0.8)",
            "Low/No support (p ≤ 0.4)",
        ]);
    });

    it("includes the view switching script", () => {
        const $ = cheerio.load(renderHtmlReport(views, { thresholds: DEFAULT_THRESHOLDS }));

        expect($("script").text()).toContain("select.addEventListener(\"change\", show);");
    });
});
