import * as cheerio from "cheerio";
import { Text } from "domhandler";
import type { AnnotatedToken, SupportTier, Thresholds, TierSummary } from "../types";
import { SUPPORT_TIERS, TIER_LABELS } from "./project";

export interface ReportView {
    /** Shown in the source switcher */
    name: string;
    annotated: readonly AnnotatedToken[];
    summary: TierSummary;
}

export interface HtmlReportOptions {
    title?: string;
    thresholds: Thresholds;
}

const TIER_STYLES = {
    high: "green",
    partial: "orange",
    low: "red",
} as const;

const TEMPLATE = `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title></title>
<style>
body { font-family: system-ui, sans-serif; margin: 2rem auto; max-width: 60rem; line-height: 1.6; }
header { display: flex; gap: 1rem; align-items: center; flex-wrap: wrap; }
.article { white-space: pre-wrap; border: 1px solid #ccc; padding: 1rem; }
.legend span { margin-right: 1.5rem; }
.summary { color: #555; font-size: 0.9rem; }
${SUPPORT_TIERS.map(tier => `.tier-${tier} { color: ${TIER_STYLES[tier]}; }`).join("\n")}
</style>
</head>
<body>
<header>
<h1></h1>
<label>Source <select id="source-select"></select></label>
</header>
<p class="legend"></p>
<main id="views"></main>
<script>
const select = document.getElementById("source-select");
const show = () => {
    for (const view of document.querySelectorAll(".view")) {
        view.hidden = view.dataset.view !== select.value;
    }
};
select.addEventListener("change", show);
show();
</script>
</body>
</html>`;

function formatSummary(summary: TierSummary): string {
    return `${summary.totalWords} words: ${summary.high} high, ${summary.partial} partial, `
        + `${summary.low} low (${summary.unscored} unscored)`;
}

/**
 * Self-contained HTML page: one pre-rendered view of the article per entry
 * in `views`, and a selector that switches between them in the browser.
 */
export function renderHtmlReport(views: readonly ReportView[], options: HtmlReportOptions): string {
    const title = options.title ?? "Fact-check report";
    const $ = cheerio.load(TEMPLATE);

    $("title").text(title);
    $("h1").text(title);

    const { high, partial } = options.thresholds;
    const thresholdsText: Record<SupportTier, string> = {
        high: `p > ${high}`,
        partial: `${partial} < p ≤ ${high}`,
        low: `p ≤ ${partial}`,
    };
    for (const tier of SUPPORT_TIERS) {
        $(".legend").append(
            $("<span>").addClass(`tier-${tier}`).text(`${TIER_LABELS[tier]} (${thresholdsText[tier]})`)
        );
    }

    views.forEach((view, index) => {
        $("#source-select").append($("<option>").attr("value", String(index)).text(view.name));

        const $article = $("<div>").addClass("article");
        for (const { token, probability, tier } of view.annotated) {
            if (tier === null) {
                $article.append(new Text(token.text));
                continue;
            }
            $article.append(
                $("<span>")
                    .addClass(`tier-${tier}`)
                    .attr("title", probability === null ? "unscored" : probability.toFixed(2))
                    .text(token.text)
            );
        }

        $("#views").append(
            $("<section>")
                .addClass("view")
                .attr("data-view", String(index))
                .append($("<h2>").text(view.name))
                .append($("<p>").addClass("summary").text(formatSummary(view.summary)))
                .append($article)
        );
    });

    return $.html();
}
