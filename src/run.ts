import type { AppConfig } from "./config";
import type { SourceDocument } from "./types";
import type { ScorerGateway } from "./llm/scorer";
import { OpenAiScorer } from "./llm/scorer";
import { createOpenAiClient } from "./llm/client";
import { analyzeArticle, type AnalysisResult } from "./pipeline";
import { tokenizeText } from "./preprocessing/tokenize";
import { combineSourceScores } from "./scoring/reconcile";
import { projectScores, summarizeTiers } from "./output/project";
import { TerminalRenderer } from "./output/terminal";
import { renderHtmlReport, type ReportView } from "./output/html";
import { loadArticle, loadSources, writeReport } from "./io/load";
import Logger from "./utils/logger";

const logger = Logger.getInstance();

export const COMBINED_VIEW_NAME = "All sources (combined)";

export interface RunDependencies {
    /** Replaces the OpenAI-backed scorer */
    gateway?: ScorerGateway;
    /** Receives rendered terminal output (default: stdout) */
    write?: (text: string) => void;
}

export interface RunOutcome {
    analysis: AnalysisResult;
    /** Terminal text, or the HTML document in GUI mode */
    output: string;
    reportPath?: string;
}

/**
 * Build one report view per source, then the combined view
 */
export function buildViews(
    articleText: string,
    analysis: AnalysisResult,
    config: Pick<AppConfig, "thresholds">
): ReportView[] {
    const tokens = tokenizeText(articleText);
    const views: ReportView[] = [];

    for (const [name, scores] of analysis.sourceScores) {
        const annotated = projectScores(tokens, scores, config.thresholds);
        views.push({ name, annotated, summary: summarizeTiers(annotated) });
    }

    if (analysis.sourceScores.size > 1) {
        const annotated = projectScores(tokens, combineSourceScores(analysis.sourceScores), config.thresholds);
        views.push({ name: COMBINED_VIEW_NAME, annotated, summary: summarizeTiers(annotated) });
    }

    return views;
}

/**
 * Terminal output: legend, the article coloured by the combined scores,
 * and a tier summary per source
 */
export function renderTerminalOutput(
    articleText: string,
    analysis: AnalysisResult,
    config: Pick<AppConfig, "thresholds" | "color">
): string {
    const renderer = new TerminalRenderer({
        ...(config.color !== undefined && { color: config.color }),
    });
    const tokens = tokenizeText(articleText);
    const combined = projectScores(tokens, combineSourceScores(analysis.sourceScores), config.thresholds);

    const lines = [
        renderer.renderLegend(),
        "",
        "Colored Article Text:",
        renderer.renderArticle(combined),
        "",
    ];

    for (const view of buildViews(articleText, analysis, config)) {
        lines.push(renderer.renderSummary(view.name, view.summary));
    }

    return lines.join("\n");
}

/**
 * Load inputs, score the article and render it. Fatal input problems throw
 * FactCheckError before any model call is made.
 */
export async function runFactCheck(config: AppConfig, deps: RunDependencies = {}): Promise<RunOutcome> {
    const articleText = loadArticle(config.articlePath);
    const sources: SourceDocument[] = loadSources(config.sourcesDir);

    const gateway = deps.gateway ?? new OpenAiScorer(
        createOpenAiClient({
            apiKey: config.apiKey,
            timeoutMs: config.timeoutMs,
            maxRetries: config.maxRetries,
            ...(config.baseUrl !== undefined && { baseUrl: config.baseUrl }),
        }),
        { model: config.model, delayMs: config.delayMs }
    );

    logger.log(`Model: ${config.model}${config.baseUrl !== undefined ? ` at ${config.baseUrl}` : ""}`);

    const analysis = await analyzeArticle(articleText, sources, gateway, {
        blockSize: config.blockSize,
        concurrency: config.concurrency,
        onProgress: (done, total) => logger.debug(`Scored ${done}/${total} block/source pairs`),
    });

    if (analysis.unmatchedWords.length > 0) {
        logger.warn(`${analysis.unmatchedWords.length} distinct word(s) had no probability and were scored 0.0`);
    }
    if (analysis.emptyResponses > 0) {
        logger.warn(`${analysis.emptyResponses} scorer call(s) returned no usable probabilities`);
    }

    if (config.gui) {
        const html = logger.time("Render HTML report", () =>
            renderHtmlReport(buildViews(articleText, analysis, config), {
                title: `Fact-check: ${config.articlePath}`,
                thresholds: config.thresholds,
            })
        );
        writeReport(config.outPath, html);
        logger.log(`Report written to ${config.outPath}; open it in a browser to switch between sources`);
        return { analysis, output: html, reportPath: config.outPath };
    }

    const output = logger.time("Render terminal output", () => renderTerminalOutput(articleText, analysis, config));
    const write = deps.write ?? ((text: string) => {
        process.stdout.write(text + "\n");
    });
    write(output);
    return { analysis, output };
}
