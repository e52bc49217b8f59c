export type {
    AnnotatedToken,
    Block,
    NormalizedScoreMap,
    RawScoreMap,
    ReadonlyWordScoreList,
    SourceDocument,
    SourceScores,
    SupportTier,
    Thresholds,
    TierSummary,
    Token,
    TokenClass,
    WordScoreList,
} from "./types";

export { tokenizeText, extractWords, countWords } from "./preprocessing/tokenize";
export { splitIntoSentences, splitIntoBlocks } from "./preprocessing/segment";
export { htmlToText } from "./preprocessing/strip";
export { normalizeProbabilities, parseProbability, stripPunctuation } from "./scoring/normalize";
export { ScoreReconciler, combineSourceScores, UNMATCHED_SCORE } from "./scoring/reconcile";
export { analyzeArticle, analyzeBlocks, type AnalysisOptions, type AnalysisResult } from "./pipeline";
export { OpenAiScorer, parseScoreResponse, type ScorerGateway } from "./llm/scorer";
export { createOpenAiClient, type ChatCompletionClient } from "./llm/client";
export { projectScores, classifyProbability, summarizeTiers, DEFAULT_THRESHOLDS } from "./output/project";
export { TerminalRenderer } from "./output/terminal";
export { renderHtmlReport, type ReportView } from "./output/html";
export { loadArticle, loadSources } from "./io/load";
export { resolveConfig, loadEnvFile, DEFAULT_CONFIG, type AppConfig, type CliOptions } from "./config";
export { runFactCheck } from "./run";
export { FactCheckError, isFactCheckError, type FactCheckErrorCode } from "./errors";
