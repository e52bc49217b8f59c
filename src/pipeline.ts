import type { Block, NormalizedScoreMap, RawScoreMap, SourceDocument, SourceScores } from "./types";
import type { ScorerGateway } from "./llm/scorer";
import { splitIntoBlocks } from "./preprocessing/segment";
import { extractWords } from "./preprocessing/tokenize";
import { normalizeProbabilities } from "./scoring/normalize";
import { ScoreReconciler } from "./scoring/reconcile";
import { describeError } from "./errors";
import { mapWithConcurrency, truncateText } from "./utils/shared";
import Logger from "./utils/logger";

const logger = Logger.getInstance();

export interface AnalysisOptions {
    /** Scorer calls in flight at once (default 1: strictly sequential) */
    concurrency?: number;
    onProgress?: (completed: number, total: number) => void;
}

export interface AnalysisResult {
    blocks: Block[];
    sourceScores: SourceScores;
    /** Distinct lowercase words that received the 0.0 sentinel somewhere */
    unmatchedWords: string[];
    /** (block, source) pairs whose scorer call produced no usable entries */
    emptyResponses: number;
}

interface ScoringTask {
    blockIndex: number;
    block: Block;
    source: SourceDocument;
}

/**
 * Call the gateway for one pair; a throwing gateway counts as an empty map
 */
async function scorePair(gateway: ScorerGateway, task: ScoringTask): Promise<RawScoreMap> {
    try {
        return await gateway.score(task.block, task.source.text);
    } catch (error) {
        logger.warn(`Scoring block ${task.blockIndex + 1} against ${task.source.name} failed: ${describeError(error)}`);
        return {};
    }
}

/**
 * Score every block against every source and reconcile the results into
 * per-source word score lists.
 *
 * Processing order is blocks outer, sources inner. With concurrency above 1
 * the calls overlap, but results are folded in that same order, so the
 * lists are identical to a sequential run.
 */
export async function analyzeBlocks(
    blocks: readonly Block[],
    sources: readonly SourceDocument[],
    gateway: ScorerGateway,
    options: AnalysisOptions = {}
): Promise<AnalysisResult> {
    const { concurrency = 1, onProgress } = options;

    const tasks: ScoringTask[] = [];
    blocks.forEach((block, blockIndex) => {
        for (const source of sources) {
            tasks.push({ blockIndex, block, source });
        }
    });

    const reconciler = new ScoreReconciler(sources.map(s => s.name));
    let completed = 0;
    let emptyResponses = 0;

    const runTask = async (task: ScoringTask): Promise<NormalizedScoreMap> => {
        logger.debug(`Block ${task.blockIndex + 1}/${blocks.length} vs ${task.source.name}: "${truncateText(task.block, 60)}"`);
        const start = performance.now();
        const raw = await scorePair(gateway, task);
        logger.recordTiming(`Score block ${task.blockIndex + 1} vs ${task.source.name}`, performance.now() - start);
        const normalized = normalizeProbabilities(raw);
        if (normalized.size === 0) {
            emptyResponses++;
        }
        completed++;
        onProgress?.(completed, tasks.length);
        return normalized;
    };

    const fold = (task: ScoringTask, normalized: NormalizedScoreMap): void => {
        reconciler.reconcileBlock(task.source.name, extractWords(task.block), normalized);
    };

    if (concurrency <= 1) {
        for (const task of tasks) {
            fold(task, await runTask(task));
        }
    } else {
        const results = await mapWithConcurrency(tasks, runTask, concurrency);
        tasks.forEach((task, i) => {
            const normalized = results[i];
            if (normalized !== undefined) {
                fold(task, normalized);
            }
        });
    }

    return {
        blocks: [...blocks],
        sourceScores: reconciler.results(),
        unmatchedWords: reconciler.unmatchedWords(),
        emptyResponses,
    };
}

/**
 * Split the article into blocks and analyze them against every source
 */
export async function analyzeArticle(
    articleText: string,
    sources: readonly SourceDocument[],
    gateway: ScorerGateway,
    options: AnalysisOptions & { blockSize: number }
): Promise<AnalysisResult> {
    const { blockSize, ...analysisOptions } = options;

    const blocks = logger.time("Split into blocks", () => splitIntoBlocks(articleText, blockSize));
    logger.log(`Article split into ${blocks.length} block(s); checking against ${sources.length} source(s)`);

    return logger.timeAsync("Score and reconcile", () =>
        analyzeBlocks(blocks, sources, gateway, analysisOptions)
    );
}
