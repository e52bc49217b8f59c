import * as fs from "fs";
import * as path from "path";
import * as dotenv from "dotenv";
import { z } from "zod";
import { FactCheckError } from "./errors";
import { DEFAULT_THRESHOLDS } from "./output/project";
import type { Thresholds } from "./types";

export interface AppConfig {
    apiKey: string;
    baseUrl?: string;
    model: string;
    articlePath: string;
    sourcesDir: string;
    /** Target words per block sent to the scorer */
    blockSize: number;
    /** Pause after every scorer call, for rate limits */
    delayMs: number;
    concurrency: number;
    timeoutMs: number;
    maxRetries: number;
    thresholds: Thresholds;
    gui: boolean;
    outPath: string;
    /** Set only by --no-color; otherwise the terminal renderer decides */
    color?: boolean;
    debug: boolean;
    timing: boolean;
}

/** Options as given on the command line; every field optional */
export type CliOptions = Partial<Omit<AppConfig, "apiKey" | "thresholds">> & {
    high?: number;
    partial?: number;
    envFile?: string;
};

export const DEFAULT_CONFIG = {
    model: "gpt-4.1-nano",
    articlePath: "article.txt",
    blockSize: 100,
    delayMs: 500,
    concurrency: 1,
    timeoutMs: 60_000,
    maxRetries: 2,
    thresholds: DEFAULT_THRESHOLDS,
    outPath: "factshade-report.html",
} as const;

const probability = z.number().min(0).max(1);

const configSchema = z.object({
    apiKey: z.string().min(1),
    baseUrl: z.string().url().optional(),
    model: z.string().min(1),
    articlePath: z.string().min(1),
    sourcesDir: z.string().min(1),
    blockSize: z.number().int().positive(),
    delayMs: z.number().int().nonnegative(),
    concurrency: z.number().int().positive(),
    timeoutMs: z.number().int().positive(),
    maxRetries: z.number().int().nonnegative(),
    thresholds: z.object({ high: probability, partial: probability })
        .refine(t => t.partial <= t.high, { message: "partial threshold must not exceed high threshold" }),
    gui: z.boolean(),
    outPath: z.string().min(1),
    color: z.boolean().optional(),
    debug: z.boolean(),
    timing: z.boolean(),
});

/**
 * Load a .env file into process.env without overriding variables already set.
 * An explicit path must exist; the default `.env` is optional.
 */
export function loadEnvFile(envFile?: string): string | null {
    const candidate = envFile ?? path.resolve(process.cwd(), ".env");

    if (!fs.existsSync(candidate)) {
        if (envFile !== undefined) {
            throw new FactCheckError("INVALID_CONFIG", `Env file not found: ${envFile}`);
        }
        return null;
    }

    const result = dotenv.config({ path: candidate, override: false });
    if (result.error) {
        throw new FactCheckError("INVALID_CONFIG", `Could not load env file ${candidate}: ${result.error.message}`);
    }
    return candidate;
}

function envNumber(value: string | undefined): number | undefined {
    if (value === undefined || value.trim() === "") return undefined;
    return Number(value);
}

function nonEmpty(value: string | undefined): string | undefined {
    if (value === undefined || value.trim() === "") return undefined;
    return value.trim();
}

/**
 * Merge CLI options over environment over defaults and validate the result
 */
export function resolveConfig(
    cli: CliOptions,
    env: NodeJS.ProcessEnv = process.env
): AppConfig {
    const apiKey = nonEmpty(env["OPENAI_API_KEY"]);
    if (apiKey === undefined) {
        throw new FactCheckError(
            "MISSING_CREDENTIAL",
            "Please set the OPENAI_API_KEY environment variable (or add it to a .env file)"
        );
    }

    const articlePath = cli.articlePath ?? DEFAULT_CONFIG.articlePath;
    const baseUrl = cli.baseUrl ?? nonEmpty(env["OPENAI_BASE_URL"]);

    const candidate = {
        apiKey,
        ...(baseUrl !== undefined && { baseUrl }),
        model: cli.model ?? nonEmpty(env["FACTSHADE_MODEL"]) ?? DEFAULT_CONFIG.model,
        articlePath,
        sourcesDir: cli.sourcesDir ?? path.dirname(articlePath),
        blockSize: cli.blockSize ?? envNumber(env["FACTSHADE_BLOCK_SIZE"]) ?? DEFAULT_CONFIG.blockSize,
        delayMs: cli.delayMs ?? envNumber(env["FACTSHADE_DELAY_MS"]) ?? DEFAULT_CONFIG.delayMs,
        concurrency: cli.concurrency ?? DEFAULT_CONFIG.concurrency,
        timeoutMs: cli.timeoutMs ?? DEFAULT_CONFIG.timeoutMs,
        maxRetries: cli.maxRetries ?? DEFAULT_CONFIG.maxRetries,
        thresholds: {
            high: cli.high ?? DEFAULT_CONFIG.thresholds.high,
            partial: cli.partial ?? DEFAULT_CONFIG.thresholds.partial,
        },
        gui: cli.gui ?? false,
        outPath: cli.outPath ?? DEFAULT_CONFIG.outPath,
        ...(cli.color !== undefined && { color: cli.color }),
        debug: cli.debug ?? false,
        timing: cli.timing ?? false,
    };

    const parsed = configSchema.safeParse(candidate);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map(issue => `${issue.path.join(".") || "config"}: ${issue.message}`)
            .join("; ");
        throw new FactCheckError("INVALID_CONFIG", `Invalid configuration: ${issues}`);
    }

    const { baseUrl: parsedBaseUrl, color, ...rest } = parsed.data;
    return {
        ...rest,
        ...(parsedBaseUrl !== undefined && { baseUrl: parsedBaseUrl }),
        ...(color !== undefined && { color }),
    };
}
