/**
 * Scorer gateway: asks the model for per-word support probabilities.
 * Every failure resolves to an empty map; nothing is thrown to the caller.
 */

import { z } from "zod";
import type { RawScoreMap } from "../types";
import type { ChatCompletionClient } from "./client";
import { SYSTEM_PROMPT, buildFactCheckPrompt } from "./prompts";
import { describeError } from "../errors";
import { sleep, truncateText } from "../utils/shared";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

export interface ScorerGateway {
    score(block: string, source: string): Promise<RawScoreMap>;
}

export interface OpenAiScorerOptions {
    model: string;
    /** Pause after each call, success or failure */
    delayMs?: number;
}

const scoreResponseSchema = z.object({
    probabilities: z.record(z.unknown()),
});

/**
 * Find the first balanced {...} span, skipping braces inside JSON strings
 */
export function extractBalancedObject(text: string): string | null {
    const start = text.indexOf("{");
    if (start === -1) return null;

    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let i = start; i < text.length; i++) {
        const char = text[i];

        if (inString) {
            if (escaped) {
                escaped = false;
            } else if (char === "\\") {
                escaped = true;
            } else if (char === "\"") {
                inString = false;
            }
            continue;
        }

        if (char === "\"") {
            inString = true;
        } else if (char === "{") {
            depth++;
        } else if (char === "}") {
            depth--;
            if (depth === 0) {
                return text.slice(start, i + 1);
            }
        }
    }

    return null;
}

function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false } {
    try {
        return { ok: true, value: JSON.parse(text) };
    } catch {
        return { ok: false };
    }
}

/**
 * Candidate JSON texts in the order they are tried: the whole reply, the
 * first balanced object, then everything from the first `{` to the last `}`
 */
function jsonCandidates(text: string): string[] {
    const candidates = [text];

    const balanced = extractBalancedObject(text);
    if (balanced !== null) {
        candidates.push(balanced);
    }

    const first = text.indexOf("{");
    const last = text.lastIndexOf("}");
    if (first !== -1 && last > first) {
        candidates.push(text.slice(first, last + 1));
    }

    return candidates;
}

/**
 * Read the probability mapping out of a model reply.
 * Accepts pure JSON or JSON embedded in prose; anything else yields {}.
 */
export function parseScoreResponse(text: string): RawScoreMap {
    for (const candidate of jsonCandidates(text.trim())) {
        const parsed = tryParseJson(candidate);
        if (!parsed.ok) continue;

        const envelope = scoreResponseSchema.safeParse(parsed.value);
        if (envelope.success) {
            return envelope.data.probabilities;
        }
        logger.warn(`Scorer response has no "probabilities" object: ${truncateText(candidate)}`);
        return {};
    }

    logger.warn(`Failed to parse JSON from scorer response: ${truncateText(text)}`);
    return {};
}

export class OpenAiScorer implements ScorerGateway {
    private readonly client: ChatCompletionClient;
    private readonly model: string;
    private readonly delayMs: number;

    constructor(client: ChatCompletionClient, options: OpenAiScorerOptions) {
        this.client = client;
        this.model = options.model;
        this.delayMs = options.delayMs ?? 500;
    }

    async score(block: string, source: string): Promise<RawScoreMap> {
        try {
            const response = await this.client.chat.completions.create({
                model: this.model,
                response_format: { type: "json_object" },
                messages: [
                    { role: "system", content: SYSTEM_PROMPT },
                    { role: "user", content: buildFactCheckPrompt(block, source) },
                ],
                temperature: 0,
            });

            const content = response.choices[0]?.message.content ?? "";
            if (content.trim() === "") {
                logger.warn(`Scorer returned empty content for block "${truncateText(block, 60)}"`);
                return {};
            }

            return parseScoreResponse(content);
        } catch (error) {
            logger.warn(`Scorer request failed: ${describeError(error)}`);
            return {};
        } finally {
            await sleep(this.delayMs);
        }
    }
}
