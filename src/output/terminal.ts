import type { AnnotatedToken, SupportTier, TierSummary } from "../types";
import { SUPPORT_TIERS, TIER_LABELS } from "./project";

const RESET = "\u001b[0m";

export const TIER_COLORS: Record<SupportTier, string> = {
    high: "\u001b[32m",    // green
    partial: "\u001b[33m", // yellow
    low: "\u001b[31m",     // red
};

export interface TerminalRendererOptions {
    /** Force colours on or off; when unset, decided from the environment */
    color?: boolean;
    env?: NodeJS.ProcessEnv;
    isTTY?: boolean;
}

/**
 * Renders annotated tokens with ANSI colour spans. Colour support is
 * decided once, on first use.
 */
export class TerminalRenderer {
    private colorEnabled: boolean | null = null;
    private readonly options: TerminalRendererOptions;

    constructor(options: TerminalRendererOptions = {}) {
        this.options = options;
    }

    /**
     * Decide colour support. Safe to call more than once.
     */
    setup(): boolean {
        if (this.colorEnabled !== null) {
            return this.colorEnabled;
        }

        const env = this.options.env ?? process.env;
        const isTTY = this.options.isTTY ?? process.stdout.isTTY === true;

        if (this.options.color !== undefined) {
            this.colorEnabled = this.options.color;
        } else if (env["NO_COLOR"] !== undefined && env["NO_COLOR"] !== "") {
            this.colorEnabled = false;
        } else if (env["FORCE_COLOR"] !== undefined && env["FORCE_COLOR"] !== "0") {
            this.colorEnabled = true;
        } else {
            this.colorEnabled = isTTY;
        }

        return this.colorEnabled;
    }

    private paint(text: string, tier: SupportTier): string {
        return `${TIER_COLORS[tier]}${text}${RESET}`;
    }

    /**
     * Article text with each word wrapped in its tier colour.
     * Punctuation and whitespace are left uncoloured.
     */
    renderArticle(annotated: readonly AnnotatedToken[]): string {
        const color = this.setup();

        return annotated
            .map(({ token, tier }) => (tier !== null && color ? this.paint(token.text, tier) : token.text))
            .join("");
    }

    renderLegend(): string {
        const color = this.setup();
        const entries = SUPPORT_TIERS.map(tier =>
            color ? this.paint(TIER_LABELS[tier], tier) : `[${tier}] ${TIER_LABELS[tier]}`
        );
        return `Legend: ${entries.join("  ")}`;
    }

    renderSummary(label: string, summary: TierSummary): string {
        const pct = (count: number): string =>
            summary.totalWords > 0 ? ((count / summary.totalWords) * 100).toFixed(1) : "0.0";

        return `${label}: ${summary.totalWords} words | high ${summary.high} (${pct(summary.high)}%)`
            + ` | partial ${summary.partial} (${pct(summary.partial)}%)`
            + ` | low ${summary.low} (${pct(summary.low)}%, ${summary.unscored} unscored)`;
    }
}
