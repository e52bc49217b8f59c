import type { CliOptions } from "./config";
import { DEFAULT_CONFIG } from "./config";
import { FactCheckError } from "./errors";

export const HELP_TEXT = `
factshade - highlight how well each word of an article is supported by its sources

Splits the article into blocks of whole sentences, asks an OpenAI model to score
every word of each block against each source file, and prints the article with
green (high), yellow (partial) and red (low/no) support highlighting.

USAGE:
  factshade [options]

INPUT:
  --article <path>       Article text file (default: ${DEFAULT_CONFIG.articlePath})
  --sources-dir <dir>    Directory holding source* files (default: the article's directory)
                         .html/.htm sources are reduced to their readable text

MODEL:
  --model <name>         Model name (default: ${DEFAULT_CONFIG.model}, env FACTSHADE_MODEL)
  --base-url <url>       OpenAI-compatible endpoint, including /v1 (env OPENAI_BASE_URL)
  --block-size <n>       Target words per block (default: ${DEFAULT_CONFIG.blockSize})
  --delay <ms>           Pause after each model call (default: ${DEFAULT_CONFIG.delayMs})
  --concurrency <n>      Model calls in flight at once (default: ${DEFAULT_CONFIG.concurrency})
  --timeout <ms>         Per-request timeout (default: ${DEFAULT_CONFIG.timeoutMs})
  --retries <n>          Retries per request on transport errors (default: ${DEFAULT_CONFIG.maxRetries})

OUTPUT:
  --gui                  Write an HTML report with a per-source switcher instead of
                         printing to the terminal
  --out <path>           Report path for --gui (default: ${DEFAULT_CONFIG.outPath})
  --high <p>             High-support threshold (default: ${DEFAULT_CONFIG.thresholds.high})
  --partial <p>          Partial-support threshold (default: ${DEFAULT_CONFIG.thresholds.partial})
  --no-color             Disable terminal colours

OTHER:
  --env-file <path>      Load environment variables from this file (default: ./.env if present)
  --debug                Show per-call debug output
  --timing, -t           Show performance timing breakdown
  --help, -h             Show this help message

ENVIRONMENT:
  OPENAI_API_KEY         Required

EXAMPLES:
  factshade --article article.txt
  factshade --gui --out report.html --model gpt-4.1-mini
  factshade --base-url http://localhost:11434/v1 --model llama3.1 --delay 0
`;

export interface ParsedArgs {
    help: boolean;
    options: CliOptions;
}

function parseNumber(flag: string, value: string, integer: boolean): number {
    const parsed = Number(value);
    if (value.trim() === "" || !Number.isFinite(parsed) || (integer && !Number.isInteger(parsed))) {
        throw new FactCheckError("INVALID_CONFIG", `${flag} expects ${integer ? "an integer" : "a number"}, got "${value}"`);
    }
    return parsed;
}

/**
 * Parse command-line arguments (without the node and script entries)
 */
export function parseCliArgs(argv: readonly string[]): ParsedArgs {
    // Filter out standalone "--" which npm passes through
    const args = argv.filter(a => a !== "--");
    const options: CliOptions = {};
    let help = false;

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === undefined) continue;

        const takeValue = (): string => {
            const value = args[i + 1];
            if (value === undefined || value.startsWith("--")) {
                throw new FactCheckError("INVALID_CONFIG", `${arg} requires a value`);
            }
            i++;
            return value;
        };

        switch (arg) {
            case "--article":
                options.articlePath = takeValue();
                break;
            case "--sources-dir":
                options.sourcesDir = takeValue();
                break;
            case "--model":
                options.model = takeValue();
                break;
            case "--base-url":
            case "--base_url":
                options.baseUrl = takeValue();
                break;
            case "--block-size":
                options.blockSize = parseNumber(arg, takeValue(), true);
                break;
            case "--delay":
                options.delayMs = parseNumber(arg, takeValue(), true);
                break;
            case "--concurrency":
                options.concurrency = parseNumber(arg, takeValue(), true);
                break;
            case "--timeout":
                options.timeoutMs = parseNumber(arg, takeValue(), true);
                break;
            case "--retries":
                options.maxRetries = parseNumber(arg, takeValue(), true);
                break;
            case "--gui":
                options.gui = true;
                break;
            case "--out":
                options.outPath = takeValue();
                break;
            case "--high":
                options.high = parseNumber(arg, takeValue(), false);
                break;
            case "--partial":
                options.partial = parseNumber(arg, takeValue(), false);
                break;
            case "--no-color":
                options.color = false;
                break;
            case "--env-file":
                options.envFile = takeValue();
                break;
            case "--debug":
                options.debug = true;
                break;
            case "--timing":
            case "-t":
                options.timing = true;
                break;
            case "--help":
            case "-h":
                help = true;
                break;
            default:
                throw new FactCheckError("INVALID_CONFIG", `Unknown option: ${arg}. Run 'factshade --help' for usage.`);
        }
    }

    return { help, options };
}
