import * as fs from "fs";
import * as path from "path";
import type { SourceDocument } from "../types";
import { htmlToText } from "../preprocessing/strip";
import { FactCheckError, describeError } from "../errors";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

/** Source files are every file whose name starts with this prefix */
export const SOURCE_PREFIX = "source";

const HTML_EXTENSIONS = new Set([".html", ".htm"]);

function readUtf8(filePath: string): string {
    try {
        return fs.readFileSync(filePath, "utf8");
    } catch (error) {
        throw new FactCheckError("READ_FAILED", `Error reading ${filePath}: ${describeError(error)}`, { filePath });
    }
}

/**
 * Read the article as UTF-8 text
 */
export function loadArticle(filePath: string): string {
    if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
        throw new FactCheckError("ARTICLE_NOT_FOUND", `Article file not found: ${filePath}`, { filePath });
    }
    return readUtf8(filePath);
}

/**
 * Load every `source*` file in a directory, sorted by file name and keyed by
 * it. HTML files are reduced to their readable text.
 */
export function loadSources(dir: string): SourceDocument[] {
    if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
        throw new FactCheckError("SOURCES_NOT_FOUND", `Sources directory not found: ${dir}`, { dir });
    }

    const names = fs.readdirSync(dir, { withFileTypes: true })
        .filter(entry => entry.isFile() && entry.name.startsWith(SOURCE_PREFIX))
        .map(entry => entry.name)
        .sort();

    if (names.length === 0) {
        throw new FactCheckError("NO_SOURCES", `No source files found (${SOURCE_PREFIX}*) in ${path.resolve(dir)}`, { dir });
    }

    return names.map(name => {
        const raw = readUtf8(path.join(dir, name));
        const isHtml = HTML_EXTENSIONS.has(path.extname(name).toLowerCase());
        const text = isHtml ? htmlToText(raw) : raw;
        logger.log(`Loaded source: ${name} (${text.length} chars${isHtml ? ", from HTML" : ""})`);
        return { name, text };
    });
}

/**
 * Write a rendered report, creating parent directories as needed
 */
export function writeReport(filePath: string, contents: string): void {
    try {
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        fs.writeFileSync(filePath, contents, "utf8");
    } catch (error) {
        throw new FactCheckError("WRITE_FAILED", `Error writing ${filePath}: ${describeError(error)}`, { filePath });
    }
}
