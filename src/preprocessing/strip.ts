import * as cheerio from "cheerio";
import type { AnyNode, Element as CheerioElement } from "domhandler";
import { normalizeWhitespace, matchesPatterns } from "../utils/shared";

// Elements to always remove (non-content elements)
const REMOVE_ELEMENTS = [
    "script",
    "style",
    "link",
    "img",
    "iframe",
    "video",
    "audio",
    "object",
    "embed",
    "noscript",
    "svg",
    "canvas",
    "button",
    "input",
    "select",
    "textarea",
    "form",
    // Citation markers and edit links on encyclopedia pages
    "sup.reference",
    ".mw-editsection",
];

const BOILERPLATE_ELEMENTS = [
    "nav",
    "footer",
    "aside",
    "header",
];

// Matched as whole words of an id or class list, so "stock-info" is not a "toc"
const BOILERPLATE_NAMES = [
    "nav",
    "navigation",
    "navbar",
    "footer",
    "sidebar",
    "menu",
    "breadcrumbs?",
    "cookies?",
    "banner",
    "advert(isement)?",
    "navbox",
    "toc",
];

const BOILERPLATE_PATTERNS = BOILERPLATE_NAMES.map(name => new RegExp(`(^|[\\s_-])${name}($|[\\s_-])`, "i"));

// Candidate content containers, most specific first
const CONTENT_SELECTORS = ["main", "article", "[role='main']", "#mw-content-text", "#content"] as const;

// Document scaffolding, never removed whatever its classes say
const STRUCTURAL_TAGS = new Set(["html", "body"]);

// Elements whose text becomes one paragraph of the extracted source
const TEXT_BLOCK_SELECTOR = "h1, h2, h3, h4, h5, h6, p, li, pre, blockquote, dd, dt, td, th, figcaption";

function isElement(node: AnyNode): node is CheerioElement {
    return node.type === "tag";
}

function isBoilerplateElement(el: CheerioElement): boolean {
    const id = el.attribs["id"] ?? "";
    const className = el.attribs["class"] ?? "";
    return matchesPatterns(`${id} ${className}`, BOILERPLATE_PATTERNS);
}

/**
 * Strip HTML of scripts, styles, and other non-content elements
 */
export function stripHtml(html: string): cheerio.CheerioAPI {
    const $ = cheerio.load(html);

    for (const selector of REMOVE_ELEMENTS) {
        $(selector).remove();
    }

    return $;
}

/**
 * Remove navigation, footers, sidebars and similar chrome.
 * Anything inside main/article is left alone, as is html, body and any
 * element holding a content container.
 */
export function removeBoilerplate($: cheerio.CheerioAPI): void {
    const isProtected = (el: AnyNode): boolean =>
        (isElement(el) && STRUCTURAL_TAGS.has(el.tagName))
        || $(el).closest("main, article, [role='main']").length > 0
        || $(el).find(CONTENT_SELECTORS.join(", ")).length > 0;

    for (const selector of BOILERPLATE_ELEMENTS) {
        $(selector).each((_, el) => {
            if (!isProtected(el)) {
                $(el).remove();
            }
        });
    }

    $("*").each((_, el) => {
        if (!isElement(el)) return;
        if (isProtected(el)) return;
        if (isBoilerplateElement(el)) {
            $(el).remove();
        }
    });
}

/**
 * Pick the element holding the document's content
 */
export function findMainContent($: cheerio.CheerioAPI): cheerio.Cheerio<CheerioElement> {
    for (const selector of CONTENT_SELECTORS) {
        const $el = $(selector).first();
        if ($el.length > 0) {
            return $el;
        }
    }
    // cheerio.load always wraps documents in html/body
    return $("body");
}

/**
 * Reduce an HTML document to readable plain text: one paragraph per
 * outermost text block, paragraphs separated by blank lines.
 */
export function htmlToText(html: string): string {
    const $ = stripHtml(html);
    removeBoilerplate($);
    const $container = findMainContent($);

    const paragraphs: string[] = [];
    $container.find(TEXT_BLOCK_SELECTOR).each((_, el) => {
        // Nested blocks (a <p> inside an <li>) are covered by their outermost block
        if ($(el).parentsUntil($container).is(TEXT_BLOCK_SELECTOR)) return;

        const text = normalizeWhitespace($(el).text());
        if (text.length > 0) {
            paragraphs.push(text);
        }
    });

    if (paragraphs.length === 0) {
        return normalizeWhitespace($container.text());
    }

    return paragraphs.join("\n\n");
}
