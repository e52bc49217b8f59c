import { describe, it, expect } from "vitest";
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import {
    stripHtml,
    removeBoilerplate,
    findMainContent,
    htmlToText,
} from "../strip";

const FIXTURE = fileURLToPath(new URL("../../../test-fixtures/run/source2.html", import.meta.url));

describe("stripHtml", () => {
    it("removes script and style elements", () => {
        const html = `
            <html>
            <head><style>p { color: red; }</style></head>
            <body>
                <p>Content before</p>
                <script>console.log("hello");</script>
                <p>Content after</p>
            </body>
            </html>
        `;

        const $ = stripHtml(html);

        expect($("script").length).toBe(0);
        expect($("style").length).toBe(0);
        expect($("p").length).toBe(2);
    });

    it("removes citation markers and edit links", () => {
        const html = `<p>Fact<sup class="reference">[1]</sup> stated<span class="mw-editsection">[edit]</span></p>`;

        const $ = stripHtml(html);

        expect($("p").text()).toBe("Fact stated");
    });

    it("removes form controls", () => {
        const $ = stripHtml(`<form><input name="q"><button>Go</button></form><p>Kept</p>`);

        expect($("form").length).toBe(0);
        expect($("button").length).toBe(0);
        expect($("p").text()).toBe("Kept");
    });
});

describe("removeBoilerplate", () => {
    it("removes nav, header and footer outside the main content", () => {
        const $ = stripHtml(`
            <body>
                <header>Site header</header>
                <nav>Menu</nav>
                <main><p>Article</p></main>
                <footer>Footer</footer>
            </body>
        `);

        removeBoilerplate($);

        expect($("header").length).toBe(0);
        expect($("nav").length).toBe(0);
        expect($("footer").length).toBe(0);
        expect($("main p").text()).toBe("Article");
    });

    it("removes elements whose class or id looks like chrome", () => {
        const $ = stripHtml(`
            <body>
                <div class="sidebar"><p>Related</p></div>
                <div id="cookie-banner">Accept cookies</div>
                <div class="content"><p>Body</p></div>
            </body>
        `);

        removeBoilerplate($);

        expect($(".sidebar").length).toBe(0);
        expect($("#cookie-banner").length).toBe(0);
        expect($(".content p").text()).toBe("Body");
    });

    it("keeps boilerplate-looking elements inside main", () => {
        const $ = stripHtml(`<body><main><nav>In-article nav</nav><p>Text</p></main></body>`);

        removeBoilerplate($);

        expect($("main nav").length).toBe(1);
    });

    it("never removes the body, whatever its classes", () => {
        const $ = stripHtml(`<html><body class="sidebar-collapsed"><p>Text</p></body></html>`);

        removeBoilerplate($);

        expect($("body").length).toBe(1);
        expect($("body p").text()).toBe("Text");
    });

    it("keeps a chrome-looking wrapper around the content container", () => {
        const $ = stripHtml(`<body><div class="menu-wrapper"><div id="content"><p>Text</p></div></div></body>`);

        removeBoilerplate($);

        expect($(".menu-wrapper #content p").text()).toBe("Text");
    });

    it("matches chrome names as whole words only", () => {
        const $ = stripHtml(`
            <body>
                <div class="stock-info"><p>Shares</p></div>
                <div class="site-menu">Links</div>
                <div id="toc">Contents</div>
            </body>
        `);

        removeBoilerplate($);

        expect($(".stock-info").length).toBe(1);
        expect($(".site-menu").length).toBe(0);
        expect($("#toc").length).toBe(0);
    });
});

describe("findMainContent", () => {
    it("prefers main over other candidates", () => {
        const $ = stripHtml(`<body><article>Article</article><main>Main</main></body>`);

        expect(findMainContent($).text()).toBe("Main");
    });

    it("uses the encyclopedia content container", () => {
        const $ = stripHtml(`<body><div id="mw-content-text">Entry</div><div>Other</div></body>`);

        expect(findMainContent($).text()).toBe("Entry");
    });

    it("falls back to body", () => {
        const $ = stripHtml(`<body><div>Only</div></body>`);

        expect(findMainContent($).is("body")).toBe(true);
    });
});

describe("htmlToText", () => {
    it("reduces a page to its main content paragraphs", () => {
        const html = readFileSync(FIXTURE, "utf8");

        expect(htmlToText(html)).toBe(
            "Bridge history\n\n"
            + "The bridge was completed in 1932 after four years of work.\n\n"
            + "Length: 503 metres\n\n"
            + "Opened by the mayor"
        );
    });

    it("collapses whitespace inside a block", () => {
        const html = `<body><p>Spread
              over    lines</p></body>`;

        expect(htmlToText(html)).toBe("Spread over lines");
    });

    it("skips empty blocks", () => {
        expect(htmlToText(`<body><p>  </p><p>One</p><h2></h2></body>`)).toBe("One");
    });

    it("drops chrome when there is no main element", () => {
        const html = `<body><nav><p>Menu</p></nav><div class="sidebar"><p>Side</p></div><p>Body text.</p></body>`;

        expect(htmlToText(html)).toBe("Body text.");
    });

    it("keeps the text of a body carrying a layout class", () => {
        const html = `<html><body class="navbar-fixed"><p>The bridge opened in 1932.</p></body></html>`;

        expect(htmlToText(html)).toBe("The bridge opened in 1932.");
    });

    it("keeps blocks whose class only contains a chrome name", () => {
        expect(htmlToText(`<body><div class="stock-info"><p>Shares rose 4%.</p></div></body>`)).toBe("Shares rose 4%.");
    });

    it("falls back to the container text when there are no text blocks", () => {
        expect(htmlToText(`<body><div>Just   a <b>div</b></div></body>`)).toBe("Just a div");
    });

    it("returns an empty string for an empty document", () => {
        expect(htmlToText("")).toBe("");
    });
});
