import { describe, expect, it } from "vitest";
import { ExtractionError, InvalidArgumentError } from "../core/errors";
import { Page } from "../types";
import { narrowHtml, parseTitle, stripNoise, validateSelector } from "./htmlParser";
import { MarkdownExtractor } from "./markdownExtractor";
import { ParseProcessor } from "./parseProcessor";
import { ReadabilityExtractor } from "./readabilityExtractor";
import { resolveExtractor } from "./registry";
import { Extractor } from "./types";

const ARTICLE_HTML = `<!doctype html>
<html>
  <head><title>Field Notes</title></head>
  <body>
    <nav><a href="/">Home</a></nav>
    <article>
      <h1>Field Notes</h1>
      <p>The quick brown fox crossed the frozen river at dawn while the village was still asleep.</p>
      <p>By noon the tracks had vanished under fresh snow, and nobody could say where it had gone.</p>
      <p>Some neighbours claim it returns every winter, always on the first clear morning of the year.</p>
    </article>
  </body>
</html>`;

function pageWithBody(body?: string): Page {
  return {
    url: "https://example.com/notes",
    discoveryOrder: 1,
    discoveredAt: "2026-01-01T00:00:00.000Z",
    lastSeenAt: "2026-01-01T00:00:00.000Z",
    stages: {
      scrape:
        body === undefined
          ? {}
          : { output: { value: { body, statusCode: 200 }, method: "http", completedAt: "2026-01-01T00:00:00.000Z" } },
      parse: {},
      summarize: {},
    },
  };
}

describe("parseTitle", () => {
  it("prefers <title> and collapses whitespace", () => {
    expect(parseTitle("<html><head><title>  Hello \n  World </title></head><body><h1>Other</h1></body></html>")).toBe(
      "Hello World",
    );
  });

  it("falls back to the first h1, then h2", () => {
    expect(parseTitle("<title></title><h1>Main</h1><h1>Second</h1>")).toBe("Main");
    expect(parseTitle("<h2>Sub</h2>")).toBe("Sub");
    expect(parseTitle("<p>no heading</p>")).toBeUndefined();
  });
});

describe("narrowHtml", () => {
  it("keeps the outer HTML of each match", () => {
    const html = `<div><section class="doc"><p>One</p></section><p>Skip</p><section class="doc"><p>Two</p></section></div>`;
    expect(narrowHtml(html, ".doc")).toBe(`<section class="doc"><p>One</p></section>\n<section class="doc"><p>Two</p></section>`);
  });

  it("fails when nothing matches", () => {
    expect(() => narrowHtml("<p>text</p>", ".missing")).toThrow(new ExtractionError('Selector ".missing" matched nothing'));
  });

  it("rejects selectors that do not parse", () => {
    expect(() => validateSelector("div[")).toThrow(InvalidArgumentError);
  });
});

describe("MarkdownExtractor", () => {
  it("converts the body to Markdown without scripts and styles", () => {
    const html = `<html><head><style>p{}</style></head><body><h1>Title</h1><p>Hello <strong>world</strong></p><script>track()</script></body></html>`;
    expect(stripNoise(html)).toBe("<h1>Title</h1><p>Hello <strong>world</strong></p>");
    expect(new MarkdownExtractor().extractText(html, "https://example.com/")).toBe("# Title\n\nHello **world**");
  });
});

describe("ReadabilityExtractor", () => {
  it("extracts the article body", () => {
    const text = new ReadabilityExtractor().extractText(ARTICLE_HTML, "https://example.com/notes");
    expect(text).toContain("The quick brown fox crossed the frozen river at dawn while the village was still asleep.");
  });

  it("fails on a page without content", () => {
    expect(() => new ReadabilityExtractor().extractText("<html><body></body></html>", "https://example.com/empty")).toThrow(
      ExtractionError,
    );
  });
});

describe("resolveExtractor", () => {
  it("resolves canonical names and aliases", () => {
    expect(resolveExtractor().name).toBe("readability");
    expect(resolveExtractor("dom_smoothie").name).toBe("readability");
    expect(resolveExtractor("fast_html2md").name).toBe("markdown");
    expect(resolveExtractor("Markdown").name).toBe("markdown");
  });

  it("rejects unknown methods", () => {
    expect(() => resolveExtractor("pdf")).toThrow(InvalidArgumentError);
  });
});

describe("ParseProcessor", () => {
  const echo: Extractor = { name: "echo", extractText: (html) => html.trim() };

  it("extracts from the selected fragment and takes the title from the whole page", async () => {
    const processor = new ParseProcessor(echo, { selector: "main" });
    const body = "<html><head><title>Docs</title></head><body><nav>menu</nav><main>content</main></body></html>";

    expect(processor.method).toBe("echo");
    expect(processor.detail).toBe("main");
    expect(await processor.process(pageWithBody(body), new AbortController().signal)).toEqual({
      title: "Docs",
      text: "<main>content</main>",
    });
  });

  it("fails without a scraped body", async () => {
    await expect(new ParseProcessor(echo).process(pageWithBody(), new AbortController().signal)).rejects.toThrow(
      "No scraped body to extract from",
    );
  });

  it("fails when the extractor returns no text", async () => {
    const blank: Extractor = { name: "blank", extractText: () => "" };
    await expect(new ParseProcessor(blank).process(pageWithBody("<p>x</p>"), new AbortController().signal)).rejects.toBeInstanceOf(
      ExtractionError,
    );
  });
});
