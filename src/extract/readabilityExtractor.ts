import { Readability } from "@mozilla/readability";
import { JSDOM } from "jsdom";
import { ExtractionError } from "../core/errors";
import { createTurndown } from "./markdownExtractor";
import { Extractor } from "./types";

/** Main-content extraction with Mozilla Readability, rendered as Markdown. */
export class ReadabilityExtractor implements Extractor {
  readonly name = "readability";
  private readonly turndown = createTurndown();

  extractText(html: string, url: string): string {
    const dom = new JSDOM(html, { url });
    try {
      const article = new Readability(dom.window.document, { charThreshold: 50 }).parse();
      const content = article?.content ?? "";
      if (!content.trim()) {
        throw new ExtractionError("Readability found no article content");
      }
      return this.turndown.turndown(content).trim();
    } finally {
      dom.window.close();
    }
  }
}
