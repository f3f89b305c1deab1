import TurndownService from "turndown";
import { stripNoise } from "./htmlParser";
import { Extractor } from "./types";

export function createTurndown(): TurndownService {
  return new TurndownService({
    headingStyle: "atx",
    codeBlockStyle: "fenced",
    bulletListMarker: "-",
  });
}

/** Converts the whole document body to Markdown, without readability scoring. */
export class MarkdownExtractor implements Extractor {
  readonly name = "markdown";
  private readonly turndown = createTurndown();

  extractText(html: string, _url: string): string {
    return this.turndown.turndown(stripNoise(html)).trim();
  }
}
