import { ExtractionError } from "../core/errors";
import { StageProcessor } from "../core/stageRunner";
import { Page, ParseOutput } from "../types";
import { narrowHtml, parseTitle } from "./htmlParser";
import { Extractor } from "./types";

export interface ParseProcessorOptions {
  /** CSS selector that narrows the HTML before extraction. */
  selector?: string;
}

export class ParseProcessor implements StageProcessor<"parse"> {
  readonly stage = "parse";
  readonly method: string;
  readonly detail?: string;
  private readonly extractor: Extractor;

  constructor(extractor: Extractor, options: ParseProcessorOptions = {}) {
    this.extractor = extractor;
    this.method = extractor.name;
    this.detail = options.selector;
  }

  async process(page: Page, signal: AbortSignal): Promise<ParseOutput> {
    const body = page.stages.scrape.output?.value.body;
    if (!body) {
      throw new ExtractionError("No scraped body to extract from");
    }
    signal.throwIfAborted();

    const title = parseTitle(body);
    const html = this.detail ? narrowHtml(body, this.detail) : body;
    const text = this.extractor.extractText(html, page.url);
    if (!text) {
      throw new ExtractionError(`Method "${this.method}" extracted no text`);
    }

    return title ? { title, text } : { text };
  }
}
