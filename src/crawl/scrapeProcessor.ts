import { FetchError } from "../core/errors";
import { StageProcessor } from "../core/stageRunner";
import { Page, ScrapeOutput } from "../types";
import { Fetcher } from "./fetcher";
import { RobotsPolicy } from "./robots";

export class ScrapeProcessor implements StageProcessor<"scrape"> {
  readonly stage = "scrape";
  readonly method: string;
  private readonly fetcher: Fetcher;
  private readonly robots?: RobotsPolicy;

  constructor(fetcher: Fetcher, robots?: RobotsPolicy) {
    this.fetcher = fetcher;
    this.robots = robots;
    this.method = fetcher.id;
  }

  async process(page: Page, signal: AbortSignal): Promise<ScrapeOutput> {
    if (this.robots && !(await this.robots.isAllowed(page.url))) {
      throw new FetchError(`Disallowed by robots.txt: ${page.url}`);
    }

    const document = await this.fetcher.fetchText(page.url, signal);
    if (!document.body.trim()) {
      throw new FetchError(`Empty body from ${page.url}`, document.statusCode);
    }

    return {
      body: document.body,
      statusCode: document.statusCode,
      ...(document.contentType ? { contentType: document.contentType } : {}),
    };
  }
}
