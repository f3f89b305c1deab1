export type PageStage = "scrape" | "parse" | "summarize";

/** The stage whose output a stage consumes. Scrape reads from the network instead. */
export const STAGE_PREREQUISITE: Record<PageStage, PageStage | undefined> = {
  scrape: undefined,
  parse: "scrape",
  summarize: "parse",
};

export interface ScrapeOutput {
  body: string;
  statusCode: number;
  contentType?: string;
}

export interface ParseOutput {
  title?: string;
  text: string;
}

export interface SummarizeOutput {
  summary: string;
}

export interface StageOutputMap {
  scrape: ScrapeOutput;
  parse: ParseOutput;
  summarize: SummarizeOutput;
}

export interface StageOutput<T> {
  value: T;
  /** Extraction method, fetcher id or provider URI that produced the value. */
  method: string;
  detail?: string;
  completedAt: string;
}

export interface StageFailure {
  message: string;
  failedAt: string;
}

export interface StageState<T> {
  output?: StageOutput<T>;
  lastError?: StageFailure;
}

export type PageStages = { [S in PageStage]: StageState<StageOutputMap[S]> };

export interface Page {
  url: string;
  discoveryOrder: number;
  discoveredAt: string;
  lastSeenAt: string;
  sitemapLastmod?: string;
  stages: PageStages;
}

export interface SitemapEntry {
  url: string;
  lastmod?: string;
}

export interface ComposablePage {
  url: string;
  title?: string;
  summary: string;
}
