import { ComposablePage, Page, PageStage, SitemapEntry, StageOutput, StageOutputMap } from "../types";

export type PageFilter =
  | { kind: "all" }
  | { kind: "url"; url: string }
  /** Pages without a successful output for the stage. */
  | { kind: "missing"; stage: PageStage }
  /** Prerequisite succeeded, stage output missing. */
  | { kind: "ready"; stage: PageStage }
  /** Prerequisite succeeded, whatever the state of the stage itself. */
  | { kind: "prerequisiteMet"; stage: PageStage }
  /** The sitemap reports a change after the stage output was produced. */
  | { kind: "changedSince"; stage: PageStage };

export interface DiscoveryResult {
  inserted: string[];
  existing: number;
}

export interface StageStats {
  ok: number;
  failed: number;
  missing: number;
}

export interface StoreStats {
  totalPages: number;
  stages: Record<PageStage, StageStats>;
}

export interface PageStore {
  upsertDiscovered(entries: SitemapEntry[], seenAt: string): Promise<DiscoveryResult>;
  get(url: string): Promise<Page | undefined>;
  list(filter: PageFilter): Promise<Page[]>;
  count(): Promise<number>;
  recordSuccess<S extends PageStage>(url: string, stage: S, output: StageOutput<StageOutputMap[S]>): Promise<void>;
  recordFailure(url: string, stage: PageStage, message: string, failedAt: string): Promise<void>;
  listComposable(): Promise<ComposablePage[]>;
  prune(keepUrls: ReadonlySet<string>): Promise<number>;
  getStats(): Promise<StoreStats>;
  close(): Promise<void>;
}
