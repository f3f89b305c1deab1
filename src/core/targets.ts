import { PageStore } from "../store";
import { Page, PageStage, STAGE_PREREQUISITE } from "../types";
import { InvalidArgumentError, UnknownTargetError } from "./errors";

export type TargetSelector = { kind: "pending" } | { kind: "all" } | { kind: "url"; url: string };

export interface FlaggedPage {
  url: string;
  reason: string;
}

export interface TargetResolution {
  stage: PageStage;
  selector: TargetSelector;
  targets: Page[];
  flagged: FlaggedPage[];
  /** Pages in the store that this invocation leaves alone. */
  skipped: number;
}

export interface ResolveOptions {
  ignorePrerequisites?: boolean;
}

const PENDING_ALIASES = new Set(["pending", "unsummarized", "unparsed"]);

export function parseTargetSelector(raw: string | undefined): TargetSelector {
  if (raw === undefined || PENDING_ALIASES.has(raw)) {
    return { kind: "pending" };
  }
  if (raw === "all") {
    return { kind: "all" };
  }

  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new InvalidArgumentError(`Target must be "all" or an absolute URL, got "${raw}"`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new InvalidArgumentError(`Target URL must use http or https, got "${raw}"`);
  }
  return { kind: "url", url: raw };
}

export function describeSelector(selector: TargetSelector): string {
  return selector.kind === "url" ? selector.url : selector.kind;
}

/**
 * Why a page's input for `stage` is unusable or out of date, if it is. The
 * input of scrape is the live page, which is out of date when the sitemap
 * reports a newer lastmod than the stored body.
 */
export function prerequisiteProblem(page: Page, stage: PageStage): string | undefined {
  const prerequisite = STAGE_PREREQUISITE[stage];
  if (!prerequisite) {
    return undefined;
  }

  const input = page.stages[prerequisite].output;
  if (!input) {
    return `no ${prerequisite} output`;
  }

  const upstream = STAGE_PREREQUISITE[prerequisite];
  const upstreamCompletedAt = upstream ? page.stages[upstream].output?.completedAt : page.sitemapLastmod;
  if (upstreamCompletedAt && upstreamCompletedAt > input.completedAt) {
    return upstream ? `${prerequisite} output predates the latest ${upstream}` : `${prerequisite} output predates sitemap lastmod`;
  }
  return undefined;
}

function mergeByDiscovery(...groups: Page[][]): Page[] {
  const byUrl = new Map<string, Page>();
  for (const page of groups.flat()) {
    byUrl.set(page.url, page);
  }
  return [...byUrl.values()].sort((left, right) => left.discoveryOrder - right.discoveryOrder);
}

async function selectPages(
  store: PageStore,
  stage: PageStage,
  selector: TargetSelector,
  options: ResolveOptions,
): Promise<Page[]> {
  switch (selector.kind) {
    case "url": {
      const page = await store.get(selector.url);
      if (!page) {
        throw new UnknownTargetError(selector.url);
      }
      return [page];
    }
    case "all":
      return options.ignorePrerequisites ? store.list({ kind: "all" }) : store.list({ kind: "prerequisiteMet", stage });
    case "pending": {
      const pending = options.ignorePrerequisites
        ? await store.list({ kind: "missing", stage })
        : await store.list({ kind: "ready", stage });
      if (stage !== "scrape") {
        return pending;
      }
      return mergeByDiscovery(pending, await store.list({ kind: "changedSince", stage }));
    }
  }
}

/** Resolves the pages one stage invocation acts on. Read-only. */
export async function resolveTargets(
  store: PageStore,
  stage: PageStage,
  selector: TargetSelector,
  options: ResolveOptions = {},
): Promise<TargetResolution> {
  const targets = await selectPages(store, stage, selector, options);
  const total = await store.count();

  const flagged: FlaggedPage[] = [];
  for (const page of targets) {
    const reason = prerequisiteProblem(page, stage);
    if (reason) {
      flagged.push({ url: page.url, reason });
    }
  }

  return {
    stage,
    selector,
    targets,
    flagged,
    skipped: total - targets.length,
  };
}
