import { Logger, MetricsRegistry } from "../observability";
import { PageStore } from "../store";
import { SitemapEntry } from "../types";
import { Fetcher } from "./fetcher";
import { parseSitemapDocument } from "./sitemapParser";

export interface SitemapCollection {
  entries: SitemapEntry[];
  sitemapsVisited: string[];
}

export interface IngestDependencies {
  store: PageStore;
  fetcher: Fetcher;
  logger: Logger;
  metrics: MetricsRegistry;
}

export interface IngestOptions {
  /** Remove pages that this sitemap no longer lists. */
  prune?: boolean;
  now?: () => Date;
}

export interface IngestSummary {
  discovered: number;
  inserted: number;
  existing: number;
  pruned: number;
  sitemapsVisited: number;
}

/**
 * Walks a sitemap and any nested sitemap indexes breadth-first in listed order.
 * Each sitemap is fetched at most once, so self-referencing indexes terminate.
 * URL entries are merged by first occurrence.
 */
export async function collectSitemapEntries(rootUrl: string, fetcher: Fetcher, logger: Logger): Promise<SitemapCollection> {
  const queue: string[] = [rootUrl];
  const visited = new Set<string>();
  const entries = new Map<string, SitemapEntry>();

  while (queue.length > 0) {
    const sitemapUrl = queue.shift();
    if (sitemapUrl === undefined) {
      break;
    }
    if (visited.has(sitemapUrl)) {
      logger.warn("sitemap_revisit_skipped", { url: sitemapUrl });
      continue;
    }
    visited.add(sitemapUrl);

    logger.debug("sitemap_fetch_start", { url: sitemapUrl });
    const fetched = await fetcher.fetchText(sitemapUrl);
    const document = parseSitemapDocument(fetched.body, fetched.finalUrl);

    for (const loc of document.skipped) {
      logger.warn("sitemap_location_skipped", { url: sitemapUrl, loc });
    }

    if (document.kind === "index") {
      logger.info("sitemap_index_found", { url: sitemapUrl, sitemaps: document.sitemaps.length });
      queue.push(...document.sitemaps);
      continue;
    }

    let added = 0;
    for (const entry of document.entries) {
      const known = entries.get(entry.url);
      if (known) {
        known.lastmod = latest(known.lastmod, entry.lastmod);
        continue;
      }
      entries.set(entry.url, { ...entry });
      added += 1;
    }
    logger.info("sitemap_parsed", { url: sitemapUrl, entries: document.entries.length, added });
  }

  return { entries: [...entries.values()], sitemapsVisited: [...visited] };
}

function latest(left: string | undefined, right: string | undefined): string | undefined {
  if (!left) {
    return right;
  }
  if (!right) {
    return left;
  }
  return left > right ? left : right;
}

/** Whether reconciling this collection with `prune` set would delete unlisted pages. */
export function prunesUnlisted(collection: SitemapCollection, options: IngestOptions): boolean {
  return Boolean(options.prune) && collection.entries.length > 0;
}

/**
 * Writes a collected sitemap into the store: new pages are inserted, known
 * ones refreshed, and with `prune` the pages it no longer lists are removed.
 */
export async function reconcileSitemap(
  deps: Omit<IngestDependencies, "fetcher">,
  sitemapUrl: string,
  collection: SitemapCollection,
  options: IngestOptions = {},
): Promise<IngestSummary> {
  const { store, logger, metrics } = deps;
  const now = options.now ?? (() => new Date());

  const result = await store.upsertDiscovered(collection.entries, now().toISOString());
  metrics.incrementCounter("pages_discovered", result.inserted.length);

  let pruned = 0;
  if (prunesUnlisted(collection, options)) {
    pruned = await store.prune(new Set(collection.entries.map((entry) => entry.url)));
    logger.info("sitemap_prune_complete", { pruned });
  } else if (options.prune) {
    logger.warn("sitemap_prune_skipped_empty_sitemap", { url: sitemapUrl });
  }

  const summary: IngestSummary = {
    discovered: collection.entries.length,
    inserted: result.inserted.length,
    existing: result.existing,
    pruned,
    sitemapsVisited: collection.sitemapsVisited.length,
  };
  logger.info("sitemap_ingest_complete", { ...summary });
  return summary;
}

/**
 * Collects the sitemap, then reconciles it into the store. Nothing is written
 * unless the whole traversal succeeded.
 */
export async function ingestSitemap(
  deps: IngestDependencies,
  sitemapUrl: string,
  options: IngestOptions = {},
): Promise<IngestSummary> {
  const collection = await collectSitemapEntries(sitemapUrl, deps.fetcher, deps.logger);
  return reconcileSitemap(deps, sitemapUrl, collection, options);
}
