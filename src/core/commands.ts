import { AppConfig } from "../config";
import { Composer, LlmsTxtComposer, writeArtifact } from "../compose";
import {
  Fetcher,
  IngestSummary,
  RobotsPolicy,
  ScrapeProcessor,
  SitemapCollection,
  collectSitemapEntries,
  prunesUnlisted,
  reconcileSitemap,
} from "../crawl";
import { Extractor, ParseProcessor } from "../extract";
import { Logger, MetricsRegistry } from "../observability";
import { PageStore, StoreStats } from "../store";
import { SummarizeProcessor, Summarizer } from "../summarize";
import { UnknownTargetError } from "./errors";
import { Pacer } from "./pacer";
import { RunRecord, runStage } from "./stageRunner";
import { TargetSelector, describeSelector, resolveTargets } from "./targets";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  store: PageStore;
  logger: Logger;
  metrics: MetricsRegistry;
}

export interface ScrapeCommandOptions {
  sitemapUrl: string;
  fetcher: Fetcher;
  target: TargetSelector;
  prune?: boolean;
}

export interface ScrapeCommandResult {
  ingest: IngestSummary;
  record: RunRecord;
}

export interface ParseCommandOptions {
  extractor: Extractor;
  target: TargetSelector;
  selector?: string;
  ignorePrerequisites?: boolean;
}

export interface SummarizeCommandOptions {
  summarizer: Summarizer;
  providerUri: string;
  target: TargetSelector;
  requestsPerMinute?: number;
  ignorePrerequisites?: boolean;
}

export interface ComposeCommandOptions {
  outputPath: string;
  title?: string;
  description?: string;
  composer?: Composer;
}

export interface ComposeCommandResult {
  pagesComposed: number;
  outputPath: string;
}

export async function runScrape(ctx: CommandContext, options: ScrapeCommandOptions): Promise<ScrapeCommandResult> {
  ctx.logger.info("scrape_start", {
    sitemapUrl: options.sitemapUrl,
    target: describeSelector(options.target),
    delayMs: ctx.config.scrapeDelayMs,
    concurrency: ctx.config.scrapeConcurrency,
  });

  const collection = await collectSitemapEntries(options.sitemapUrl, options.fetcher, ctx.logger);
  await assertScrapeTargetKnown(ctx.store, options.target, collection, options.prune);
  const ingest = await reconcileSitemap(
    { store: ctx.store, logger: ctx.logger, metrics: ctx.metrics },
    options.sitemapUrl,
    collection,
    { prune: options.prune },
  );

  const resolution = await resolveTargets(ctx.store, "scrape", options.target);
  const robots = ctx.config.respectRobotsTxt
    ? new RobotsPolicy(options.fetcher, ctx.config.userAgent, ctx.logger)
    : undefined;
  const record = await runStage({
    store: ctx.store,
    processor: new ScrapeProcessor(options.fetcher, robots),
    resolution,
    logger: ctx.logger,
    metrics: ctx.metrics,
    timeoutMs: ctx.config.requestTimeoutMs,
    concurrency: ctx.config.scrapeConcurrency,
    pacer: new Pacer(ctx.config.scrapeDelayMs),
  });
  return { ingest, record };
}

/**
 * An explicit scrape target must exist once the sitemap is reconciled. This is
 * checked before anything is written, so a bad target leaves the store as it was.
 */
async function assertScrapeTargetKnown(
  store: PageStore,
  target: TargetSelector,
  collection: SitemapCollection,
  prune?: boolean,
): Promise<void> {
  if (target.kind !== "url") {
    return;
  }
  if (collection.entries.some((entry) => entry.url === target.url)) {
    return;
  }
  if (!prunesUnlisted(collection, { prune }) && (await store.get(target.url))) {
    return;
  }
  throw new UnknownTargetError(target.url);
}

export async function runParse(ctx: CommandContext, options: ParseCommandOptions): Promise<RunRecord> {
  ctx.logger.info("parse_start", {
    method: options.extractor.name,
    selector: options.selector,
    target: describeSelector(options.target),
  });

  const resolution = await resolveTargets(ctx.store, "parse", options.target, {
    ignorePrerequisites: options.ignorePrerequisites,
  });
  return runStage({
    store: ctx.store,
    processor: new ParseProcessor(options.extractor, { selector: options.selector }),
    resolution,
    logger: ctx.logger,
    metrics: ctx.metrics,
    timeoutMs: ctx.config.parseTimeoutMs,
  });
}

export async function runSummarize(ctx: CommandContext, options: SummarizeCommandOptions): Promise<RunRecord> {
  ctx.logger.info("summarize_start", {
    provider: options.providerUri,
    prompt: options.summarizer.promptId,
    target: describeSelector(options.target),
    rpm: options.requestsPerMinute,
    concurrency: ctx.config.summarizeConcurrency,
  });

  const resolution = await resolveTargets(ctx.store, "summarize", options.target, {
    ignorePrerequisites: options.ignorePrerequisites,
  });
  return runStage({
    store: ctx.store,
    processor: new SummarizeProcessor(options.summarizer, options.providerUri),
    resolution,
    logger: ctx.logger,
    metrics: ctx.metrics,
    timeoutMs: ctx.config.summarizeTimeoutMs,
    concurrency: ctx.config.summarizeConcurrency,
    pacer: options.requestsPerMinute ? Pacer.perMinute(options.requestsPerMinute) : undefined,
  });
}

export async function runCompose(ctx: CommandContext, options: ComposeCommandOptions): Promise<ComposeCommandResult> {
  const composer = options.composer ?? new LlmsTxtComposer();
  const pages = await ctx.store.listComposable();
  const content = composer.compose(pages, { title: options.title, description: options.description });

  await writeArtifact(options.outputPath, content);
  ctx.metrics.incrementCounter("pages_composed", pages.length);
  ctx.logger.info("compose_complete", { outputPath: options.outputPath, pagesComposed: pages.length });
  return { pagesComposed: pages.length, outputPath: options.outputPath };
}

export async function runStatus(ctx: CommandContext): Promise<StoreStats> {
  const stats = await ctx.store.getStats();
  ctx.logger.debug("status_complete", { stats });
  return stats;
}

export function formatStats(stats: StoreStats): string[] {
  const lines = [`pages: ${stats.totalPages}`];
  for (const [stage, counts] of Object.entries(stats.stages)) {
    lines.push(`${stage}: ok=${counts.ok} failed=${counts.failed} missing=${counts.missing}`);
  }
  return lines;
}
