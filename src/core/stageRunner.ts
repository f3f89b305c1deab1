import { Logger, MetricCounterName, MetricTimerName, MetricsRegistry } from "../observability";
import { PageStore } from "../store";
import { Page, PageStage, StageOutputMap } from "../types";
import { StageTimeoutError, errorMessage, isFatalError } from "./errors";
import { Pacer } from "./pacer";
import { FlaggedPage, TargetResolution } from "./targets";

/**
 * One stage's collaborator. Implementations must be safe to call again for the
 * same page and tag their output with the method that produced it.
 */
export interface StageProcessor<S extends PageStage> {
  readonly stage: S;
  readonly method: string;
  readonly detail?: string;
  process(page: Page, signal: AbortSignal): Promise<StageOutputMap[S]>;
}

export interface PageFailure {
  url: string;
  message: string;
}

export interface RunRecord {
  stage: PageStage;
  attempted: number;
  succeeded: number;
  failed: number;
  skipped: number;
  failures: PageFailure[];
  flagged: FlaggedPage[];
}

export interface RunStageOptions<S extends PageStage> {
  store: PageStore;
  processor: StageProcessor<S>;
  resolution: TargetResolution;
  logger: Logger;
  metrics: MetricsRegistry;
  timeoutMs: number;
  concurrency?: number;
  pacer?: Pacer;
  now?: () => Date;
}

const STAGE_METRICS: Record<PageStage, { ok: MetricCounterName; failed: MetricCounterName; timer: MetricTimerName }> = {
  scrape: { ok: "scrape_ok", failed: "scrape_failed", timer: "fetch_ms" },
  parse: { ok: "parse_ok", failed: "parse_failed", timer: "parse_ms" },
  summarize: { ok: "summarize_ok", failed: "summarize_failed", timer: "summarize_ms" },
};

async function withTimeout<T>(task: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new StageTimeoutError(timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

async function processWithConcurrency<T>(
  items: T[],
  concurrency: number,
  worker: (item: T) => Promise<void>,
): Promise<void> {
  let index = 0;
  const slots = new Array(Math.max(1, concurrency)).fill(null).map(async () => {
    while (true) {
      const current = index;
      index += 1;
      if (current >= items.length) {
        break;
      }
      await worker(items[current]);
    }
  });
  await Promise.all(slots);
}

/**
 * Runs a stage over every resolved target. A page's failure is recorded
 * against that page and the run moves on; only fatal errors (store I/O,
 * broken invariants) abort it, after in-flight pages have settled.
 */
export async function runStage<S extends PageStage>(options: RunStageOptions<S>): Promise<RunRecord> {
  const { store, processor, resolution, logger, metrics, timeoutMs, pacer } = options;
  const now = options.now ?? (() => new Date());
  const stage = processor.stage;
  const stageMetrics = STAGE_METRICS[stage];

  const record: RunRecord = {
    stage,
    attempted: 0,
    succeeded: 0,
    failed: 0,
    skipped: resolution.skipped,
    failures: [],
    flagged: resolution.flagged,
  };

  for (const flagged of resolution.flagged) {
    logger.warn("stage_prerequisite_flagged", { stage, url: flagged.url, reason: flagged.reason });
  }

  logger.info("stage_start", {
    stage,
    method: processor.method,
    targets: resolution.targets.length,
    skipped: resolution.skipped,
    concurrency: options.concurrency ?? 1,
  });

  let fatalError: unknown;

  await processWithConcurrency(resolution.targets, options.concurrency ?? 1, async (page) => {
    if (fatalError !== undefined) {
      return;
    }

    await pacer?.wait();
    record.attempted += 1;
    const stopTimer = metrics.startTimer(stageMetrics.timer);
    logger.trace("stage_page_start", { stage, url: page.url });

    try {
      const value = await withTimeout((signal) => processor.process(page, signal), timeoutMs);
      await store.recordSuccess(page.url, stage, {
        value,
        method: processor.method,
        detail: processor.detail,
        completedAt: now().toISOString(),
      });
      record.succeeded += 1;
      metrics.incrementCounter(stageMetrics.ok);
      logger.debug("stage_page_ok", { stage, url: page.url, durationMs: stopTimer() });
    } catch (error) {
      const durationMs = stopTimer();
      if (isFatalError(error)) {
        fatalError = error;
        return;
      }

      const message = errorMessage(error);
      try {
        await store.recordFailure(page.url, stage, message, now().toISOString());
      } catch (storeError) {
        fatalError = storeError;
        return;
      }
      record.failed += 1;
      record.failures.push({ url: page.url, message });
      metrics.incrementCounter(stageMetrics.failed);
      logger.warn("stage_page_failed", { stage, url: page.url, durationMs, error: message });
    }
  });

  if (fatalError !== undefined) {
    logger.error("stage_aborted", { stage, error: errorMessage(fatalError) });
    throw fatalError;
  }

  logger.info("stage_complete", {
    stage,
    attempted: record.attempted,
    succeeded: record.succeeded,
    failed: record.failed,
    skipped: record.skipped,
  });
  return record;
}

export function formatRunRecord(record: RunRecord): string {
  const parts = [
    `${record.stage}:`,
    `attempted=${record.attempted}`,
    `succeeded=${record.succeeded}`,
    `failed=${record.failed}`,
    `skipped=${record.skipped}`,
  ];
  if (record.flagged.length > 0) {
    parts.push(`flagged=${record.flagged.length}`);
  }
  return parts.join(" ");
}
