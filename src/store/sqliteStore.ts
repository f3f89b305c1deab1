import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { z } from "zod";
import { InvariantViolationError, PipelineError, StoreIOError, errorMessage } from "../core/errors";
import {
  ComposablePage,
  Page,
  PageStage,
  ParseOutput,
  STAGE_PREREQUISITE,
  SitemapEntry,
  StageOutput,
  StageOutputMap,
  StageState,
  SummarizeOutput,
} from "../types";
import { DiscoveryResult, PageFilter, PageStore, StageStats, StoreStats } from "./types";

type PageRow = {
  url: string;
  discoveryOrder: number;
  discoveredAt: string;
  lastSeenAt: string;
  sitemapLastmod: string | null;
};

type StageRow = {
  url: string;
  stage: string;
  payload: string | null;
  method: string | null;
  detail: string | null;
  completedAt: string | null;
  error: string | null;
  failedAt: string | null;
};

type ComposableRow = {
  url: string;
  parsePayload: string | null;
  summaryPayload: string;
};

type FilterParams = Record<string, string>;

const scrapeOutputSchema = z.object({
  body: z.string(),
  statusCode: z.number().int(),
  contentType: z.string().optional(),
});

const parseOutputSchema = z.object({
  title: z.string().optional(),
  text: z.string(),
});

const summarizeOutputSchema = z.object({
  summary: z.string(),
});

const STAGE_VALUE_SCHEMAS: { [S in PageStage]: z.ZodType<StageOutputMap[S]> } = {
  scrape: scrapeOutputSchema,
  parse: parseOutputSchema,
  summarize: summarizeOutputSchema,
};

const MEMORY_PATH = ":memory:";

export class SqliteStore implements PageStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    try {
      if (dbPath === MEMORY_PATH) {
        this.db = new Database(MEMORY_PATH);
      } else {
        const absolutePath = path.resolve(dbPath);
        fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
        this.db = new Database(absolutePath);
        this.db.pragma("journal_mode = WAL");
      }
      this.db.pragma("foreign_keys = ON");
      this.initializeSchema();
    } catch (error) {
      throw new StoreIOError(`Unable to open store ${dbPath}: ${errorMessage(error)}`, { cause: error });
    }
  }

  async upsertDiscovered(entries: SitemapEntry[], seenAt: string): Promise<DiscoveryResult> {
    return this.guard("upsert_discovered", () => {
      const exists = this.db.prepare<[string], { url: string }>("SELECT url FROM pages WHERE url = ?");
      const upsert = this.db.prepare<{ url: string; seenAt: string; sitemapLastmod: string | null }>(`
        INSERT INTO pages (url, discoveredAt, lastSeenAt, sitemapLastmod)
        VALUES (@url, @seenAt, @seenAt, @sitemapLastmod)
        ON CONFLICT(url) DO UPDATE SET
          lastSeenAt = excluded.lastSeenAt,
          sitemapLastmod = COALESCE(excluded.sitemapLastmod, sitemapLastmod)
      `);

      const tx = this.db.transaction((items: SitemapEntry[]) => {
        const inserted: string[] = [];
        let existing = 0;
        for (const item of items) {
          if (exists.get(item.url)) {
            existing += 1;
          } else {
            inserted.push(item.url);
          }
          upsert.run({ url: item.url, seenAt, sitemapLastmod: item.lastmod ?? null });
        }
        return { inserted, existing };
      });

      return tx(entries);
    });
  }

  async get(url: string): Promise<Page | undefined> {
    const [page] = await this.list({ kind: "url", url });
    return page;
  }

  async list(filter: PageFilter): Promise<Page[]> {
    return this.guard("list", () => {
      const { where, params } = buildFilter(filter);
      const selectPages = this.db.prepare<FilterParams, PageRow>(`
        SELECT p.url, p.discoveryOrder, p.discoveredAt, p.lastSeenAt, p.sitemapLastmod
        FROM pages p
        WHERE ${where}
        ORDER BY p.discoveryOrder ASC
      `);
      const selectStages = this.db.prepare<FilterParams, StageRow>(`
        SELECT s.url, s.stage, s.payload, s.method, s.detail, s.completedAt, s.error, s.failedAt
        FROM page_stages s
        WHERE s.url IN (SELECT p.url FROM pages p WHERE ${where})
      `);

      // Both reads share one transaction so a page and its stages come from the same snapshot.
      const read = this.db.transaction(() => ({
        pageRows: selectPages.all(params),
        stageRows: selectStages.all(params),
      }));
      const { pageRows, stageRows } = read();

      const stagesByUrl = new Map<string, Map<string, StageRow>>();
      for (const row of stageRows) {
        const byStage = stagesByUrl.get(row.url) ?? new Map<string, StageRow>();
        byStage.set(row.stage, row);
        stagesByUrl.set(row.url, byStage);
      }

      return pageRows.map((row) => toPage(row, stagesByUrl.get(row.url)));
    });
  }

  async count(): Promise<number> {
    return this.guard("count", () => this.countWhere("1 = 1"));
  }

  async recordSuccess<S extends PageStage>(url: string, stage: S, output: StageOutput<StageOutputMap[S]>): Promise<void> {
    this.guard("record_success", () => {
      const statement = this.db.prepare<{
        url: string;
        stage: string;
        payload: string;
        method: string;
        detail: string | null;
        completedAt: string;
      }>(`
        INSERT INTO page_stages (url, stage, payload, method, detail, completedAt, error, failedAt)
        VALUES (@url, @stage, @payload, @method, @detail, @completedAt, NULL, NULL)
        ON CONFLICT(url, stage) DO UPDATE SET
          payload = excluded.payload,
          method = excluded.method,
          detail = excluded.detail,
          completedAt = excluded.completedAt,
          error = NULL,
          failedAt = NULL
      `);

      this.db.transaction(() => {
        this.assertPageExists(url, "record_success");
        statement.run({
          url,
          stage,
          payload: JSON.stringify(output.value),
          method: output.method,
          detail: output.detail ?? null,
          completedAt: output.completedAt,
        });
      })();
    });
  }

  async recordFailure(url: string, stage: PageStage, message: string, failedAt: string): Promise<void> {
    this.guard("record_failure", () => {
      const statement = this.db.prepare<{ url: string; stage: string; error: string; failedAt: string }>(`
        INSERT INTO page_stages (url, stage, error, failedAt)
        VALUES (@url, @stage, @error, @failedAt)
        ON CONFLICT(url, stage) DO UPDATE SET
          error = excluded.error,
          failedAt = excluded.failedAt
      `);

      this.db.transaction(() => {
        this.assertPageExists(url, "record_failure");
        statement.run({ url, stage, error: message, failedAt });
      })();
    });
  }

  async listComposable(): Promise<ComposablePage[]> {
    return this.guard("list_composable", () => {
      const rows = this.db
        .prepare<[], ComposableRow>(
          `
          SELECT p.url, parse.payload AS parsePayload, summary.payload AS summaryPayload
          FROM pages p
          JOIN page_stages summary
            ON summary.url = p.url AND summary.stage = 'summarize' AND summary.completedAt IS NOT NULL
          LEFT JOIN page_stages parse
            ON parse.url = p.url AND parse.stage = 'parse' AND parse.completedAt IS NOT NULL
          ORDER BY p.discoveryOrder ASC
        `,
        )
        .all();

      const pages: ComposablePage[] = [];
      for (const row of rows) {
        const summary: SummarizeOutput = decodeValue("summarize", row.summaryPayload);
        if (!summary.summary) {
          continue;
        }
        const parsed: ParseOutput | undefined = row.parsePayload ? decodeValue("parse", row.parsePayload) : undefined;
        pages.push({ url: row.url, title: parsed?.title, summary: summary.summary });
      }
      return pages;
    });
  }

  async prune(keepUrls: ReadonlySet<string>): Promise<number> {
    return this.guard("prune", () => {
      const selectUrls = this.db.prepare<[], { url: string }>("SELECT url FROM pages");
      const remove = this.db.prepare<[string]>("DELETE FROM pages WHERE url = ?");
      const tx = this.db.transaction(() => {
        let removed = 0;
        for (const row of selectUrls.all()) {
          if (!keepUrls.has(row.url)) {
            removed += remove.run(row.url).changes;
          }
        }
        return removed;
      });
      return tx();
    });
  }

  async getStats(): Promise<StoreStats> {
    return this.guard("get_stats", () => {
      const totalPages = this.countWhere("1 = 1");
      const stageStats = (stage: PageStage): StageStats => {
        const ok = this.countWhere(stageExists(stage, "s.completedAt IS NOT NULL"));
        return {
          ok,
          failed: this.countWhere(stageExists(stage, "s.error IS NOT NULL")),
          missing: totalPages - ok,
        };
      };

      return {
        totalPages,
        stages: {
          scrape: stageStats("scrape"),
          parse: stageStats("parse"),
          summarize: stageStats("summarize"),
        },
      };
    });
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof PipelineError) {
        throw error;
      }
      throw new StoreIOError(`Store operation ${operation} failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  private assertPageExists(url: string, operation: string): void {
    const row = this.db.prepare<[string], { url: string }>("SELECT url FROM pages WHERE url = ?").get(url);
    if (!row) {
      throw new InvariantViolationError(`${operation} on unknown page ${url}`);
    }
  }

  private countWhere(whereClause: string): number {
    const row = this.db
      .prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM pages p WHERE ${whereClause}`)
      .get();
    return row?.count ?? 0;
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS pages (
        discoveryOrder INTEGER PRIMARY KEY AUTOINCREMENT,
        url TEXT NOT NULL UNIQUE,
        discoveredAt TEXT NOT NULL,
        lastSeenAt TEXT NOT NULL,
        sitemapLastmod TEXT NULL
      );

      CREATE TABLE IF NOT EXISTS page_stages (
        url TEXT NOT NULL REFERENCES pages(url) ON DELETE CASCADE,
        stage TEXT NOT NULL,
        payload TEXT NULL,
        method TEXT NULL,
        detail TEXT NULL,
        completedAt TEXT NULL,
        error TEXT NULL,
        failedAt TEXT NULL,
        PRIMARY KEY (url, stage)
      );

      CREATE INDEX IF NOT EXISTS idx_page_stages_stage ON page_stages(stage, completedAt);
    `);
  }
}

function stageExists(stage: PageStage, condition: string): string {
  return `EXISTS (SELECT 1 FROM page_stages s WHERE s.url = p.url AND s.stage = '${stage}' AND ${condition})`;
}

function stageMissing(stage: PageStage): string {
  return `NOT ${stageExists(stage, "s.completedAt IS NOT NULL")}`;
}

function prerequisiteMet(stage: PageStage): string {
  const prerequisite = STAGE_PREREQUISITE[stage];
  return prerequisite ? stageExists(prerequisite, "s.completedAt IS NOT NULL") : "1 = 1";
}

function buildFilter(filter: PageFilter): { where: string; params: FilterParams } {
  switch (filter.kind) {
    case "all":
      return { where: "1 = 1", params: {} };
    case "url":
      return { where: "p.url = @url", params: { url: filter.url } };
    case "missing":
      return { where: stageMissing(filter.stage), params: {} };
    case "ready":
      return { where: `${prerequisiteMet(filter.stage)} AND ${stageMissing(filter.stage)}`, params: {} };
    case "prerequisiteMet":
      return { where: prerequisiteMet(filter.stage), params: {} };
    case "changedSince":
      return {
        where: `p.sitemapLastmod IS NOT NULL AND ${stageExists(
          filter.stage,
          "s.completedAt IS NOT NULL AND s.completedAt < p.sitemapLastmod",
        )}`,
        params: {},
      };
  }
}

function decodeValue<S extends PageStage>(stage: S, payload: string): StageOutputMap[S] {
  const parsed = STAGE_VALUE_SCHEMAS[stage].safeParse(JSON.parse(payload));
  if (!parsed.success) {
    throw new StoreIOError(`Corrupt ${stage} payload: ${parsed.error.message}`);
  }
  return parsed.data;
}

function toStageState<S extends PageStage>(stage: S, row: StageRow | undefined): StageState<StageOutputMap[S]> {
  if (!row) {
    return {};
  }

  const state: StageState<StageOutputMap[S]> = {};
  if (row.payload !== null && row.method !== null && row.completedAt !== null) {
    state.output = {
      value: decodeValue(stage, row.payload),
      method: row.method,
      detail: row.detail ?? undefined,
      completedAt: row.completedAt,
    };
  }
  if (row.error !== null && row.failedAt !== null) {
    state.lastError = { message: row.error, failedAt: row.failedAt };
  }
  return state;
}

function toPage(row: PageRow, stageRows: Map<string, StageRow> | undefined): Page {
  return {
    url: row.url,
    discoveryOrder: row.discoveryOrder,
    discoveredAt: row.discoveredAt,
    lastSeenAt: row.lastSeenAt,
    sitemapLastmod: row.sitemapLastmod ?? undefined,
    stages: {
      scrape: toStageState("scrape", stageRows?.get("scrape")),
      parse: toStageState("parse", stageRows?.get("parse")),
      summarize: toStageState("summarize", stageRows?.get("summarize")),
    },
  };
}
