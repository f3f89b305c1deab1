import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SqliteStore } from "../store";
import { InvalidArgumentError, UnknownTargetError } from "./errors";
import { parseTargetSelector, prerequisiteProblem, resolveTargets } from "./targets";

const P1 = "https://example.com/one";
const P2 = "https://example.com/two";
const P3 = "https://example.com/three";

const T1 = "2026-03-01T00:00:00.000Z";
const T2 = "2026-03-02T00:00:00.000Z";
const T3 = "2026-03-03T00:00:00.000Z";

async function scrape(store: SqliteStore, url: string, completedAt = T1): Promise<void> {
  await store.recordSuccess(url, "scrape", { value: { body: `<p>${url}</p>`, statusCode: 200 }, method: "http", completedAt });
}

async function parse(store: SqliteStore, url: string, completedAt = T2): Promise<void> {
  await store.recordSuccess(url, "parse", { value: { title: url, text: `text of ${url}` }, method: "readability", completedAt });
}

describe("parseTargetSelector", () => {
  it("maps the CLI spellings", () => {
    expect(parseTargetSelector(undefined)).toEqual({ kind: "pending" });
    expect(parseTargetSelector("unsummarized")).toEqual({ kind: "pending" });
    expect(parseTargetSelector("all")).toEqual({ kind: "all" });
    expect(parseTargetSelector(P1)).toEqual({ kind: "url", url: P1 });
  });

  it("rejects anything that is not an http(s) URL", () => {
    expect(() => parseTargetSelector("some-page")).toThrow(InvalidArgumentError);
    expect(() => parseTargetSelector("ftp://example.com/a")).toThrow('Target URL must use http or https, got "ftp://example.com/a"');
  });
});

describe("resolveTargets", () => {
  let store: SqliteStore;

  beforeEach(async () => {
    store = new SqliteStore(":memory:");
    await store.upsertDiscovered([{ url: P1 }, { url: P2 }, { url: P3 }], T1);
    for (const url of [P1, P2, P3]) {
      await scrape(store, url);
    }
    await parse(store, P1);
    await parse(store, P2);
    await store.recordSuccess(P2, "summarize", { value: { summary: "two" }, method: "ollama://qwen3", completedAt: T3 });
  });

  afterEach(async () => {
    await store.close();
  });

  it("selects parsed but unsummarized pages by default", async () => {
    const resolution = await resolveTargets(store, "summarize", { kind: "pending" });
    expect(resolution.targets.map((page) => page.url)).toEqual([P1]);
    expect(resolution.skipped).toBe(2);
    expect(resolution.flagged).toEqual([]);
  });

  it("selects every page with a parsed input for all", async () => {
    const resolution = await resolveTargets(store, "summarize", { kind: "all" });
    expect(resolution.targets.map((page) => page.url)).toEqual([P1, P2]);
    expect(resolution.skipped).toBe(1);
  });

  it("processes an explicit URL even without its prerequisite and flags it", async () => {
    const resolution = await resolveTargets(store, "summarize", { kind: "url", url: P3 });
    expect(resolution.targets.map((page) => page.url)).toEqual([P3]);
    expect(resolution.flagged).toEqual([{ url: P3, reason: "no parse output" }]);
    expect(resolution.skipped).toBe(2);
  });

  it("drops the prerequisite condition when asked", async () => {
    const resolution = await resolveTargets(store, "summarize", { kind: "pending" }, { ignorePrerequisites: true });
    expect(resolution.targets.map((page) => page.url)).toEqual([P1, P3]);
    expect(resolution.flagged).toEqual([{ url: P3, reason: "no parse output" }]);
  });

  it("fails on a URL that was never discovered without writing anything", async () => {
    const before = await store.getStats();
    await expect(
      resolveTargets(store, "parse", { kind: "url", url: "https://example.com/unknown" }),
    ).rejects.toBeInstanceOf(UnknownTargetError);
    expect(await store.getStats()).toEqual(before);
  });

  it("adds pages whose sitemap lastmod is newer than their scrape to pending scrapes", async () => {
    await store.upsertDiscovered([{ url: P1 }, { url: P2, lastmod: T3 }, { url: P3 }], T3);
    await store.upsertDiscovered([{ url: "https://example.com/four" }], T3);

    const resolution = await resolveTargets(store, "scrape", { kind: "pending" });
    expect(resolution.targets.map((page) => page.url)).toEqual([P2, "https://example.com/four"]);
  });

  it("flags parsed text that is older than the latest scrape", async () => {
    await scrape(store, P1, T3);
    const page = await store.get(P1);
    expect(page && prerequisiteProblem(page, "summarize")).toBe("parse output predates the latest scrape");

    const resolution = await resolveTargets(store, "summarize", { kind: "pending" });
    expect(resolution.flagged).toEqual([{ url: P1, reason: "parse output predates the latest scrape" }]);
  });
});
