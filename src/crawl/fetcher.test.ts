import { MockAgent } from "undici";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DEFAULT_CONFIG } from "../config";
import { FetchError } from "../core/errors";
import { Page } from "../types";
import { FetchedDocument, Fetcher, HttpFetcher } from "./fetcher";
import { ScrapeProcessor } from "./scrapeProcessor";

const config = { ...DEFAULT_CONFIG, userAgent: "sitedigest-test", requestTimeoutMs: 1_000 };

describe("HttpFetcher", () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  it("returns the body, status and content type of a page", async () => {
    agent
      .get("https://example.com")
      .intercept({ path: "/page", method: "GET", headers: { "user-agent": "sitedigest-test" } })
      .reply(200, "<html><title>Page</title></html>", { headers: { "content-type": "text/html; charset=utf-8" } });

    const document = await new HttpFetcher(config, { dispatcher: agent }).fetchText("https://example.com/page");

    expect(document.body).toBe("<html><title>Page</title></html>");
    expect(document.statusCode).toBe(200);
    expect(document.contentType).toBe("text/html; charset=utf-8");
  });

  it("turns error statuses into fetch errors carrying the status", async () => {
    agent.get("https://example.com").intercept({ path: "/missing", method: "GET" }).reply(404, "not found");

    const error = await new HttpFetcher(config, { dispatcher: agent })
      .fetchText("https://example.com/missing")
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(FetchError);
    expect(error instanceof FetchError && error.statusCode).toBe(404);
    expect(error instanceof FetchError && error.message).toBe("HTTP 404 while fetching https://example.com/missing");
  });

  it("wraps connection failures", async () => {
    agent.get("https://example.com").intercept({ path: "/down", method: "GET" }).replyWithError(new Error("socket hang up"));

    await expect(
      new HttpFetcher(config, { dispatcher: agent }).fetchText("https://example.com/down"),
    ).rejects.toBeInstanceOf(FetchError);
  });
});

describe("ScrapeProcessor", () => {
  const page: Page = {
    url: "https://example.com/a",
    discoveryOrder: 1,
    discoveredAt: "2026-01-01T00:00:00.000Z",
    lastSeenAt: "2026-01-01T00:00:00.000Z",
    stages: { scrape: {}, parse: {}, summarize: {} },
  };

  function fetcherReturning(document: Partial<FetchedDocument>): Fetcher {
    return {
      id: "stub",
      fetchText: async (url) => ({ url, finalUrl: url, statusCode: 200, body: "", ...document }),
    };
  }

  it("tags scrape output with the fetcher id", async () => {
    const processor = new ScrapeProcessor(fetcherReturning({ body: "<p>a</p>", contentType: "text/html" }));

    expect(processor.method).toBe("stub");
    expect(await processor.process(page, new AbortController().signal)).toEqual({
      body: "<p>a</p>",
      statusCode: 200,
      contentType: "text/html",
    });
  });

  it("fails on an empty body", async () => {
    const processor = new ScrapeProcessor(fetcherReturning({ body: "  \n" }));
    await expect(processor.process(page, new AbortController().signal)).rejects.toThrow(
      "Empty body from https://example.com/a",
    );
  });
});
