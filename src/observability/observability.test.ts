import { describe, expect, it } from "vitest";
import { Pacer } from "../core/pacer";
import { Logger, levelFromVerbosity } from "./logger";
import { MetricsRegistry } from "./metrics";
import { createRunId } from "./runId";

describe("Logger", () => {
  it("writes JSON lines at or above its level and carries context into children", () => {
    const lines: string[] = [];
    const logger = new Logger({ component: "cli", runId: "run-1" }, { level: "info", write: (line) => lines.push(line) });

    logger.debug("hidden");
    logger.child("parse").warn("page_failed", { url: "https://example.com/a" });

    expect(lines).toHaveLength(1);
    const { ts, ...rest } = JSON.parse(lines[0]);
    expect(typeof ts).toBe("string");
    expect(rest).toEqual({ level: "warn", msg: "page_failed", component: "parse", runId: "run-1", url: "https://example.com/a" });
  });

  it("maps verbosity counts to levels", () => {
    expect(levelFromVerbosity(0)).toBe("error");
    expect(levelFromVerbosity(2)).toBe("info");
    expect(levelFromVerbosity(9)).toBe("trace");
  });
});

describe("MetricsRegistry", () => {
  it("counts and logs a summary at debug", () => {
    const metrics = new MetricsRegistry();
    metrics.incrementCounter("scrape_ok");
    metrics.incrementCounter("pages_discovered", 3);

    const lines: string[] = [];
    metrics.logSummary(new Logger({ component: "cli", runId: "r" }, { level: "debug", write: (line) => lines.push(line) }));

    expect(metrics.getCounter("scrape_ok")).toBe(1);
    const payload = JSON.parse(lines[0]);
    expect(payload.msg).toBe("metrics_summary");
    expect(payload.counters.pages_discovered).toBe(3);
    expect(payload.counters.parse_failed).toBe(0);
    expect(payload.timers).toEqual({});
  });
});

describe("createRunId", () => {
  it("prefixes the command and encodes the start time", () => {
    expect(createRunId("parse", new Date("2026-01-02T03:04:05.006Z"))).toMatch(/^parse_2026-01-02T03-04-05-006Z_[0-9a-z]+$/);
  });
});

describe("Pacer", () => {
  it("spaces calls by the interval on a shared schedule", async () => {
    const pauses: number[] = [];
    const pacer = new Pacer(
      100,
      () => 1_000,
      async (ms) => {
        pauses.push(ms);
      },
    );

    await pacer.wait();
    await pacer.wait();
    await pacer.wait();

    expect(pauses).toEqual([100, 200]);
  });
});
