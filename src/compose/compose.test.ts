import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { LlmsTxtComposer } from "./llmsTxtComposer";
import { writeArtifact } from "./writeArtifact";

const PAGES = [
  { url: "https://example.com/a", title: "Alpha", summary: "First page." },
  { url: "https://example.com/b", summary: "Second page." },
];

describe("LlmsTxtComposer", () => {
  it("renders one section per page, linking titled pages", () => {
    expect(new LlmsTxtComposer().compose(PAGES)).toBe(
      "## [Alpha](https://example.com/a)\nFirst page.\n\n## https://example.com/b\nSecond page.\n\n",
    );
  });

  it("adds the title and description header when given", () => {
    expect(new LlmsTxtComposer().compose(PAGES.slice(0, 1), { title: "Example", description: "Everything about examples" })).toBe(
      "# Example\n\n> Everything about examples\n\n## [Alpha](https://example.com/a)\nFirst page.\n\n",
    );
  });

  it("renders nothing for an empty store", () => {
    expect(new LlmsTxtComposer().compose([])).toBe("");
  });
});

describe("writeArtifact", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "sitedigest-compose-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("creates missing directories and leaves no temp file behind", async () => {
    const outputPath = path.join(dir, "public", "llms.txt");

    await writeArtifact(outputPath, "first");
    await writeArtifact(outputPath, "second");

    expect(fs.readFileSync(outputPath, "utf-8")).toBe("second");
    expect(fs.readdirSync(path.join(dir, "public"))).toEqual(["llms.txt"]);
  });
});
