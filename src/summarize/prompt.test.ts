import { describe, expect, it } from "vitest";
import { DEFAULT_PROMPT_TEMPLATE, buildMessages, promptId, stripThinking } from "./prompt";

describe("buildMessages", () => {
  it("sends the page text separately when the template has no {text}", () => {
    const messages = buildMessages(DEFAULT_PROMPT_TEMPLATE, "https://example.com/a", "Page body");

    expect(messages).toEqual([
      { role: "user", content: DEFAULT_PROMPT_TEMPLATE.replace("{url}", "https://example.com/a") },
      { role: "user", content: "Page body" },
    ]);
    expect(messages[0].content.startsWith("\nYou will see a webpage content from https://example.com/a.\n")).toBe(true);
  });

  it("inlines the text when the template asks for it", () => {
    expect(buildMessages("Summarize {url}:\n{text}", "https://example.com/b", "Costs $5 & {url}")).toEqual([
      { role: "user", content: "Summarize https://example.com/b:\nCosts $5 & {url}" },
    ]);
  });
});

describe("stripThinking", () => {
  it("removes a think block and the whitespace after it", () => {
    expect(stripThinking("<think>This is inside think tags</think>\n## [Test Title](http://example.com)\nTest content")).toBe(
      "## [Test Title](http://example.com)\nTest content",
    );
  });

  it("removes an empty think block", () => {
    expect(stripThinking("<think>\n</think>\n## [Test Title](http://example.com)\nTest content")).toBe(
      "## [Test Title](http://example.com)\nTest content",
    );
  });

  it("leaves responses without reasoning alone apart from trimming", () => {
    expect(stripThinking("  Plain summary.\n")).toBe("Plain summary.");
  });
});

describe("promptId", () => {
  it("names the built-in template and hashes custom ones", () => {
    expect(promptId(DEFAULT_PROMPT_TEMPLATE)).toBe("default");
    const id = promptId("Summarize {url}");
    expect(id).toMatch(/^sha256:[0-9a-f]{12}$/);
    expect(promptId("Summarize {url}")).toBe(id);
    expect(promptId("Summarize {text}")).not.toBe(id);
  });
});
