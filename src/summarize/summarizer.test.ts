import { describe, expect, it } from "vitest";
import { SummarizationError } from "../core/errors";
import { Page } from "../types";
import { ChatMessage, ChatProvider } from "./chatProvider";
import { DEFAULT_PROMPT_TEMPLATE } from "./prompt";
import { LlmSummarizer, SummarizeProcessor } from "./summarizer";

class ScriptedProvider implements ChatProvider {
  readonly id = "scripted";
  readonly calls: ChatMessage[][] = [];
  private readonly reply: string;

  constructor(reply: string) {
    this.reply = reply;
  }

  async chat(messages: ChatMessage[]): Promise<string> {
    this.calls.push(messages);
    return this.reply;
  }
}

function pageWithText(text?: string): Page {
  return {
    url: "https://example.com/post",
    discoveryOrder: 1,
    discoveredAt: "2026-01-01T00:00:00.000Z",
    lastSeenAt: "2026-01-01T00:00:00.000Z",
    stages: {
      scrape: {},
      parse:
        text === undefined
          ? {}
          : { output: { value: { text }, method: "readability", completedAt: "2026-01-01T00:00:00.000Z" } },
      summarize: {},
    },
  };
}

describe("LlmSummarizer", () => {
  it("strips reasoning from the reply", async () => {
    const provider = new ScriptedProvider("<think>\nplanning\n</think>\nA digest entry.");
    const summarizer = new LlmSummarizer(provider);

    expect(await summarizer.summarize("https://example.com/post", "Body", new AbortController().signal)).toBe(
      "A digest entry.",
    );
    expect(provider.calls[0]).toEqual([
      { role: "user", content: DEFAULT_PROMPT_TEMPLATE.replace("{url}", "https://example.com/post") },
      { role: "user", content: "Body" },
    ]);
  });

  it("treats a reply that is only reasoning as a failure", async () => {
    const summarizer = new LlmSummarizer(new ScriptedProvider("<think>nothing to say</think>\n"));
    await expect(summarizer.summarize("https://example.com/post", "Body", new AbortController().signal)).rejects.toThrow(
      "scripted returned an empty summary",
    );
  });
});

describe("SummarizeProcessor", () => {
  it("tags summaries with the provider URI and prompt id", async () => {
    const processor = new SummarizeProcessor(
      new LlmSummarizer(new ScriptedProvider("Summary."), "Summarize {url}: {text}"),
      "ollama://8b@qwen3",
    );

    expect(processor.method).toBe("ollama://8b@qwen3");
    expect(processor.detail).toMatch(/^sha256:[0-9a-f]{12}$/);
    expect(await processor.process(pageWithText("Body"), new AbortController().signal)).toEqual({ summary: "Summary." });
  });

  it("fails pages without parsed text", async () => {
    const processor = new SummarizeProcessor(new LlmSummarizer(new ScriptedProvider("unused")), "ollama://qwen3");
    await expect(processor.process(pageWithText(), new AbortController().signal)).rejects.toBeInstanceOf(SummarizationError);
  });
});
