import { createHash } from "node:crypto";
import { ChatMessage } from "./chatProvider";

export const DEFAULT_PROMPT_TEMPLATE = `
You will see a webpage content from {url}.
Create its concise summary for a digest.
Your answer should contain only summary, it will be pasted directly into digest.
Nobody should know it was generated using an LLM.
Try your best to keep original style and language.
Webpage content to summarize:`;

const THINK_BLOCK_PATTERN = /<think>[\s\S]*<\/think>\s*/g;

/** Identifies the template a summary was produced with: `default` or a short content hash. */
export function promptId(template: string): string {
  if (template === DEFAULT_PROMPT_TEMPLATE) {
    return "default";
  }
  return `sha256:${createHash("sha256").update(template).digest("hex").slice(0, 12)}`;
}

function substitute(template: string, placeholder: string, value: string): string {
  return template.split(placeholder).join(value);
}

/**
 * Fills `{url}` and `{text}`. A template without `{text}` gets the page text
 * as a second user message.
 */
export function buildMessages(template: string, url: string, text: string): ChatMessage[] {
  const prompt = substitute(substitute(template, "{url}", url), "{text}", text);
  const messages: ChatMessage[] = [{ role: "user", content: prompt }];
  if (!template.includes("{text}")) {
    messages.push({ role: "user", content: text });
  }
  return messages;
}

/** Drops reasoning blocks some models emit before the answer. */
export function stripThinking(response: string): string {
  return response.replace(THINK_BLOCK_PATTERN, "").trim();
}
