import { SummarizationError } from "../core/errors";
import { StageProcessor } from "../core/stageRunner";
import { Page, SummarizeOutput } from "../types";
import { ChatProvider } from "./chatProvider";
import { DEFAULT_PROMPT_TEMPLATE, buildMessages, promptId, stripThinking } from "./prompt";

export interface Summarizer {
  /** Identifies the prompt template, recorded as the detail of summaries. */
  readonly promptId: string;
  summarize(url: string, text: string, signal: AbortSignal): Promise<string>;
}

export class LlmSummarizer implements Summarizer {
  readonly promptId: string;
  private readonly promptTemplate: string;
  private readonly provider: ChatProvider;

  constructor(provider: ChatProvider, promptTemplate: string = DEFAULT_PROMPT_TEMPLATE) {
    this.provider = provider;
    this.promptTemplate = promptTemplate;
    this.promptId = promptId(promptTemplate);
  }

  async summarize(url: string, text: string, signal: AbortSignal): Promise<string> {
    const response = await this.provider.chat(buildMessages(this.promptTemplate, url, text), signal);
    const summary = stripThinking(response);
    if (!summary) {
      throw new SummarizationError(`${this.provider.id} returned an empty summary`);
    }
    return summary;
  }
}

export class SummarizeProcessor implements StageProcessor<"summarize"> {
  readonly stage = "summarize";
  /** Provider URI. */
  readonly method: string;
  readonly detail: string;
  private readonly summarizer: Summarizer;

  constructor(summarizer: Summarizer, providerUri: string) {
    this.summarizer = summarizer;
    this.method = providerUri;
    this.detail = summarizer.promptId;
  }

  async process(page: Page, signal: AbortSignal): Promise<SummarizeOutput> {
    const text = page.stages.parse.output?.value.text;
    if (!text) {
      throw new SummarizationError("No parsed text to summarize");
    }
    return { summary: await this.summarizer.summarize(page.url, text, signal) };
  }
}
