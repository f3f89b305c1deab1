import { z } from "zod";
import { SummarizationError } from "../core/errors";
import { ChatMessage, HttpChatProvider, HttpChatProviderOptions } from "./chatProvider";

const completionResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable(),
      }),
    }),
  ),
});

/** OpenAI-compatible `/chat/completions` endpoint; also serves OpenRouter. */
export class OpenAiChatProvider extends HttpChatProvider {
  readonly id: string;

  constructor(options: HttpChatProviderOptions & { id?: string }) {
    super(options);
    this.id = options.id ?? "openai";
  }

  async chat(messages: ChatMessage[], signal: AbortSignal): Promise<string> {
    const response = await this.postJson(
      "/chat/completions",
      { model: this.model, messages },
      completionResponseSchema,
      signal,
    );
    const content = response.choices[0]?.message.content;
    if (content === undefined || content === null) {
      throw new SummarizationError(`${this.id} returned no choices`);
    }
    return content;
  }
}
