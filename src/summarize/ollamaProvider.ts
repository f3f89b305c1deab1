import { z } from "zod";
import { ChatMessage, HttpChatProvider } from "./chatProvider";

const ollamaChatResponseSchema = z.object({
  message: z.object({
    content: z.string(),
  }),
});

export class OllamaChatProvider extends HttpChatProvider {
  readonly id = "ollama";

  async chat(messages: ChatMessage[], signal: AbortSignal): Promise<string> {
    const response = await this.postJson(
      "/api/chat",
      { model: this.model, messages, stream: false },
      ollamaChatResponseSchema,
      signal,
    );
    return response.message.content;
  }
}
