import { Dispatcher, fetch } from "undici";
import { ZodType } from "zod";
import { SummarizationError, errorMessage } from "../core/errors";
import { sleep } from "../core/pacer";

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ChatProvider {
  readonly id: string;
  chat(messages: ChatMessage[], signal: AbortSignal): Promise<string>;
}

export interface HttpChatProviderOptions {
  baseUrl: string;
  model: string;
  apiKey?: string;
  dispatcher?: Dispatcher;
  maxRetries?: number;
  retryDelayMs?: number;
}

function isRetriableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

class RetriableStatusError extends SummarizationError {}

/** JSON-over-HTTP chat backend. Retries throttling and server errors with linear backoff. */
export abstract class HttpChatProvider implements ChatProvider {
  abstract readonly id: string;
  protected readonly baseUrl: string;
  protected readonly model: string;
  protected readonly apiKey?: string;
  private readonly dispatcher?: Dispatcher;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(options: HttpChatProviderOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.model = options.model;
    this.apiKey = options.apiKey;
    this.dispatcher = options.dispatcher;
    this.maxRetries = options.maxRetries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 500;
  }

  abstract chat(messages: ChatMessage[], signal: AbortSignal): Promise<string>;

  protected async postJson<T>(path: string, payload: unknown, schema: ZodType<T>, signal: AbortSignal): Promise<T> {
    const endpoint = `${this.baseUrl}${path}`;
    const headers: Record<string, string> = { "content-type": "application/json" };
    if (this.apiKey) {
      headers.authorization = `Bearer ${this.apiKey}`;
    }

    let attempt = 0;
    while (true) {
      attempt += 1;
      try {
        return await this.postOnce(endpoint, headers, JSON.stringify(payload), schema, signal);
      } catch (error) {
        if (!(error instanceof RetriableStatusError) || attempt > this.maxRetries) {
          throw error;
        }
      }
      await sleep(this.retryDelayMs * attempt);
      signal.throwIfAborted();
    }
  }

  private async postOnce<T>(
    endpoint: string,
    headers: Record<string, string>,
    body: string,
    schema: ZodType<T>,
    signal: AbortSignal,
  ): Promise<T> {
    let responseText: string;
    let status: number;
    try {
      const response = await fetch(endpoint, { method: "POST", headers, body, signal, dispatcher: this.dispatcher });
      status = response.status;
      responseText = await response.text();
      if (!response.ok) {
        const message = `${this.id} returned HTTP ${status}: ${responseText.slice(0, 200)}`;
        if (isRetriableStatus(status)) {
          throw new RetriableStatusError(message, status);
        }
        throw new SummarizationError(message, status);
      }
    } catch (error) {
      if (error instanceof SummarizationError) {
        throw error;
      }
      throw new SummarizationError(`${this.id} request failed: ${errorMessage(error)}`, undefined, { cause: error });
    }

    let json: unknown;
    try {
      json = JSON.parse(responseText);
    } catch (error) {
      throw new SummarizationError(`${this.id} returned invalid JSON`, status, { cause: error });
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new SummarizationError(`${this.id} returned an unexpected response shape`, status);
    }
    return parsed.data;
  }
}
