import { Dispatcher, fetch } from "undici";
import { AppConfig } from "../config";
import { FetchError, errorMessage } from "../core/errors";
import { createRequestSignal, getFetchDispatcher } from "../core/fetch";

export interface FetchedDocument {
  url: string;
  finalUrl: string;
  statusCode: number;
  contentType?: string;
  body: string;
}

export interface Fetcher {
  /** Recorded as the method tag of scrape outputs. */
  readonly id: string;
  fetchText(url: string, signal?: AbortSignal): Promise<FetchedDocument>;
}

export interface HttpFetcherOptions {
  dispatcher?: Dispatcher;
}

function describeFailure(error: unknown): string {
  const message = errorMessage(error);
  if (error instanceof Error && error.cause instanceof Error) {
    return `${message} (${error.cause.message})`;
  }
  return message;
}

export class HttpFetcher implements Fetcher {
  readonly id = "http";
  private readonly config: AppConfig;
  private readonly dispatcher?: Dispatcher;

  constructor(config: AppConfig, options: HttpFetcherOptions = {}) {
    this.config = config;
    this.dispatcher = options.dispatcher ?? getFetchDispatcher(config.ignoreHttpsErrors);
  }

  async fetchText(url: string, signal?: AbortSignal): Promise<FetchedDocument> {
    const request = createRequestSignal(this.config.requestTimeoutMs, signal);

    try {
      const response = await fetch(url, {
        method: "GET",
        headers: {
          "user-agent": this.config.userAgent,
          accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
        },
        dispatcher: this.dispatcher,
        signal: request.signal,
        redirect: "follow",
      });

      if (!response.ok) {
        await response.body?.cancel();
        throw new FetchError(`HTTP ${response.status} while fetching ${url}`, response.status);
      }

      return {
        url,
        finalUrl: response.url || url,
        statusCode: response.status,
        contentType: response.headers.get("content-type") ?? undefined,
        body: await response.text(),
      };
    } catch (error) {
      if (error instanceof FetchError) {
        throw error;
      }
      throw new FetchError(`Request to ${url} failed: ${describeFailure(error)}`, undefined, { cause: error });
    } finally {
      request.dispose();
    }
  }
}
