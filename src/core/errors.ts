/**
 * Errors raised by the pipeline. Per-page stage errors are recorded against the
 * page and the run continues; fatal errors abort the whole command.
 */
export abstract class PipelineError extends Error {
  abstract readonly fatal: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class FetchError extends PipelineError {
  readonly fatal = false;
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.statusCode = statusCode;
  }
}

export class ExtractionError extends PipelineError {
  readonly fatal = false;
}

export class SummarizationError extends PipelineError {
  readonly fatal = false;
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.statusCode = statusCode;
  }
}

export class StageTimeoutError extends PipelineError {
  readonly fatal = false;

  constructor(readonly timeoutMs: number) {
    super(`timed out after ${timeoutMs}ms`);
  }
}

export class ParseSitemapError extends PipelineError {
  readonly fatal = true;

  constructor(
    readonly sitemapUrl: string,
    reason: string,
  ) {
    super(`Invalid sitemap ${sitemapUrl}: ${reason}`);
  }
}

export class UnknownTargetError extends PipelineError {
  readonly fatal = true;

  constructor(readonly url: string) {
    super(`Target ${url} was never discovered by a sitemap ingestion`);
  }
}

export class StoreIOError extends PipelineError {
  readonly fatal = true;
}

export class InvariantViolationError extends PipelineError {
  readonly fatal = true;
}

export class InvalidArgumentError extends PipelineError {
  readonly fatal = true;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Errors thrown by collaborators that are not pipeline errors count as per-page failures. */
export function isFatalError(error: unknown): boolean {
  if (error instanceof PipelineError) {
    return error.fatal;
  }
  return false;
}
