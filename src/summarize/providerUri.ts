import { InvalidArgumentError } from "../core/errors";

export type ProviderBackend = "ollama" | "openai" | "openrouter";

const BACKENDS: readonly ProviderBackend[] = ["ollama", "openai", "openrouter"];

export interface ProviderSpec {
  backend: ProviderBackend;
  model: string;
  /** The URI as given; recorded as the method tag of summaries. */
  uri: string;
}

const PROVIDER_URI_PATTERN = /^([a-z][a-z0-9+.-]*):\/\/(?:([^@/]+)@)?([^/@]+)(\/[^@]*)?$/i;

function isBackend(value: string): value is ProviderBackend {
  return BACKENDS.some((backend) => backend === value);
}

/**
 * Parses `backend://[variant@]model[/path]`. The variant is appended as a tag,
 * so `ollama://8b@qwen3` selects model `qwen3:8b`, and a path keeps vendor
 * prefixes such as `openrouter://meta-llama/llama-3.1-8b-instruct`.
 */
export function parseProviderUri(uri: string): ProviderSpec {
  const match = PROVIDER_URI_PATTERN.exec(uri.trim());
  if (!match) {
    throw new InvalidArgumentError(`Invalid provider URI "${uri}" (expected backend://[variant@]model)`);
  }

  const [, scheme, variant, host, path] = match;
  const backend = scheme.toLowerCase();
  if (!isBackend(backend)) {
    throw new InvalidArgumentError(`Unknown model backend "${scheme}" (expected one of: ${BACKENDS.join(", ")})`);
  }

  const name = `${host}${path ?? ""}`.replace(/\/+$/, "");
  if (!name) {
    throw new InvalidArgumentError(`Provider URI "${uri}" names no model`);
  }

  return {
    backend,
    model: variant ? `${name}:${variant}` : name,
    uri: uri.trim(),
  };
}
