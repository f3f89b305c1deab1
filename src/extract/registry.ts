import { InvalidArgumentError } from "../core/errors";
import { MarkdownExtractor } from "./markdownExtractor";
import { ReadabilityExtractor } from "./readabilityExtractor";
import { Extractor } from "./types";

export const DEFAULT_EXTRACTOR = "readability";

const FACTORIES: Record<string, () => Extractor> = {
  readability: () => new ReadabilityExtractor(),
  markdown: () => new MarkdownExtractor(),
};

const ALIASES: Record<string, string> = {
  dom_smoothie: "readability",
  fast_html2md: "markdown",
  html2md: "markdown",
};

export function listExtractors(): string[] {
  return [...Object.keys(FACTORIES), ...Object.keys(ALIASES)];
}

export function resolveExtractor(name: string = DEFAULT_EXTRACTOR): Extractor {
  const normalized = name.trim().toLowerCase();
  const canonical = ALIASES[normalized] ?? normalized;
  const factory = FACTORIES[canonical];
  if (!factory) {
    throw new InvalidArgumentError(`Unknown text extraction method "${name}" (expected one of: ${listExtractors().join(", ")})`);
  }
  return factory();
}
