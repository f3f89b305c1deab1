import { load } from "cheerio";
import { ExtractionError, InvalidArgumentError, errorMessage } from "../core/errors";

function sanitizeTitle(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/** First non-empty of `<title>`, `<h1>`, `<h2>`. */
export function parseTitle(html: string): string | undefined {
  const $ = load(html);
  for (const tag of ["title", "h1", "h2"]) {
    const text = sanitizeTitle($(tag).first().text());
    if (text) {
      return text;
    }
  }
  return undefined;
}

export function validateSelector(selector: string): void {
  try {
    load("<html></html>")(selector);
  } catch (error) {
    throw new InvalidArgumentError(`Invalid CSS selector "${selector}": ${errorMessage(error)}`);
  }
}

/** Outer HTML of every element matching `selector`, joined by newlines. */
export function narrowHtml(html: string, selector: string): string {
  const $ = load(html);
  const fragments = $(selector)
    .toArray()
    .map((element) => $.html(element));

  if (fragments.length === 0) {
    throw new ExtractionError(`Selector "${selector}" matched nothing`);
  }
  return fragments.join("\n");
}

const NOISE_SELECTORS = ["script", "style", "noscript", "template", "iframe", "svg"];

export function stripNoise(html: string): string {
  const $ = load(html);
  $(NOISE_SELECTORS.join(", ")).remove();
  return $("body").html() ?? $.html();
}
