import { XMLParser, XMLValidator } from "fast-xml-parser";
import { z } from "zod";
import { ParseSitemapError } from "../core/errors";
import { SitemapEntry } from "../types";

export type SitemapDocument =
  | { kind: "urlset"; entries: SitemapEntry[]; skipped: string[] }
  | { kind: "index"; sitemaps: string[]; skipped: string[] };

const xmlParser = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  removeNSPrefix: true,
  parseTagValue: false,
  trimValues: true,
  isArray: (name) => name === "sitemap" || name === "url",
});

// Elements without children come back as "" from the parser.
const locatedSchema = z.union([
  z
    .object({
      loc: z.string().optional(),
      lastmod: z.string().optional(),
    })
    .passthrough(),
  z.string(),
]);

const documentSchema = z
  .object({
    urlset: z.union([z.object({ url: z.array(locatedSchema).optional() }).passthrough(), z.string()]).optional(),
    sitemapindex: z
      .union([z.object({ sitemap: z.array(locatedSchema).optional() }).passthrough(), z.string()])
      .optional(),
  })
  .passthrough();

type Located = z.infer<typeof locatedSchema>;

/** Resolves a `<loc>` against the sitemap URL. Only http(s) targets are kept. */
export function resolveLocation(loc: string, sitemapUrl: string): string | undefined {
  try {
    const resolved = new URL(loc.trim(), sitemapUrl);
    if (resolved.protocol !== "http:" && resolved.protocol !== "https:") {
      return undefined;
    }
    resolved.hash = "";
    return resolved.toString();
  } catch {
    return undefined;
  }
}

/** W3C datetime values are normalized to ISO-8601 UTC so they compare as strings. */
export function normalizeLastmod(value: string | undefined): string | undefined {
  if (!value) {
    return undefined;
  }
  const timestamp = Date.parse(value.trim());
  return Number.isNaN(timestamp) ? undefined : new Date(timestamp).toISOString();
}

function collectLocations(items: Located[] | undefined, sitemapUrl: string) {
  const located: Array<{ url: string; lastmod?: string }> = [];
  const skipped: string[] = [];

  for (const item of items ?? []) {
    if (typeof item === "string" || !item.loc) {
      continue;
    }
    const url = resolveLocation(item.loc, sitemapUrl);
    if (!url) {
      skipped.push(item.loc);
      continue;
    }
    located.push({ url, lastmod: normalizeLastmod(item.lastmod) });
  }

  return { located, skipped };
}

const XML_PROLOG = /^\uFEFF?\s*(?:<\?xml[^>]*\?>)?\s*$/;

export function parseSitemapDocument(xml: string, sitemapUrl: string): SitemapDocument {
  // A blank body or a bare declaration lists nothing.
  if (XML_PROLOG.test(xml)) {
    return { kind: "urlset", entries: [], skipped: [] };
  }

  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line } = validation.err;
    throw new ParseSitemapError(sitemapUrl, `${msg} (line ${line})`);
  }

  const parsed = documentSchema.safeParse(xmlParser.parse(xml));
  if (!parsed.success) {
    throw new ParseSitemapError(sitemapUrl, `unexpected structure: ${parsed.error.issues[0]?.message ?? "unknown"}`);
  }

  const { urlset, sitemapindex } = parsed.data;
  if (urlset !== undefined) {
    const { located, skipped } = collectLocations(typeof urlset === "string" ? [] : urlset.url, sitemapUrl);
    return { kind: "urlset", entries: located, skipped };
  }

  if (sitemapindex !== undefined) {
    const { located, skipped } = collectLocations(
      typeof sitemapindex === "string" ? [] : sitemapindex.sitemap,
      sitemapUrl,
    );
    return { kind: "index", sitemaps: located.map((item) => item.url), skipped };
  }

  throw new ParseSitemapError(sitemapUrl, "root element is neither <urlset> nor <sitemapindex>");
}
