export * from "./fetcher";
export * from "./robots";
export * from "./scrapeProcessor";
export * from "./sitemapIngestor";
export * from "./sitemapParser";
