export * from "./htmlParser";
export * from "./markdownExtractor";
export * from "./parseProcessor";
export * from "./readabilityExtractor";
export * from "./registry";
export * from "./types";
