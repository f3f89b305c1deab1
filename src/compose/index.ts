export * from "./llmsTxtComposer";
export * from "./types";
export * from "./writeArtifact";
