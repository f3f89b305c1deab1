export * from "./chatProvider";
export * from "./ollamaProvider";
export * from "./openAiProvider";
export * from "./prompt";
export * from "./providerFactory";
export * from "./providerUri";
export * from "./summarizer";
