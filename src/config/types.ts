export interface ProviderEndpoints {
  ollamaBaseUrl: string;
  openaiBaseUrl: string;
  openrouterBaseUrl: string;
}

export interface AppConfig {
  userAgent: string;
  ignoreHttpsErrors: boolean;
  respectRobotsTxt: boolean;
  requestTimeoutMs: number;
  parseTimeoutMs: number;
  summarizeTimeoutMs: number;
  scrapeDelayMs: number;
  scrapeConcurrency: number;
  summarizeConcurrency: number;
  providers: ProviderEndpoints;
  modelApiKey?: string;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "providers">> & {
  providers?: Partial<ProviderEndpoints>;
};
