import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { InvalidArgumentError, errorMessage } from "../core/errors";
import { AppConfig, ConfigOverrides } from "./types";

export const MODEL_API_KEY_ENV_NAME = "SITEDIGEST_MODEL_API_KEY";

const DEFAULT_CONFIG: AppConfig = {
  userAgent: "sitedigest/0.1 (+llms.txt builder)",
  ignoreHttpsErrors: false,
  respectRobotsTxt: true,
  requestTimeoutMs: 20_000,
  parseTimeoutMs: 30_000,
  summarizeTimeoutMs: 180_000,
  scrapeDelayMs: 1_000,
  scrapeConcurrency: 1,
  summarizeConcurrency: 1,
  providers: {
    ollamaBaseUrl: "http://127.0.0.1:11434",
    openaiBaseUrl: "https://api.openai.com/v1",
    openrouterBaseUrl: "https://openrouter.ai/api/v1",
  },
  modelApiKey: undefined,
};

const configFileSchema = z
  .object({
    userAgent: z.string(),
    ignoreHttpsErrors: z.boolean(),
    respectRobotsTxt: z.boolean(),
    requestTimeoutMs: z.number().int().positive(),
    parseTimeoutMs: z.number().int().positive(),
    summarizeTimeoutMs: z.number().int().positive(),
    scrapeDelayMs: z.number().int().nonnegative(),
    scrapeConcurrency: z.number().int().positive(),
    summarizeConcurrency: z.number().int().positive(),
    providers: z
      .object({
        ollamaBaseUrl: z.string().url(),
        openaiBaseUrl: z.string().url(),
        openrouterBaseUrl: z.string().url(),
      })
      .partial(),
    modelApiKey: z.string(),
  })
  .partial()
  .strict();

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new InvalidArgumentError(`Config file not found: ${absolutePath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(absolutePath, "utf-8"));
  } catch (error) {
    throw new InvalidArgumentError(`Config file ${absolutePath} is not valid JSON: ${errorMessage(error)}`);
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Config file ${absolutePath} is invalid: ${parsed.error.message}`);
  }
  return parsed.data;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    providers: {
      ...DEFAULT_CONFIG.providers,
      ...(fileConfig.providers ?? {}),
    },
  };

  return {
    ...merged,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    respectRobotsTxt: toBool(env.RESPECT_ROBOTS_TXT, merged.respectRobotsTxt),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    parseTimeoutMs: toInt(env.PARSE_TIMEOUT_MS, merged.parseTimeoutMs),
    summarizeTimeoutMs: toInt(env.SUMMARIZE_TIMEOUT_MS, merged.summarizeTimeoutMs),
    scrapeDelayMs: toInt(env.SCRAPE_DELAY_MS, merged.scrapeDelayMs),
    scrapeConcurrency: toInt(env.SCRAPE_CONCURRENCY, merged.scrapeConcurrency),
    summarizeConcurrency: toInt(env.SUMMARIZE_CONCURRENCY, merged.summarizeConcurrency),
    providers: {
      ollamaBaseUrl: env.OLLAMA_BASE_URL ?? merged.providers.ollamaBaseUrl,
      openaiBaseUrl: env.OPENAI_BASE_URL ?? merged.providers.openaiBaseUrl,
      openrouterBaseUrl: env.OPENROUTER_BASE_URL ?? merged.providers.openrouterBaseUrl,
    },
    modelApiKey: env[MODEL_API_KEY_ENV_NAME] ?? merged.modelApiKey,
  };
}

export { DEFAULT_CONFIG };
