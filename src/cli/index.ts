import fs from "node:fs";
import { AppConfig, loadConfig } from "../config";
import {
  CommandContext,
  formatStats,
  runCompose,
  runParse,
  runScrape,
  runStatus,
  runSummarize,
} from "../core/commands";
import { Fetcher, HttpFetcher } from "../crawl";
import { InvalidArgumentError, errorMessage } from "../core/errors";
import { formatRunRecord } from "../core/stageRunner";
import { parseTargetSelector } from "../core/targets";
import { resolveExtractor, validateSelector } from "../extract";
import { Logger, MetricsRegistry, createRunId, levelFromVerbosity } from "../observability";
import { PageStore, createStore } from "../store";
import { ChatProvider, LlmSummarizer, ProviderSpec, createChatProvider, parseProviderUri } from "../summarize";
import { ParsedCliArgs, getHelpText, parseCliArgs } from "./args";

export { CliUsageError, getHelpText, parseCliArgs } from "./args";
export type { CommandArgs, CommandName, ParsedCliArgs } from "./args";

/** Seams for tests: where output goes and which collaborators talk to the network. */
export interface CliDependencies {
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
  env?: NodeJS.ProcessEnv;
  createFetcher?: (config: AppConfig) => Fetcher;
  createChatProvider?: (providerSpec: ProviderSpec, config: AppConfig) => ChatProvider;
}

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_USAGE = 2;

function applyFlags(config: AppConfig, parsed: ParsedCliArgs): AppConfig {
  let next = config;
  if (parsed.ignoreHttpsErrors) {
    next = { ...next, ignoreHttpsErrors: true };
  }
  if (parsed.command === "scrape") {
    next = {
      ...next,
      scrapeDelayMs: parsed.delayMs ?? next.scrapeDelayMs,
      scrapeConcurrency: parsed.concurrency ?? next.scrapeConcurrency,
    };
  }
  if (parsed.command === "summarize") {
    next = { ...next, summarizeConcurrency: parsed.concurrency ?? next.summarizeConcurrency };
  }
  return next;
}

function readPromptFile(promptFile: string): string {
  try {
    return fs.readFileSync(promptFile, "utf-8");
  } catch (error) {
    throw new InvalidArgumentError(`Unable to read prompt file ${promptFile}: ${errorMessage(error)}`);
  }
}

type CommandRunner = (context: CommandContext) => Promise<void>;

/**
 * Validates the arguments and builds the collaborators of one command. Nothing
 * touches the store until the returned runner is called.
 */
function prepareCommand(
  parsed: ParsedCliArgs,
  config: AppConfig,
  deps: CliDependencies,
  stdout: (line: string) => void,
): CommandRunner {
  switch (parsed.command) {
    case "scrape": {
      const target = parseTargetSelector(parsed.target);
      const fetcher = deps.createFetcher?.(config) ?? new HttpFetcher(config);
      return async (context) => {
        const { record } = await runScrape(
          { ...context, logger: context.logger.child("scrape") },
          { sitemapUrl: parsed.sitemapUrl, fetcher, target, prune: parsed.prune },
        );
        stdout(formatRunRecord(record));
      };
    }
    case "parse": {
      const target = parseTargetSelector(parsed.target);
      const extractor = resolveExtractor(parsed.textBy);
      if (parsed.selector !== undefined) {
        validateSelector(parsed.selector);
      }
      return async (context) => {
        const record = await runParse(
          { ...context, logger: context.logger.child("parse") },
          { extractor, target, selector: parsed.selector, ignorePrerequisites: parsed.ignorePrerequisites },
        );
        stdout(formatRunRecord(record));
      };
    }
    case "summarize": {
      const target = parseTargetSelector(parsed.target);
      const providerSpec = parseProviderUri(parsed.providerUri);
      const provider = deps.createChatProvider?.(providerSpec, config) ?? createChatProvider(providerSpec, config);
      const template = parsed.promptFile ? readPromptFile(parsed.promptFile) : undefined;
      return async (context) => {
        const record = await runSummarize(
          { ...context, logger: context.logger.child("summarize") },
          {
            summarizer: new LlmSummarizer(provider, template),
            providerUri: providerSpec.uri,
            target,
            requestsPerMinute: parsed.rpm,
            ignorePrerequisites: parsed.ignorePrerequisites,
          },
        );
        stdout(formatRunRecord(record));
      };
    }
    case "compose":
      return async (context) => {
        const result = await runCompose(
          { ...context, logger: context.logger.child("compose") },
          { outputPath: parsed.outputPath, title: parsed.title, description: parsed.description },
        );
        stdout(`compose: pages=${result.pagesComposed} output=${result.outputPath}`);
      };
    case "status":
      return async (context) => {
        const stats = await runStatus({ ...context, logger: context.logger.child("status") });
        for (const line of formatStats(stats)) {
          stdout(line);
        }
      };
  }
}

/**
 * Runs one command and resolves to the process exit code. Page failures still
 * exit 0; usage errors exit 2 and anything that aborted the command exits 1.
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const stdout = deps.stdout ?? ((line: string) => console.log(line));
  const stderr = deps.stderr ?? ((line: string) => console.error(line));

  let parsed: ParsedCliArgs | "help";
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    stderr(`error: ${errorMessage(error)}`);
    stderr(getHelpText());
    return EXIT_USAGE;
  }
  if (parsed === "help") {
    stdout(getHelpText());
    return EXIT_OK;
  }

  const runId = createRunId(parsed.command);
  const logger = new Logger({ component: "cli", runId }, { level: levelFromVerbosity(parsed.verbosity), write: stderr });
  const metrics = new MetricsRegistry();

  let store: PageStore | undefined;
  try {
    const config = applyFlags(loadConfig(parsed.configPath, deps.env), parsed);
    const runCommand = prepareCommand(parsed, config, deps, stdout);
    store = createStore(parsed.storePath);
    logger.info("command_start", { command: parsed.command, storePath: parsed.storePath });

    await runCommand({ runId, config, store, logger, metrics });

    logger.info("command_complete", { command: parsed.command });
    return EXIT_OK;
  } catch (error) {
    stderr(`error: ${errorMessage(error)}`);
    if (error instanceof InvalidArgumentError) {
      stderr(getHelpText());
      return EXIT_USAGE;
    }
    logger.error("command_failed", { command: parsed.command, error: errorMessage(error) });
    return EXIT_FATAL;
  } finally {
    await store?.close();
    metrics.logSummary(logger);
  }
}
