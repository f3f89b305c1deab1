import { InvalidArgumentError } from "../core/errors";

export type CommandName = "scrape" | "parse" | "summarize" | "compose" | "status";

export type CommandArgs =
  | {
      command: "scrape";
      sitemapUrl: string;
      storePath: string;
      target?: string;
      delayMs?: number;
      concurrency?: number;
      prune: boolean;
    }
  | {
      command: "parse";
      storePath: string;
      textBy?: string;
      target?: string;
      selector?: string;
      ignorePrerequisites: boolean;
    }
  | {
      command: "summarize";
      storePath: string;
      providerUri: string;
      target?: string;
      promptFile?: string;
      rpm?: number;
      concurrency?: number;
      ignorePrerequisites: boolean;
    }
  | {
      command: "compose";
      storePath: string;
      outputPath: string;
      title?: string;
      description?: string;
    }
  | {
      command: "status";
      storePath: string;
    };

export type ParsedCliArgs = CommandArgs & {
  verbosity: number;
  configPath?: string;
  ignoreHttpsErrors: boolean;
};

/** Bad command line; reported with the usage text. */
export class CliUsageError extends InvalidArgumentError {}

export const DEFAULT_VERBOSITY = 2;

const HELP_TEXT = `
Usage:
  sitedigest <command> [options]

Commands:
  scrape <sitemap_url> <store_path>   Ingest a sitemap and fetch page bodies
      --target <url|all>              Re-fetch one page or every page
      --delay <ms>                    Pause between requests (default 1000)
      --concurrency <n>               Parallel requests (default 1)
      --prune                         Drop pages the sitemap no longer lists
  parse <store_path>                  Extract title and text from fetched bodies
      --text-by <method>              readability (default) or markdown
      --selector <css>                Only extract from matching elements
      --target <url|all>
      --ignore-prerequisites
  summarize <store_path> <provider>   Summarize parsed text, e.g. ollama://8b@qwen3
      --prompt-file <path>            Template with {url} and {text} placeholders
      --rpm <n>                       At most n requests per minute
      --concurrency <n>
      --target <url|all>
      --ignore-prerequisites
  compose <store_path> <output_path>  Write the llms.txt digest
      --title <text>
      --description <text>
  status <store_path>                 Per-stage page counts

Options:
  --config <path>          Optional path to JSON config file
  --ignore-https-errors    Ignore TLS certificate errors (use only when required)
  -v, -vv, ...             Verbosity: error (0), warn (1), info (2), debug (3), trace (4)
  --verbose <n>            Same as repeating -v n times
  -h, --help               Show this help
`;

const VALUE_FLAGS = new Set([
  "target",
  "delay",
  "concurrency",
  "text-by",
  "selector",
  "prompt-file",
  "rpm",
  "title",
  "description",
  "config",
  "verbose",
]);

const BOOLEAN_FLAGS = new Set(["prune", "ignore-prerequisites", "ignore-https-errors"]);

const GLOBAL_FLAGS = new Set(["config", "verbose", "ignore-https-errors"]);

const COMMAND_FLAGS: Record<CommandName, Set<string>> = {
  scrape: new Set(["target", "delay", "concurrency", "prune"]),
  parse: new Set(["text-by", "target", "selector", "ignore-prerequisites"]),
  summarize: new Set(["target", "prompt-file", "rpm", "concurrency", "ignore-prerequisites"]),
  compose: new Set(["title", "description"]),
  status: new Set(),
};

const POSITIONALS: Record<CommandName, string[]> = {
  scrape: ["sitemap_url", "store_path"],
  parse: ["store_path"],
  summarize: ["store_path", "provider_uri"],
  compose: ["store_path", "output_path"],
  status: ["store_path"],
};

interface RawArgs {
  positionals: string[];
  values: Map<string, string>;
  switches: Set<string>;
  vCount: number;
}

function isCommand(raw: string | undefined): raw is CommandName {
  return raw === "scrape" || raw === "parse" || raw === "summarize" || raw === "compose" || raw === "status";
}

function tokenize(argv: string[]): RawArgs {
  const raw: RawArgs = { positionals: [], values: new Map(), switches: new Set(), vCount: 0 };

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];

    if (/^-v+$/.test(token)) {
      raw.vCount += token.length - 1;
      continue;
    }

    if (!token.startsWith("--") || token === "--") {
      if (token.startsWith("-") && token !== "-") {
        throw new CliUsageError(`Unknown option ${token}`);
      }
      raw.positionals.push(token);
      continue;
    }

    const equalsAt = token.indexOf("=");
    const name = equalsAt >= 0 ? token.slice(2, equalsAt) : token.slice(2);
    if (BOOLEAN_FLAGS.has(name)) {
      if (equalsAt >= 0) {
        throw new CliUsageError(`Option --${name} takes no value`);
      }
      raw.switches.add(name);
      continue;
    }
    if (!VALUE_FLAGS.has(name)) {
      throw new CliUsageError(`Unknown option --${name}`);
    }

    let value: string | undefined;
    if (equalsAt >= 0) {
      value = token.slice(equalsAt + 1);
    } else {
      value = argv[index + 1];
      index += 1;
    }
    if (value === undefined) {
      throw new CliUsageError(`Option --${name} needs a value`);
    }
    raw.values.set(name, value);
  }

  return raw;
}

function parseCount(name: string, value: string | undefined, min: number): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new CliUsageError(`Option --${name} must be an integer >= ${min}, got "${value}"`);
  }
  return parsed;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help") || argv.length === 0 || argv[0] === "help") {
    return "help";
  }

  const [commandRaw, ...rest] = argv;
  if (!isCommand(commandRaw)) {
    throw new CliUsageError(`Unknown command "${commandRaw}"`);
  }
  const command = commandRaw;
  const raw = tokenize(rest);

  const allowed = COMMAND_FLAGS[command];
  for (const name of [...raw.values.keys(), ...raw.switches]) {
    if (!allowed.has(name) && !GLOBAL_FLAGS.has(name)) {
      throw new CliUsageError(`Option --${name} does not apply to ${command}`);
    }
  }

  const expected = POSITIONALS[command];
  if (raw.positionals.length !== expected.length) {
    throw new CliUsageError(`${command} expects ${expected.map((name) => `<${name}>`).join(" ")}`);
  }

  const verbose = parseCount("verbose", raw.values.get("verbose"), 0);
  const common = {
    verbosity: raw.vCount > 0 ? raw.vCount : (verbose ?? DEFAULT_VERBOSITY),
    configPath: raw.values.get("config"),
    ignoreHttpsErrors: raw.switches.has("ignore-https-errors"),
  };
  const [first, second] = raw.positionals;
  const target = raw.values.get("target");

  switch (command) {
    case "scrape":
      return {
        ...common,
        command,
        sitemapUrl: first,
        storePath: second,
        target,
        delayMs: parseCount("delay", raw.values.get("delay"), 0),
        concurrency: parseCount("concurrency", raw.values.get("concurrency"), 1),
        prune: raw.switches.has("prune"),
      };
    case "parse":
      return {
        ...common,
        command,
        storePath: first,
        textBy: raw.values.get("text-by"),
        target,
        selector: raw.values.get("selector"),
        ignorePrerequisites: raw.switches.has("ignore-prerequisites"),
      };
    case "summarize":
      return {
        ...common,
        command,
        storePath: first,
        providerUri: second,
        target,
        promptFile: raw.values.get("prompt-file"),
        rpm: parseCount("rpm", raw.values.get("rpm"), 1),
        concurrency: parseCount("concurrency", raw.values.get("concurrency"), 1),
        ignorePrerequisites: raw.switches.has("ignore-prerequisites"),
      };
    case "compose":
      return {
        ...common,
        command,
        storePath: first,
        outputPath: second,
        title: raw.values.get("title"),
        description: raw.values.get("description"),
      };
    case "status":
      return { ...common, command, storePath: first };
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
