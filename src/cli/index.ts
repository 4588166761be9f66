import { AppConfig, loadConfig } from "../config";
import { ContentStore, SqliteContentStore } from "../content";
import {
  CommandContext,
  runDispatch,
  runPoll,
  runReconcile,
  runReset,
  runSeed,
  runShow,
  runStatus,
} from "../core/commands";
import { ConfigError } from "../core/errors";
import { isRecordFilter, RecordFilter } from "../dispatch";
import { createRunId, isLogLevel, Logger, MetricsRegistry } from "../observability";
import { createSink } from "../sink";
import { createStore, PublishingTrackerStore } from "../store";

export type CommandName = "seed" | "run" | "reconcile" | "poll" | "status" | "show" | "reset";

export interface ParsedCliArgs {
  command: CommandName;
  ignoreHttpsErrors: boolean;
  iterations?: number;
  intervalMinutes?: number;
  maxDocs?: number;
  maxPasses?: number;
  configPath?: string;
  inputPath?: string;
  doi?: string;
  filter?: RecordFilter;
}

export type CliParseResult = ParsedCliArgs | "help" | { error: string };

const HELP_TEXT = `
Usage:
  doi-acquire <command> [options]

Commands:
  seed --input <file>   Add DOIs (one per line) to the tracker
  run                   Dispatch workers over the backlog
  reconcile             Repair tracker state from files on disk and the content database
  poll                  Reconcile then run, repeatedly
  status [--filter f]   Print aggregate counts (filters: all, backlog, downloaded,
                        not-downloaded, exhausted, fully-processed, stalled)
  show --doi <doi>      Print one record and its event history
  reset --doi <doi>     Put one record back to its defaults

Options:
  --config <path>        Optional path to JSON config file
  --ignore-https-errors  Ignore TLS certificate errors (use only when required)
  --max-docs <n>         Limit passes in run/poll
  --max-passes <n>       Limit dispatch rounds in run
  --iterations <n>       Limit polling iterations (poll command)
  --interval-minutes <n> Override poll interval minutes
  -h, --help             Show this help
`;

const COMMANDS: readonly CommandName[] = ["seed", "run", "reconcile", "poll", "status", "show", "reset"];

function parseCommand(raw: string | undefined): CommandName | undefined {
  return COMMANDS.find((command) => command === raw);
}

function optionValue(argv: string[], name: string): string | undefined {
  const index = argv.indexOf(name);
  if (index < 0) {
    return undefined;
  }
  const value = argv[index + 1];
  return value && !value.startsWith("--") ? value : undefined;
}

function optionInt(argv: string[], name: string): number | undefined {
  const raw = optionValue(argv, name);
  const parsed = raw ? Number.parseInt(raw, 10) : undefined;
  return parsed !== undefined && Number.isFinite(parsed) ? parsed : undefined;
}

export function parseCliArgs(argv: string[]): CliParseResult {
  if (argv.includes("-h") || argv.includes("--help") || argv.length === 0) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return { error: `Unknown command: ${argv[0]}` };
  }

  const inputPath = optionValue(argv, "--input");
  const doi = optionValue(argv, "--doi");
  if (command === "seed" && !inputPath) {
    return { error: "seed requires --input <file>" };
  }
  if ((command === "show" || command === "reset") && !doi) {
    return { error: `${command} requires --doi <doi>` };
  }

  const rawFilter = optionValue(argv, "--filter");
  let filter: RecordFilter | undefined;
  if (rawFilter !== undefined) {
    if (!isRecordFilter(rawFilter)) {
      return { error: `Unknown filter: ${rawFilter}` };
    }
    filter = rawFilter;
  }

  return {
    command,
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
    maxDocs: optionInt(argv, "--max-docs"),
    maxPasses: optionInt(argv, "--max-passes"),
    iterations: optionInt(argv, "--iterations"),
    intervalMinutes: optionInt(argv, "--interval-minutes"),
    configPath: optionValue(argv, "--config"),
    inputPath,
    doi,
    filter,
  };
}

async function runCommand(parsed: ParsedCliArgs, context: CommandContext): Promise<void> {
  const { logger } = context;
  switch (parsed.command) {
    case "seed":
      await runSeed({ ...context, logger: logger.child("seed") }, parsed.inputPath ?? "");
      break;
    case "run":
      await runDispatch({ ...context, logger: logger.child("dispatch") }, parsed.maxDocs, parsed.maxPasses);
      break;
    case "reconcile":
      await runReconcile({ ...context, logger: logger.child("reconcile") });
      break;
    case "poll":
      await runPoll({ ...context, logger: logger.child("poll") }, parsed.maxDocs, parsed.iterations);
      break;
    case "status":
      await runStatus({ ...context, logger: logger.child("status") }, parsed.filter);
      break;
    case "show":
      await runShow({ ...context, logger: logger.child("show") }, parsed.doi);
      break;
    case "reset":
      await runReset({ ...context, logger: logger.child("reset") }, parsed.doi);
      break;
  }
}

function applyCliOverrides(config: AppConfig, parsed: ParsedCliArgs): AppConfig {
  let next = config;
  if (parsed.ignoreHttpsErrors) {
    next = { ...next, ignoreHttpsErrors: true };
  }
  if (parsed.intervalMinutes !== undefined) {
    next = { ...next, pollIntervalMinutes: parsed.intervalMinutes };
  }
  return next;
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }
  if ("error" in parsed) {
    console.error(parsed.error);
    console.error(HELP_TEXT.trim());
    return 1;
  }

  let config: AppConfig;
  try {
    config = applyCliOverrides(loadConfig(parsed.configPath), parsed);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`config error: ${error.message}`);
      return 1;
    }
    throw error;
  }

  const runId = createRunId();
  const rawLevel = process.env.LOG_LEVEL;
  const minLevel = isLogLevel(rawLevel) ? rawLevel : undefined;
  const logger = new Logger({ component: "cli", runId, minLevel });
  const metrics = new MetricsRegistry();
  const sink = createSink(config, runId, logger.child("sink"));
  const trackerStore = createStore(config);
  const store = new PublishingTrackerStore(trackerStore, sink, logger.child("events"));
  const contentStore: ContentStore | undefined = config.ingestContent ? new SqliteContentStore(config.contentDbPath) : undefined;

  logger.info("command_start", {
    command: parsed.command,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
    maxDocs: parsed.maxDocs,
    maxPasses: parsed.maxPasses,
    iterations: parsed.iterations,
    intervalMinutes: config.pollIntervalMinutes,
  });

  try {
    await runCommand(parsed, { runId, config, store, contentStore, logger, metrics });
    logger.info("command_complete", { command: parsed.command });
    return 0;
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error("command_usage_error", { command: parsed.command, error: error.message });
      return 1;
    }
    throw error;
  } finally {
    await store.close();
    await contentStore?.close();
    metrics.printSummary();
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
