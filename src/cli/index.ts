import { loadConfig, type AppConfig } from "../config";
import { runRebuildRates, runStatus, runWatch, type CommandContext } from "../core/commands";
import { errorMessage, exitCodeFor, WatcherError } from "../core/errors";
import type { FetchFn } from "../core/fetch";
import type { PdfParserFactory } from "../extract/pdfText";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { createSink } from "../sink";
import { createStore, type RecordStore } from "../store";

export type CommandName = "run" | "status" | "rebuild-rates";

export interface ParsedCliArgs {
  command: CommandName;
  dryRun: boolean;
  ignoreHttpsErrors: boolean;
  configPath?: string;
}

export interface CliOptions {
  env?: Record<string, string | undefined>;
  fetchFn?: FetchFn;
  parserFactory?: PdfParserFactory;
  now?: () => Date;
}

const HELP_TEXT = `
Usage:
  forex-rates-watcher <command> [options]

Commands:
  run            Fetch the rate sheet once and save it if it is new
  status         Show the last saved sheet
  rebuild-rates  Regenerate the per-currency CSV files from saved sheets

Options:
  --config <path>        Optional path to JSON config file
  --dry-run              Fetch and classify without writing anything (run)
  --ignore-https-errors  Ignore TLS certificate errors (use only when required)
  -h, --help             Show this help

Exit codes:
  0 success, 1 configuration or unexpected error, 2 fetch failed, 3 persistence failed
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "run" || raw === "status" || raw === "rebuild-rates") {
    return raw;
  }
  return undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  let configPath: string | undefined;
  const configIndex = argv.indexOf("--config");
  if (configIndex >= 0 && argv[configIndex + 1]) {
    configPath = argv[configIndex + 1];
  }

  return {
    command,
    dryRun: argv.includes("--dry-run"),
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
    configPath,
  };
}

function applyFlags(config: AppConfig, parsed: ParsedCliArgs): AppConfig {
  if (!parsed.ignoreHttpsErrors) {
    return config;
  }
  return { ...config, ignoreHttpsErrors: true };
}

export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const runId = createRunId();
  let config: AppConfig;
  try {
    config = applyFlags(loadConfig(parsed.configPath, options.env ?? process.env), parsed);
  } catch (error) {
    new Logger({ component: "cli", runId }).error("config_invalid", { error: errorMessage(error) });
    return exitCodeFor(error);
  }

  const logger = new Logger({ component: "cli", runId, filePath: config.logFilePath });
  const metrics = new MetricsRegistry();

  logger.info("command_start", {
    command: parsed.command,
    dryRun: parsed.dryRun,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
    storeMode: config.storeMode,
    noveltyPolicy: config.noveltyPolicy,
  });

  let store: RecordStore;
  try {
    store = createStore(config);
  } catch (error) {
    logger.error("command_failed", { command: parsed.command, error: errorMessage(error) });
    return exitCodeFor(error);
  }

  const context: CommandContext = {
    runId,
    config,
    store,
    logger,
    metrics,
    sink: createSink(config),
    fetchFn: options.fetchFn,
    parserFactory: options.parserFactory,
    now: options.now,
  };

  try {
    switch (parsed.command) {
      case "run":
        await runWatch({ ...context, logger: logger.child("watch") }, parsed.dryRun);
        break;
      case "status":
        await runStatus({ ...context, logger: logger.child("status") });
        break;
      case "rebuild-rates":
        await runRebuildRates({ ...context, logger: logger.child("rebuild_rates") });
        break;
    }

    logger.info("command_complete", { command: parsed.command });
    return 0;
  } catch (error) {
    logger.error("command_failed", {
      command: parsed.command,
      error: errorMessage(error),
      code: error instanceof WatcherError ? error.code : "unexpected",
    });
    return exitCodeFor(error);
  } finally {
    await store.close();
    metrics.logSummary(logger);
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
