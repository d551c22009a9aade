import { loadConfig } from "../config";
import { runSyncCommand, runYearsCommand } from "../core/commands";
import { errorMessage, SyncError } from "../core/errors";
import { createConsoleProgress, createRunId, Logger, MetricsRegistry } from "../observability";

export type CommandName = "sync" | "years";

export interface ParsedCliArgs {
  command: CommandName;
  targetPath?: string;
  configPath?: string;
  yearLabel?: string;
  username?: string;
  latest?: boolean;
  dryRun: boolean;
  debug: boolean;
  ignoreHttpsErrors: boolean;
}

const HELP_TEXT = `
Usage:
  catalog-sync <command> [path] [options]

Commands:
  sync [path]   Download new course documents into path (default: outputDir)
  years         List the academic years available to the account

Options:
  --config <path>        Optional path to JSON config file
  --year <label>         Academic year to sync (as listed by "years")
  --username <name>      Account name (overrides CATALOG_USERNAME)
  --latest               Pick the most recent academic year (default)
  --no-latest            Require --year when several years are available
  --dry-run              Resolve the files to download without downloading them
  --debug                Verbose logging, also written to debug.log
  --ignore-https-errors  Ignore TLS certificate errors (use only when required)
  -h, --help             Show this help

Credentials are read from CATALOG_USERNAME and CATALOG_PASSWORD.
A rejected login is not retried with the same credentials.
`;

const OPTIONS_WITH_VALUE = new Set(["--config", "--year", "--username"]);

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "sync" || raw === "years") {
    return raw;
  }
  return undefined;
}

function optionValue(argv: string[], name: string): string | undefined {
  const index = argv.indexOf(name);
  return index >= 0 ? argv[index + 1] : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const positionals: string[] = [];
  for (let index = 1; index < argv.length; index += 1) {
    const arg = argv[index];
    if (OPTIONS_WITH_VALUE.has(arg)) {
      index += 1;
      continue;
    }
    if (!arg.startsWith("--")) {
      positionals.push(arg);
    }
  }

  let latest: boolean | undefined;
  if (argv.includes("--latest")) {
    latest = true;
  }
  if (argv.includes("--no-latest")) {
    latest = false;
  }

  return {
    command,
    targetPath: positionals[0],
    configPath: optionValue(argv, "--config"),
    yearLabel: optionValue(argv, "--year"),
    username: optionValue(argv, "--username"),
    latest,
    dryRun: argv.includes("--dry-run"),
    debug: argv.includes("--debug"),
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
  };
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  let config = loadConfig(parsed.configPath);
  if (parsed.username !== undefined) {
    config = { ...config, username: parsed.username };
  }
  if (parsed.ignoreHttpsErrors) {
    config = { ...config, ignoreHttpsErrors: true };
  }
  if (parsed.debug) {
    config = { ...config, logLevel: "debug", logFilePath: config.logFilePath ?? "debug.log" };
  }

  const runId = createRunId();
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId, level: config.logLevel, filePath: config.logFilePath });
  const print = (line: string) => console.log(line);
  const context = { runId, config, logger, metrics, progress: createConsoleProgress(print), print };

  logger.info("command_start", {
    command: parsed.command,
    path: parsed.targetPath,
    year: parsed.yearLabel,
    dryRun: parsed.dryRun,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
  });

  try {
    switch (parsed.command) {
      case "sync":
        await runSyncCommand(
          { ...context, logger: logger.child("sync") },
          {
            targetPath: parsed.targetPath,
            yearLabel: parsed.yearLabel,
            autoSelectLatestYear: parsed.latest,
            dryRun: parsed.dryRun,
          },
        );
        break;
      case "years":
        await runYearsCommand({ ...context, logger: logger.child("years") });
        break;
      default:
        console.error(`Unsupported command: ${parsed.command}`);
        return 1;
    }

    logger.info("command_complete", { command: parsed.command });
    return 0;
  } catch (error) {
    logger.error("command_failed", {
      command: parsed.command,
      code: error instanceof SyncError ? error.code : undefined,
      error: errorMessage(error),
    });
    return 1;
  } finally {
    if (parsed.command === "sync") {
      metrics.printSummary(runId);
    }
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
