import { loadConfig, type AppConfig } from "../config";
import { runIngest, runStatus, runValidate } from "../core/commands";
import { ConfigurationError, ValidationError } from "../core/errors";
import { createRunId, errorMessage, Logger, MetricsRegistry } from "../observability";
import { createSink } from "../sink";
import { createStore } from "../store";

export type CommandName = "ingest" | "validate" | "status";

export interface ParsedCliArgs {
  command: CommandName;
  jobPath?: string;
  configPath?: string;
  ignoreHttpsErrors: boolean;
}

const HELP_TEXT = `
Usage:
  doc-ingest <command> [options]

Commands:
  ingest --job <path>    Run an ingestion job
  validate --job <path>  Validate a job file without running it
  status                 Show run history statistics

Options:
  --job <path>     Path to the JSON job file
  --config <path>  Optional path to JSON config file
  --ignore-https-errors  Ignore TLS certificate errors (use only when required)
  -h, --help       Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "ingest" || raw === "validate" || raw === "status") {
    return raw;
  }
  return undefined;
}

function optionValue(argv: string[], name: string): string | undefined {
  const index = argv.indexOf(name);
  const value = index >= 0 ? argv[index + 1] : undefined;
  return value && !value.startsWith("--") ? value : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const jobPath = optionValue(argv, "--job");
  if (command !== "status" && !jobPath) {
    return "help";
  }

  return {
    command,
    jobPath,
    configPath: optionValue(argv, "--config"),
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
  };
}

function isUsageError(error: unknown): boolean {
  return error instanceof ValidationError || error instanceof ConfigurationError;
}

export async function runCli(argv: string[], signal?: AbortSignal): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  let config: AppConfig;
  try {
    config = loadConfig(parsed.configPath);
  } catch (error) {
    console.error(`config error: ${errorMessage(error)}`);
    return 1;
  }
  if (parsed.ignoreHttpsErrors) {
    config = {
      ...config,
      ignoreHttpsErrors: true,
    };
  }

  const runId = createRunId();
  const store = createStore(config);
  const sink = createSink(config.sink);
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId });
  const context = { runId, config, store, sink, logger, metrics };

  logger.info("command_start", {
    command: parsed.command,
    jobPath: parsed.jobPath,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
  });

  try {
    switch (parsed.command) {
      case "ingest": {
        await runIngest({ ...context, logger: logger.child("ingest") }, parsed.jobPath ?? "", signal);
        break;
      }
      case "validate": {
        const valid = await runValidate({ ...context, logger: logger.child("validate") }, parsed.jobPath ?? "");
        if (!valid) {
          return 1;
        }
        break;
      }
      case "status":
        await runStatus({ ...context, logger: logger.child("status") });
        break;
    }

    logger.info("command_complete", { command: parsed.command });
    return 0;
  } catch (error) {
    if (!isUsageError(error)) {
      throw error;
    }
    logger.error("command_rejected", { command: parsed.command, error: errorMessage(error) });
    return 1;
  } finally {
    await store.close();
    if (parsed.command === "ingest") {
      metrics.printSummary();
    }
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
