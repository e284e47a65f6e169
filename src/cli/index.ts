import { AppConfig, loadConfig, validateConfig } from "../config";
import { runOnce, runSchedule, runStatus } from "../core/commands";
import { buildHarvesters } from "../harvest/registry";
import { describeError, isLogLevel, Logger } from "../observability";
import { LogLevel } from "../observability/types";
import { createStore } from "../store";

export type CommandName = "run" | "schedule" | "status";

export interface ParsedCliArgs {
  command: CommandName;
  configPath?: string;
  root?: string;
  days?: number;
  weekday?: number;
  hour?: number;
  minute?: number;
  everyHour: boolean;
  once: boolean;
  logDir?: string;
  logLevel?: LogLevel;
  ignoreHttpsErrors: boolean;
}

const HELP_TEXT = `
Usage:
  harvest-ledger <command> [options]

Commands:
  run              Harvest the current window once and exit
  schedule         Run weekly (or hourly with --every-hour) until interrupted
  status           Show stored document and attachment counts per source

Options:
  --config <path>      Optional path to JSON config file
  --root <dir>         Storage root folder (default: data)
  --days <n>           Window size in days (default: 7)
  --weekday <0-6>      Weekly run day, 0=Mon ... 6=Sun (default: 0)
  --hour <0-23>        Weekly run hour (default: 9)
  --minute <0-59>      Weekly run minute (default: 0)
  --every-hour         Run every hour on the hour (testing / high frequency)
  --once               With schedule: run immediately once and exit
  --log-dir <dir>      Log directory (default: logs)
  --log-level <level>  debug, info, warn or error (default: info)
  --ignore-https-errors  Ignore TLS certificate errors (use only when required)
  -h, --help           Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "run" || raw === "schedule" || raw === "status") {
    return raw;
  }
  return undefined;
}

function stringOption(argv: string[], name: string): string | undefined {
  const index = argv.indexOf(name);
  return index >= 0 ? argv[index + 1] : undefined;
}

function intOption(argv: string[], name: string): number | undefined {
  const raw = stringOption(argv, name);
  const parsed = raw ? Number.parseInt(raw, 10) : undefined;
  return parsed !== undefined && Number.isFinite(parsed) ? parsed : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const logLevelRaw = stringOption(argv, "--log-level")?.toLowerCase();
  return {
    command,
    configPath: stringOption(argv, "--config"),
    root: stringOption(argv, "--root"),
    days: intOption(argv, "--days"),
    weekday: intOption(argv, "--weekday"),
    hour: intOption(argv, "--hour"),
    minute: intOption(argv, "--minute"),
    everyHour: argv.includes("--every-hour"),
    once: argv.includes("--once"),
    logDir: stringOption(argv, "--log-dir"),
    logLevel: logLevelRaw && isLogLevel(logLevelRaw) ? logLevelRaw : undefined,
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
  };
}

export function applyCliOverrides(config: AppConfig, parsed: ParsedCliArgs): AppConfig {
  return validateConfig({
    ...config,
    storageRoot: parsed.root ?? config.storageRoot,
    windowDays: parsed.days ?? config.windowDays,
    schedule: {
      weekday: parsed.weekday ?? config.schedule.weekday,
      hour: parsed.hour ?? config.schedule.hour,
      minute: parsed.minute ?? config.schedule.minute,
    },
    hourly: parsed.everyHour || config.hourly,
    logDir: parsed.logDir ?? config.logDir,
    logLevel: parsed.logLevel ?? config.logLevel,
    ignoreHttpsErrors: parsed.ignoreHttpsErrors || config.ignoreHttpsErrors,
  });
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const config = applyCliOverrides(loadConfig(parsed.configPath), parsed);
  const logger = new Logger({ component: "cli", runId: `pid_${process.pid}` }, { level: config.logLevel });
  const store = createStore(config);
  const harvesters = buildHarvesters(config, logger);
  const context = { config, store, logger, harvesters };

  logger.info("command_start", {
    command: parsed.command,
    storageRoot: config.storageRoot,
    windowDays: config.windowDays,
    hourly: config.hourly,
    once: parsed.once,
    harvesters: harvesters.map((harvester) => harvester.name),
  });

  const controller = new AbortController();
  const stop = (signalName: string): void => {
    logger.warn("stopped_by_operator", { signal: signalName });
    controller.abort();
  };
  const onSigint = (): void => stop("SIGINT");
  const onSigterm = (): void => stop("SIGTERM");
  process.once("SIGINT", onSigint);
  process.once("SIGTERM", onSigterm);

  try {
    switch (parsed.command) {
      case "run":
        await runOnce({ ...context, logger: logger.child("run_once") });
        break;
      case "schedule":
        if (parsed.once) {
          await runOnce({ ...context, logger: logger.child("run_once") });
        } else {
          await runSchedule({ ...context, logger: logger.child("scheduler") }, controller.signal);
        }
        break;
      case "status":
        await runStatus({ ...context, logger: logger.child("status") });
        break;
    }

    logger.info("command_complete", { command: parsed.command });
    return 0;
  } catch (error) {
    logger.error("command_failed", { command: parsed.command, ...describeError(error) });
    return 1;
  } finally {
    process.off("SIGINT", onSigint);
    process.off("SIGTERM", onSigterm);
    await store.close();
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
