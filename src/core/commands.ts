import path from "node:path";
import { AppConfig } from "../config";
import { Harvester } from "../harvest/types";
import { Logger } from "../observability";
import { RunSummary, Scheduler, ScheduleMode } from "../scheduler";
import { IngestStore, SourceStats } from "../store/types";

export interface CommandContext {
  config: AppConfig;
  store: IngestStore;
  logger: Logger;
  harvesters: Harvester[];
}

export function scheduleModeFor(config: AppConfig): ScheduleMode {
  if (config.hourly) {
    return { kind: "hourly" };
  }
  return { kind: "weekly", ...config.schedule };
}

export function runLoggerFactory(config: AppConfig, options: { console?: boolean } = {}): (runId: string) => Logger {
  return (runId) =>
    new Logger(
      { component: "run", runId },
      {
        level: config.logLevel,
        filePath: path.join(config.logDir, `${runId}.log`),
        console: options.console,
      },
    );
}

function createScheduler(ctx: CommandContext, mode: ScheduleMode): Scheduler {
  return new Scheduler({
    harvesters: ctx.harvesters,
    store: ctx.store,
    mode,
    windowDays: ctx.config.windowDays,
    backoffMs: ctx.config.backoffSeconds * 1000,
    logger: ctx.logger,
    createRunLogger: runLoggerFactory(ctx.config),
  });
}

export async function runOnce(ctx: CommandContext): Promise<RunSummary | undefined> {
  ctx.logger.info("run_once_start", { windowDays: ctx.config.windowDays, harvesters: ctx.harvesters.length });
  const scheduler = createScheduler(ctx, { kind: "once" });
  await scheduler.start();
  const summary = scheduler.lastRun;
  ctx.logger.info("run_once_complete", { runId: summary?.runId, totalNew: summary?.totalNew });
  return summary;
}

export async function runSchedule(ctx: CommandContext, signal: AbortSignal): Promise<void> {
  const mode = scheduleModeFor(ctx.config);
  if (mode.kind === "hourly") {
    ctx.logger.warn("hourly_mode_enabled", { note: "runs every hour on the hour" });
  }
  await createScheduler(ctx, mode).start(signal);
}

export async function runStatus(ctx: CommandContext): Promise<SourceStats[]> {
  ctx.logger.info("status_start");
  const sources = await ctx.store.listSources();
  const stats: SourceStats[] = [];
  for (const source of sources) {
    const sourceStats = await ctx.store.getStats(source);
    ctx.logger.info("source_status", { ...sourceStats });
    stats.push(sourceStats);
  }
  ctx.logger.info("status_complete", { sources: stats.length });
  return stats;
}
