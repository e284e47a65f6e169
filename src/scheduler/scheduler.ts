import { sleep as defaultSleep } from "../core/sleep";
import { Harvester } from "../harvest/types";
import { createRunId, describeError, Logger, MetricsRegistry } from "../observability";
import { IngestStore } from "../store/types";
import { DocumentRecord, TimeWindow } from "../types";
import { computeWindow, isWithinWindow, nextFireTime, ScheduleMode } from "./schedule";

export type SchedulerState = "idle" | "running" | "sleeping" | "stopped";

export const DEFAULT_BACKOFF_MS = 60_000;

export interface HarvesterOutcome {
  source: string;
  status: "ok" | "failed";
  candidates: number;
  newRecords: number;
  duplicates: number;
  outOfWindow: number;
  failedRecords: number;
  elapsedMs: number;
  error?: string;
}

export interface RunSummary {
  runId: string;
  window: TimeWindow;
  outcomes: HarvesterOutcome[];
  totalNew: number;
  failedHarvesters: number;
  elapsedMs: number;
}

export interface SchedulerDeps {
  harvesters: Harvester[];
  store: IngestStore;
  mode: ScheduleMode;
  windowDays: number;
  logger: Logger;
  /** Fixed pause after a cycle-level failure, before the next fire time is computed. */
  backoffMs?: number;
  /** Logger for one cycle; lets every run write its own log file. */
  createRunLogger?: (runId: string) => Logger;
  clock?: () => Date;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Runs a fixed roster of harvesters on a cadence. Harvesters run one after the
 * other; a failing harvester or record never stops the rest of the cycle, and
 * a failing cycle never stops the loop.
 */
export class Scheduler {
  private readonly harvesters: readonly Harvester[];
  private readonly store: IngestStore;
  private readonly mode: ScheduleMode;
  private readonly windowDays: number;
  private readonly logger: Logger;
  private readonly backoffMs: number;
  private readonly createRunLogger: (runId: string) => Logger;
  private readonly clock: () => Date;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private currentState: SchedulerState = "idle";
  private latestRun?: RunSummary;

  constructor(deps: SchedulerDeps) {
    this.harvesters = [...deps.harvesters];
    this.store = deps.store;
    this.mode = deps.mode;
    this.windowDays = deps.windowDays;
    this.logger = deps.logger;
    this.backoffMs = deps.backoffMs ?? DEFAULT_BACKOFF_MS;
    this.createRunLogger = deps.createRunLogger ?? ((runId) => new Logger({ component: "run", runId }));
    this.clock = deps.clock ?? (() => new Date());
    this.sleep = deps.sleep ?? defaultSleep;
  }

  get state(): SchedulerState {
    return this.currentState;
  }

  get lastRun(): RunSummary | undefined {
    return this.latestRun;
  }

  async start(signal?: AbortSignal): Promise<void> {
    if (this.mode.kind === "once") {
      this.currentState = "running";
      try {
        await this.runCycle();
      } finally {
        this.currentState = "stopped";
      }
      return;
    }

    this.logger.info("scheduler_start", { mode: this.mode, harvesters: this.harvesters.map((h) => h.name) });
    while (!signal?.aborted) {
      try {
        this.currentState = "idle";
        const runAt = nextFireTime(this.mode, this.clock());
        this.logger.info("next_run_scheduled", { mode: this.mode.kind, runAt: runAt.toISOString() });

        this.currentState = "sleeping";
        let remainingMs = runAt.getTime() - this.clock().getTime();
        while (remainingMs > 0 && !signal?.aborted) {
          await this.sleep(remainingMs, signal);
          remainingMs = runAt.getTime() - this.clock().getTime();
        }
        if (signal?.aborted) {
          break;
        }

        this.currentState = "running";
        await this.runCycle();
      } catch (error) {
        this.logger.error("cycle_failed", { backoffMs: this.backoffMs, ...describeError(error) });
        this.currentState = "sleeping";
        await this.sleep(this.backoffMs, signal);
      }
    }

    this.currentState = "stopped";
    this.logger.warn("scheduler_stopped", { reason: "interrupted" });
  }

  async runCycle(now: Date = this.clock()): Promise<RunSummary> {
    const runId = createRunId(now);
    const logger = this.createRunLogger(runId);
    const metrics = new MetricsRegistry();
    const stopCycle = metrics.startTimer("cycle_ms");
    const window = computeWindow(now, this.windowDays);

    logger.info("run_window", {
      start: window.start.toISOString(),
      end: window.end.toISOString(),
      harvesters: this.harvesters.map((h) => h.name),
    });

    const outcomes: HarvesterOutcome[] = [];
    for (const harvester of this.harvesters) {
      outcomes.push(await this.runHarvester(harvester, window, logger, metrics));
    }

    const elapsedMs = stopCycle();
    const totalNew = outcomes.reduce((sum, outcome) => sum + outcome.newRecords, 0);
    const failedHarvesters = outcomes.filter((outcome) => outcome.status === "failed").length;
    logger.info("run_complete", { totalNew, failedHarvesters, elapsedMs });
    metrics.logSummary(logger);

    this.latestRun = { runId, window, outcomes, totalNew, failedHarvesters, elapsedMs };
    return this.latestRun;
  }

  private async runHarvester(
    harvester: Harvester,
    window: TimeWindow,
    logger: Logger,
    metrics: MetricsRegistry,
  ): Promise<HarvesterOutcome> {
    const source = harvester.name;
    const stopTimer = metrics.startTimer("harvester_ms");
    logger.info("harvester_start", { source });

    let records: DocumentRecord[];
    try {
      records = await harvester.fetchRange(window.start, window.end, this.store);
    } catch (error) {
      const elapsedMs = stopTimer();
      const described = describeError(error);
      metrics.incrementCounter("harvesters_failed");
      logger.error("harvester_failed", { source, elapsedMs, ...described });
      return {
        source,
        status: "failed",
        candidates: 0,
        newRecords: 0,
        duplicates: 0,
        outOfWindow: 0,
        failedRecords: 0,
        elapsedMs,
        error: described.error,
      };
    }

    let newRecords = 0;
    let duplicates = 0;
    let outOfWindow = 0;
    let failedRecords = 0;
    for (const record of records) {
      if (!isWithinWindow(record.date, window)) {
        outOfWindow += 1;
        metrics.incrementCounter("records_out_of_window");
        logger.debug("record_out_of_window", { source, documentId: record.documentId, date: record.date });
        continue;
      }

      try {
        if (await this.store.appendRecord(record)) {
          newRecords += 1;
          metrics.incrementCounter("records_new");
        } else {
          duplicates += 1;
          metrics.incrementCounter("records_duplicate");
        }
      } catch (error) {
        failedRecords += 1;
        metrics.incrementCounter("records_failed");
        logger.error("record_append_failed", {
          source,
          documentId: record.documentId,
          url: record.url,
          ...describeError(error),
        });
      }
    }

    const elapsedMs = stopTimer();
    metrics.incrementCounter("harvesters_ok");
    const outcome: HarvesterOutcome = {
      source,
      status: "ok",
      candidates: records.length,
      newRecords,
      duplicates,
      outOfWindow,
      failedRecords,
      elapsedMs,
    };
    logger.info("harvester_complete", { ...outcome });
    return outcome;
  }
}
