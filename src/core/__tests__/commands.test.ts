import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { AppConfig, DEFAULT_CONFIG } from "../../config";
import { makeRecord } from "../../harvest/recordFactory";
import { Harvester } from "../../harvest/types";
import { Logger } from "../../observability";
import { LocalStore } from "../../store";
import { CommandContext, runLoggerFactory, runOnce, runSchedule, runStatus, scheduleModeFor } from "../commands";

let tmpDir: string;
let store: LocalStore;
let config: AppConfig;

const harvester: Harvester = {
  name: "alpha",
  fetchRange: async () => [
    makeRecord({
      source: "alpha",
      documentId: "d1",
      url: "https://example.org/news/1",
      title: "News",
      date: null,
      docType: "press_release",
    }),
  ],
};

function context(overrides: Partial<CommandContext> = {}): CommandContext {
  return {
    config,
    store,
    logger: new Logger({ component: "test", runId: "run_test" }, { console: false }),
    harvesters: [harvester],
    ...overrides,
  };
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "harvest-commands-"));
  config = { ...DEFAULT_CONFIG, storageRoot: path.join(tmpDir, "data"), logDir: path.join(tmpDir, "logs") };
  store = new LocalStore(config.storageRoot);
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await store.close();
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe("scheduleModeFor", () => {
  it("is weekly unless hourly mode is on", () => {
    expect(scheduleModeFor(config)).toEqual({ kind: "weekly", weekday: 0, hour: 9, minute: 0 });
    expect(scheduleModeFor({ ...config, hourly: true })).toEqual({ kind: "hourly" });
  });
});

describe("runLoggerFactory", () => {
  it("gives each run its own file in the log directory", () => {
    const logger = runLoggerFactory(config, { console: false })("run_20240108_090000_abcdef");
    expect(logger.filePath).toBe(path.join(config.logDir, "run_20240108_090000_abcdef.log"));
  });
});

describe("runOnce", () => {
  it("runs one cycle and logs it to the run's file", async () => {
    const summary = await runOnce(context());

    expect(summary?.totalNew).toBe(1);
    const logFile = path.join(config.logDir, `${summary?.runId}.log`);
    const messages = fs
      .readFileSync(logFile, "utf-8")
      .trim()
      .split("\n")
      .map((line) => (JSON.parse(line) as { msg: string }).msg);
    expect(messages[0]).toBe("run_window");
    expect(messages).toContain("harvester_complete");
    expect(messages[messages.length - 1]).toBe("metrics_summary");
  });
});

describe("runSchedule", () => {
  it("returns without running when already aborted", async () => {
    const fetchRange = vi.fn(harvester.fetchRange);
    await runSchedule(context({ harvesters: [{ name: "alpha", fetchRange }] }), AbortSignal.abort());
    expect(fetchRange).not.toHaveBeenCalled();
  });
});

describe("runStatus", () => {
  it("reports every source with stored state", async () => {
    await runOnce(context());
    expect(await runStatus(context())).toEqual([{ source: "alpha", documents: 1, attachments: 0 }]);
  });

  it("reports nothing for an empty store", async () => {
    expect(await runStatus(context())).toEqual([]);
  });
});
