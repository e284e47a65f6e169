function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** `run_YYYYMMDD_HHMMSS_xxxxxx` in local time; doubles as the run's log file name. */
export function createRunId(now = new Date()): string {
  const stamp =
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}` +
    `_${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  const suffix = Math.random().toString(36).slice(2, 8).padEnd(6, "0");
  return `run_${stamp}_${suffix}`;
}
