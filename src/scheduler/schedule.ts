import { WeeklySchedule } from "../config";
import { localMidnight } from "../harvest/dates";
import { TimeWindow } from "../types";

const DAY_MS = 24 * 60 * 60 * 1000;

export type ScheduleMode = { kind: "once" } | { kind: "hourly" } | ({ kind: "weekly" } & WeeklySchedule);

/** Next local occurrence of weekday/hour:minute strictly after `now` (weekday 0 = Monday). */
export function nextWeeklyRunAt(now: Date, schedule: WeeklySchedule): Date {
  const target = new Date(now.getTime());
  target.setHours(schedule.hour, schedule.minute, 0, 0);
  const mondayBased = (target.getDay() + 6) % 7;
  let daysAhead = (schedule.weekday - mondayBased + 7) % 7;
  if (daysAhead === 0 && target.getTime() <= now.getTime()) {
    daysAhead = 7;
  }
  // setDate keeps the local wall-clock time across DST changes
  target.setDate(target.getDate() + daysAhead);
  return target;
}

export function nextHourBoundary(now: Date): Date {
  const target = new Date(now.getTime());
  target.setMinutes(0, 0, 0);
  target.setHours(target.getHours() + 1);
  return target;
}

export function nextFireTime(mode: ScheduleMode, now: Date): Date {
  switch (mode.kind) {
    case "once":
      return new Date(now.getTime());
    case "hourly":
      return nextHourBoundary(now);
    case "weekly":
      return nextWeeklyRunAt(now, mode);
  }
}

export function computeWindow(now: Date, windowDays: number): TimeWindow {
  return {
    start: new Date(now.getTime() - windowDays * DAY_MS),
    end: new Date(now.getTime()),
  };
}

/** Undated records are accepted; dated ones must fall in `[start, end)` at local midnight. */
export function isWithinWindow(date: string | null, window: TimeWindow): boolean {
  if (date === null) {
    return true;
  }
  const day = localMidnight(date);
  if (!day) {
    return false;
  }
  return day.getTime() >= window.start.getTime() && day.getTime() < window.end.getTime();
}
