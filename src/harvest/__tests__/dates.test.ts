import { describe, it, expect } from "vitest";
import { localMidnight, parseDateAny, toIsoDate } from "../dates";

describe("parseDateAny", () => {
  it.each([
    ["2024-01-03", "2024-01-03"],
    ["2024/1/3", "2024-01-03"],
    ["2024-01-03T10:00:00Z", "2024-01-03"],
    ["3rd of January 2024", "2024-01-03"],
    ["Posted 3 Jan. 2024", "2024-01-03"],
    ["3 Sept 2024", "2024-09-03"],
    ["January 3, 2024", "2024-01-03"],
    ["03.01.2024", "2024-01-03"],
    ["Released on 29 February 2024", "2024-02-29"],
  ])("parses %j", (input, expected) => {
    expect(parseDateAny(input)).toBe(expected);
  });

  it("skips impossible dates and keeps looking", () => {
    expect(parseDateAny("31 Foo 2024, updated 2 May 2024")).toBe("2024-05-02");
    expect(parseDateAny("2023-02-29")).toBeNull();
  });

  it("returns the date that appears first in the text", () => {
    expect(parseDateAny("Published 3 January 2024. Related: speech of 2019-05-01")).toBe("2024-01-03");
    expect(parseDateAny("Updated 2024-02-01, first issued January 5, 2024")).toBe("2024-02-01");
  });

  it("returns null when there is no date", () => {
    expect(parseDateAny("")).toBeNull();
    expect(parseDateAny("no date here")).toBeNull();
  });
});

describe("toIsoDate", () => {
  it("formats a Date in local time", () => {
    expect(toIsoDate(new Date(2024, 0, 3, 23, 59))).toBe("2024-01-03");
  });

  it("maps absent and unparseable values to null", () => {
    expect(toIsoDate(null)).toBeNull();
    expect(toIsoDate(undefined)).toBeNull();
    expect(toIsoDate(new Date(Number.NaN))).toBeNull();
    expect(toIsoDate("garbage")).toBeNull();
  });

  it("normalizes strings", () => {
    expect(toIsoDate("January 3, 2024")).toBe("2024-01-03");
  });
});

describe("localMidnight", () => {
  it("returns local midnight of an ISO date", () => {
    expect(localMidnight("2024-01-03")?.getTime()).toBe(new Date(2024, 0, 3).getTime());
  });

  it("rejects other shapes", () => {
    expect(localMidnight("2024-1-3")).toBeUndefined();
  });
});
