import { describe, it, expect } from "vitest";
import { parseInstant, daysBefore, latest, formatDisplay, formatFileStamp } from "./dates.js";

describe("parseInstant", () => {
  it("parses a Z suffix", () => {
    expect(parseInstant("2024-03-01T10:20:30Z")?.toISOString()).toBe("2024-03-01T10:20:30.000Z");
  });

  it("applies a colon offset", () => {
    expect(parseInstant("2024-03-01T10:20:30+02:00")?.toISOString()).toBe("2024-03-01T08:20:30.000Z");
    expect(parseInstant("2024-03-01T10:20:30-05:30")?.toISOString()).toBe("2024-03-01T15:50:30.000Z");
  });

  it("applies a compact offset", () => {
    expect(parseInstant("2024-03-01T10:20:30+0100")?.toISOString()).toBe("2024-03-01T09:20:30.000Z");
  });

  it("keeps milliseconds and truncates longer fractions", () => {
    expect(parseInstant("2024-03-01T10:20:30.5Z")?.toISOString()).toBe("2024-03-01T10:20:30.500Z");
    expect(parseInstant("2024-03-01T10:20:30.123456+00:00")?.toISOString()).toBe("2024-03-01T10:20:30.123Z");
  });

  it("accepts a space separator and a missing offset as UTC", () => {
    expect(parseInstant("2024-03-01 10:20:30")?.toISOString()).toBe("2024-03-01T10:20:30.000Z");
    expect(parseInstant("2024-03-01 10:20:30+0000")?.toISOString()).toBe("2024-03-01T10:20:30.000Z");
  });

  it("accepts timestamps without seconds", () => {
    expect(parseInstant("2024-03-01T10:20Z")?.toISOString()).toBe("2024-03-01T10:20:00.000Z");
  });

  it("passes valid Date objects through", () => {
    const d = new Date("2024-03-01T00:00:00Z");
    expect(parseInstant(d)).toBe(d);
  });

  it("returns null for unparseable values", () => {
    expect(parseInstant("not a date")).toBeNull();
    expect(parseInstant("2024-13-01T00:00:00Z")).toBeNull();
    expect(parseInstant("2024-02-30T00:00:00Z")).toBeNull();
    expect(parseInstant("2024-03-01T25:00:00Z")).toBeNull();
    expect(parseInstant("")).toBeNull();
    expect(parseInstant(null)).toBeNull();
    expect(parseInstant(undefined)).toBeNull();
    expect(parseInstant(new Date("garbage"))).toBeNull();
  });
});

describe("daysBefore", () => {
  it("subtracts whole days", () => {
    const now = new Date("2024-03-31T12:00:00Z");
    expect(daysBefore(now, 30).toISOString()).toBe("2024-03-01T12:00:00.000Z");
  });
});

describe("latest", () => {
  it("returns the newest non-null date", () => {
    const a = new Date("2024-01-01T00:00:00Z");
    const b = new Date("2024-02-01T00:00:00Z");
    expect(latest(a, null, b)).toBe(b);
    expect(latest(null, null)).toBeNull();
  });
});

describe("formatting", () => {
  it("formats display and file stamps in UTC", () => {
    const d = new Date("2024-03-01T04:05:06.789Z");
    expect(formatDisplay(d)).toBe("2024-03-01 04:05:06");
    expect(formatFileStamp(d)).toBe("20240301_040506");
  });
});
