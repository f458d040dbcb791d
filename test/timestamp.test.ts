import { describe, it, expect } from "vitest";
import {
  formatTime,
  formatTimestampDate,
  formatTimestampFull,
  formatTimestampShort,
  parseIsoTimestamp,
  parseSinceDate,
} from "../src/timestamp.js";
import { ConfigurationError } from "../src/errors.js";

describe("parseIsoTimestamp", () => {
  it("reads Z, offset and zoneless forms", () => {
    expect(parseIsoTimestamp("2025-01-02T03:04:05Z")?.toISOString()).toBe("2025-01-02T03:04:05.000Z");
    expect(parseIsoTimestamp("2025-01-02T03:04:05.250+02:00")?.toISOString()).toBe(
      "2025-01-02T01:04:05.250Z",
    );
    expect(parseIsoTimestamp("2025-01-02T03:04:05+0200")?.toISOString()).toBe(
      "2025-01-02T01:04:05.000Z",
    );
    expect(parseIsoTimestamp("2025-01-02 03:04")?.toISOString()).toBe("2025-01-02T03:04:00.000Z");
    expect(parseIsoTimestamp("2025-01-02")?.toISOString()).toBe("2025-01-02T00:00:00.000Z");
  });

  it("rejects anything else", () => {
    expect(parseIsoTimestamp(undefined)).toBeNull();
    expect(parseIsoTimestamp("")).toBeNull();
    expect(parseIsoTimestamp("yesterday")).toBeNull();
    expect(parseIsoTimestamp("2025-13-45T00:00:00Z")).toBeNull();
  });
});

describe("timestamp formatting", () => {
  const date = new Date("2025-03-04T05:06:07Z");

  it("formats in UTC", () => {
    expect(formatTime(date)).toBe("05:06:07");
    expect(formatTimestampShort(date)).toBe("03-04 05:06:07");
    expect(formatTimestampFull(date)).toBe("2025-03-04 05:06:07 UTC");
    expect(formatTimestampDate(date)).toBe("2025-03-04 05:06");
  });

  it("gives an empty string without a date", () => {
    expect(formatTimestampShort(null)).toBe("");
    expect(formatTimestampFull(null)).toBe("");
    expect(formatTimestampDate(null)).toBe("");
  });
});

describe("parseSinceDate", () => {
  const now = new Date("2025-06-10T12:00:00Z");

  it("subtracts relative amounts from now", () => {
    expect(parseSinceDate("1d", now).toISOString()).toBe("2025-06-09T12:00:00.000Z");
    expect(parseSinceDate("2h", now).toISOString()).toBe("2025-06-10T10:00:00.000Z");
    expect(parseSinceDate("30m", now).toISOString()).toBe("2025-06-10T11:30:00.000Z");
    expect(parseSinceDate("1W", now).toISOString()).toBe("2025-06-03T12:00:00.000Z");
  });

  it("accepts absolute dates", () => {
    expect(parseSinceDate(" 2024-12-01 ", now).toISOString()).toBe("2024-12-01T00:00:00.000Z");
  });

  it("rejects unknown formats", () => {
    expect(() => parseSinceDate("last week", now)).toThrow(ConfigurationError);
    expect(() => parseSinceDate("5y", now)).toThrow("Invalid date format: '5y'");
  });
});
