import { describe, expect, it } from "vitest";
import {
  classifyExpiration,
  diffInDays,
  normalizeCandidates,
  parseExpirationType,
  parseIsoDate
} from "../normalize";

const NOW = new Date("2026-01-05T15:00:00Z");

const utc = (value: string) => new Date(`${value}T00:00:00Z`);

describe("date helpers", () => {
  it("parses strict ISO dates", () => {
    expect(parseIsoDate("2026-02-20")?.toISOString()).toBe("2026-02-20T00:00:00.000Z");
    expect(parseIsoDate("2026-02-30")).toBeNull();
    expect(parseIsoDate("2026-2-3")).toBeNull();
    expect(parseIsoDate("next friday")).toBeNull();
  });

  it("counts calendar days regardless of time of day", () => {
    expect(diffInDays(new Date("2026-01-05T23:59:00Z"), new Date("2026-01-06T00:01:00Z"))).toBe(1);
    expect(diffInDays(NOW, utc("2026-01-05"))).toBe(0);
  });
});

describe("classifyExpiration", () => {
  it("treats month-end dates as monthly", () => {
    expect(classifyExpiration(utc("2026-01-30"))).toBe("monthly");
    expect(classifyExpiration(utc("2026-02-02"))).toBe("monthly");
  });

  it("recognizes third Fridays", () => {
    expect(classifyExpiration(utc("2026-01-16"))).toBe("monthly");
    expect(classifyExpiration(utc("2026-03-20"))).toBe("quarterly");
  });

  it("treats other Fridays as weekly", () => {
    expect(classifyExpiration(utc("2026-01-09"))).toBe("weekly");
    expect(classifyExpiration(utc("2026-01-14"))).toBe("other");
  });
});

describe("parseExpirationType", () => {
  it("accepts aliases case-insensitively", () => {
    expect(parseExpirationType("End-Of-Week")).toBe("eow");
    expect(parseExpirationType("end_of_quarter")).toBe("eoq");
    expect(parseExpirationType("MONTHLY")).toBe("monthly");
  });

  it("maps unknown labels to other", () => {
    expect(parseExpirationType("leaps")).toBe("other");
    expect(parseExpirationType(undefined)).toBeNull();
  });
});

describe("normalizeCandidates", () => {
  it("keeps valid candidates and records why others were dropped", () => {
    const { candidates, dropped } = normalizeCandidates(
      [
        "2026-01-16",
        "2026-02-30",
        "2026-01-02",
        { days: 30 },
        { days: 2.5 },
        { days: -1 },
        { type: "weekly" },
        { date: "2026-01-23", type: "eow", daysToNextEarnings: 10, volume: 5, openInterest: 50 }
      ],
      NOW
    );

    expect(candidates).toEqual([
      { date: "2026-01-16", days: 11, expirationType: "monthly" },
      {
        date: "2026-02-04",
        days: 30,
        expirationType: "other",
        daysToNextEarnings: null,
        volume: null,
        openInterest: null
      },
      {
        date: "2026-01-23",
        days: 18,
        expirationType: "eow",
        daysToNextEarnings: 10,
        volume: 5,
        openInterest: 50
      }
    ]);
    expect(dropped.map((entry) => entry.code)).toEqual([
      "INVALID_DATE_FORMAT",
      "EXPIRED",
      "INVALID_DAYS",
      "INVALID_DAYS",
      "MISSING_EXPIRATION"
    ]);
    expect(dropped[1]?.message).toBe("Expiration 2026-01-02 is 3 days in the past.");
  });

  it("accepts expirations due today", () => {
    const { candidates } = normalizeCandidates([{ days: 0 }, "2026-01-05"], NOW);
    expect(candidates.map((candidate) => [candidate.date, candidate.days])).toEqual([
      ["2026-01-05", 0],
      ["2026-01-05", 0]
    ]);
  });

  it("keeps supplied days and classifies by the supplied date", () => {
    const { candidates } = normalizeCandidates([{ days: 10, date: "2026-01-16" }], NOW);
    expect(candidates[0]).toMatchObject({ date: "2026-01-16", days: 10, expirationType: "monthly" });
  });

  it("lets an explicit type override classification", () => {
    const { candidates } = normalizeCandidates([{ date: "2026-01-16", type: "weekly" }], NOW);
    expect(candidates[0]?.expirationType).toBe("weekly");
  });
});
