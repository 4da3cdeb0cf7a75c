import { describe, expect, it } from "vitest";
import {
  DEFAULT_SCORING_CURVES,
  interpolateCurve,
  scoreEventBuffer,
  scoreGammaRisk,
  scoreLiquidity,
  scoreThetaEfficiency
} from "../curves";

describe("theta efficiency curve", () => {
  it("follows the breakpoint table", () => {
    expect(scoreThetaEfficiency(0)).toBe(10);
    expect(scoreThetaEfficiency(6)).toBe(10);
    expect(scoreThetaEfficiency(7)).toBe(30);
    expect(scoreThetaEfficiency(14)).toBe(45);
    expect(scoreThetaEfficiency(21)).toBe(60);
    expect(scoreThetaEfficiency(30)).toBe(95);
    expect(scoreThetaEfficiency(33)).toBe(100);
    expect(scoreThetaEfficiency(45)).toBe(95);
    expect(scoreThetaEfficiency(90)).toBe(55);
    expect(scoreThetaEfficiency(200)).toBe(40);
  });

  it("scores at least 95 only inside the 30-45 day window", () => {
    for (let days = 30; days <= 45; days += 1) {
      expect(scoreThetaEfficiency(days)).toBeGreaterThanOrEqual(95);
    }
    for (let days = 0; days <= 200; days += 1) {
      expect(scoreThetaEfficiency(days) >= 95).toBe(days >= 30 && days <= 45);
    }
    expect(scoreThetaEfficiency(29)).toBeCloseTo(91.11, 2);
    expect(scoreThetaEfficiency(46)).toBeCloseTo(93.33, 2);
  });

  it("applies and clamps the adjustment factor", () => {
    expect(scoreThetaEfficiency(40, 1.2)).toBe(100);
    expect(scoreThetaEfficiency(21, 0.8)).toBeCloseTo(48, 6);
  });
});

describe("gamma risk curve", () => {
  it("stays at or below 30 inside a week", () => {
    for (let days = 0; days < 7; days += 1) {
      expect(scoreGammaRisk(days)).toBeLessThanOrEqual(30);
      expect(scoreGammaRisk(days, 0.05)).toBeLessThanOrEqual(30);
      expect(scoreGammaRisk(days, 2)).toBeLessThanOrEqual(30);
    }
  });

  it("rises with tenor", () => {
    expect(scoreGammaRisk(14)).toBe(40);
    expect(scoreGammaRisk(30)).toBe(80);
    expect(scoreGammaRisk(45)).toBeCloseTo(83, 6);
  });

  it("shifts for volatility only from 30 days out", () => {
    expect(scoreGammaRisk(30, 0.5)).toBeCloseTo(76, 6);
    expect(scoreGammaRisk(21, 0.9)).toBe(60);
  });
});

describe("liquidity curve", () => {
  it("starts from the expiration type and penalizes extreme tenors", () => {
    expect(scoreLiquidity("monthly", 30)).toBe(95);
    expect(scoreLiquidity("other", 30)).toBe(60);
    expect(scoreLiquidity("weekly", 5)).toBeCloseTo(59.5, 6);
    expect(scoreLiquidity("quarterly", 120)).toBeCloseTo(60, 6);
  });

  it("reacts to turnover when both volume and open interest are known", () => {
    expect(scoreLiquidity("monthly", 30, { volume: 2000, openInterest: 1000 })).toBe(100);
    expect(scoreLiquidity("monthly", 30, { volume: 10, openInterest: 1000 })).toBeCloseTo(76, 6);
    expect(scoreLiquidity("monthly", 30, { volume: 10, openInterest: 0 })).toBe(95);
    expect(scoreLiquidity("monthly", 30, { volume: null, openInterest: 1000 })).toBe(95);
  });

  it("applies the profile factor", () => {
    expect(scoreLiquidity("weekly", 30, {}, 1.09)).toBeCloseTo(92.65, 6);
  });
});

describe("event buffer curve", () => {
  it("uses a neutral score without earnings data", () => {
    expect(scoreEventBuffer(30)).toBe(75);
  });

  it("rewards expiring well before earnings", () => {
    expect(scoreEventBuffer(30, 40)).toBe(100);
    expect(scoreEventBuffer(30, 35)).toBe(100);
    expect(scoreEventBuffer(30, 34)).toBe(30);
  });

  it("scores expirations after the report by distance", () => {
    expect(scoreEventBuffer(30, 10)).toBe(90);
    expect(scoreEventBuffer(30, 22)).toBe(70);
    expect(scoreEventBuffer(30, 25)).toBe(30);
  });
});

describe("interpolateCurve", () => {
  it("falls back to the short-dated score when there are no breakpoints", () => {
    const curve = { ...DEFAULT_SCORING_CURVES.theta, points: [] };
    expect(interpolateCurve(curve, 40)).toBe(10);
  });
});
