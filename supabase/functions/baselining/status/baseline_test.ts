import { describe, expect, it } from "vitest";
import fixturesJson from "./fixtures.baseline.v1.json" with { type: "json" };
import type { MetricSeries } from "./types.ts";
import {
  baselineFromJSON,
  baselineToJSON,
  baselineWindow,
  computeBaseline,
  computeBaselineRange,
} from "./baseline.ts";
import { StatusInputError } from "./errors.ts";
import { dailySeries } from "./test_helpers.ts";

type Fixture = {
  id: string;
  asOfDate: string;
  windowDays: number;
  series: MetricSeries;
  expected: { sampleCount: number; mean: number | null; stddev: number | null };
};

type FixtureFile = {
  version: string;
  generatedAt: string;
  fixtures: Fixture[];
};

const file: FixtureFile = fixturesJson;

describe("computeBaseline", () => {
  it("matches baseline fixtures (v1)", () => {
    expect(file.fixtures.length).toBeGreaterThan(0);

    for (const fx of file.fixtures) {
      const b = computeBaseline("m", fx.series, fx.asOfDate, fx.windowDays);
      expect(b.sampleCount, fx.id).toBe(fx.expected.sampleCount);
      if (fx.expected.mean == null) expect(b.mean, fx.id).toBeNull();
      else expect(b.mean, fx.id).toBeCloseTo(fx.expected.mean, 10);
      if (fx.expected.stddev == null) expect(b.stddev, fx.id).toBeNull();
      else expect(b.stddev, fx.id).toBeCloseTo(fx.expected.stddev, 10);
    }
  });

  it("anchors the window on asOfDate and counts only days inside it", () => {
    const recent = dailySeries(
      "2025-05-01",
      Array.from({ length: 14 }, (_, i) => 60 + i),
    );
    const series = [{ date: "2025-04-01", value: 500 }, ...recent];

    const b = computeBaseline("resting_heart_rate", series, "2025-05-14", 30);
    expect(b.sampleCount).toBe(14);
    expect(b.mean).toBe(66.5);
    expect(b).toEqual(computeBaseline("resting_heart_rate", recent, "2025-05-14", 30));
    expect(baselineWindow("2025-05-14", 30)).toEqual({ start: "2025-04-15", end: "2025-05-14" });
  });

  it("gives exactly the value and a zero stddev for identical values", () => {
    const series = dailySeries("2025-05-01", Array.from({ length: 10 }, () => 0.1));
    const b = computeBaseline("m", series, "2025-05-10", 10);
    expect(b.mean).toBe(0.1);
    expect(b.stddev).toBe(0);
  });

  it("is idempotent", () => {
    const series = dailySeries("2025-05-01", [3.2, null, 4.8, 5.1, 2.7, null, 6.4]);
    const a = computeBaseline("m", series, "2025-05-07", 7);
    const b = computeBaseline("m", series, "2025-05-07", 7);
    expect(b).toEqual(a);
    expect(Object.is(a.mean, b.mean)).toBe(true);
    expect(Object.is(a.stddev, b.stddev)).toBe(true);
  });

  it("carries the request through to the result", () => {
    const b = computeBaseline("hrv_rmssd", [], "2025-05-14", 90);
    expect(b).toEqual({
      metricName: "hrv_rmssd",
      asOfDate: "2025-05-14",
      windowDays: 90,
      mean: null,
      stddev: null,
      sampleCount: 0,
    });
  });

  it("rejects a window that is not a positive integer", () => {
    expect(() => computeBaseline("m", [], "2025-05-14", 0)).toThrow(StatusInputError);
    expect(() => computeBaseline("m", [], "2025-05-14", -3)).toThrow(StatusInputError);
    expect(() => computeBaseline("m", [], "2025-05-14", 1.5)).toThrow(StatusInputError);
  });

  it("rejects an invalid asOfDate", () => {
    expect(() => computeBaseline("m", [], "2025-02-30", 7)).toThrow(StatusInputError);
    expect(() => computeBaseline("m", [], "14/05/2025", 7)).toThrow(StatusInputError);
  });
});

describe("computeBaselineRange", () => {
  it("equals a per-day computeBaseline for every day", () => {
    const series = dailySeries("2025-04-28", [50, 52, null, 47, 55, 49, null, null, 51, 53, 48, 60, 44, 50, 52, 58, 46]);

    const range = computeBaselineRange("m", series, "2025-05-01", "2025-05-14", 5);
    expect(range).toHaveLength(14);
    expect(range[0].asOfDate).toBe("2025-05-01");
    expect(range[13].asOfDate).toBe("2025-05-14");
    for (const b of range) {
      expect(b).toEqual(computeBaseline("m", series, b.asOfDate, 5));
    }
  });

  it("rejects an end date before the start date", () => {
    expect(() => computeBaselineRange("m", [], "2025-05-14", "2025-05-13", 7)).toThrow(StatusInputError);
  });
});

describe("baseline snapshots", () => {
  it("round-trips through JSON", () => {
    const b = computeBaseline("hrv_rmssd", dailySeries("2025-05-12", [40, 44, 42]), "2025-05-14", 90);
    const snapshot = baselineToJSON(b);
    expect(snapshot).toEqual({
      metric_name: "hrv_rmssd",
      as_of_date: "2025-05-14",
      window_days: 90,
      mean: 42,
      std_dev: 2,
      sample_count: 3,
    });
    expect(baselineFromJSON(JSON.parse(JSON.stringify(snapshot)))).toEqual(b);
  });

  it("rejects snapshots no computation can produce", () => {
    const valid = { metric_name: "m", as_of_date: "2025-05-14", window_days: 7, mean: 5, std_dev: 1, sample_count: 3 };
    expect(() => baselineFromJSON({ ...valid, mean: null })).toThrow(StatusInputError);
    expect(() => baselineFromJSON({ ...valid, sample_count: 1 })).toThrow(StatusInputError);
    expect(() => baselineFromJSON({ ...valid, std_dev: -1 })).toThrow(StatusInputError);
    expect(() => baselineFromJSON({ ...valid, window_days: 0 })).toThrow(StatusInputError);
    expect(() => baselineFromJSON({ ...valid, as_of_date: "2025-13-01" })).toThrow(StatusInputError);
    expect(() => baselineFromJSON("nope")).toThrow(StatusInputError);
    expect(baselineFromJSON({ ...valid, mean: null, std_dev: null, sample_count: 0 }).mean).toBeNull();
  });
});
