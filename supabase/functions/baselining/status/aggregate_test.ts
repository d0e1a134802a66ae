import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { Direction, MetricRequest } from "./types.ts";
import { evaluateDailyStatus } from "./aggregate.ts";
import { observationSeriesSource } from "./series.ts";
import { StatusInputError } from "./errors.ts";
import { dailySeries, memoryObservationStore, memorySeriesSource } from "./test_helpers.ts";

function request(metricName: string, direction: Direction, windowDays: number): MetricRequest {
  return { metricName, policy: { direction, optimalBoundary: 0.75, warningBoundary: 1.5 }, windowDays };
}

const DATE = "2025-05-14";

const seriesByMetric = {
  resting_heart_rate: dailySeries("2025-05-08", [50, 52, 48, 50, 52, 48, 50]),
  avg_stress_level: dailySeries("2025-05-10", [20, 22, 18, 20, 40]),
  hrv_rmssd: dailySeries("2025-05-10", [45, 47, 44, 46]),
  body_battery_max: dailySeries("2025-05-10", [80, 82, 78, 81, null]),
};

describe("evaluateDailyStatus", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("reports a failing metric in place and still evaluates the others", async () => {
    const source = memorySeriesSource(seriesByMetric, { hrv_rmssd: new Error("store unreachable") });

    const status = await evaluateDailyStatus(source, {
      userId: "user-1",
      date: DATE,
      requests: [
        request("resting_heart_rate", "lowerIsBetter", 7),
        request("avg_stress_level", "lowerIsBetter", 5),
        request("hrv_rmssd", "higherIsBetter", 90),
      ],
    });

    expect(Object.keys(status).sort()).toEqual(["avg_stress_level", "hrv_rmssd", "resting_heart_rate"]);
    expect(status.hrv_rmssd).toEqual({ metricName: "hrv_rmssd", status: "unavailable", reason: "store unreachable" });

    expect(status.resting_heart_rate).toMatchObject({ status: "normal", value: 50, zScore: 0 });

    const stress = status.avg_stress_level;
    expect(stress.status).toBe("concerning");
    if (stress.status !== "concerning") return;
    expect(stress.value).toBe(40);
    expect(stress.baseline.mean).toBe(24);
    expect(stress.baseline.sampleCount).toBe(5);
    expect(stress.zScore).toBeCloseTo(16 / Math.sqrt(82), 10);

    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it("asks the source for exactly the baseline window", async () => {
    const source = memorySeriesSource(seriesByMetric);
    await evaluateDailyStatus(source, {
      userId: "user-1",
      date: DATE,
      requests: [request("resting_heart_rate", "lowerIsBetter", 7)],
    });
    expect(source.calls).toEqual([
      { userId: "user-1", metricName: "resting_heart_rate", range: { start: "2025-05-08", end: "2025-05-14" } },
    ]);
  });

  it("gives no_baseline with a null value when today has no reading", async () => {
    const source = memorySeriesSource(seriesByMetric);
    const status = await evaluateDailyStatus(source, {
      userId: "user-1",
      date: DATE,
      requests: [request("body_battery_max", "higherIsBetter", 14), request("hrv_rmssd", "higherIsBetter", 90)],
    });

    expect(status.body_battery_max).toMatchObject({ status: "no_baseline", value: null, zScore: null });
    expect(status.hrv_rmssd).toMatchObject({ status: "no_baseline", value: null, zScore: null });
    const hrv = status.hrv_rmssd;
    if (hrv.status !== "no_baseline") throw new Error("expected no_baseline");
    expect(hrv.baseline.sampleCount).toBe(4);
    expect(hrv.baseline.mean).toBe(45.5);
  });

  it("marks invalid requests as rejected without failing the call", async () => {
    const source = memorySeriesSource(seriesByMetric);
    const status = await evaluateDailyStatus(source, {
      userId: "user-1",
      date: DATE,
      requests: [
        request("resting_heart_rate", "lowerIsBetter", 0),
        { metricName: "avg_stress_level", policy: { direction: "symmetric", optimalBoundary: 2, warningBoundary: 1 }, windowDays: 5 },
        request("hrv_rmssd", "higherIsBetter", 90),
      ],
    });

    expect(status.resting_heart_rate).toEqual({
      metricName: "resting_heart_rate",
      status: "rejected",
      reason: "windowDays must be a positive integer, got 0",
    });
    expect(status.avg_stress_level.status).toBe("rejected");
    expect(status.hrv_rmssd.status).toBe("no_baseline");
    expect(source.calls.map((c) => c.metricName)).toEqual(["hrv_rmssd"]);
  });

  it("treats a malformed series from the source as unavailable", async () => {
    const source = memorySeriesSource({
      hrv_rmssd: [
        { date: "2025-05-14", value: 40 },
        { date: "2025-05-13", value: 41 },
      ],
    });
    const status = await evaluateDailyStatus(source, {
      userId: "user-1",
      date: DATE,
      requests: [request("hrv_rmssd", "higherIsBetter", 90)],
    });
    expect(status.hrv_rmssd).toEqual({
      metricName: "hrv_rmssd",
      status: "unavailable",
      reason: "series dates not strictly increasing at 2025-05-13",
    });
  });

  it("rejects a malformed call as a whole", async () => {
    const source = memorySeriesSource(seriesByMetric);
    const rhr = request("resting_heart_rate", "lowerIsBetter", 7);

    await expect(evaluateDailyStatus(source, { userId: "user-1", date: DATE, requests: [rhr, rhr] })).rejects.toThrow(
      "metric resting_heart_rate requested more than once",
    );
    await expect(evaluateDailyStatus(source, { userId: " ", date: DATE, requests: [rhr] })).rejects.toThrow(
      StatusInputError,
    );
    await expect(evaluateDailyStatus(source, { userId: "user-1", date: "2025-02-30", requests: [rhr] })).rejects.toThrow(
      StatusInputError,
    );
    expect(source.calls).toHaveLength(0);
  });

  it("treats inherited object property names as ordinary unknown metrics", async () => {
    const names = ["toString", "__proto__", "constructor", "vo2_max"];
    const status = await evaluateDailyStatus(observationSeriesSource(memoryObservationStore([])), {
      userId: "user-1",
      date: DATE,
      requests: names.map((n) => request(n, "symmetric", 30)),
    });

    expect(Object.getPrototypeOf(status)).toBe(Object.prototype);
    expect(Object.keys(status)).toEqual(names);
    expect(Object.entries(status)).toEqual(
      names.map((n) => [n, { metricName: n, status: "rejected", reason: `no extraction sources for metric ${n}` }]),
    );
  });

  it("returns an empty map for an empty request list", async () => {
    expect(await evaluateDailyStatus(memorySeriesSource({}), { userId: "user-1", date: DATE, requests: [] })).toEqual({});
  });

  it("evaluates observations end to end", async () => {
    const store = memoryObservationStore([
      { userId: "user-1", date: "2025-05-12", category: "resting_heart_rate", payload: { restingHeartRate: 50 } },
      { userId: "user-1", date: "2025-05-13", category: "sleep", payload: { dailySleepDTO: { restingHeartRateInBeatsPerMinute: 54 } } },
      { userId: "user-1", date: "2025-05-14", category: "resting_heart_rate", payload: { restingHeartRate: 58 } },
    ]);

    const status = await evaluateDailyStatus(observationSeriesSource(store), {
      userId: "user-1",
      date: DATE,
      requests: [request("resting_heart_rate", "lowerIsBetter", 60), request("vo2_max", "higherIsBetter", 30)],
    });

    const rhr = status.resting_heart_rate;
    if (rhr.status === "unavailable" || rhr.status === "rejected") throw new Error(rhr.reason);
    expect(rhr.value).toBe(58);
    expect(rhr.baseline).toEqual({
      metricName: "resting_heart_rate",
      asOfDate: DATE,
      windowDays: 60,
      mean: 54,
      stddev: 4,
      sampleCount: 3,
    });
    expect(rhr.zScore).toBe(1);
    expect(rhr.status).toBe("warning");
    expect(status.vo2_max).toEqual({
      metricName: "vo2_max",
      status: "rejected",
      reason: "no extraction sources for metric vo2_max",
    });
  });
});
