import type { Baseline, DateRange, ISODate, MetricName, MetricSeries } from "./types.ts";
import { addDaysUTC, eachDay, isISODate } from "./dates.ts";
import { StatusInputError } from "./errors.ts";

function windowStartFor(asOfDate: ISODate, windowDays: number): ISODate {
  if (!Number.isInteger(windowDays) || windowDays <= 0) {
    throw new StatusInputError(`windowDays must be a positive integer, got ${windowDays}`);
  }
  const start = isISODate(asOfDate) ? addDaysUTC(asOfDate, -(windowDays - 1)) : null;
  if (!start) throw new StatusInputError(`invalid asOfDate ${asOfDate}`);
  return start;
}

/** Calendar days a baseline as of `asOfDate` looks at, inclusive. */
export function baselineWindow(asOfDate: ISODate, windowDays: number): DateRange {
  return { start: windowStartFor(asOfDate, windowDays), end: asOfDate };
}

// First index whose date is >= dayKey. Series dates are strictly increasing.
function lowerBound(series: MetricSeries, dayKey: ISODate): number {
  let lo = 0;
  let hi = series.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (series[mid].date < dayKey) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/**
 * Mean is accumulated relative to the first value so that a window of identical
 * values yields exactly that value and a stddev of exactly 0.
 */
function summarize(values: number[]): { mean: number | null; stddev: number | null } {
  const n = values.length;
  if (n === 0) return { mean: null, stddev: null };

  const shift = values[0];
  let shiftedSum = 0;
  for (const v of values) shiftedSum += v - shift;
  const mean = shift + shiftedSum / n;
  if (n === 1) return { mean, stddev: null };

  let squares = 0;
  for (const v of values) squares += (v - mean) ** 2;
  return { mean, stddev: Math.sqrt(squares / (n - 1)) };
}

function presentValues(series: MetricSeries, from: number, to: number): number[] {
  const out: number[] = [];
  for (let i = from; i < to; i++) {
    const v = series[i].value;
    if (v != null) out.push(v);
  }
  return out;
}

function baselineFrom(
  metricName: MetricName,
  asOfDate: ISODate,
  windowDays: number,
  values: number[],
): Baseline {
  const { mean, stddev } = summarize(values);
  return { metricName, asOfDate, windowDays, mean, stddev, sampleCount: values.length };
}

/**
 * Rolling baseline over the calendar window [asOfDate - windowDays + 1, asOfDate].
 *
 * - sampleCount counts non-absent values inside the window; missing days shrink it
 *   but never move the window.
 * - mean/stddev are null with no samples; stddev is null with a single sample.
 *
 * The series must be ordered by strictly increasing date (see `assertMetricSeries`).
 */
export function computeBaseline(
  metricName: MetricName,
  series: MetricSeries,
  asOfDate: ISODate,
  windowDays: number,
): Baseline {
  const start = windowStartFor(asOfDate, windowDays);
  const from = lowerBound(series, start);
  let to = from;
  while (to < series.length && series[to].date <= asOfDate) to++;
  return baselineFrom(metricName, asOfDate, windowDays, presentValues(series, from, to));
}

/**
 * One baseline per day in [startDate, endDate], sliding the window over a series
 * fetched once. Each element is identical to `computeBaseline` for that day.
 */
export function computeBaselineRange(
  metricName: MetricName,
  series: MetricSeries,
  startDate: ISODate,
  endDate: ISODate,
  windowDays: number,
): Baseline[] {
  windowStartFor(startDate, windowDays);
  if (!isISODate(endDate)) throw new StatusInputError(`invalid endDate ${endDate}`);
  if (endDate < startDate) {
    throw new StatusInputError(`endDate ${endDate} is before startDate ${startDate}`);
  }

  const out: Baseline[] = [];
  let lo = 0;
  let hi = 0;
  for (const day of eachDay(startDate, endDate)) {
    const windowStart = windowStartFor(day, windowDays);
    while (hi < series.length && series[hi].date <= day) hi++;
    while (lo < hi && series[lo].date < windowStart) lo++;
    out.push(baselineFrom(metricName, day, windowDays, presentValues(series, lo, hi)));
  }
  return out;
}

export type BaselineSnapshot = {
  metric_name: string;
  as_of_date: string;
  window_days: number;
  mean: number | null;
  std_dev: number | null;
  sample_count: number;
};

export function baselineToJSON(b: Baseline): BaselineSnapshot {
  return {
    metric_name: b.metricName,
    as_of_date: b.asOfDate,
    window_days: b.windowDays,
    mean: b.mean,
    std_dev: b.stddev,
    sample_count: b.sampleCount,
  };
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function isFiniteOrNull(x: unknown): x is number | null {
  return x === null || (typeof x === "number" && Number.isFinite(x));
}

/** Parse a snapshot produced by `baselineToJSON`, rejecting shapes no computation can produce. */
export function baselineFromJSON(raw: unknown): Baseline {
  if (!isRecord(raw)) throw new StatusInputError("baseline snapshot must be an object");
  const { metric_name, as_of_date, window_days, mean, std_dev, sample_count } = raw;

  if (typeof metric_name !== "string" || !metric_name) throw new StatusInputError("metric_name missing");
  if (!isISODate(as_of_date)) throw new StatusInputError(`invalid as_of_date ${String(as_of_date)}`);
  if (typeof window_days !== "number" || !Number.isInteger(window_days) || window_days <= 0) {
    throw new StatusInputError(`invalid window_days ${String(window_days)}`);
  }
  if (typeof sample_count !== "number" || !Number.isInteger(sample_count) || sample_count < 0) {
    throw new StatusInputError(`invalid sample_count ${String(sample_count)}`);
  }
  if (!isFiniteOrNull(mean) || !isFiniteOrNull(std_dev)) {
    throw new StatusInputError("mean and std_dev must be finite numbers or null");
  }
  if ((mean === null) !== (sample_count === 0)) {
    throw new StatusInputError("mean must be null exactly when sample_count is 0");
  }
  if ((std_dev === null) !== (sample_count < 2)) {
    throw new StatusInputError("std_dev must be null exactly when sample_count < 2");
  }
  if (std_dev !== null && std_dev < 0) throw new StatusInputError("std_dev must be >= 0");

  return {
    metricName: metric_name,
    asOfDate: as_of_date,
    windowDays: window_days,
    mean,
    stddev: std_dev,
    sampleCount: sample_count,
  };
}
