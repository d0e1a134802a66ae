import type { DailyStatus, ISODate, MetricName, MetricRequest, MetricStatusRecord } from "./types.ts";
import { assertMetricSeries, type SeriesSource } from "./series.ts";
import { baselineWindow, computeBaseline } from "./baseline.ts";
import { evaluateDeviation, validatePolicy } from "./threshold.ts";
import { isISODate } from "./dates.ts";
import { errorMessage, StatusInputError } from "./errors.ts";

export type DailyStatusParams = {
  userId: string;
  date: ISODate;
  requests: MetricRequest[];
};

async function evaluateMetric(
  source: SeriesSource,
  userId: string,
  date: ISODate,
  request: MetricRequest,
): Promise<MetricStatusRecord> {
  const { metricName, policy, windowDays } = request;
  try {
    validatePolicy(policy);
    const range = baselineWindow(date, windowDays);

    const series = await source.getMetricSeries(userId, metricName, range);
    assertMetricSeries(series);

    const baseline = computeBaseline(metricName, series, date, windowDays);
    const value = series.find((p) => p.date === date)?.value ?? null;
    if (value == null) {
      // Nothing observed today: no classification, whatever the history looks like.
      return { metricName, status: "no_baseline", value: null, baseline, zScore: null };
    }

    const { status, zScore } = evaluateDeviation(value, baseline, policy);
    return { metricName, status, value, baseline, zScore };
  } catch (err) {
    if (err instanceof StatusInputError) {
      console.warn("🟠 BASELINE_METRIC_REJECTED", { userId, date, metricName, error: err.message });
      return { metricName, status: "rejected", reason: err.message };
    }
    console.error("🔴 BASELINE_METRIC_UNAVAILABLE", { userId, date, metricName, error: errorMessage(err) });
    return { metricName, status: "unavailable", reason: errorMessage(err) };
  }
}

/**
 * Status of every requested metric for one user on one day.
 *
 * Metrics are evaluated independently and concurrently. A failing metric is
 * reported in place (`unavailable` for store failures, `rejected` for invalid
 * input) and never aborts its siblings. Only a malformed call as a whole (bad
 * user id or date, the same metric requested twice) throws.
 */
export async function evaluateDailyStatus(source: SeriesSource, params: DailyStatusParams): Promise<DailyStatus> {
  const { userId, date, requests } = params;
  if (typeof userId !== "string" || userId.trim().length === 0) {
    throw new StatusInputError("userId is required");
  }
  if (!isISODate(date)) throw new StatusInputError(`invalid date ${date}`);

  const seen = new Set<string>();
  for (const r of requests) {
    if (seen.has(r.metricName)) throw new StatusInputError(`metric ${r.metricName} requested more than once`);
    seen.add(r.metricName);
  }

  const records = await Promise.all(requests.map((r) => evaluateMetric(source, userId, date, r)));

  // fromEntries defines own keys, so a name like "__proto__" stays a plain entry
  return Object.fromEntries(records.map((rec): [MetricName, MetricStatusRecord] => [rec.metricName, rec]));
}
