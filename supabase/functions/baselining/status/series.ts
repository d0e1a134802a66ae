import type {
  DateRange,
  ISODate,
  MetricName,
  MetricSeries,
  MetricSource,
  Observation,
  ObservationCategory,
  SourceConfig,
} from "./types.ts";
import { categoriesFor, extractDailyValue, metricSources, sourcesFor } from "./extract.ts";
import { isISODate } from "./dates.ts";
import { ObservationStoreError, StatusInputError } from "./errors.ts";

/** Read-only access to the dated, categorized observation table. */
export interface ObservationStore {
  fetchObservations(userId: string, categories: ObservationCategory[], range: DateRange): Promise<Observation[]>;
}

/** Time-ordered numeric series for one (user, metric). */
export interface SeriesSource {
  getMetricSeries(userId: string, metricName: MetricName, range: DateRange): Promise<MetricSeries>;
}

export function assertDateRange(range: DateRange): void {
  if (!isISODate(range.start) || !isISODate(range.end)) {
    throw new StatusInputError(`invalid date range start=${range.start} end=${range.end}`);
  }
  if (range.start > range.end) {
    throw new StatusInputError(`date range start ${range.start} is after end ${range.end}`);
  }
}

/**
 * A day appears once it has at least one observation in a source category; its
 * value is null when none of the sources yields a number.
 */
export function buildMetricSeries(
  observations: Observation[],
  sources: MetricSource[],
  range: DateRange,
): MetricSeries {
  const wanted = new Set(categoriesFor(sources));
  const byDay = new Map<ISODate, Observation[]>();
  for (const obs of observations) {
    if (!wanted.has(obs.category)) continue;
    if (obs.date < range.start || obs.date > range.end) continue;
    const day = byDay.get(obs.date);
    if (day) day.push(obs);
    else byDay.set(obs.date, [obs]);
  }

  return Array.from(byDay.keys())
    .sort()
    .map((date) => ({ date, value: extractDailyValue(byDay.get(date) ?? [], sources) }));
}

/** Series handed back by a source must be strictly increasing by date with finite-or-absent values. */
export function assertMetricSeries(series: MetricSeries): void {
  let prev: ISODate | null = null;
  for (const point of series) {
    if (!isISODate(point.date)) throw new ObservationStoreError(`malformed series date ${String(point.date)}`);
    if (prev != null && point.date <= prev) {
      throw new ObservationStoreError(`series dates not strictly increasing at ${point.date}`);
    }
    if (point.value != null && !Number.isFinite(point.value)) {
      throw new ObservationStoreError(`non-finite series value on ${point.date}`);
    }
    prev = point.date;
  }
}

export function observationSeriesSource(
  store: ObservationStore,
  sourceConfig: SourceConfig = metricSources,
): SeriesSource {
  return {
    async getMetricSeries(userId, metricName, range) {
      const sources = sourcesFor(metricName, sourceConfig);
      if (!sources) throw new StatusInputError(`no extraction sources for metric ${metricName}`);
      assertDateRange(range);

      const observations = await store.fetchObservations(userId, categoriesFor(sources), range);
      return buildMetricSeries(
        observations.filter((o) => o.userId === userId),
        sources,
        range,
      );
    },
  };
}
