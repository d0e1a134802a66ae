export type {
  Baseline,
  DailyStatus,
  DateRange,
  DeviationResult,
  DeviationStatus,
  Direction,
  DirectionalityPolicy,
  ISODate,
  MetricName,
  MetricRequest,
  MetricSeries,
  MetricSource,
  MetricStatusRecord,
  Observation,
  ObservationCategory,
  SeriesPoint,
} from "./status/types.ts";
export {
  baselineFromJSON,
  baselineToJSON,
  baselineWindow,
  computeBaseline,
  computeBaselineRange,
  type BaselineSnapshot,
} from "./status/baseline.ts";
export { classifyDeviation, evaluateDeviation, validatePolicy, zScore } from "./status/threshold.ts";
export { extractDailyValue, extractMetricValue, metricSources, sourcesFor } from "./status/extract.ts";
export { defaultMetricRequests, knownMetricNames, metricPolicies, policyFor, windowDaysFor } from "./status/policies.ts";
export {
  buildMetricSeries,
  observationSeriesSource,
  type ObservationStore,
  type SeriesSource,
} from "./status/series.ts";
export { evaluateDailyStatus, type DailyStatusParams } from "./status/aggregate.ts";
export { ObservationStoreError, StatusInputError } from "./status/errors.ts";
export { supabaseObservationStore, OBSERVATIONS_TABLE } from "./store/supabase.ts";
