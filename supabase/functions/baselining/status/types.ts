export type ISODate = string; // YYYY-MM-DD

export type MetricName = string;

export type ObservationCategory =
  | "sleep"
  | "stress"
  | "hrv"
  | "body_battery"
  | "heart_rate"
  | "resting_heart_rate"
  | "activities"
  | "spo2"
  | "respiration"
  | "steps";

export type Observation = {
  userId: string;
  date: ISODate;
  category: ObservationCategory;
  payload: Record<string, unknown>;
};

export type DateRange = { start: ISODate; end: ISODate }; // inclusive on both ends

export type SeriesPoint = { date: ISODate; value: number | null }; // null = absent, never 0

export type MetricSeries = SeriesPoint[]; // dates strictly increasing

export type Baseline = {
  metricName: MetricName;
  asOfDate: ISODate;
  windowDays: number;
  mean: number | null;
  stddev: number | null; // sample (N-1) stddev; null when sampleCount < 2
  sampleCount: number;
};

export type DeviationStatus = "no_baseline" | "optimal" | "normal" | "warning" | "concerning";

export type Direction = "lowerIsBetter" | "higherIsBetter" | "symmetric";

export type DirectionalityPolicy = {
  direction: Direction;
  optimalBoundary: number; // sigma multiple
  warningBoundary: number; // sigma multiple, >= optimalBoundary
};

export type DeviationResult = {
  status: DeviationStatus;
  zScore: number | null;
};

export type KeyPath = string[];

export type MetricSource =
  | { kind: "field"; category: ObservationCategory; path: KeyPath }
  | { kind: "sum"; category: ObservationCategory; paths: KeyPath[] }
  | { kind: "share_percent"; category: ObservationCategory; part: KeyPath; whole: KeyPath[] }
  | { kind: "span_percent"; category: ObservationCategory; paths: KeyPath[]; start: KeyPath; end: KeyPath } // span in ms
  | { kind: "array_max"; category: ObservationCategory; path: KeyPath; index: number }
  | { kind: "array_min"; category: ObservationCategory; path: KeyPath; index: number };

export type SourceConfig = Record<MetricName, MetricSource[]>; // priority order: first non-absent wins

export type MetricPolicyConfig = {
  version: string;
  defaults: { optimalBoundary: number; warningBoundary: number; windowDays: number };
  metrics: Record<
    MetricName,
    {
      direction: Direction;
      windowDays?: number;
      optimalBoundary?: number;
      warningBoundary?: number;
      description?: string;
    }
  >;
};

export type MetricRequest = {
  metricName: MetricName;
  policy: DirectionalityPolicy;
  windowDays: number;
};

export type EvaluatedRecord = {
  metricName: MetricName;
  status: DeviationStatus;
  value: number | null;
  baseline: Baseline;
  zScore: number | null;
};

export type UnavailableRecord = {
  metricName: MetricName;
  status: "unavailable"; // store failed; distinct from no_baseline
  reason: string;
};

export type RejectedRecord = {
  metricName: MetricName;
  status: "rejected"; // input validation failed for this metric only
  reason: string;
};

export type MetricStatusRecord = EvaluatedRecord | UnavailableRecord | RejectedRecord;

export type DailyStatus = Record<MetricName, MetricStatusRecord>;
