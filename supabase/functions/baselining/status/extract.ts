import sourcesJson from "./sources.v1.json" with { type: "json" };
import type { KeyPath, MetricName, MetricSource, Observation, ObservationCategory, SourceConfig } from "./types.ts";

const CATEGORIES: readonly ObservationCategory[] = [
  "sleep",
  "stress",
  "hrv",
  "body_battery",
  "heart_rate",
  "resting_heart_rate",
  "activities",
  "spo2",
  "respiration",
  "steps",
];

export function isObservationCategory(x: unknown): x is ObservationCategory {
  return typeof x === "string" && CATEGORIES.some((c) => c === x);
}

function asNumOrNull(x: unknown): number | null {
  if (typeof x === "number") return Number.isFinite(x) ? x : null;
  if (typeof x === "string" && x.trim().length > 0) {
    const n = Number(x);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function valueAt(payload: unknown, path: KeyPath): unknown {
  let cur: unknown = payload;
  for (const key of path) {
    if (!isRecord(cur)) return null;
    cur = cur[key] ?? null;
  }
  return cur;
}

function numberAt(payload: unknown, path: KeyPath): number | null {
  return asNumOrNull(valueAt(payload, path));
}

function sumAt(payload: unknown, paths: KeyPath[]): number | null {
  let total = 0;
  for (const p of paths) {
    const v = numberAt(payload, p);
    if (v == null) return null;
    total += v;
  }
  return total;
}

function columnOf(payload: unknown, path: KeyPath, index: number): number[] {
  const rows = valueAt(payload, path);
  if (!Array.isArray(rows)) return [];
  const out: number[] = [];
  for (const row of rows) {
    if (!Array.isArray(row)) continue;
    const v = asNumOrNull(row[index]);
    if (v != null) out.push(v);
  }
  return out;
}

/**
 * Scalar for one source out of one observation. Missing fields and type
 * mismatches are absence (null); this never throws.
 */
export function extractMetricValue(observation: Observation, source: MetricSource): number | null {
  if (observation.category !== source.category) return null;
  const payload = observation.payload;

  switch (source.kind) {
    case "field":
      return numberAt(payload, source.path);
    case "sum":
      return sumAt(payload, source.paths);
    case "share_percent": {
      const part = numberAt(payload, source.part);
      const whole = sumAt(payload, source.whole);
      if (part == null || whole == null || whole <= 0) return null;
      return (part * 100) / whole;
    }
    case "span_percent": {
      const total = sumAt(payload, source.paths);
      const start = numberAt(payload, source.start);
      const end = numberAt(payload, source.end);
      if (total == null || start == null || end == null) return null;
      const spanSeconds = (end - start) / 1000;
      return spanSeconds > 0 ? (total * 100) / spanSeconds : null;
    }
    case "array_max": {
      const col = columnOf(payload, source.path, source.index);
      return col.length ? col.reduce((a, b) => (b > a ? b : a)) : null;
    }
    case "array_min": {
      const col = columnOf(payload, source.path, source.index);
      return col.length ? col.reduce((a, b) => (b < a ? b : a)) : null;
    }
    default: {
      const _exhaustive: never = source;
      return null;
    }
  }
}

/**
 * One day's value for a metric: sources are tried in declared priority order and
 * the first non-absent value wins. Values from lower-priority sources are never
 * averaged in.
 */
export function extractDailyValue(observations: Observation[], sources: MetricSource[]): number | null {
  for (const source of sources) {
    for (const obs of observations) {
      if (obs.category !== source.category) continue;
      const v = extractMetricValue(obs, source);
      if (v != null) return v;
    }
  }
  return null;
}

function assert(condition: unknown, message: string): asserts condition {
  if (!condition) throw new Error(message);
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function isKeyPath(x: unknown): x is KeyPath {
  return Array.isArray(x) && x.length > 0 && x.every((k) => typeof k === "string" && k.length > 0);
}

function isKeyPathList(x: unknown): x is KeyPath[] {
  return Array.isArray(x) && x.length > 0 && x.every(isKeyPath);
}

function parseSource(raw: unknown, ctx: string): MetricSource {
  assert(isRecord(raw), `${ctx}: must be an object`);
  const { kind, category } = raw;
  assert(isObservationCategory(category), `${ctx}: unknown category ${String(category)}`);

  switch (kind) {
    case "field":
      assert(isKeyPath(raw.path), `${ctx}: path must be a non-empty key list`);
      return { kind: "field", category, path: raw.path };
    case "sum":
      assert(isKeyPathList(raw.paths), `${ctx}: paths must be a non-empty list of key lists`);
      return { kind: "sum", category, paths: raw.paths };
    case "share_percent":
      assert(isKeyPath(raw.part), `${ctx}: part must be a key list`);
      assert(isKeyPathList(raw.whole), `${ctx}: whole must be a list of key lists`);
      return { kind: "share_percent", category, part: raw.part, whole: raw.whole };
    case "span_percent":
      assert(isKeyPathList(raw.paths), `${ctx}: paths must be a list of key lists`);
      assert(isKeyPath(raw.start) && isKeyPath(raw.end), `${ctx}: start/end must be key lists`);
      return { kind: "span_percent", category, paths: raw.paths, start: raw.start, end: raw.end };
    case "array_max":
    case "array_min":
      assert(isKeyPath(raw.path), `${ctx}: path must be a key list`);
      assert(typeof raw.index === "number" && Number.isInteger(raw.index) && raw.index >= 0, `${ctx}: bad index`);
      return { kind: kind === "array_max" ? "array_max" : "array_min", category, path: raw.path, index: raw.index };
    default:
      throw new Error(`${ctx}: unknown source kind ${String(kind)}`);
  }
}

export function parseSourceConfig(raw: unknown): SourceConfig {
  assert(isRecord(raw) && isRecord(raw.metrics), "source config must have a metrics object");
  return Object.fromEntries(
    Object.entries(raw.metrics).map(([name, list]): [MetricName, MetricSource[]] => {
      assert(Array.isArray(list) && list.length > 0, `metric ${name}: needs at least one source`);
      return [name, list.map((s, i) => parseSource(s, `metric ${name} source #${i}`))];
    }),
  );
}

export const metricSources: SourceConfig = parseSourceConfig(sourcesJson);

export function sourcesFor(metricName: MetricName, config: SourceConfig = metricSources): MetricSource[] | null {
  return Object.hasOwn(config, metricName) ? config[metricName] : null;
}

export function categoriesFor(sources: MetricSource[]): ObservationCategory[] {
  return Array.from(new Set(sources.map((s) => s.category)));
}
