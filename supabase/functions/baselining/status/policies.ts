import policiesJson from "./policies.v1.json" with { type: "json" };
import type { DirectionalityPolicy, MetricName, MetricPolicyConfig, MetricRequest } from "./types.ts";
import { isDirection, validatePolicy } from "./threshold.ts";
import { StatusInputError } from "./errors.ts";

function assert(condition: unknown, message: string): asserts condition {
  if (!condition) throw new Error(message);
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function isFiniteNumber(x: unknown): x is number {
  return typeof x === "number" && Number.isFinite(x);
}

function optionalNumber(x: unknown, ctx: string): number | undefined {
  if (x === undefined) return undefined;
  assert(isFiniteNumber(x), `${ctx}: must be a finite number`);
  return x;
}

function assertWindowDays(x: number, ctx: string): void {
  assert(Number.isInteger(x) && x > 0, `${ctx}: windowDays must be a positive integer, got ${x}`);
}

export function parsePolicyConfig(raw: unknown): MetricPolicyConfig {
  assert(isRecord(raw), "policy config must be an object");
  assert(typeof raw.version === "string" && raw.version.length > 0, "version missing");

  const d = raw.defaults;
  assert(isRecord(d), "defaults missing");
  assert(isFiniteNumber(d.optimalBoundary), "defaults.optimalBoundary missing/invalid");
  assert(isFiniteNumber(d.warningBoundary), "defaults.warningBoundary missing/invalid");
  assert(isFiniteNumber(d.windowDays), "defaults.windowDays missing/invalid");
  assertWindowDays(d.windowDays, "defaults");
  const defaults = { optimalBoundary: d.optimalBoundary, warningBoundary: d.warningBoundary, windowDays: d.windowDays };

  assert(isRecord(raw.metrics) && Object.keys(raw.metrics).length > 0, "metrics missing");
  const entries: Array<[MetricName, MetricPolicyConfig["metrics"][MetricName]]> = [];
  for (const [name, m] of Object.entries(raw.metrics)) {
    assert(isRecord(m), `metric ${name}: must be an object`);
    assert(isDirection(m.direction), `metric ${name}: unknown direction ${String(m.direction)}`);
    const windowDays = optionalNumber(m.windowDays, `metric ${name} windowDays`);
    if (windowDays !== undefined) assertWindowDays(windowDays, `metric ${name}`);
    const entry = {
      direction: m.direction,
      windowDays,
      optimalBoundary: optionalNumber(m.optimalBoundary, `metric ${name} optimalBoundary`),
      warningBoundary: optionalNumber(m.warningBoundary, `metric ${name} warningBoundary`),
      description: typeof m.description === "string" ? m.description : undefined,
    };
    entries.push([name, entry]);
  }
  const metrics: MetricPolicyConfig["metrics"] = Object.fromEntries(entries);

  const config: MetricPolicyConfig = { version: raw.version, defaults, metrics };
  // Every resolved policy must be classifiable.
  for (const name of Object.keys(metrics)) validatePolicy(policyFor(name, config));
  return config;
}

// Validated at module load.
export const metricPolicies: MetricPolicyConfig = parsePolicyConfig(policiesJson);

function metricPolicyEntry(metricName: MetricName, config: MetricPolicyConfig): MetricPolicyConfig["metrics"][MetricName] {
  if (!Object.hasOwn(config.metrics, metricName)) {
    throw new StatusInputError(`no directionality policy for metric ${metricName}`);
  }
  return config.metrics[metricName];
}

export function policyFor(metricName: MetricName, config: MetricPolicyConfig = metricPolicies): DirectionalityPolicy {
  const m = metricPolicyEntry(metricName, config);
  return {
    direction: m.direction,
    optimalBoundary: m.optimalBoundary ?? config.defaults.optimalBoundary,
    warningBoundary: m.warningBoundary ?? config.defaults.warningBoundary,
  };
}

export function windowDaysFor(metricName: MetricName, config: MetricPolicyConfig = metricPolicies): number {
  const m = metricPolicyEntry(metricName, config);
  return m.windowDays ?? config.defaults.windowDays;
}

export function knownMetricNames(config: MetricPolicyConfig = metricPolicies): MetricName[] {
  return Object.keys(config.metrics);
}

/** Requests for the given metrics (all configured metrics by default), in catalog order. */
export function defaultMetricRequests(
  metricNames?: MetricName[],
  config: MetricPolicyConfig = metricPolicies,
): MetricRequest[] {
  return (metricNames ?? knownMetricNames(config)).map((metricName) => ({
    metricName,
    policy: policyFor(metricName, config),
    windowDays: windowDaysFor(metricName, config),
  }));
}
