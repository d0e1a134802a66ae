import Fastify, { type FastifyInstance, type FastifyReply } from "fastify";
import type { SeriesSource } from "../baselining/status/series.ts";
import type { ISODate, MetricName } from "../baselining/status/types.ts";
import { evaluateDailyStatus } from "../baselining/status/aggregate.ts";
import { defaultMetricRequests, knownMetricNames } from "../baselining/status/policies.ts";
import { clampEndDateToToday, isISODate, toYYYYMMDD } from "../baselining/status/dates.ts";
import { errorMessage, StatusInputError } from "../baselining/status/errors.ts";

const corsHeaders = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "POST,OPTIONS,GET",
  "Access-Control-Allow-Headers": "Content-Type, Authorization, apikey, x-admin-secret",
};

export type DailyStatusDeps = {
  source: SeriesSource;
  adminSecret: string;
  now?: () => Date;
};

export type DailyStatusBody = {
  userId: string;
  date: ISODate;
  metrics: MetricName[];
};

function jsonResponse(reply: FastifyReply, body: Record<string, unknown>, status = 200) {
  return reply.code(status).headers(corsHeaders).type("application/json").send(body);
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function isStringList(x: unknown): x is string[] {
  return Array.isArray(x) && x.every((m) => typeof m === "string");
}

function asString(v: unknown): string | null {
  return typeof v === "string" && v.trim().length > 0 ? v.trim() : null;
}

/** `date` defaults to today and is clamped to today; `metrics` defaults to the whole catalog. */
export function parseDailyStatusBody(raw: unknown, now: Date): { ok: true; body: DailyStatusBody } | { ok: false; error: string } {
  const body: Record<string, unknown> = isRecord(raw) ? raw : {};

  const userId = asString(body.userId);
  if (!userId) return { ok: false, error: "userId is required" };

  let date = toYYYYMMDD(now);
  if (body.date != null) {
    if (!isISODate(body.date)) return { ok: false, error: `invalid date ${String(body.date)}` };
    date = clampEndDateToToday(body.date, now);
  }

  const known = knownMetricNames();
  let metrics = known;
  if (body.metrics != null) {
    if (!isStringList(body.metrics) || !body.metrics.length) {
      return { ok: false, error: "metrics must be a non-empty list of metric names" };
    }
    const requested = Array.from(new Set(body.metrics));
    const unknown = requested.filter((m) => !known.includes(m));
    if (unknown.length) return { ok: false, error: `unknown metrics: ${unknown.join(",")}` };
    metrics = requested;
  }

  return { ok: true, body: { userId, date, metrics } };
}

export function buildDailyStatusApp(deps: DailyStatusDeps): FastifyInstance {
  const now = deps.now ?? (() => new Date());
  const app = Fastify({ logger: false });

  app.setErrorHandler((err, _req, reply) => {
    const status = err.statusCode && err.statusCode >= 400 ? err.statusCode : 500;
    if (status >= 500) console.error("🔴 DAILY_STATUS_ERROR", { error: err.message });
    return jsonResponse(reply, { ok: false, error: err.message }, status);
  });

  app.options("/", async (_req, reply) => reply.code(204).headers(corsHeaders).send());

  app.get("/", async (_req, reply) => jsonResponse(reply, { ok: true, message: "daily_status alive" }));

  app.route({
    method: ["PUT", "PATCH", "DELETE"],
    url: "/",
    handler: async (_req, reply) => jsonResponse(reply, { ok: false, error: "Method not allowed" }, 405),
  });

  app.post<{ Body: unknown }>("/", async (req, reply) => {
    const provided = req.headers["x-admin-secret"];
    if (!deps.adminSecret || provided !== deps.adminSecret) {
      return jsonResponse(reply, { ok: false, error: "Unauthorized" }, 401);
    }

    const parsed = parseDailyStatusBody(req.body, now());
    if (!parsed.ok) return jsonResponse(reply, { ok: false, error: parsed.error }, 400);
    const { userId, date, metrics } = parsed.body;

    try {
      const statuses = await evaluateDailyStatus(deps.source, {
        userId,
        date,
        requests: defaultMetricRequests(metrics),
      });

      const unavailable = Object.values(statuses).filter((r) => r.status === "unavailable").length;
      console.log("🟢 DAILY_STATUS_EVALUATED", { userId, date, metrics: metrics.length, unavailable });

      return jsonResponse(reply, { ok: true, userId, date, statuses });
    } catch (err) {
      if (err instanceof StatusInputError) return jsonResponse(reply, { ok: false, error: err.message }, 400);
      console.error("🔴 DAILY_STATUS_EVALUATION_FAILED", { userId, date, error: errorMessage(err) });
      return jsonResponse(reply, { ok: false, error: errorMessage(err) }, 500);
    }
  });

  return app;
}
