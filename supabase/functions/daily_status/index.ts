// Daily status function: evaluates every configured metric for one user and day.
// POST { userId, date?, metrics? } with x-admin-secret; GET is a liveness probe.

import "dotenv/config";
import { createClient } from "@supabase/supabase-js";
import { loadConfig } from "./config.ts";
import { buildDailyStatusApp } from "./app.ts";
import { observationSeriesSource } from "../baselining/status/series.ts";
import { supabaseObservationStore } from "../baselining/store/supabase.ts";
import { metricPolicies } from "../baselining/status/policies.ts";
import { errorMessage } from "../baselining/status/errors.ts";

const config = loadConfig();

const supabase = createClient(config.supabaseUrl, config.supabaseKey, {
  auth: {
    autoRefreshToken: false,
    persistSession: false,
  },
});

const store = supabaseObservationStore(supabase, { timeoutMs: config.observationQueryTimeoutMs });
const app = buildDailyStatusApp({
  source: observationSeriesSource(store),
  adminSecret: config.adminSecret,
});

if (!config.adminSecret) {
  console.warn("⚠️ BASELINE_ADMIN_SECRET is not set; every POST will be rejected");
}

try {
  await app.listen({ port: config.port, host: "0.0.0.0" });
  console.log("🚀 DAILY_STATUS_LISTENING", { port: config.port, policies: metricPolicies.version });
} catch (err) {
  console.error("🔴 DAILY_STATUS_START_FAILED", { error: errorMessage(err) });
  process.exit(1);
}
