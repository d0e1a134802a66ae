export type DailyStatusConfig = {
  supabaseUrl: string;
  supabaseKey: string;
  adminSecret: string; // empty => every POST is rejected
  port: number;
  observationQueryTimeoutMs: number;
};

type Env = Record<string, string | undefined>;

function required(env: Env, key: string): string {
  const value = env[key];
  if (!value) {
    throw new Error(
      `Missing required environment variable: ${key}\n` +
        `Please set it before starting the function (see .env.example).`,
    );
  }
  return value;
}

function positiveInt(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw == null || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) throw new Error(`${key} must be a positive integer, got "${raw}"`);
  return n;
}

export function loadConfig(env: Env = process.env): DailyStatusConfig {
  const supabaseUrl = required(env, "SUPABASE_URL");
  const supabaseKey = env.SUPABASE_SERVICE_ROLE_KEY || required(env, "SUPABASE_ANON_KEY");

  return {
    supabaseUrl,
    supabaseKey,
    adminSecret: env.BASELINE_ADMIN_SECRET ?? "",
    port: positiveInt(env, "PORT", 8787),
    observationQueryTimeoutMs: positiveInt(env, "OBSERVATION_QUERY_TIMEOUT_MS", 8000),
  };
}
