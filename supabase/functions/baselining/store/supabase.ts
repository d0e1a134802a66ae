import type { SupabaseClient } from "@supabase/supabase-js";
import type { ISODate, Observation } from "../status/types.ts";
import type { ObservationStore } from "../status/series.ts";
import { isObservationCategory } from "../status/extract.ts";
import { isISODate } from "../status/dates.ts";
import { errorMessage, ObservationStoreError } from "../status/errors.ts";

export const OBSERVATIONS_TABLE = "health_observations";

const SELECT_COLUMNS = "user_id,observation_date,category,payload";

function toISODateYYYYMMDD(rawDate: unknown): ISODate | null {
  if (typeof rawDate !== "string") return null;
  // date columns arrive as YYYY-MM-DD; timestamps as YYYY-MM-DDTHH:mm:ss...
  const dayKey = /^\d{4}-\d{2}-\d{2}T/.test(rawDate) ? rawDate.slice(0, 10) : rawDate;
  return isISODate(dayKey) ? dayKey : null;
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

/** One `health_observations` row as an Observation; anything else is a store failure. */
export function observationFromRow(r: unknown): Observation {
  if (!isRecord(r)) throw new ObservationStoreError("observation row is not an object");

  const userId = r.user_id == null ? null : String(r.user_id);
  const date = toISODateYYYYMMDD(r.observation_date);
  const category = r.category;
  const payload = r.payload;

  if (!userId) throw new ObservationStoreError("observation row without user_id");
  if (!date) throw new ObservationStoreError(`observation row with bad date ${String(r.observation_date)}`);
  if (!isObservationCategory(category)) {
    throw new ObservationStoreError(`observation row with unknown category ${String(category)}`);
  }
  if (!isRecord(payload)) {
    throw new ObservationStoreError(`observation ${userId}/${date}/${category} has a non-object payload`);
  }

  return { userId, date, category, payload };
}

export type SupabaseObservationStoreOptions = {
  table?: string;
  timeoutMs?: number; // per query
};

export function supabaseObservationStore(
  supabase: SupabaseClient,
  options: SupabaseObservationStoreOptions = {},
): ObservationStore {
  const table = options.table ?? OBSERVATIONS_TABLE;

  return {
    async fetchObservations(userId, categories, range) {
      if (!categories.length) return [];

      let query = supabase
        .from(table)
        .select(SELECT_COLUMNS)
        .eq("user_id", userId)
        .in("category", categories)
        .gte("observation_date", range.start)
        .lte("observation_date", range.end)
        .order("observation_date", { ascending: true })
        .order("category", { ascending: true });

      if (options.timeoutMs != null && options.timeoutMs > 0) {
        query = query.abortSignal(AbortSignal.timeout(options.timeoutMs));
      }

      let result: Awaited<typeof query>;
      try {
        result = await query;
      } catch (err) {
        throw new ObservationStoreError(`${table} fetch failed: ${errorMessage(err)}`, { cause: err });
      }

      const { data, error } = result;
      if (error) throw new ObservationStoreError(`${table} fetch failed: ${error.message}`);

      const rows: unknown[] = data ?? [];
      return rows.map(observationFromRow);
    },
  };
}
