import type { ISODate } from "./types.ts";

const DAY_KEY_RE = /^\d{4}-\d{2}-\d{2}$/;

export function parseISODateYYYYMMDDToUTCDate(dayKey: ISODate): Date | null {
  if (!DAY_KEY_RE.test(dayKey)) return null;
  const d = new Date(`${dayKey}T00:00:00Z`);
  if (Number.isNaN(d.getTime())) return null;
  // Reject rollovers such as 2025-02-30 -> 2025-03-02.
  return toYYYYMMDD(d) === dayKey ? d : null;
}

export function isISODate(v: unknown): v is ISODate {
  return typeof v === "string" && parseISODateYYYYMMDDToUTCDate(v) != null;
}

export function toYYYYMMDD(d: Date): ISODate {
  return d.toISOString().slice(0, 10);
}

export function addDaysUTC(dayKey: ISODate, deltaDays: number): ISODate | null {
  const d = parseISODateYYYYMMDDToUTCDate(dayKey);
  if (!d) return null;
  d.setUTCDate(d.getUTCDate() + deltaDays);
  return toYYYYMMDD(d);
}

export function clampEndDateToToday(dayKey: ISODate, now: Date = new Date()): ISODate {
  const today = toYYYYMMDD(now);
  return dayKey > today ? today : dayKey;
}

/** Inclusive list of day keys from start to end; empty when end < start. */
export function eachDay(start: ISODate, end: ISODate): ISODate[] {
  const out: ISODate[] = [];
  for (let cur: ISODate | null = start; cur != null && cur <= end; cur = addDaysUTC(cur, 1)) {
    out.push(cur);
  }
  return out;
}
