import { createClient } from "@supabase/supabase-js";
import { DEFAULT_LINK_LIMIT, MAX_TARGET_PER_DAY, intFromEnv, isValidTimeZone, loadEnvLocal } from "@replyledger/shared";

loadEnvLocal(import.meta.url);

export type StoreKind = "supabase" | "memory";

export type Env = {
  PORT: number;
  STORE: StoreKind;
  SUPABASE_URL?: string | undefined;
  SUPABASE_SERVICE_ROLE_KEY?: string | undefined;
  API_TOKEN?: string | undefined; // shared secret for bot and admin callers (x-api-token)
  LOG_LEVEL: string;
  REPORT_DIR: string;
};

// Knobs the services read; kept apart from Env so tests can build them without touching process.env.
export type TrackerSettings = {
  timeZone: string;
  periodDays: number;
  maxDailyTarget: number;
  maxLinksPerMessage: number;
};

export const DEFAULT_SETTINGS: TrackerSettings = {
  timeZone: "UTC",
  periodDays: 60,
  maxDailyTarget: MAX_TARGET_PER_DAY,
  maxLinksPerMessage: DEFAULT_LINK_LIMIT
};

export function getEnv(): Env {
  const store: StoreKind = process.env.STORE?.trim() === "memory" ? "memory" : "supabase";
  if (store === "supabase") {
    for (const k of ["SUPABASE_URL", "SUPABASE_SERVICE_ROLE_KEY"] as const) {
      if (!process.env[k]?.trim()) throw new Error(`Missing env: ${k}`);
    }
  }
  return {
    PORT: intFromEnv(process.env.PORT, 3001, { min: 1, max: 65535 }),
    STORE: store,
    SUPABASE_URL: process.env.SUPABASE_URL?.trim() || undefined,
    SUPABASE_SERVICE_ROLE_KEY: process.env.SUPABASE_SERVICE_ROLE_KEY?.trim() || undefined,
    API_TOKEN: process.env.API_TOKEN?.trim() || undefined,
    LOG_LEVEL: process.env.LOG_LEVEL?.trim() || "info",
    REPORT_DIR: process.env.REPORT_DIR?.trim() || "reports"
  };
}

export function getSettings(): TrackerSettings {
  const tz = process.env.TRACKER_TIMEZONE?.trim() || DEFAULT_SETTINGS.timeZone;
  if (!isValidTimeZone(tz)) throw new Error(`Invalid TRACKER_TIMEZONE: ${tz}`);
  return {
    timeZone: tz,
    periodDays: intFromEnv(process.env.PERIOD_DAYS, DEFAULT_SETTINGS.periodDays, { min: 1, max: 366 }),
    maxDailyTarget: intFromEnv(process.env.MAX_DAILY_TARGET, DEFAULT_SETTINGS.maxDailyTarget, { min: 1, max: MAX_TARGET_PER_DAY }),
    maxLinksPerMessage: intFromEnv(process.env.MAX_LINKS_PER_MESSAGE, DEFAULT_SETTINGS.maxLinksPerMessage, { min: 1, max: 500 })
  };
}

export function createSupabaseAdmin(env: Env) {
  if (!env.SUPABASE_URL || !env.SUPABASE_SERVICE_ROLE_KEY) {
    throw new Error("Missing env: SUPABASE_URL / SUPABASE_SERVICE_ROLE_KEY");
  }
  return createClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_ROLE_KEY, {
    auth: { persistSession: false }
  });
}

export type SupabaseAdmin = ReturnType<typeof createSupabaseAdmin>;
