import { DEFAULT_LINK_LIMIT, MAX_TARGET_PER_DAY, intFromEnv, isValidTimeZone, loadEnvLocal } from "@replyledger/shared";

loadEnvLocal(import.meta.url);

export type Env = {
  DISCORD_TOKEN: string;
  GUILD_ID?: string | undefined;
  API_BASE_URL: string;
  API_TOKEN?: string | undefined;
  LOG_LEVEL: string;
};

// Names and clocks the flows read; separate from Env so tests can build them directly.
export type BotSettings = {
  trackingRoleName: string;
  adminRoleName: string;
  trackingCategoryName: string;
  adminCategoryName: string;
  adminChannelName: string;
  timeZone: string;
  reminderHour: number;
  onboardingTtlMinutes: number;
  periodDays: number;
  maxDailyTarget: number;
  maxLinksPerMessage: number;
};

export const DEFAULT_BOT_SETTINGS: BotSettings = {
  trackingRoleName: "Reply Tracker",
  adminRoleName: "Admin",
  trackingCategoryName: "Reply Tracking",
  adminCategoryName: "Tracker Admin",
  adminChannelName: "tracker-admin",
  timeZone: "UTC",
  reminderHour: 9,
  onboardingTtlMinutes: 60,
  periodDays: 60,
  maxDailyTarget: MAX_TARGET_PER_DAY,
  maxLinksPerMessage: DEFAULT_LINK_LIMIT
};

export function getEnv(): Env {
  const token = process.env.DISCORD_TOKEN?.trim();
  if (!token) throw new Error("Missing env: DISCORD_TOKEN");
  return {
    DISCORD_TOKEN: token,
    GUILD_ID: process.env.GUILD_ID?.trim() || undefined,
    API_BASE_URL: process.env.API_BASE_URL?.trim() || "http://localhost:3001",
    API_TOKEN: process.env.API_TOKEN?.trim() || undefined,
    LOG_LEVEL: process.env.LOG_LEVEL?.trim() || "info"
  };
}

export function getSettings(): BotSettings {
  const d = DEFAULT_BOT_SETTINGS;
  const tz = process.env.TRACKER_TIMEZONE?.trim() || d.timeZone;
  if (!isValidTimeZone(tz)) throw new Error(`Invalid TRACKER_TIMEZONE: ${tz}`);
  const name = (key: string, fallback: string) => process.env[key]?.trim() || fallback;
  return {
    trackingRoleName: name("TRACKING_ROLE_NAME", d.trackingRoleName),
    adminRoleName: name("ADMIN_ROLE_NAME", d.adminRoleName),
    trackingCategoryName: name("TRACKING_CATEGORY_NAME", d.trackingCategoryName),
    adminCategoryName: name("ADMIN_CATEGORY_NAME", d.adminCategoryName),
    adminChannelName: name("ADMIN_CHANNEL_NAME", d.adminChannelName),
    timeZone: tz,
    reminderHour: intFromEnv(process.env.REMINDER_HOUR, d.reminderHour, { min: 0, max: 23 }),
    onboardingTtlMinutes: intFromEnv(process.env.ONBOARDING_TTL_MINUTES, d.onboardingTtlMinutes, { min: 1, max: 24 * 60 }),
    periodDays: intFromEnv(process.env.PERIOD_DAYS, d.periodDays, { min: 1, max: 366 }),
    maxDailyTarget: intFromEnv(process.env.MAX_DAILY_TARGET, d.maxDailyTarget, { min: 1, max: MAX_TARGET_PER_DAY }),
    maxLinksPerMessage: intFromEnv(process.env.MAX_LINKS_PER_MESSAGE, d.maxLinksPerMessage, { min: 1, max: 500 })
  };
}
