import { createSupabaseAdmin, getEnv, getSettings } from "./config.js";
import { logger } from "./logger.js";
import { buildServer } from "./server.js";
import { createExcelReportSink } from "./services/excel.js";
import { MemoryStore } from "./store/memory.js";
import { SupabaseStore } from "./store/supabase.js";

const env = getEnv();
const settings = getSettings();

const store = env.STORE === "memory" ? new MemoryStore() : new SupabaseStore(createSupabaseAdmin(env));
const reports = createExcelReportSink({ dir: env.REPORT_DIR });

if (!env.API_TOKEN) logger.warn({ evt: "api_token_unset" }, "API_TOKEN is not set; bot and admin routes are open");

const app = buildServer({ store, reports, settings, apiToken: env.API_TOKEN, logLevel: env.LOG_LEVEL });

logger.info({ evt: "api_starting", store: env.STORE, time_zone: settings.timeZone, period_days: settings.periodDays }, "starting");
await app.listen({ port: env.PORT, host: "0.0.0.0" });
