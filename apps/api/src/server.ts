import Fastify from "fastify";
import cors from "@fastify/cors";
import { ZodError } from "zod";
import { localDateString } from "@replyledger/shared";
import type { TrackerSettings } from "./config.js";
import { TrackerError } from "./errors.js";
import { registerAdminRoutes } from "./routes/admin.js";
import { registerBotRoutes } from "./routes/bot.js";
import type { RouteContext } from "./routes/context.js";
import { createKeyedQueue } from "./services/keyedQueue.js";
import { createQuotaLedger } from "./services/ledger.js";
import { createOnboardingService } from "./services/onboarding.js";
import { createPeriodService } from "./services/periods.js";
import type { ReportSink } from "./services/reportSink.js";
import { createReportingService } from "./services/reporting.js";
import type { TrackerStore } from "./store/types.js";

export type ServerDeps = {
  store: TrackerStore;
  reports: ReportSink;
  settings: TrackerSettings;
  apiToken?: string | undefined;
  now?: () => Date;
  logLevel?: string;
};

export function buildServer(deps: ServerDeps) {
  const app = Fastify({
    logger: {
      level: deps.logLevel ?? process.env.LOG_LEVEL ?? "info"
    }
  });

  void app.register(cors, { origin: true });

  const now = deps.now ?? (() => new Date());
  const accounts = createKeyedQueue();
  const writes = createKeyedQueue();
  const ctx: RouteContext = {
    store: deps.store,
    settings: deps.settings,
    ledger: createQuotaLedger({ store: deps.store, reports: deps.reports, queue: writes }),
    onboarding: createOnboardingService({ store: deps.store, reports: deps.reports, settings: deps.settings, accounts, now }),
    periods: createPeriodService({ store: deps.store, settings: deps.settings, accounts, writes }),
    reporting: createReportingService({ store: deps.store }),
    apiToken: deps.apiToken,
    now,
    today: () => localDateString(now(), deps.settings.timeZone)
  };

  app.setErrorHandler((err, req, reply) => {
    if (err instanceof TrackerError) {
      if (err.kind === "consistency") req.log.warn({ evt: "consistency_signal", code: err.code }, err.message);
      else if (err.statusCode >= 500) req.log.error({ evt: "request_failed", code: err.code, err }, err.message);
      return reply.code(err.statusCode).send({ ok: false, error: err.code, kind: err.kind, message: err.message });
    }
    if (err instanceof ZodError) {
      const message = err.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message)).join("; ");
      return reply.code(400).send({ ok: false, error: "invalid_request", kind: "validation", message });
    }
    // Fastify's own 4xx (malformed JSON, unsupported media type, body too large).
    if (typeof err.statusCode === "number" && err.statusCode < 500) {
      return reply.code(err.statusCode).send({ ok: false, error: err.code ?? "bad_request", kind: "validation", message: err.message });
    }
    req.log.error({ evt: "unhandled_error", err }, "request failed");
    return reply.code(500).send({ ok: false, error: "internal_error", kind: "persistence", message: "The operation did not complete" });
  });

  app.get("/health", async () => {
    return { ok: true, service: "replyledger-api", ts: now().toISOString() };
  });

  registerBotRoutes(app, ctx);
  registerAdminRoutes(app, ctx);

  return app;
}
