import type { FastifyRequest } from "fastify";
import type { z } from "zod";
import type { TrackerSettings } from "../config.js";
import { TrackerError } from "../errors.js";
import type { QuotaLedger } from "../services/ledger.js";
import type { OnboardingService } from "../services/onboarding.js";
import type { PeriodService } from "../services/periods.js";
import type { ReportingService } from "../services/reporting.js";
import type { TrackerStore } from "../store/types.js";

export type RouteContext = {
  store: TrackerStore;
  settings: TrackerSettings;
  ledger: QuotaLedger;
  onboarding: OnboardingService;
  periods: PeriodService;
  reporting: ReportingService;
  apiToken: string | undefined;
  now: () => Date;
  today: () => string;
};

class UnauthorizedError extends TrackerError {
  constructor() {
    super("consistency", "unauthorized", "Missing or wrong x-api-token", 401);
  }
}

// Shared secret between the bot (and admin tooling) and this service. Unset means open, for local runs.
export function requireApiToken(ctx: RouteContext, req: FastifyRequest) {
  if (!ctx.apiToken) return;
  const header = req.headers["x-api-token"];
  const token = Array.isArray(header) ? header[0] : header;
  if (token !== ctx.apiToken) throw new UnauthorizedError();
}

// Throws ZodError on bad input; the server's error handler turns it into a validation response.
export function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  return schema.parse(value ?? {});
}
