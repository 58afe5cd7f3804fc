import type { FastifyInstance } from "fastify";
import { z } from "zod";
import {
  externalIdBodySchema,
  externalIdSchema,
  extractLinks,
  onboardingBodySchema,
  periodStatusSchema,
  resourceBodySchema,
  submissionBodySchema,
  targetBodySchema,
  type PeriodEntry
} from "@replyledger/shared";
import { ConsistencyError, NotFoundError } from "../errors.js";
import { parse, requireApiToken, type RouteContext } from "./context.js";

const externalIdParams = z.object({ externalId: externalIdSchema });
const periodListQuery = z.object({
  status: periodStatusSchema.default("active"),
  with_resource: z.enum(["0", "1"]).optional()
});

/** Endpoints the bot calls. All of them require the shared x-api-token when one is configured. */
export function registerBotRoutes(app: FastifyInstance, ctx: RouteContext) {
  // The period a member is currently tracked by: active first, then paused.
  async function findTracked(externalId: string): Promise<PeriodEntry | null> {
    return (await ctx.store.getActiveTrackingPeriod(externalId)) ?? (await ctx.store.getTrackingPeriodByStatus(externalId, "paused"));
  }

  app.get("/bot/periods/:externalId", async (req) => {
    requireApiToken(ctx, req);
    const { externalId } = parse(externalIdParams, req.params);
    return { ok: true, entry: await findTracked(externalId) };
  });

  app.get("/bot/periods", async (req) => {
    requireApiToken(ctx, req);
    const q = parse(periodListQuery, req.query);
    const entries = await ctx.store.listPeriodsByStatus(q.status, { withResource: q.with_resource === "1" });
    return { ok: true, entries };
  });

  app.post("/bot/onboarding/complete", async (req) => {
    requireApiToken(ctx, req);
    const body = parse(onboardingBodySchema, req.body);
    const res = await ctx.onboarding.complete(body);
    return { ok: true, entry: { account: res.account, period: res.period }, report_ref: res.report_ref };
  });

  app.post("/bot/submissions", async (req) => {
    requireApiToken(ctx, req);
    const body = parse(submissionBodySchema, req.body);
    const entry = await findTracked(body.external_id);
    if (!entry) throw new NotFoundError("no_period", "No tracking period for this member");
    if (entry.account.resource_ref !== body.resource_ref) {
      throw new ConsistencyError("resource_mismatch", "Message was posted outside the member's own tracking channel");
    }
    const max = ctx.settings.maxLinksPerMessage;
    const links = extractLinks(body.text, { limit: max });
    const truncated = links.length === max && extractLinks(body.text, { limit: max + 1 }).length > max;
    const result = await ctx.ledger.submit({
      period: entry.period,
      claimed_handle: entry.account.claimed_handle,
      day: ctx.today(),
      links
    });
    return { ok: true, result, links_found: links.length, truncated };
  });

  app.get("/bot/progress/:externalId", async (req) => {
    requireApiToken(ctx, req);
    const { externalId } = parse(externalIdParams, req.params);
    const entry = await findTracked(externalId);
    if (!entry) throw new NotFoundError("no_period", "No tracking period for this member");
    const today = ctx.today();
    return { ok: true, today, entry, progress: await ctx.reporting.periodProgress(entry, today) };
  });

  app.post("/bot/periods/pause", async (req) => {
    requireApiToken(ctx, req);
    const { external_id } = parse(externalIdBodySchema, req.body);
    return { ok: true, ...(await ctx.periods.pause(external_id)) };
  });

  app.post("/bot/periods/resume", async (req) => {
    requireApiToken(ctx, req);
    const { external_id } = parse(externalIdBodySchema, req.body);
    return { ok: true, ...(await ctx.periods.resume(external_id)) };
  });

  app.post("/bot/periods/left-server", async (req) => {
    requireApiToken(ctx, req);
    const { external_id } = parse(externalIdBodySchema, req.body);
    return { ok: true, ...(await ctx.periods.markLeftServer(external_id)) };
  });

  app.post("/bot/periods/target", async (req) => {
    requireApiToken(ctx, req);
    const body = parse(targetBodySchema, req.body);
    return { ok: true, entry: await ctx.periods.changeTarget(body.external_id, body.target_per_day) };
  });

  app.post("/bot/accounts/resource", async (req) => {
    requireApiToken(ctx, req);
    const body = parse(resourceBodySchema, req.body);
    await ctx.periods.setResource(body.external_id, body.resource_ref);
    return { ok: true };
  });

  app.get("/bot/reminders/due", async (req) => {
    requireApiToken(ctx, req);
    const day = ctx.today();
    return { ok: true, day, due: await ctx.reporting.remindersDue(day) };
  });
}
