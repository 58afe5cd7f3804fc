import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { calendarDateSchema, duplicatesBodySchema, externalIdBodySchema } from "@replyledger/shared";
import { parse, requireApiToken, type RouteContext } from "./context.js";

const dayQuery = z.object({ day: calendarDateSchema.optional() });

function stamp(d: Date): string {
  return d.toISOString().replace(/[-:]/g, "").replace("T", "_").slice(0, 15);
}

export function registerAdminRoutes(app: FastifyInstance, ctx: RouteContext) {
  app.get("/admin/dashboard", async (req) => {
    requireApiToken(ctx, req);
    const { day } = parse(dayQuery, req.query);
    return { ok: true, dashboard: await ctx.reporting.dashboard(day ?? ctx.today()) };
  });

  app.get("/admin/daily-summary", async (req) => {
    requireApiToken(ctx, req);
    const q = parse(dayQuery, req.query);
    const day = q.day ?? ctx.today();
    return { ok: true, day, rows: await ctx.reporting.dailyPerformance(day) };
  });

  app.post("/admin/duplicates", async (req) => {
    requireApiToken(ctx, req);
    const body = parse(duplicatesBodySchema, req.body);
    return { ok: true, scan: await ctx.reporting.scanDuplicates(body.external_ids) };
  });

  // xlsx travels base64-encoded so the bot's JSON client can carry it to a file attachment.
  app.get("/admin/reports/combined", async (req) => {
    requireApiToken(ctx, req);
    const now = ctx.now();
    const { periods, buffer } = await ctx.reporting.combinedWorkbook(ctx.today(), now.toISOString());
    return {
      ok: true,
      filename: `combined_reports_${stamp(now)}.xlsx`,
      periods,
      content_base64: buffer.toString("base64")
    };
  });

  app.post("/admin/periods/delete", async (req) => {
    requireApiToken(ctx, req);
    const { external_id } = parse(externalIdBodySchema, req.body);
    return { ok: true, ...(await ctx.periods.remove(external_id)) };
  });
}
