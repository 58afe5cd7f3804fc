import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { combinedReportResponseSchema, onboardingResponseSchema, submissionResponseSchema } from "@replyledger/shared";
import { buildServer } from "../server.js";
import { MemoryReportSink } from "../services/reportSink.js";
import { MemoryStore } from "../store/memory.js";
import { link, settings } from "./helpers/factories.js";

const TOKEN = "test-secret";
const NOW = new Date("2026-05-01T10:00:00.000Z");
const headers = { "x-api-token": TOKEN };

describe("http routes", () => {
  let app: ReturnType<typeof buildServer>;
  let store: MemoryStore;

  beforeEach(async () => {
    store = new MemoryStore(() => NOW);
    app = buildServer({ store, reports: new MemoryReportSink(), settings, apiToken: TOKEN, now: () => NOW, logLevel: "silent" });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  async function onboard(externalId = "1001", handle = "alice") {
    return app.inject({
      method: "POST",
      url: "/bot/onboarding/complete",
      headers,
      payload: {
        external_id: externalId,
        display_name: "Alice",
        claimed_handle: handle,
        target_per_day: 3,
        start_date: "2026-05-01",
        resource_ref: `chan-${externalId}`
      }
    });
  }

  it("answers health checks without a token", async () => {
    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true, service: "replyledger-api", ts: NOW.toISOString() });
  });

  it("rejects calls without the shared token", async () => {
    const res = await app.inject({ method: "GET", url: "/bot/periods/1001" });
    expect(res.statusCode).toBe(401);
    expect(res.json()).toMatchObject({ ok: false, error: "unauthorized" });
  });

  it("completes onboarding and returns the new period", async () => {
    const res = await onboard();
    expect(res.statusCode).toBe(200);
    const body = onboardingResponseSchema.parse(res.json());
    expect(body.entry.period.end_date).toBe("2026-06-30");
    expect(body.report_ref).toBe(`memory:${body.entry.period.id}`);

    const lookup = await app.inject({ method: "GET", url: "/bot/periods/1001", headers });
    expect(lookup.json().entry.period.id).toBe(body.entry.period.id);
  });

  it("turns validation failures into 400 with a code", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/bot/onboarding/complete",
      headers,
      payload: { external_id: "1001", display_name: "Alice", claimed_handle: "alice", target_per_day: 3, start_date: "2026-04-01", resource_ref: null }
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ ok: false, error: "past_date", kind: "validation" });
  });

  it("rejects malformed bodies before they reach a service", async () => {
    const res = await app.inject({ method: "POST", url: "/bot/submissions", headers, payload: { external_id: "alice" } });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ ok: false, error: "invalid_request", kind: "validation" });
  });

  it("extracts links from a message and records them", async () => {
    await onboard();
    const text = `done ${link("alice", 1)} and ${link("alice", 2)}, also ${link("bob", 3)}`;
    const res = await app.inject({ method: "POST", url: "/bot/submissions", headers, payload: { external_id: "1001", resource_ref: "chan-1001", text } });
    expect(res.statusCode).toBe(200);
    const body = submissionResponseSchema.parse(res.json());
    expect(body.links_found).toBe(3);
    expect(body.truncated).toBe(false);
    expect(body.result.status).toBe("accepted");
    expect(body.result.day).toBe("2026-05-01");
    expect(body.result.accepted.map((s) => s.ordinal)).toEqual([1, 2]);
    expect(body.result.rejected).toEqual([{ link: link("bob", 3), reason: "invalid_link" }]);
    expect(body.result.remaining).toBe(1);
  });

  it("reports a message from someone else's channel as a consistency error", async () => {
    await onboard();
    const res = await app.inject({
      method: "POST",
      url: "/bot/submissions",
      headers,
      payload: { external_id: "1001", resource_ref: "chan-other", text: link("alice", 1) }
    });
    expect(res.statusCode).toBe(403);
    expect(res.json()).toMatchObject({ ok: false, error: "resource_mismatch", kind: "consistency" });
    const entry = await store.getActiveTrackingPeriod("1001");
    if (!entry) throw new Error("period missing");
    expect(await store.listSubmissions(entry.period.id)).toEqual([]);
  });

  it("returns 404 for a member without a period", async () => {
    const res = await app.inject({ method: "POST", url: "/bot/submissions", headers, payload: { external_id: "2002", resource_ref: "chan-2002", text: "hi" } });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toMatchObject({ error: "no_period" });
  });

  it("pauses, resumes and changes the target", async () => {
    await onboard();
    const paused = await app.inject({ method: "POST", url: "/bot/periods/pause", headers, payload: { external_id: "1001" } });
    expect(paused.json()).toMatchObject({ ok: true, previous: "active", entry: { period: { status: "paused" } } });

    const blocked = await app.inject({
      method: "POST",
      url: "/bot/submissions",
      headers,
      payload: { external_id: "1001", resource_ref: "chan-1001", text: link("alice", 1) }
    });
    expect(blocked.json().result.status).toBe("period_inactive");

    const resumed = await app.inject({ method: "POST", url: "/bot/periods/resume", headers, payload: { external_id: "1001" } });
    expect(resumed.json().entry.period.status).toBe("active");

    const target = await app.inject({ method: "POST", url: "/bot/periods/target", headers, payload: { external_id: "1001", target_per_day: 8 } });
    expect(target.json().entry.period.target_per_day).toBe(8);
  });

  it("holds a submission to a target lowered while it was in flight", async () => {
    class HookedStore extends MemoryStore {
      afterLookup: (() => Promise<unknown>) | null = null;
      override async getActiveTrackingPeriod(externalId: string) {
        const entry = await super.getActiveTrackingPeriod(externalId);
        const hook = this.afterLookup;
        this.afterLookup = null;
        if (hook) await hook();
        return entry;
      }
    }
    const hooked = new HookedStore(() => NOW);
    const server = buildServer({ store: hooked, reports: new MemoryReportSink(), settings, apiToken: TOKEN, now: () => NOW, logLevel: "silent" });
    await server.ready();
    try {
      await server.inject({
        method: "POST",
        url: "/bot/onboarding/complete",
        headers,
        payload: { external_id: "1001", display_name: "Alice", claimed_handle: "alice", target_per_day: 3, start_date: "2026-05-01", resource_ref: "chan-1001" }
      });
      hooked.afterLookup = () =>
        server.inject({ method: "POST", url: "/bot/periods/target", headers, payload: { external_id: "1001", target_per_day: 2 } });

      const text = [1, 2, 3].map((n) => link("alice", n)).join(" ");
      const res = await server.inject({ method: "POST", url: "/bot/submissions", headers, payload: { external_id: "1001", resource_ref: "chan-1001", text } });
      const body = submissionResponseSchema.parse(res.json());
      expect(body.result.status).toBe("quota_exceeded");
      expect(body.result.target_per_day).toBe(2);
      const entry = await hooked.getActiveTrackingPeriod("1001");
      if (!entry) throw new Error("period missing");
      expect(entry.period.target_per_day).toBe(2);
      expect(await hooked.countSubmissions(entry.period.id, "2026-05-01")).toBe(0);
    } finally {
      await server.close();
    }
  });

  it("serves progress, reminders and the admin dashboard", async () => {
    await onboard();
    await app.inject({ method: "POST", url: "/bot/submissions", headers, payload: { external_id: "1001", resource_ref: "chan-1001", text: link("alice", 1) } });

    const progress = await app.inject({ method: "GET", url: "/bot/progress/1001", headers });
    expect(progress.json()).toMatchObject({ ok: true, today: "2026-05-01", progress: { total: 1, expected: 3, today_count: 1 } });

    const reminders = await app.inject({ method: "GET", url: "/bot/reminders/due", headers });
    expect(reminders.json()).toEqual({
      ok: true,
      day: "2026-05-01",
      due: [{ external_id: "1001", resource_ref: "chan-1001", day_count: 1, target_per_day: 3, remaining: 2 }]
    });

    const dashboard = await app.inject({ method: "GET", url: "/admin/dashboard", headers });
    expect(dashboard.json()).toMatchObject({ ok: true, dashboard: { day: "2026-05-01", total_accounts: 1, submissions_today: 1 } });

    const summary = await app.inject({ method: "GET", url: "/admin/daily-summary?day=2026-05-01", headers });
    expect(summary.json().rows).toHaveLength(1);
  });

  it("deletes a period and hands back the channel to remove", async () => {
    await onboard();
    const res = await app.inject({ method: "POST", url: "/admin/periods/delete", headers, payload: { external_id: "1001" } });
    expect(res.json()).toMatchObject({ ok: true, previous: "active", resource_ref: "chan-1001", entry: { period: { status: "deleted" } } });
    const lookup = await app.inject({ method: "GET", url: "/bot/periods/1001", headers });
    expect(lookup.json()).toEqual({ ok: true, entry: null });
  });

  it("lists active periods with channels for the reconciler", async () => {
    await onboard("1001", "alice");
    await onboard("1002", "bob");
    const res = await app.inject({ method: "GET", url: "/bot/periods?status=active&with_resource=1", headers });
    expect(res.json().entries.map((e: { account: { external_id: string } }) => e.account.external_id).sort()).toEqual(["1001", "1002"]);
  });

  it("exports the combined workbook as base64", async () => {
    await onboard();
    const res = await app.inject({ method: "GET", url: "/admin/reports/combined", headers });
    const body = combinedReportResponseSchema.parse(res.json());
    expect(body.filename).toBe("combined_reports_20260501_100000.xlsx");
    expect(body.periods).toBe(1);
    expect(Buffer.from(body.content_base64, "base64").subarray(0, 2).toString("latin1")).toBe("PK");
  });
});
