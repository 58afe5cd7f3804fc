import type { z } from "zod";
import {
  combinedReportResponseSchema,
  dailySummaryResponseSchema,
  dashboardResponseSchema,
  duplicatesResponseSchema,
  errorBodySchema,
  okResponseSchema,
  onboardingResponseSchema,
  periodListResponseSchema,
  periodLookupResponseSchema,
  progressResponseSchema,
  remindersResponseSchema,
  statusChangeResponseSchema,
  submissionResponseSchema,
  targetResponseSchema,
  type OnboardingBody,
  type PeriodStatus
} from "@replyledger/shared";
import { ApiError } from "./errors.js";

export type ApiResponse = { status: number; ok: boolean; json: unknown; text: string };
export type ApiFn = (path: string, init?: { method?: "GET" | "POST"; body?: string }) => Promise<ApiResponse>;

export function createApiClient(baseUrl: string, opts: { token?: string | undefined } = {}): ApiFn {
  return async function api(path, init) {
    let res: Response;
    try {
      res = await fetch(`${baseUrl}${path}`, {
        ...init,
        headers: { "Content-Type": "application/json", ...(opts.token ? { "x-api-token": opts.token } : {}) }
      });
    } catch (e) {
      throw new ApiError(0, "api_unreachable", "external", `Tracker API unreachable: ${path}`, { cause: e });
    }
    const text = await res.text();
    let json: unknown = null;
    try {
      json = text ? JSON.parse(text) : null;
    } catch {
      json = null;
    }
    return { status: res.status, ok: res.ok, json, text };
  };
}

const post = (body: unknown) => ({ method: "POST" as const, body: JSON.stringify(body) });

/**
 * Typed calls against the tracker API. Non-OK answers become {@link ApiError} carrying the
 * server's error code and kind; bodies that do not match the expected shape are treated as
 * persistence failures since nothing can be said about what was stored.
 */
export function createTrackerClient(api: ApiFn) {
  async function call<S extends z.ZodTypeAny>(schema: S, path: string, init?: Parameters<ApiFn>[1]): Promise<z.infer<S>> {
    const r = await api(path, init);
    if (!r.ok) {
      const body = errorBodySchema.safeParse(r.json);
      if (body.success) throw new ApiError(r.status, body.data.error, body.data.kind, body.data.message);
      throw new ApiError(r.status, "http_error", r.status >= 500 ? "persistence" : "validation", `HTTP ${r.status} from ${path}`);
    }
    const parsed = schema.safeParse(r.json);
    if (!parsed.success) {
      throw new ApiError(r.status, "bad_response", "persistence", `Unexpected response from ${path}`, { cause: parsed.error });
    }
    return parsed.data;
  }

  return {
    async getPeriod(externalId: string) {
      return (await call(periodLookupResponseSchema, `/bot/periods/${externalId}`)).entry;
    },
    async listPeriods(status: PeriodStatus, opts: { withResource?: boolean } = {}) {
      const q = `status=${status}${opts.withResource ? "&with_resource=1" : ""}`;
      return (await call(periodListResponseSchema, `/bot/periods?${q}`)).entries;
    },
    completeOnboarding(body: OnboardingBody) {
      return call(onboardingResponseSchema, "/bot/onboarding/complete", post(body));
    },
    submit(externalId: string, resourceRef: string, text: string) {
      return call(submissionResponseSchema, "/bot/submissions", post({ external_id: externalId, resource_ref: resourceRef, text }));
    },
    progress(externalId: string) {
      return call(progressResponseSchema, `/bot/progress/${externalId}`);
    },
    pause(externalId: string) {
      return call(statusChangeResponseSchema, "/bot/periods/pause", post({ external_id: externalId }));
    },
    resume(externalId: string) {
      return call(statusChangeResponseSchema, "/bot/periods/resume", post({ external_id: externalId }));
    },
    markLeftServer(externalId: string) {
      return call(statusChangeResponseSchema, "/bot/periods/left-server", post({ external_id: externalId }));
    },
    deletePeriod(externalId: string) {
      return call(statusChangeResponseSchema, "/admin/periods/delete", post({ external_id: externalId }));
    },
    async changeTarget(externalId: string, targetPerDay: number) {
      return (await call(targetResponseSchema, "/bot/periods/target", post({ external_id: externalId, target_per_day: targetPerDay }))).entry;
    },
    async setResource(externalId: string, resourceRef: string | null): Promise<void> {
      await call(okResponseSchema, "/bot/accounts/resource", post({ external_id: externalId, resource_ref: resourceRef }));
    },
    remindersDue() {
      return call(remindersResponseSchema, "/bot/reminders/due");
    },
    async dashboard(day?: string) {
      return (await call(dashboardResponseSchema, `/admin/dashboard${day ? `?day=${day}` : ""}`)).dashboard;
    },
    dailySummary(day?: string) {
      return call(dailySummaryResponseSchema, `/admin/daily-summary${day ? `?day=${day}` : ""}`);
    },
    async scanDuplicates(externalIds?: string[]) {
      return (await call(duplicatesResponseSchema, "/admin/duplicates", post(externalIds ? { external_ids: externalIds } : {}))).scan;
    },
    combinedReport() {
      return call(combinedReportResponseSchema, "/admin/reports/combined");
    }
  };
}

export type TrackerClient = ReturnType<typeof createTrackerClient>;
