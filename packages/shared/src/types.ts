// Shared domain records. Schemas double as row/response validators; types are inferred from them.

import { z } from "zod";

export const PERIOD_STATUSES = ["active", "paused", "deleted", "left_server"] as const;
export const periodStatusSchema = z.enum(PERIOD_STATUSES);
export type PeriodStatus = z.infer<typeof periodStatusSchema>;

export const calendarDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");
export const externalIdSchema = z.string().regex(/^\d{1,25}$/, "expected a numeric id");

// Upper bound of a daily target; tracking_periods carries the same check.
export const MAX_TARGET_PER_DAY = 500;

export const accountSchema = z.object({
  id: z.string(),
  external_id: externalIdSchema,
  display_name: z.string(),
  claimed_handle: z.string(),
  resource_ref: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string().nullable()
});
export type DbAccount = z.infer<typeof accountSchema>;

export const trackingPeriodSchema = z.object({
  id: z.string(),
  account_id: z.string(),
  target_per_day: z.number().int(),
  start_date: calendarDateSchema,
  end_date: calendarDateSchema,
  status: periodStatusSchema,
  report_ref: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string().nullable()
});
export type DbTrackingPeriod = z.infer<typeof trackingPeriodSchema>;

export const submissionSchema = z.object({
  id: z.string(),
  period_id: z.string(),
  occurred_on: calendarDateSchema,
  link: z.string(),
  ordinal: z.number().int().positive(),
  external_post_id: z.string().nullable(),
  handle_extracted: z.string().nullable(),
  valid: z.boolean(),
  created_at: z.string()
});
export type DbSubmission = z.infer<typeof submissionSchema>;

export const periodEntrySchema = z.object({
  account: accountSchema,
  period: trackingPeriodSchema
});
export type PeriodEntry = z.infer<typeof periodEntrySchema>;

// --- Quota ledger ---

export const REJECT_REASONS = ["invalid_link", "quota_exceeded", "outside_period", "period_inactive"] as const;
export type RejectReason = (typeof REJECT_REASONS)[number];

export const SUBMIT_STATUSES = [
  "accepted",
  "quota_exceeded",
  "outside_period",
  "period_inactive",
  "no_valid_links",
  "no_links"
] as const;
export type SubmitStatus = (typeof SUBMIT_STATUSES)[number];

export const submitResultSchema = z.object({
  status: z.enum(SUBMIT_STATUSES),
  accepted: z.array(submissionSchema),
  rejected: z.array(z.object({ link: z.string(), reason: z.enum(REJECT_REASONS) })),
  day: calendarDateSchema,
  // null when the batch never reached the counter (inactive period, outside the window)
  day_count: z.number().int().nullable(),
  target_per_day: z.number().int(),
  remaining: z.number().int().nullable(),
  boundary: z.enum(["not_started", "ended"]).nullable()
});
export type SubmitResult = z.infer<typeof submitResultSchema>;

// --- Reporting feed ---

export const periodProgressSchema = z.object({
  phase: z.enum(["not_started", "active", "completed"]),
  total: z.number().int(),
  expected: z.number().int(),
  completion_pct: z.number(),
  active_days: z.number().int(),
  elapsed_days: z.number().int(),
  total_days: z.number().int(),
  today_count: z.number().int()
});
export type PeriodProgress = z.infer<typeof periodProgressSchema>;

export const performanceRowSchema = z.object({
  external_id: externalIdSchema,
  display_name: z.string(),
  claimed_handle: z.string(),
  target_per_day: z.number().int(),
  day_count: z.number().int(),
  completion_pct: z.number()
});
export type PerformanceRow = z.infer<typeof performanceRowSchema>;

export const dashboardSchema = z.object({
  day: calendarDateSchema,
  total_accounts: z.number().int(),
  active_periods: z.number().int(),
  active_today: z.number().int(),
  submissions_today: z.number().int(),
  avg_completion_pct: z.number().nullable(),
  top: z.array(performanceRowSchema),
  needs_attention: z.array(performanceRowSchema),
  needs_attention_more: z.number().int()
});
export type Dashboard = z.infer<typeof dashboardSchema>;

export const duplicateGroupSchema = z.object({
  key: z.string(),
  link: z.string(),
  occurrences: z.array(z.object({ occurred_on: calendarDateSchema, ordinal: z.number().int() }))
});
export const duplicateScanSchema = z.object({
  accounts_scanned: z.number().int(),
  internal: z.array(
    z.object({
      external_id: externalIdSchema,
      display_name: z.string(),
      claimed_handle: z.string(),
      total: z.number().int(),
      duplicates: z.array(duplicateGroupSchema)
    })
  ),
  cross_account: z.array(
    z.object({
      post_id: z.string(),
      link: z.string(),
      accounts: z.array(z.object({ external_id: externalIdSchema, display_name: z.string(), submissions: z.number().int() })),
      total_submissions: z.number().int()
    })
  )
});
export type DuplicateScan = z.infer<typeof duplicateScanSchema>;
