// Request and response bodies of the HTTP API between the bot and the tracker service.

import { z } from "zod";
import {
  calendarDateSchema,
  dashboardSchema,
  duplicateScanSchema,
  externalIdSchema,
  performanceRowSchema,
  periodEntrySchema,
  periodProgressSchema,
  periodStatusSchema,
  submitResultSchema
} from "./types.js";

export const ERROR_KINDS = ["validation", "quota", "external", "persistence", "consistency"] as const;
export type ErrorKind = (typeof ERROR_KINDS)[number];

export const errorBodySchema = z.object({
  ok: z.literal(false),
  error: z.string(),
  kind: z.enum(ERROR_KINDS),
  message: z.string()
});

// --- requests ---

export const externalIdBodySchema = z.object({ external_id: externalIdSchema });

export const resourceBodySchema = z.object({
  external_id: externalIdSchema,
  resource_ref: z.string().min(1).nullable()
});

export const onboardingBodySchema = z.object({
  external_id: externalIdSchema,
  display_name: z.string().min(1).max(100),
  claimed_handle: z.string().min(1).max(32),
  target_per_day: z.number().int(),
  start_date: z.string(),
  resource_ref: z.string().min(1).nullable()
});
export type OnboardingBody = z.infer<typeof onboardingBodySchema>;

export const submissionBodySchema = z.object({
  external_id: externalIdSchema,
  resource_ref: z.string().min(1),
  text: z.string().max(8000)
});

export const targetBodySchema = z.object({
  external_id: externalIdSchema,
  target_per_day: z.number().int()
});

export const duplicatesBodySchema = z.object({
  external_ids: z.array(externalIdSchema).optional()
});

// --- responses ---

export const periodLookupResponseSchema = z.object({
  ok: z.literal(true),
  entry: periodEntrySchema.nullable()
});

export const periodListResponseSchema = z.object({
  ok: z.literal(true),
  entries: z.array(periodEntrySchema)
});

export const onboardingResponseSchema = z.object({
  ok: z.literal(true),
  entry: periodEntrySchema,
  report_ref: z.string().nullable()
});

export const submissionResponseSchema = z.object({
  ok: z.literal(true),
  result: submitResultSchema,
  links_found: z.number().int(),
  truncated: z.boolean()
});

export const progressResponseSchema = z.object({
  ok: z.literal(true),
  today: calendarDateSchema,
  entry: periodEntrySchema,
  progress: periodProgressSchema
});

export const statusChangeResponseSchema = z.object({
  ok: z.literal(true),
  entry: periodEntrySchema,
  previous: periodStatusSchema,
  resource_ref: z.string().nullable()
});

export const targetResponseSchema = z.object({ ok: z.literal(true), entry: periodEntrySchema });

export const reminderDueSchema = z.object({
  external_id: externalIdSchema,
  resource_ref: z.string(),
  day_count: z.number().int(),
  target_per_day: z.number().int(),
  remaining: z.number().int()
});
export type ReminderDue = z.infer<typeof reminderDueSchema>;

export const remindersResponseSchema = z.object({
  ok: z.literal(true),
  day: calendarDateSchema,
  due: z.array(reminderDueSchema)
});

export const dashboardResponseSchema = z.object({ ok: z.literal(true), dashboard: dashboardSchema });

export const dailySummaryResponseSchema = z.object({
  ok: z.literal(true),
  day: calendarDateSchema,
  rows: z.array(performanceRowSchema)
});

export const duplicatesResponseSchema = z.object({ ok: z.literal(true), scan: duplicateScanSchema });

export const combinedReportResponseSchema = z.object({
  ok: z.literal(true),
  filename: z.string(),
  periods: z.number().int(),
  content_base64: z.string()
});

export const okResponseSchema = z.object({ ok: z.literal(true) });
