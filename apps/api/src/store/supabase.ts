import {
  accountSchema,
  submissionSchema,
  trackingPeriodSchema,
  type DbAccount,
  type DbSubmission,
  type DbTrackingPeriod,
  type PeriodEntry,
  type PeriodStatus
} from "@replyledger/shared";
import { z } from "zod";
import type { SupabaseAdmin } from "../config.js";
import { ConflictError, NotFoundError, PersistenceError, ValidationError } from "../errors.js";
import type { AccountUpsert, NewSubmission, NewTrackingPeriod, SubmissionFilter, TrackerStore } from "./types.js";

type PgError = { code?: string; message: string };

const PG_UNIQUE_VIOLATION = "23505";

const periodWithAccountSchema = trackingPeriodSchema.extend({ account: accountSchema });

function fail(op: string, error: PgError): never {
  if (error.code === PG_UNIQUE_VIOLATION) {
    throw new ConflictError("unique_violation", `${op}: ${error.message}`);
  }
  throw new PersistenceError(`${op} failed: ${error.message}`, error);
}

function parseRow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, op: string, row: unknown): T {
  const parsed = schema.safeParse(row);
  if (!parsed.success) throw new PersistenceError(`${op}: unexpected row shape`, parsed.error);
  return parsed.data;
}

function toEntry(row: z.infer<typeof periodWithAccountSchema>): PeriodEntry {
  const { account, ...period } = row;
  return { account, period };
}

/** Postgres-backed store. Table layout lives in apps/api/db/schema.sql. */
export class SupabaseStore implements TrackerStore {
  constructor(private readonly db: SupabaseAdmin) {}

  async getAccountByExternalId(externalId: string): Promise<DbAccount | null> {
    const res = await this.db.from("accounts").select("*").eq("external_id", externalId).maybeSingle();
    if (res.error) fail("getAccountByExternalId", res.error);
    return res.data ? parseRow(accountSchema, "getAccountByExternalId", res.data) : null;
  }

  async upsertAccount(input: AccountUpsert): Promise<DbAccount> {
    const existing = await this.getAccountByExternalId(input.external_id);
    if (existing) {
      const patch: Record<string, string | null> = {
        display_name: input.display_name,
        updated_at: new Date().toISOString()
      };
      if (input.claimed_handle) patch.claimed_handle = input.claimed_handle;
      if (input.resource_ref !== undefined) patch.resource_ref = input.resource_ref;
      const upd = await this.db.from("accounts").update(patch).eq("id", existing.id).select("*").single();
      if (upd.error) fail("upsertAccount", upd.error);
      return parseRow(accountSchema, "upsertAccount", upd.data);
    }
    if (!input.claimed_handle) throw new ValidationError("missing_handle", "A new account needs a claimed handle");
    const ins = await this.db
      .from("accounts")
      .insert([
        {
          external_id: input.external_id,
          display_name: input.display_name,
          claimed_handle: input.claimed_handle,
          resource_ref: input.resource_ref ?? null
        }
      ])
      .select("*")
      .single();
    if (ins.error) fail("upsertAccount", ins.error);
    return parseRow(accountSchema, "upsertAccount", ins.data);
  }

  async countAccounts(): Promise<number> {
    const res = await this.db.from("accounts").select("id", { count: "exact", head: true });
    if (res.error) fail("countAccounts", res.error);
    return res.count ?? 0;
  }

  async createTrackingPeriod(input: NewTrackingPeriod): Promise<DbTrackingPeriod> {
    const ins = await this.db
      .from("tracking_periods")
      .insert([{ ...input, status: "active" }])
      .select("*")
      .single();
    if (ins.error) {
      // partial unique index: one active period per account
      if (ins.error.code === PG_UNIQUE_VIOLATION) {
        throw new ConflictError("already_active", "Account already has an active tracking period");
      }
      fail("createTrackingPeriod", ins.error);
    }
    return parseRow(trackingPeriodSchema, "createTrackingPeriod", ins.data);
  }

  async getTrackingPeriodById(periodId: string): Promise<DbTrackingPeriod | null> {
    const res = await this.db.from("tracking_periods").select("*").eq("id", periodId).maybeSingle();
    if (res.error) fail("getTrackingPeriodById", res.error);
    return res.data ? parseRow(trackingPeriodSchema, "getTrackingPeriodById", res.data) : null;
  }

  async getActiveTrackingPeriod(externalId: string): Promise<PeriodEntry | null> {
    return this.getTrackingPeriodByStatus(externalId, "active");
  }

  async getTrackingPeriodByStatus(externalId: string, status: PeriodStatus): Promise<PeriodEntry | null> {
    const res = await this.db
      .from("tracking_periods")
      .select("*, account:accounts!inner(*)")
      .eq("account.external_id", externalId)
      .eq("status", status)
      .order("created_at", { ascending: false })
      .limit(1)
      .maybeSingle();
    if (res.error) fail("getTrackingPeriodByStatus", res.error);
    return res.data ? toEntry(parseRow(periodWithAccountSchema, "getTrackingPeriodByStatus", res.data)) : null;
  }

  async listPeriodsByStatus(status: PeriodStatus, opts: { withResource?: boolean } = {}): Promise<PeriodEntry[]> {
    let q = this.db.from("tracking_periods").select("*, account:accounts!inner(*)").eq("status", status);
    if (opts.withResource) q = q.not("account.resource_ref", "is", null);
    const res = await q;
    if (res.error) fail("listPeriodsByStatus", res.error);
    const rows = parseRow(z.array(periodWithAccountSchema), "listPeriodsByStatus", res.data ?? []);
    return rows.map(toEntry).sort((a, b) => a.account.display_name.localeCompare(b.account.display_name));
  }

  private async patchPeriod(op: string, periodId: string, patch: Record<string, string | number | null>): Promise<DbTrackingPeriod> {
    const res = await this.db
      .from("tracking_periods")
      .update({ ...patch, updated_at: new Date().toISOString() })
      .eq("id", periodId)
      .select("*")
      .maybeSingle();
    if (res.error) fail(op, res.error);
    if (!res.data) throw new NotFoundError("period_not_found", `Tracking period ${periodId} not found`);
    return parseRow(trackingPeriodSchema, op, res.data);
  }

  async updateTrackingPeriodStatus(periodId: string, status: PeriodStatus): Promise<DbTrackingPeriod> {
    return this.patchPeriod("updateTrackingPeriodStatus", periodId, { status });
  }

  async updateTrackingPeriodTarget(periodId: string, target: number): Promise<DbTrackingPeriod> {
    return this.patchPeriod("updateTrackingPeriodTarget", periodId, { target_per_day: target });
  }

  async setReportRef(periodId: string, reportRef: string | null): Promise<void> {
    await this.patchPeriod("setReportRef", periodId, { report_ref: reportRef });
  }

  async countSubmissions(periodId: string, day: string): Promise<number> {
    const res = await this.db
      .from("submissions")
      .select("id", { count: "exact", head: true })
      .eq("period_id", periodId)
      .eq("occurred_on", day)
      .eq("valid", true);
    if (res.error) fail("countSubmissions", res.error);
    return res.count ?? 0;
  }

  async insertSubmissions(periodId: string, day: string, links: NewSubmission[], startOrdinal: number): Promise<DbSubmission[]> {
    if (links.length === 0) return [];
    const rows = links.map((l, idx) => ({
      period_id: periodId,
      occurred_on: day,
      link: l.link,
      ordinal: startOrdinal + idx,
      external_post_id: l.external_post_id,
      handle_extracted: l.handle_extracted,
      valid: true
    }));
    // Single multi-row insert: the unique (period_id, occurred_on, ordinal) index rejects the whole batch on a race.
    const ins = await this.db.from("submissions").insert(rows).select("*");
    if (ins.error) {
      if (ins.error.code === PG_UNIQUE_VIOLATION) {
        throw new ConflictError("ordinal_taken", `Ordinal already used for ${day}`);
      }
      fail("insertSubmissions", ins.error);
    }
    const parsed = parseRow(z.array(submissionSchema), "insertSubmissions", ins.data ?? []);
    return parsed.sort((a, b) => a.ordinal - b.ordinal);
  }

  async listSubmissions(periodId: string, filter: SubmissionFilter = {}): Promise<DbSubmission[]> {
    let q = this.db.from("submissions").select("*").eq("period_id", periodId).eq("valid", true);
    if (filter.day) q = q.eq("occurred_on", filter.day);
    if (filter.from) q = q.gte("occurred_on", filter.from);
    if (filter.to) q = q.lte("occurred_on", filter.to);
    const res = await q.order("occurred_on", { ascending: true }).order("ordinal", { ascending: true });
    if (res.error) fail("listSubmissions", res.error);
    return parseRow(z.array(submissionSchema), "listSubmissions", res.data ?? []);
  }

  async setResourceRef(externalId: string, resourceRef: string | null): Promise<void> {
    const res = await this.db
      .from("accounts")
      .update({ resource_ref: resourceRef, updated_at: new Date().toISOString() })
      .eq("external_id", externalId)
      .select("id");
    if (res.error) fail("setResourceRef", res.error);
    if (!res.data || res.data.length === 0) throw new NotFoundError("account_not_found", `Account ${externalId} not found`);
  }

  async getResourceRef(externalId: string): Promise<string | null> {
    const account = await this.getAccountByExternalId(externalId);
    return account?.resource_ref ?? null;
  }
}
