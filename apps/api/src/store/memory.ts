import crypto from "node:crypto";
import type { DbAccount, DbSubmission, DbTrackingPeriod, PeriodEntry, PeriodStatus } from "@replyledger/shared";
import { ConflictError, NotFoundError, ValidationError } from "../errors.js";
import type { AccountUpsert, NewSubmission, NewTrackingPeriod, SubmissionFilter, TrackerStore } from "./types.js";

// In-process store: used by tests and by STORE=memory for local runs. Mirrors the Postgres constraints.
export class MemoryStore implements TrackerStore {
  private readonly accounts = new Map<string, DbAccount>(); // key: external_id
  private readonly periods = new Map<string, DbTrackingPeriod>(); // key: id
  private readonly submissions: DbSubmission[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  private ts(): string {
    return this.now().toISOString();
  }

  private accountById(id: string): DbAccount | null {
    for (const a of this.accounts.values()) if (a.id === id) return a;
    return null;
  }

  private latestFor(externalId: string, status: PeriodStatus): PeriodEntry | null {
    const account = this.accounts.get(externalId);
    if (!account) return null;
    const matches = [...this.periods.values()]
      .filter((p) => p.account_id === account.id && p.status === status)
      .sort((a, b) => b.created_at.localeCompare(a.created_at));
    const period = matches[0];
    return period ? { account: { ...account }, period: { ...period } } : null;
  }

  async getAccountByExternalId(externalId: string): Promise<DbAccount | null> {
    const a = this.accounts.get(externalId);
    return a ? { ...a } : null;
  }

  async upsertAccount(input: AccountUpsert): Promise<DbAccount> {
    const existing = this.accounts.get(input.external_id);
    if (existing) {
      const next: DbAccount = {
        ...existing,
        display_name: input.display_name,
        claimed_handle: input.claimed_handle ?? existing.claimed_handle,
        resource_ref: input.resource_ref === undefined ? existing.resource_ref : input.resource_ref,
        updated_at: this.ts()
      };
      this.accounts.set(input.external_id, next);
      return { ...next };
    }
    if (!input.claimed_handle) throw new ValidationError("missing_handle", "A new account needs a claimed handle");
    const created: DbAccount = {
      id: crypto.randomUUID(),
      external_id: input.external_id,
      display_name: input.display_name,
      claimed_handle: input.claimed_handle,
      resource_ref: input.resource_ref ?? null,
      created_at: this.ts(),
      updated_at: null
    };
    this.accounts.set(input.external_id, created);
    return { ...created };
  }

  async countAccounts(): Promise<number> {
    return this.accounts.size;
  }

  async createTrackingPeriod(input: NewTrackingPeriod): Promise<DbTrackingPeriod> {
    for (const p of this.periods.values()) {
      if (p.account_id === input.account_id && p.status === "active") {
        throw new ConflictError("already_active", "Account already has an active tracking period");
      }
    }
    const period: DbTrackingPeriod = {
      id: crypto.randomUUID(),
      account_id: input.account_id,
      target_per_day: input.target_per_day,
      start_date: input.start_date,
      end_date: input.end_date,
      status: "active",
      report_ref: null,
      created_at: this.ts(),
      updated_at: null
    };
    this.periods.set(period.id, period);
    return { ...period };
  }

  async getTrackingPeriodById(periodId: string): Promise<DbTrackingPeriod | null> {
    const p = this.periods.get(periodId);
    return p ? { ...p } : null;
  }

  async getActiveTrackingPeriod(externalId: string): Promise<PeriodEntry | null> {
    return this.latestFor(externalId, "active");
  }

  async getTrackingPeriodByStatus(externalId: string, status: PeriodStatus): Promise<PeriodEntry | null> {
    return this.latestFor(externalId, status);
  }

  async listPeriodsByStatus(status: PeriodStatus, opts: { withResource?: boolean } = {}): Promise<PeriodEntry[]> {
    const out: PeriodEntry[] = [];
    for (const period of this.periods.values()) {
      if (period.status !== status) continue;
      const account = this.accountById(period.account_id);
      if (!account) continue;
      if (opts.withResource && !account.resource_ref) continue;
      out.push({ account: { ...account }, period: { ...period } });
    }
    return out.sort((a, b) => a.account.display_name.localeCompare(b.account.display_name));
  }

  private patchPeriod(periodId: string, patch: Partial<DbTrackingPeriod>): DbTrackingPeriod {
    const p = this.periods.get(periodId);
    if (!p) throw new NotFoundError("period_not_found", `Tracking period ${periodId} not found`);
    const next = { ...p, ...patch, updated_at: this.ts() };
    this.periods.set(periodId, next);
    return { ...next };
  }

  async updateTrackingPeriodStatus(periodId: string, status: PeriodStatus): Promise<DbTrackingPeriod> {
    const p = this.periods.get(periodId);
    if (p && status === "active" && p.status !== "active") {
      for (const other of this.periods.values()) {
        if (other.id !== periodId && other.account_id === p.account_id && other.status === "active") {
          throw new ConflictError("already_active", "Account already has an active tracking period");
        }
      }
    }
    return this.patchPeriod(periodId, { status });
  }

  async updateTrackingPeriodTarget(periodId: string, target: number): Promise<DbTrackingPeriod> {
    return this.patchPeriod(periodId, { target_per_day: target });
  }

  async setReportRef(periodId: string, reportRef: string | null): Promise<void> {
    this.patchPeriod(periodId, { report_ref: reportRef });
  }

  async countSubmissions(periodId: string, day: string): Promise<number> {
    return this.submissions.filter((s) => s.period_id === periodId && s.occurred_on === day && s.valid).length;
  }

  async insertSubmissions(periodId: string, day: string, links: NewSubmission[], startOrdinal: number): Promise<DbSubmission[]> {
    if (!this.periods.has(periodId)) throw new NotFoundError("period_not_found", `Tracking period ${periodId} not found`);
    const taken = new Set(this.submissions.filter((s) => s.period_id === periodId && s.occurred_on === day).map((s) => s.ordinal));
    const rows: DbSubmission[] = links.map((l, idx) => ({
      id: crypto.randomUUID(),
      period_id: periodId,
      occurred_on: day,
      link: l.link,
      ordinal: startOrdinal + idx,
      external_post_id: l.external_post_id,
      handle_extracted: l.handle_extracted,
      valid: true,
      created_at: this.ts()
    }));
    if (rows.some((r) => taken.has(r.ordinal))) {
      throw new ConflictError("ordinal_taken", `Ordinal already used for ${day}`);
    }
    this.submissions.push(...rows);
    return rows.map((r) => ({ ...r }));
  }

  async listSubmissions(periodId: string, filter: SubmissionFilter = {}): Promise<DbSubmission[]> {
    return this.submissions
      .filter((s) => s.period_id === periodId && s.valid)
      .filter((s) => (filter.day ? s.occurred_on === filter.day : true))
      .filter((s) => (filter.from ? s.occurred_on >= filter.from : true))
      .filter((s) => (filter.to ? s.occurred_on <= filter.to : true))
      .sort((a, b) => a.occurred_on.localeCompare(b.occurred_on) || a.ordinal - b.ordinal)
      .map((s) => ({ ...s }));
  }

  async setResourceRef(externalId: string, resourceRef: string | null): Promise<void> {
    const a = this.accounts.get(externalId);
    if (!a) throw new NotFoundError("account_not_found", `Account ${externalId} not found`);
    this.accounts.set(externalId, { ...a, resource_ref: resourceRef, updated_at: this.ts() });
  }

  async getResourceRef(externalId: string): Promise<string | null> {
    return this.accounts.get(externalId)?.resource_ref ?? null;
  }
}
