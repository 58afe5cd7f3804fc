import type { DbAccount, DbSubmission, DbTrackingPeriod, PeriodEntry, PeriodStatus } from "@replyledger/shared";

export type AccountUpsert = {
  external_id: string;
  display_name: string;
  claimed_handle?: string | undefined;
  resource_ref?: string | null | undefined;
};

export type NewTrackingPeriod = {
  account_id: string;
  target_per_day: number;
  start_date: string;
  end_date: string;
};

export type NewSubmission = {
  link: string;
  external_post_id: string | null;
  handle_extracted: string | null;
};

export type SubmissionFilter = {
  day?: string | undefined;
  from?: string | undefined;
  to?: string | undefined;
};

/**
 * Persistence boundary. One implementation per backing store; callers never branch on which.
 *
 * `createTrackingPeriod` must refuse a second active period for the same account
 * (ConflictError). `insertSubmissions` must refuse an ordinal already taken for the
 * same (period, day); the quota ledger serializes count+insert per period on top.
 */
export interface TrackerStore {
  getAccountByExternalId(externalId: string): Promise<DbAccount | null>;
  upsertAccount(input: AccountUpsert): Promise<DbAccount>;
  countAccounts(): Promise<number>;

  createTrackingPeriod(input: NewTrackingPeriod): Promise<DbTrackingPeriod>;
  getTrackingPeriodById(periodId: string): Promise<DbTrackingPeriod | null>;
  getActiveTrackingPeriod(externalId: string): Promise<PeriodEntry | null>;
  getTrackingPeriodByStatus(externalId: string, status: PeriodStatus): Promise<PeriodEntry | null>;
  listPeriodsByStatus(status: PeriodStatus, opts?: { withResource?: boolean }): Promise<PeriodEntry[]>;
  updateTrackingPeriodStatus(periodId: string, status: PeriodStatus): Promise<DbTrackingPeriod>;
  updateTrackingPeriodTarget(periodId: string, target: number): Promise<DbTrackingPeriod>;
  setReportRef(periodId: string, reportRef: string | null): Promise<void>;

  countSubmissions(periodId: string, day: string): Promise<number>;
  insertSubmissions(periodId: string, day: string, links: NewSubmission[], startOrdinal: number): Promise<DbSubmission[]>;
  listSubmissions(periodId: string, filter?: SubmissionFilter): Promise<DbSubmission[]>;

  setResourceRef(externalId: string, resourceRef: string | null): Promise<void>;
  getResourceRef(externalId: string): Promise<string | null>;
}
