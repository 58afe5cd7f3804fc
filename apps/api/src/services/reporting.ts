import {
  dateRange,
  daysBetween,
  isWithin,
  type Dashboard,
  type DbSubmission,
  type DuplicateScan,
  type PerformanceRow,
  type PeriodEntry,
  type PeriodProgress,
  type ReminderDue
} from "@replyledger/shared";
import { asPersistenceError } from "../errors.js";
import type { TrackerStore } from "../store/types.js";
import { buildCombinedWorkbook, type CombinedReportItem } from "./excel.js";

const DASHBOARD_LIST_SIZE = 5;


function pct(part: number, whole: number): number {
  return whole > 0 ? Math.round((part / whole) * 1000) / 10 : 0;
}

export function periodProgress(entry: PeriodEntry, today: string, submissions: DbSubmission[]): PeriodProgress {
  const { start_date: start, end_date: end, target_per_day: target } = entry.period;
  const totalDays = daysBetween(start, end) + 1;
  const phase = today < start ? "not_started" : today > end ? "completed" : "active";
  const elapsedDays = phase === "not_started" ? 0 : phase === "completed" ? totalDays : daysBetween(start, today) + 1;
  const expected = elapsedDays * target;
  return {
    phase,
    total: submissions.length,
    expected,
    completion_pct: pct(submissions.length, expected),
    active_days: new Set(submissions.map((s) => s.occurred_on)).size,
    elapsed_days: elapsedDays,
    total_days: totalDays,
    today_count: submissions.filter((s) => s.occurred_on === today).length
  };
}

function internalDuplicates(submissions: DbSubmission[]): DuplicateScan["internal"][number]["duplicates"] {
  // Same post under a different link variant counts too, so group by post id when there is one.
  const groups = new Map<string, DbSubmission[]>();
  for (const s of submissions) {
    const key = s.external_post_id ? `post:${s.external_post_id}` : `link:${s.link}`;
    const list = groups.get(key);
    if (list) list.push(s);
    else groups.set(key, [s]);
  }
  const out: DuplicateScan["internal"][number]["duplicates"] = [];
  for (const [key, list] of groups) {
    const first = list[0];
    if (!first || list.length < 2) continue;
    out.push({ key, link: first.link, occurrences: list.map((s) => ({ occurred_on: s.occurred_on, ordinal: s.ordinal })) });
  }
  return out;
}

/** Read-only aggregates over the store. Nothing here is cached; every call recomputes. */
export function createReportingService(deps: { store: TrackerStore }) {
  const { store } = deps;

  async function read<T>(what: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (e) {
      throw asPersistenceError(e, `Could not read ${what}`);
    }
  }

  async function dailyPerformance(day: string): Promise<PerformanceRow[]> {
    return read("daily performance", async () => {
      const active = await store.listPeriodsByStatus("active");
      const rows: PerformanceRow[] = [];
      for (const { account, period } of active) {
        if (!isWithin(day, period.start_date, period.end_date)) continue;
        const count = await store.countSubmissions(period.id, day);
        rows.push({
          external_id: account.external_id,
          display_name: account.display_name,
          claimed_handle: account.claimed_handle,
          target_per_day: period.target_per_day,
          day_count: count,
          completion_pct: pct(count, period.target_per_day)
        });
      }
      return rows.sort((a, b) => b.completion_pct - a.completion_pct || b.day_count - a.day_count);
    });
  }

  return {
    periodProgress: (entry: PeriodEntry, today: string) =>
      read("progress", async () => periodProgress(entry, today, await store.listSubmissions(entry.period.id))),

    dailyPerformance,

    async dashboard(day: string): Promise<Dashboard> {
      const [totalAccounts, active, rows] = await Promise.all([
        read("accounts", () => store.countAccounts()),
        read("active periods", () => store.listPeriodsByStatus("active")),
        dailyPerformance(day)
      ]);
      const idle = rows.filter((r) => r.day_count === 0);
      return {
        day,
        total_accounts: totalAccounts,
        active_periods: active.length,
        active_today: rows.filter((r) => r.day_count > 0).length,
        submissions_today: rows.reduce((sum, r) => sum + r.day_count, 0),
        avg_completion_pct: rows.length > 0 ? Math.round((rows.reduce((sum, r) => sum + r.completion_pct, 0) / rows.length) * 10) / 10 : null,
        top: rows.slice(0, DASHBOARD_LIST_SIZE),
        needs_attention: idle.slice(0, DASHBOARD_LIST_SIZE),
        needs_attention_more: Math.max(0, idle.length - DASHBOARD_LIST_SIZE)
      };
    },

    // Active in-window periods still under today's target that have a resource to post into.
    async remindersDue(day: string): Promise<ReminderDue[]> {
      return read("reminders", async () => {
        const entries = await store.listPeriodsByStatus("active", { withResource: true });
        const due: ReminderDue[] = [];
        for (const { account, period } of entries) {
          if (!account.resource_ref || !isWithin(day, period.start_date, period.end_date)) continue;
          const count = await store.countSubmissions(period.id, day);
          if (count >= period.target_per_day) continue;
          due.push({
            external_id: account.external_id,
            resource_ref: account.resource_ref,
            day_count: count,
            target_per_day: period.target_per_day,
            remaining: period.target_per_day - count
          });
        }
        return due;
      });
    },

    // Cross-account hits are advisory: a post can be edited or deleted after it was submitted.
    async scanDuplicates(externalIds?: string[]): Promise<DuplicateScan> {
      return read("submissions", async () => {
        let entries = await store.listPeriodsByStatus("active");
        if (externalIds && externalIds.length > 0) {
          const wanted = new Set(externalIds);
          entries = entries.filter((e) => wanted.has(e.account.external_id));
        }
        const internal: DuplicateScan["internal"] = [];
        const byPost = new Map<string, { link: string; accounts: Map<string, { display_name: string; submissions: number }> }>();
        for (const { account, period } of entries) {
          const subs = await store.listSubmissions(period.id);
          internal.push({
            external_id: account.external_id,
            display_name: account.display_name,
            claimed_handle: account.claimed_handle,
            total: subs.length,
            duplicates: internalDuplicates(subs)
          });
          for (const s of subs) {
            if (!s.external_post_id) continue;
            let group = byPost.get(s.external_post_id);
            if (!group) {
              group = { link: s.link, accounts: new Map() };
              byPost.set(s.external_post_id, group);
            }
            const hit = group.accounts.get(account.external_id);
            if (hit) hit.submissions += 1;
            else group.accounts.set(account.external_id, { display_name: account.display_name, submissions: 1 });
          }
        }
        const crossAccount: DuplicateScan["cross_account"] = [];
        for (const [postId, group] of byPost) {
          if (group.accounts.size < 2) continue;
          const accounts = [...group.accounts].map(([external_id, v]) => ({ external_id, ...v }));
          crossAccount.push({
            post_id: postId,
            link: group.link,
            accounts,
            total_submissions: accounts.reduce((sum, a) => sum + a.submissions, 0)
          });
        }
        return { accounts_scanned: entries.length, internal, cross_account: crossAccount };
      });
    },

    async combinedWorkbook(today: string, generatedAt: string): Promise<{ periods: number; buffer: Buffer }> {
      const items = await read("reports", async () => {
        const entries = await store.listPeriodsByStatus("active");
        const out: CombinedReportItem[] = [];
        for (const entry of entries) {
          const submissions = await store.listSubmissions(entry.period.id);
          out.push({ entry, submissions, progress: periodProgress(entry, today, submissions) });
        }
        return out;
      });
      const buffer = await buildCombinedWorkbook(items, generatedAt, (e) => dateRange(e.period.start_date, e.period.end_date));
      return { periods: items.length, buffer };
    }
  };
}

export type ReportingService = ReturnType<typeof createReportingService>;
