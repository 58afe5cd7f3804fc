import { acceptsSubmissions, extractPostId, extractHandle, validateLink, type DbSubmission, type DbTrackingPeriod, type SubmitResult } from "@replyledger/shared";
import { PersistenceError, TrackerError } from "../errors.js";
import { logger as baseLogger, type Logger } from "../logger.js";
import type { TrackerStore } from "../store/types.js";
import { createKeyedQueue, type KeyedQueue } from "./keyedQueue.js";
import type { ReportSink } from "./reportSink.js";

export type SubmitInput = {
  period: DbTrackingPeriod;
  claimed_handle: string;
  day: string;
  links: string[];
};

export type QuotaLedger = {
  submit(input: SubmitInput): Promise<SubmitResult>;
};

/**
 * Enforces the daily cap and assigns ordinals.
 *
 * Count and insert for one period run inside a single-writer queue slot, so two batches never read
 * the same count. The period is re-read inside the slot; status and target changes take the same
 * slot (see `createPeriodService`). Report rows are written after the slot is released.
 */
export function createQuotaLedger(deps: {
  store: TrackerStore;
  reports: ReportSink;
  queue?: KeyedQueue;
  logger?: Logger;
}): QuotaLedger {
  const queue = deps.queue ?? createKeyedQueue();
  const log = deps.logger ?? baseLogger;

  async function mirror(period: DbTrackingPeriod, rows: DbSubmission[]) {
    for (const row of rows) {
      try {
        await deps.reports.writeRow(period.id, row.occurred_on, row.ordinal, row.link);
      } catch (e) {
        log.warn({ evt: "report_write_failed", period_id: period.id, day: row.occurred_on, ordinal: row.ordinal, err: e }, "report row not written");
      }
    }
  }

  return {
    async submit({ period, claimed_handle, day, links }) {
      const base = { day, target_per_day: period.target_per_day };

      if (!acceptsSubmissions(period.status)) {
        return {
          ...base,
          status: "period_inactive",
          accepted: [],
          rejected: links.map((link) => ({ link, reason: "period_inactive" as const })),
          day_count: null,
          remaining: null,
          boundary: null
        };
      }
      if (day < period.start_date || day > period.end_date) {
        return {
          ...base,
          status: "outside_period",
          accepted: [],
          rejected: links.map((link) => ({ link, reason: "outside_period" as const })),
          day_count: null,
          remaining: null,
          boundary: day < period.start_date ? "not_started" : "ended"
        };
      }
      if (links.length === 0) {
        return { ...base, status: "no_links", accepted: [], rejected: [], day_count: null, remaining: null, boundary: null };
      }

      const survivors: string[] = [];
      const rejected: SubmitResult["rejected"] = [];
      for (const link of links) {
        if (validateLink(link, claimed_handle)) survivors.push(link);
        else rejected.push({ link, reason: "invalid_link" });
      }
      if (survivors.length === 0) {
        return { ...base, status: "no_valid_links", accepted: [], rejected, day_count: null, remaining: null, boundary: null };
      }

      type SlotOutcome =
        | { kind: "inactive"; target: number }
        | { kind: "full"; existing: number; target: number }
        | { kind: "accepted"; accepted: DbSubmission[]; existing: number; target: number };

      let outcome: SlotOutcome;
      try {
        outcome = await queue.run(period.id, async (): Promise<SlotOutcome> => {
          // Status and target may have changed since the caller looked the period up.
          const current = await deps.store.getTrackingPeriodById(period.id);
          if (!current || !acceptsSubmissions(current.status)) return { kind: "inactive", target: current?.target_per_day ?? period.target_per_day };
          const target = current.target_per_day;
          const existing = await deps.store.countSubmissions(period.id, day);
          if (existing + survivors.length > target) return { kind: "full", existing, target };
          const accepted = await deps.store.insertSubmissions(
            period.id,
            day,
            survivors.map((link) => ({ link, external_post_id: extractPostId(link), handle_extracted: extractHandle(link) })),
            existing + 1
          );
          return { kind: "accepted", accepted, existing, target };
        });
      } catch (e) {
        // A lost ordinal race from another process surfaces as a conflict; either way nothing was recorded.
        if (e instanceof PersistenceError) throw e;
        const cause = e instanceof TrackerError ? `${e.code}: ${e.message}` : "store failure";
        throw new PersistenceError(`Submissions for ${day} were not recorded (${cause})`, e);
      }

      if (outcome.kind === "inactive") {
        log.info({ evt: "period_inactive", period_id: period.id, day }, "period stopped accepting before insert");
        return {
          day,
          target_per_day: outcome.target,
          status: "period_inactive",
          accepted: [],
          rejected: [...rejected, ...survivors.map((link) => ({ link, reason: "period_inactive" as const }))],
          day_count: null,
          remaining: null,
          boundary: null
        };
      }
      if (outcome.kind === "full") {
        const { existing, target } = outcome;
        log.info({ evt: "quota_exceeded", period_id: period.id, day, existing, batch: survivors.length }, "batch over daily target");
        return {
          day,
          target_per_day: target,
          status: "quota_exceeded",
          accepted: [],
          rejected: [...rejected, ...survivors.map((link) => ({ link, reason: "quota_exceeded" as const }))],
          day_count: existing,
          remaining: Math.max(0, target - existing),
          boundary: null
        };
      }

      const { accepted, existing, target } = outcome;
      await mirror(period, accepted);
      const dayCount = existing + accepted.length;
      log.info({ evt: "submissions_accepted", period_id: period.id, day, accepted: accepted.length, day_count: dayCount }, "batch accepted");
      return {
        day,
        target_per_day: target,
        status: "accepted",
        accepted,
        rejected,
        day_count: dayCount,
        remaining: Math.max(0, target - dayCount),
        boundary: null
      };
    }
  };
}
