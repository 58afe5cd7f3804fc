import { beforeEach, describe, expect, it } from "vitest";
import type { DbSubmission, PeriodEntry } from "@replyledger/shared";
import { PersistenceError } from "../errors.js";
import { createQuotaLedger, type QuotaLedger } from "../services/ledger.js";
import { MemoryReportSink } from "../services/reportSink.js";
import { MemoryStore } from "../store/memory.js";
import type { NewSubmission } from "../store/types.js";
import { createTrackedAccount, link, seedSubmissions } from "./helpers/factories.js";

const DAY = "2026-05-10";

describe("quota ledger", () => {
  let store: MemoryStore;
  let reports: MemoryReportSink;
  let ledger: QuotaLedger;
  let entry: PeriodEntry;

  beforeEach(async () => {
    store = new MemoryStore();
    reports = new MemoryReportSink();
    ledger = createQuotaLedger({ store, reports });
    entry = await createTrackedAccount(store, { target: 5 });
  });

  function submit(links: string[], day = DAY, period = entry.period) {
    return ledger.submit({ period, claimed_handle: "alice", day, links });
  }

  it("accepts a batch that fits and continues the ordinals", async () => {
    await seedSubmissions(store, entry, DAY, 3);
    const res = await submit([link("alice", 1), link("alice", 2)]);
    expect(res.status).toBe("accepted");
    expect(res.accepted.map((s) => s.ordinal)).toEqual([4, 5]);
    expect(res.accepted.map((s) => s.external_post_id)).toEqual(["1", "2"]);
    expect(res.day_count).toBe(5);
    expect(res.remaining).toBe(0);
    expect(reports.rows).toEqual([
      { periodId: entry.period.id, day: DAY, ordinal: 4, link: link("alice", 1) },
      { periodId: entry.period.id, day: DAY, ordinal: 5, link: link("alice", 2) }
    ]);
  });

  it("rejects a whole batch that would overshoot and reports what still fits", async () => {
    await seedSubmissions(store, entry, DAY, 3);
    const res = await submit([link("alice", 1), link("alice", 2), link("alice", 3)]);
    expect(res.status).toBe("quota_exceeded");
    expect(res.accepted).toEqual([]);
    expect(res.remaining).toBe(2);
    expect(res.day_count).toBe(3);
    expect(res.rejected.map((r) => r.reason)).toEqual(["quota_exceeded", "quota_exceeded", "quota_exceeded"]);
    expect(await store.countSubmissions(entry.period.id, DAY)).toBe(3);
    expect(reports.rows).toEqual([]);
  });

  it("drops links owned by someone else before counting", async () => {
    const res = await submit([link("alice", 10), link("bob", 11), "https://x.com/home"]);
    expect(res.status).toBe("accepted");
    expect(res.accepted.map((s) => [s.ordinal, s.link])).toEqual([[1, link("alice", 10)]]);
    expect(res.rejected).toEqual([
      { link: link("bob", 11), reason: "invalid_link" },
      { link: "https://x.com/home", reason: "invalid_link" }
    ]);
    expect(res.remaining).toBe(4);
  });

  it("keeps invalid-link rejections next to a quota rejection", async () => {
    await seedSubmissions(store, entry, DAY, 5);
    const res = await submit([link("bob", 1), link("alice", 2)]);
    expect(res.status).toBe("quota_exceeded");
    expect(res.rejected).toEqual([
      { link: link("bob", 1), reason: "invalid_link" },
      { link: link("alice", 2), reason: "quota_exceeded" }
    ]);
    expect(res.remaining).toBe(0);
  });

  it("rejects days outside the period regardless of quota", async () => {
    const before = await submit([link("alice", 1)], "2026-04-30");
    expect(before.status).toBe("outside_period");
    expect(before.boundary).toBe("not_started");
    expect(before.rejected).toEqual([{ link: link("alice", 1), reason: "outside_period" }]);

    await seedSubmissions(store, entry, "2026-06-30", 5);
    const after = await submit([link("alice", 2)], "2026-07-01");
    expect(after.status).toBe("outside_period");
    expect(after.boundary).toBe("ended");
    expect(after.day_count).toBeNull();
    expect(await store.countSubmissions(entry.period.id, "2026-07-01")).toBe(0);
  });

  it("accepts on the first and last day of the period", async () => {
    expect((await submit([link("alice", 1)], "2026-05-01")).status).toBe("accepted");
    expect((await submit([link("alice", 2)], "2026-06-30")).status).toBe("accepted");
  });

  it("refuses submissions to a paused period", async () => {
    const paused = await store.updateTrackingPeriodStatus(entry.period.id, "paused");
    const res = await submit([link("alice", 1)], DAY, paused);
    expect(res.status).toBe("period_inactive");
    expect(res.rejected).toEqual([{ link: link("alice", 1), reason: "period_inactive" }]);
    expect(await store.countSubmissions(entry.period.id, DAY)).toBe(0);
  });

  it("applies a target lowered after the caller read the period", async () => {
    const stale = entry.period;
    await store.updateTrackingPeriodTarget(entry.period.id, 2);
    const res = await submit([link("alice", 1), link("alice", 2), link("alice", 3)], DAY, stale);
    expect(res.status).toBe("quota_exceeded");
    expect(res.target_per_day).toBe(2);
    expect(res.remaining).toBe(2);
    expect(await store.countSubmissions(entry.period.id, DAY)).toBe(0);
  });

  it("refuses a batch when the period was paused after the caller read it", async () => {
    const stale = entry.period;
    await store.updateTrackingPeriodStatus(entry.period.id, "paused");
    const res = await submit([link("bob", 1), link("alice", 2)], DAY, stale);
    expect(res.status).toBe("period_inactive");
    expect(res.rejected).toEqual([
      { link: link("bob", 1), reason: "invalid_link" },
      { link: link("alice", 2), reason: "period_inactive" }
    ]);
    expect(await store.countSubmissions(entry.period.id, DAY)).toBe(0);
  });

  it("distinguishes no links from no valid links", async () => {
    expect((await submit([])).status).toBe("no_links");
    const res = await submit([link("bob", 1)]);
    expect(res.status).toBe("no_valid_links");
    expect(res.day_count).toBeNull();
  });

  it("never lets two concurrent batches overshoot the target", async () => {
    const a = [1, 2, 3].map((n) => link("alice", n));
    const b = [4, 5, 6].map((n) => link("alice", n));
    const [ra, rb] = await Promise.all([submit(a), submit(b)]);
    expect([ra.status, rb.status].sort()).toEqual(["accepted", "quota_exceeded"]);
    expect(ra.accepted.length + rb.accepted.length).toBe(3);
    const stored = await store.listSubmissions(entry.period.id, { day: DAY });
    expect(stored.map((s) => s.ordinal)).toEqual([1, 2, 3]);
  });

  it("keeps separate days independent", async () => {
    await seedSubmissions(store, entry, DAY, 5);
    const res = await submit([link("alice", 1)], "2026-05-11");
    expect(res.status).toBe("accepted");
    expect(res.accepted[0]?.ordinal).toBe(1);
  });

  it("surfaces a store failure as a persistence error, not a rejection", async () => {
    class FailingStore extends MemoryStore {
      override async insertSubmissions(_p: string, _d: string, _l: NewSubmission[], _o: number): Promise<DbSubmission[]> {
        throw new Error("connection reset");
      }
    }
    const failing = new FailingStore();
    const e = await createTrackedAccount(failing);
    const l = createQuotaLedger({ store: failing, reports });
    await expect(l.submit({ period: e.period, claimed_handle: "alice", day: DAY, links: [link("alice", 1)] })).rejects.toBeInstanceOf(
      PersistenceError
    );
  });

  it("reports an ordinal collision from another writer as a persistence error", async () => {
    class RacingStore extends MemoryStore {
      // Another process slips its rows in between our count and our insert.
      override async countSubmissions(periodId: string, day: string): Promise<number> {
        const n = await super.countSubmissions(periodId, day);
        if (n === 0) await super.insertSubmissions(periodId, day, [{ link: link("alice", 99), external_post_id: "99", handle_extracted: "alice" }], 1);
        return n;
      }
    }
    const racing = new RacingStore();
    const e = await createTrackedAccount(racing);
    const l = createQuotaLedger({ store: racing, reports });
    const err = await l.submit({ period: e.period, claimed_handle: "alice", day: DAY, links: [link("alice", 1)] }).catch((x: unknown) => x);
    expect(err).toBeInstanceOf(PersistenceError);
    expect(await racing.countSubmissions(e.period.id, DAY)).toBe(1);
  });

  it("still accepts when the report sink fails", async () => {
    const broken = {
      async writeRow(): Promise<void> {
        throw new Error("disk full");
      },
      async generateEmptyTemplate(): Promise<string> {
        return "unused";
      }
    };
    const l = createQuotaLedger({ store, reports: broken });
    const res = await l.submit({ period: entry.period, claimed_handle: "alice", day: DAY, links: [link("alice", 1)] });
    expect(res.status).toBe("accepted");
    expect(await store.countSubmissions(entry.period.id, DAY)).toBe(1);
  });
});
