import { beforeEach, describe, expect, it } from "vitest";
import { ConflictError, NotFoundError, ValidationError } from "../errors.js";
import { createKeyedQueue } from "../services/keyedQueue.js";
import { createPeriodService, type PeriodService } from "../services/periods.js";
import { MemoryStore } from "../store/memory.js";
import { createTrackedAccount, settings } from "./helpers/factories.js";

describe("period status actions", () => {
  let store: MemoryStore;
  let periods: PeriodService;

  beforeEach(async () => {
    store = new MemoryStore();
    periods = createPeriodService({ store, settings, accounts: createKeyedQueue(), writes: createKeyedQueue() });
    await createTrackedAccount(store, { resource_ref: "chan-1" });
  });

  it("pauses and resumes", async () => {
    const paused = await periods.pause("1001");
    expect(paused.previous).toBe("active");
    expect(paused.entry.period.status).toBe("paused");
    expect(await store.getActiveTrackingPeriod("1001")).toBeNull();

    await expect(periods.pause("1001")).rejects.toBeInstanceOf(NotFoundError);

    const resumed = await periods.resume("1001");
    expect(resumed.previous).toBe("paused");
    expect(resumed.entry.period.status).toBe("active");
  });

  it("refuses to resume when nothing is paused", async () => {
    await expect(periods.resume("1001")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("deletes a paused period, clears the resource and hands it back", async () => {
    await periods.pause("1001");
    const res = await periods.remove("1001");
    expect(res.previous).toBe("paused");
    expect(res.entry.period.status).toBe("deleted");
    expect(res.resource_ref).toBe("chan-1");
    expect(res.entry.account.resource_ref).toBeNull();
    expect(await store.getResourceRef("1001")).toBeNull();
  });

  it("treats deleted and left_server as terminal", async () => {
    await periods.markLeftServer("1001");
    await expect(periods.resume("1001")).rejects.toBeInstanceOf(NotFoundError);
    await expect(periods.remove("1001")).rejects.toBeInstanceOf(NotFoundError);
    expect((await store.getTrackingPeriodByStatus("1001", "left_server"))?.period.status).toBe("left_server");
  });

  it("changes the daily target within bounds", async () => {
    const entry = await periods.changeTarget("1001", 12);
    expect(entry.period.target_per_day).toBe(12);
    await expect(periods.changeTarget("1001", 0)).rejects.toBeInstanceOf(ValidationError);
    await expect(periods.changeTarget("1001", 501)).rejects.toBeInstanceOf(ValidationError);
    await expect(periods.changeTarget("2002", 5)).rejects.toBeInstanceOf(NotFoundError);
  });

  it("stores a new resource ref and rejects unknown members", async () => {
    await periods.setResource("1001", "chan-2");
    expect(await store.getResourceRef("1001")).toBe("chan-2");
    await expect(periods.setResource("2002", "chan-3")).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe("memory store constraints", () => {
  it("allows one active period per account", async () => {
    const store = new MemoryStore();
    const { account } = await createTrackedAccount(store);
    await expect(
      store.createTrackingPeriod({ account_id: account.id, target_per_day: 3, start_date: "2026-05-01", end_date: "2026-06-30" })
    ).rejects.toBeInstanceOf(ConflictError);
  });

  it("refuses to reactivate a period while another is active", async () => {
    const store = new MemoryStore();
    const first = await createTrackedAccount(store);
    await store.updateTrackingPeriodStatus(first.period.id, "paused");
    await store.createTrackingPeriod({ account_id: first.account.id, target_per_day: 3, start_date: "2026-05-01", end_date: "2026-06-30" });
    await expect(store.updateTrackingPeriodStatus(first.period.id, "active")).rejects.toBeInstanceOf(ConflictError);
  });

  it("refuses an ordinal already taken for the day", async () => {
    const store = new MemoryStore();
    const { period } = await createTrackedAccount(store);
    const row = { link: "https://x.com/alice/status/1", external_post_id: "1", handle_extracted: "alice" };
    await store.insertSubmissions(period.id, "2026-05-02", [row], 1);
    await expect(store.insertSubmissions(period.id, "2026-05-02", [row], 1)).rejects.toBeInstanceOf(ConflictError);
    expect(await store.countSubmissions(period.id, "2026-05-02")).toBe(1);
  });

  it("needs a handle to create an account", async () => {
    const store = new MemoryStore();
    await expect(store.upsertAccount({ external_id: "1001", display_name: "Alice" })).rejects.toBeInstanceOf(ValidationError);
  });
});
