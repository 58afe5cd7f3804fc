import { describe, expect, it } from "vitest";
import { createTrackerClient } from "../apiClient.js";
import { createReminderTicker } from "../sweeps.js";
import { errorBody, fakeApi, FakePlatform, silentLogger, titleOf } from "./helpers/fakes.js";

describe("reminder ticker", () => {
  function setup(opts: { failFetch?: () => boolean } = {}) {
    let now = new Date("2026-05-01T08:45:00.000Z");
    const platform = new FakePlatform();
    platform.resources.add("chan-1");
    const { api, calls } = fakeApi({
      "GET /bot/reminders/due": () =>
        opts.failFetch?.()
          ? { status: 503, json: errorBody("persistence_failed", "persistence") }
          : {
              json: {
                ok: true,
                day: now.toISOString().slice(0, 10),
                due: [
                  { external_id: "1001", resource_ref: "chan-1", day_count: 2, target_per_day: 5, remaining: 3 },
                  { external_id: "1002", resource_ref: "chan-gone", day_count: 0, target_per_day: 4, remaining: 4 }
                ]
              }
            }
    });
    const ticker = createReminderTicker({
      tracker: createTrackerClient(api),
      platform,
      timeZone: "UTC",
      hour: 9,
      logger: silentLogger,
      now: () => now
    });
    return { ticker, platform, calls, setNow: (iso: string) => (now = new Date(iso)) };
  }

  it("waits for the reminder hour, sends once, then waits for the next day", async () => {
    const { ticker, platform, calls, setNow } = setup();
    expect(await ticker.tick()).toEqual({ status: "early", sent: 0, failed: 0 });
    expect(calls).toEqual([]);

    setNow("2026-05-01T09:00:00.000Z");
    expect(await ticker.tick()).toEqual({ status: "sent", sent: 1, failed: 1 });
    expect(platform.sent.map((s) => [s.ref, titleOf(s.message)])).toEqual([["chan-1", "Daily reminder"]]);

    setNow("2026-05-01T21:15:00.000Z");
    expect((await ticker.tick()).status).toBe("done_today");

    setNow("2026-05-02T10:30:00.000Z");
    expect((await ticker.tick()).status).toBe("sent");
    expect(calls.length).toBe(2);
  });

  it("retries on the next tick when the list could not be fetched", async () => {
    let fail = true;
    const { ticker, setNow } = setup({ failFetch: () => fail });
    setNow("2026-05-01T09:15:00.000Z");
    await expect(ticker.tick()).rejects.toMatchObject({ code: "persistence_failed" });
    fail = false;
    setNow("2026-05-01T09:30:00.000Z");
    expect(await ticker.tick()).toEqual({ status: "sent", sent: 1, failed: 1 });
  });
});
