import { beforeEach, describe, expect, it } from "vitest";
import type { PeriodEntry } from "@replyledger/shared";
import { createTrackerClient } from "../apiClient.js";
import { handleDeparture, reconcile, type ReconcileDeps } from "../flows/reconcile.js";
import { errorBody, fakeApi, FakePlatform, periodEntry, settings, silentLogger, titleOf } from "./helpers/fakes.js";

describe("lifecycle reconciler", () => {
  let platform: FakePlatform;
  const gone = periodEntry({ external_id: "1001", display_name: "Alice", resource_ref: "chan-a" });
  const missing = periodEntry({ external_id: "1002", display_name: "Bob", resource_ref: "chan-b" });
  const healthy = periodEntry({ external_id: "1003", display_name: "Cara", resource_ref: "chan-c" });

  beforeEach(() => {
    platform = new FakePlatform();
    platform.addMember("1002", "Bob");
    platform.addMember("1003", "Cara");
    platform.resources.add("chan-a");
    platform.resources.add("chan-c");
  });

  function setup(entries: PeriodEntry[]) {
    const { api, calls } = fakeApi({
      "GET /bot/periods?status=active&with_resource=1": () => ({ json: { ok: true, entries } }),
      "POST /bot/periods/left-server": (body) => {
        const entry = entries.find((e) => JSON.stringify(body).includes(e.account.external_id));
        if (!entry) return { status: 404, json: errorBody("no_period", "validation") };
        return {
          json: {
            ok: true,
            entry: { account: { ...entry.account, resource_ref: null }, period: { ...entry.period, status: "left_server" } },
            previous: "active",
            resource_ref: entry.account.resource_ref
          }
        };
      },
      "POST /bot/accounts/resource": () => ({ json: { ok: true } })
    });
    const deps: ReconcileDeps = {
      platform,
      tracker: createTrackerClient(api),
      trackingRoleName: settings.trackingRoleName,
      adminRoleName: settings.adminRoleName,
      logger: silentLogger
    };
    return { deps, calls };
  }

  it.each([
    { order: "in listing order", entries: [gone, missing, healthy] },
    { order: "in reverse order", entries: [healthy, missing, gone] }
  ])("closes out the departed member and recreates the missing channel $order", async ({ entries }) => {
    const { deps, calls } = setup(entries);
    const summary = await reconcile(deps);

    expect(summary).toEqual({ checked: 3, healthy: 1, departed: 1, recreated: 1, attempted: 1, skipped: 0, failed: 0 });
    expect(platform.resources.has("chan-a")).toBe(false);
    expect(platform.resources.has("chan-new-1")).toBe(true);
    expect(calls.filter((c) => c.method === "POST").map((c) => [c.path, c.body])).toEqual(
      expect.arrayContaining([
        ["/bot/periods/left-server", { external_id: "1001" }],
        ["/bot/accounts/resource", { external_id: "1002", resource_ref: "chan-new-1" }]
      ])
    );
    expect(titleOf(platform.sent[0]?.message)).toBe("Your tracking channel was restored");
    expect(platform.admin.map(titleOf).sort()).toEqual(["Channel check finished", "Member left the server"]);
  });

  it("skips members who no longer hold the tracking role", async () => {
    platform.addMember("1002", "Bob", []);
    const { deps } = setup([missing]);
    const summary = await reconcile(deps);
    expect(summary).toMatchObject({ checked: 1, skipped: 1, attempted: 0, recreated: 0 });
    expect(platform.created).toEqual([]);
  });

  it("keeps going when one account fails", async () => {
    platform.addMember("1001", "Alice");
    platform.failCreateFor.add("1001");
    const { deps } = setup([periodEntry({ external_id: "1001", display_name: "Alice", resource_ref: "chan-x" }), missing]);
    const summary = await reconcile(deps);
    expect(summary).toMatchObject({ checked: 2, attempted: 2, recreated: 1, failed: 1 });
    expect(platform.created.map((c) => c.owner.external_id)).toEqual(["1002"]);
  });

  it("removes a recreated channel the API would not record", async () => {
    const { api } = fakeApi({
      "GET /bot/periods?status=active&with_resource=1": () => ({ json: { ok: true, entries: [missing] } }),
      "POST /bot/accounts/resource": () => ({ status: 503, json: errorBody("persistence_failed", "persistence") })
    });
    const deps: ReconcileDeps = {
      platform,
      tracker: createTrackerClient(api),
      trackingRoleName: settings.trackingRoleName,
      adminRoleName: settings.adminRoleName,
      logger: silentLogger
    };

    expect(await reconcile(deps)).toMatchObject({ checked: 1, attempted: 1, recreated: 0, failed: 1 });
    expect(await reconcile(deps)).toMatchObject({ checked: 1, attempted: 1, recreated: 0, failed: 1 });
    expect(platform.created.map((c) => c.ref)).toEqual(["chan-new-1", "chan-new-2"]);
    expect([...platform.resources].sort()).toEqual(["chan-a", "chan-c"]);
  });

  it("stays quiet when everything is in place", async () => {
    const { deps } = setup([healthy]);
    expect(await reconcile(deps)).toMatchObject({ checked: 1, healthy: 1 });
    expect(platform.admin).toEqual([]);
  });

  it("ignores a departure without a tracking period", async () => {
    const { deps } = setup([]);
    expect(await handleDeparture(deps, "1009")).toBe(false);
    expect(platform.admin).toEqual([]);
  });
});
