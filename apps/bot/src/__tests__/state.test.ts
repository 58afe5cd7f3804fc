import { describe, expect, it } from "vitest";
import { createOnboardingStore } from "../state.js";

const MINUTE = 60 * 1000;

describe("onboarding session store", () => {
  function setup() {
    let t = 1_000_000;
    const store = createOnboardingStore({ ttlMs: 60 * MINUTE, now: () => t });
    return { store, advance: (ms: number) => (t += ms) };
  }

  it("starts sessions at the handle step", () => {
    const { store } = setup();
    const s = store.start({ external_id: "1001", display_name: "Alice", resource_ref: "chan-1" });
    expect(s).toEqual({
      external_id: "1001",
      display_name: "Alice",
      resource_ref: "chan-1",
      step: "awaiting_handle",
      collected: {},
      created_at: 1_000_000
    });
    expect(store.get("1001")).toBe(s);
  });

  it("keeps a session until it is older than the ttl", () => {
    const { store, advance } = setup();
    store.start({ external_id: "1001", display_name: "Alice", resource_ref: "chan-1" });
    advance(60 * MINUTE);
    expect(store.sweep()).toEqual([]);
    expect(store.size()).toBe(1);

    advance(1);
    expect(store.sweep().map((s) => s.external_id)).toEqual(["1001"]);
    expect(store.get("1001")).toBeUndefined();
  });

  it("counts the ttl from the start even when the session advances", () => {
    const { store, advance } = setup();
    const s = store.start({ external_id: "1001", display_name: "Alice", resource_ref: "chan-1" });
    store.start({ external_id: "1002", display_name: "Bob", resource_ref: "chan-2" });
    advance(30 * MINUTE);
    store.save({ ...s, step: "awaiting_target", collected: { handle: "alice" } });
    store.start({ external_id: "1003", display_name: "Cara", resource_ref: "chan-3" });
    advance(31 * MINUTE);
    expect(store.sweep().map((x) => x.external_id).sort()).toEqual(["1001", "1002"]);
    expect(store.get("1003")?.step).toBe("awaiting_handle");
  });

  it("deletes explicitly", () => {
    const { store } = setup();
    store.start({ external_id: "1001", display_name: "Alice", resource_ref: "chan-1" });
    expect(store.delete("1001")).toBe(true);
    expect(store.delete("1001")).toBe(false);
  });
});
