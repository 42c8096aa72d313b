import { describe, expect, it } from "vitest";

import { fakeClock } from "../testing/fakes.js";
import { ExpiringMap, resolveStore } from "./expiringMap.js";

describe("ExpiringMap", () => {
  it("keeps an entry alive for exactly the ttl", () => {
    const clock = fakeClock();
    const map = new ExpiringMap<string, number>(1000, clock.now);
    map.set("a", 1);

    clock.advance(1000);
    expect(map.get("a")).toBe(1);

    clock.advance(1);
    expect(map.get("a")).toBeUndefined();
    expect(map.size()).toBe(0);
  });

  it("restarts the window on touch", () => {
    const clock = fakeClock();
    const map = new ExpiringMap<string, number>(1000, clock.now);
    map.set("a", 1);
    clock.advance(800);
    expect(map.touch("a")).toBe(true);
    clock.advance(800);
    expect(map.get("a")).toBe(1);
  });

  it("does not revive a lapsed entry on touch", () => {
    const clock = fakeClock();
    const map = new ExpiringMap<string, number>(1000, clock.now);
    map.set("a", 1);
    clock.advance(1001);
    expect(map.touch("a")).toBe(false);
    expect(map.get("a")).toBeUndefined();
  });

  it("sweeps only lapsed entries", () => {
    const clock = fakeClock();
    const map = new ExpiringMap<string, number>(1000, clock.now);
    map.set("old", 1);
    clock.advance(600);
    map.set("fresh", 2);
    clock.advance(500);

    expect(map.size()).toBe(2);
    expect(map.values()).toEqual([2]);
    expect(map.sweep()).toBe(1);
    expect(map.size()).toBe(1);
    expect(map.get("fresh")).toBe(2);
  });

  it("rejects a non-positive ttl", () => {
    expect(() => new ExpiringMap(0)).toThrow("ExpiringMap ttl must be positive, got 0");
  });
});

describe("resolveStore", () => {
  it("prefers an injected store over the ttl", () => {
    const injected = new ExpiringMap<number, string>(5);
    const resolved = resolveStore({ store: injected, ttlMs: 99 }, 1000);
    expect(resolved.store).toBe(injected);
  });

  it("builds a map with the default ttl and the given clock", () => {
    const clock = fakeClock();
    const { store } = resolveStore<number, string>({ clock: clock.now }, 100);
    store.set(1, "x");
    clock.advance(100);
    expect(store.get(1)).toBe("x");
    clock.advance(1);
    expect(store.get(1)).toBeUndefined();
  });
});
