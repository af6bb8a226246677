import { test, expect } from "vitest";
import { StatusCache } from "../src/services/status-cache.ts";
import { FakeClock } from "./helpers/fake-system.ts";

interface Probes {
  active: boolean;
  name: string;
}

function counter<T>(values: T[]) {
  let calls = 0;
  const fetch = async () => {
    const value = values[Math.min(calls, values.length - 1)];
    calls++;
    if (value === undefined) throw new Error("no value");
    return value;
  };
  return { fetch, calls: () => calls };
}

// ---- TTL ----
test("returns the cached value just before the TTL runs out", async () => {
  const clock = new FakeClock();
  const cache = new StatusCache<Probes>(5_000, clock);
  const probe = counter([true, false]);

  expect(await cache.getOrFetch("active", probe.fetch)).toBe(true);
  clock.advance(4_999);
  expect(await cache.getOrFetch("active", probe.fetch)).toBe(true);
  expect(probe.calls()).toBe(1);
});

test("refetches once the TTL has passed", async () => {
  const clock = new FakeClock();
  const cache = new StatusCache<Probes>(5_000, clock);
  const probe = counter([true, false]);

  await cache.getOrFetch("active", probe.fetch);
  clock.advance(5_001);
  expect(await cache.getOrFetch("active", probe.fetch)).toBe(false);
  expect(probe.calls()).toBe(2);
});

test("keys are cached independently", async () => {
  const cache = new StatusCache<Probes>(5_000, new FakeClock());
  const active = counter([true]);
  const name = counter(["ap"]);

  await cache.getOrFetch("active", active.fetch);
  expect(await cache.getOrFetch("name", name.fetch)).toBe("ap");
  expect(cache.size).toBe(2);
});

// ---- Failures ----
test("a failed fetch is not cached", async () => {
  const cache = new StatusCache<Probes>(5_000, new FakeClock());
  let calls = 0;
  const flaky = async () => {
    calls++;
    if (calls === 1) throw new Error("nmcli crashed");
    return true;
  };

  await expect(cache.getOrFetch("active", flaky)).rejects.toThrow("nmcli crashed");
  expect(await cache.getOrFetch("active", flaky)).toBe(true);
  expect(calls).toBe(2);
});

// ---- Invalidation ----
test("invalidateAll forces the next read to refetch", async () => {
  const cache = new StatusCache<Probes>(5_000, new FakeClock());
  const probe = counter([false, true]);

  expect(await cache.getOrFetch("active", probe.fetch)).toBe(false);
  cache.invalidateAll();
  expect(cache.size).toBe(0);
  expect(await cache.getOrFetch("active", probe.fetch)).toBe(true);
});

test("concurrent readers share one fetch", async () => {
  const cache = new StatusCache<Probes>(5_000, new FakeClock());
  const probe = counter(["ap"]);

  const [a, b] = await Promise.all([
    cache.getOrFetch("name", probe.fetch),
    cache.getOrFetch("name", probe.fetch),
  ]);
  expect([a, b]).toEqual(["ap", "ap"]);
  expect(probe.calls()).toBe(1);
});

test("a fetch started before invalidateAll does not repopulate the cache", async () => {
  const cache = new StatusCache<Probes>(5_000, new FakeClock());
  let release: (value: boolean) => void = () => {};
  const slow = () => new Promise<boolean>((resolve) => {
    release = resolve;
  });

  const pending = cache.getOrFetch("active", slow);
  cache.invalidateAll();
  release(false);
  expect(await pending).toBe(false);

  expect(cache.size).toBe(0);
  expect(await cache.getOrFetch("active", async () => true)).toBe(true);
});
