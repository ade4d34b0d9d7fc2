import { beforeEach, describe, expect, it, vi } from "vitest";

import { cacheKey, MetricCache } from "../metricCache";

const deferred = <T>() => {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
};

describe("cacheKey", () => {
  it("ignores key order and undefined members", () => {
    expect(cacheKey("m", { b: 1, a: 2 })).toBe('m|{"a":2,"b":1}');
    expect(cacheKey("m", { a: 1, c: undefined })).toBe(cacheKey("m", { a: 1 }));
    expect(cacheKey("m", { outer: { z: 1, y: [2] } })).toBe('m|{"outer":{"y":[2],"z":1}}');
  });
});

describe("MetricCache", () => {
  let clock: number;
  let cache: MetricCache<number>;

  beforeEach(() => {
    clock = 1_000_000;
    cache = new MetricCache<number>({ now: () => clock });
  });

  it("serves the stored value until the TTL runs out", async () => {
    const compute = vi.fn(async () => 42);

    expect(await cache.getOrCompute("m", { w: "7d" }, 60, compute)).toEqual({ value: 42, computedAt: 1_000_000, fromCache: false });
    clock += 59_999;
    expect(await cache.getOrCompute("m", { w: "7d" }, 60, compute)).toEqual({ value: 42, computedAt: 1_000_000, fromCache: true });
    expect(compute).toHaveBeenCalledTimes(1);

    clock += 1;
    const refreshed = await cache.getOrCompute("m", { w: "7d" }, 60, compute);
    expect(refreshed).toEqual({ value: 42, computedAt: 1_060_000, fromCache: false });
    expect(compute).toHaveBeenCalledTimes(2);
  });

  it("keeps entries for different filters apart", async () => {
    await cache.getOrCompute("m", { w: "7d" }, 60, async () => 1);
    const other = await cache.getOrCompute("m", { w: "30d" }, 60, async () => 2);
    expect(other.value).toBe(2);
    expect(cache.size).toBe(2);
  });

  it("shares one computation between concurrent misses", async () => {
    const gate = deferred<number>();
    const compute = vi.fn(() => gate.promise);

    const first = cache.getOrCompute("m", {}, 60, compute);
    const second = cache.getOrCompute("m", {}, 60, compute);
    gate.resolve(7);

    const results = await Promise.all([first, second]);
    expect(compute).toHaveBeenCalledTimes(1);
    expect(results.map((r) => [r.value, r.fromCache])).toEqual([
      [7, false],
      [7, true]
    ]);
  });

  it("never stores a failed computation", async () => {
    await expect(cache.getOrCompute("m", {}, 60, async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    expect(cache.size).toBe(0);

    const retry = await cache.getOrCompute("m", {}, 60, async () => 3);
    expect(retry).toEqual({ value: 3, computedAt: 1_000_000, fromCache: false });
  });

  it("invalidates one metric or everything", async () => {
    await cache.getOrCompute("a", { w: 1 }, 60, async () => 1);
    await cache.getOrCompute("a", { w: 2 }, 60, async () => 2);
    await cache.getOrCompute("b", {}, 60, async () => 3);

    expect(cache.invalidate("a")).toBe(2);
    expect(cache.peek("a", { w: 1 })).toBeNull();
    expect(cache.peek("b", {})?.value).toBe(3);

    expect(cache.invalidate()).toBe(1);
    expect(cache.size).toBe(0);
  });

  it("does not store a computation invalidated while in flight", async () => {
    const gate = deferred<number>();
    const pending = cache.getOrCompute("m", {}, 60, () => gate.promise);

    cache.invalidate("m");
    gate.resolve(5);

    expect((await pending).value).toBe(5);
    expect(cache.size).toBe(0);
  });

  it("evicts expired entries of other keys when storing", async () => {
    await cache.getOrCompute("a", { from: "2024-01-01" }, 1, async () => 1);
    await cache.getOrCompute("a", { from: "2024-01-02" }, 1, async () => 2);
    await cache.getOrCompute("b", {}, 60, async () => 3);
    expect(cache.size).toBe(3);

    clock += 10_000;
    await cache.getOrCompute("c", {}, 60, async () => 4);

    expect(cache.size).toBe(2);
    expect(cache.peek("b", {})?.value).toBe(3);
  });

  it("treats a zero TTL as already stale", async () => {
    const compute = vi.fn(async () => 1);
    await cache.getOrCompute("m", {}, 0, compute);
    await cache.getOrCompute("m", {}, 0, compute);
    expect(compute).toHaveBeenCalledTimes(2);
  });
});
