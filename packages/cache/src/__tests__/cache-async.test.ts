import { ErrorCode, type LogEntry, Logger, type LogTransport } from "@recency/shared";
import { describe, expect, it, vi } from "vitest";
import { LruCache } from "../cache.js";

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function createMockTransport(): LogTransport & { entries: LogEntry[] } {
  return {
    entries: [],
    log(entry: LogEntry) {
      this.entries.push(entry);
    },
  };
}

describe("LruCache.getOrAddAsync", () => {
  it("caches the resolved value of an async producer", async () => {
    const cache = new LruCache<string>();
    const create = vi.fn(async () => "value");

    await expect(cache.getOrAddAsync("key", 0, create)).resolves.toEqual({ ok: true, value: "value" });
    await expect(cache.getOrAddAsync("key", 0, create)).resolves.toEqual({ ok: true, value: "value" });
    expect(create).toHaveBeenCalledTimes(1);
  });

  it("accepts a synchronous producer", async () => {
    const cache = new LruCache<number>();

    await expect(cache.getOrAddAsync("key", 0, () => 42)).resolves.toEqual({ ok: true, value: 42 });
    expect(cache.peek("key")?.value).toBe(42);
  });

  it("gives parallel callers on disjoint keys their own values", async () => {
    const cache = new LruCache<string>({ capacity: 100 });
    let active = 0;
    let maxActive = 0;

    const results = await Promise.all(
      Array.from({ length: 100 }, (_, i) =>
        cache.getOrAddAsync(`key:${i}`, 0, async () => {
          active++;
          maxActive = Math.max(maxActive, active);
          await delay(1);
          active--;
          return `value:${i}`;
        })
      )
    );

    expect(results.map((result) => (result.ok ? result.value : null))).toEqual(
      Array.from({ length: 100 }, (_, i) => `value:${i}`)
    );
    expect(cache.size).toBe(100);
    expect(maxActive).toBe(1);
  });

  it("runs the producer once when parallel callers share a key", async () => {
    const cache = new LruCache<string>();
    const create = vi.fn(async () => {
      await delay(1);
      return "shared";
    });

    const results = await Promise.all(Array.from({ length: 10 }, () => cache.getOrAddAsync("key", 0, create)));

    expect(create).toHaveBeenCalledTimes(1);
    expect(results.every((result) => result.ok && result.value === "shared")).toBe(true);
  });

  it("keeps every worker's reads consistent across overlapping key sets", async () => {
    const cache = new LruCache<string>({ capacity: 100 });

    const worker = async () => {
      const mismatches: string[] = [];
      for (let o = 0; o < 50; o++) {
        const expected = `value:${o}`;
        const result = await cache.getOrAddAsync(`key:${o}`, 0, () => expected);
        if (!result.ok || result.value !== expected) {
          mismatches.push(`key:${o}`);
        }
      }
      return mismatches;
    };

    const mismatches = await Promise.all(Array.from({ length: 20 }, worker));

    expect(mismatches.flat()).toEqual([]);
    expect(cache.size).toBe(50);
  });

  it("evicts under capacity pressure", async () => {
    const onEvict = vi.fn();
    const cache = new LruCache<string>({ capacity: 2, onEvict });

    await Promise.all(["a", "b", "c"].map((key) => cache.getOrAddAsync(key, 0, async () => key.toUpperCase())));

    expect(onEvict).toHaveBeenCalledTimes(1);
    expect(onEvict.mock.calls[0]?.[0]).toMatchObject({ key: "a", value: "A" });
    expect(cache.keys()).toEqual(["b", "c"]);
  });

  it("returns PRODUCER_FAILED for a rejected producer and releases the lock", async () => {
    const cache = new LruCache<string>();
    const cause = new Error("backend down");

    const failed = await cache.getOrAddAsync("key", 0, () => Promise.reject(cause));

    expect(failed.ok).toBe(false);
    if (!failed.ok) {
      expect(failed.error.code).toBe(ErrorCode.PRODUCER_FAILED);
      expect(failed.error.cause).toBe(cause);
    }
    expect(cache.has("key")).toBe(false);
    await expect(cache.getOrAddAsync("key", 0, async () => "recovered")).resolves.toEqual({
      ok: true,
      value: "recovered",
    });
  });

  it("captures a producer that throws synchronously", async () => {
    const cache = new LruCache<string>();

    const result = await cache.getOrAddAsync("key", 0, () => {
      throw new Error("sync throw");
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(ErrorCode.PRODUCER_FAILED);
    }
  });

  it("returns validation errors without taking the producer path", async () => {
    const cache = new LruCache<string>();
    const create = vi.fn(async () => "value");

    const result = await cache.getOrAddAsync("", 0, create);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(ErrorCode.INVALID_KEY);
    }
    expect(create).not.toHaveBeenCalled();
  });

  it("rejects when the eviction observer throws and stays usable", async () => {
    const cache = new LruCache<string>({
      capacity: 1,
      onEvict: () => {
        throw new Error("observer failed");
      },
    });
    await cache.getOrAddAsync("a", 0, () => "A");

    await expect(cache.getOrAddAsync("b", 0, () => "B")).rejects.toThrow("observer failed");
    await expect(cache.getOrAddAsync("c", 0, () => "C")).resolves.toEqual({ ok: true, value: "C" });
  });

  it("refuses synchronous misses while an async producer holds the lock", async () => {
    const cache = new LruCache<string>({ capacity: 4 });
    let active = 0;
    let maxActive = 0;
    const track = <T>(produce: () => T): T => {
      active++;
      maxActive = Math.max(maxActive, active);
      try {
        return produce();
      } finally {
        active--;
      }
    };
    await cache.getOrAddAsync("warm", 0, () => "W");

    let resolveProducer: (value: string) => void = () => {};
    const pending = cache.getOrAddAsync("a", 0, () => {
      active++;
      maxActive = Math.max(maxActive, active);
      return new Promise<string>((resolve) => {
        resolveProducer = (value) => {
          active--;
          resolve(value);
        };
      });
    });
    await delay(0);

    const syncCreate = vi.fn(() => track(() => "B"));
    const busy = cache.getOrAdd("b", 0, syncCreate);
    const hit = cache.getOrAdd("warm", 0, () => track(() => "unused"));

    expect(busy.ok).toBe(false);
    if (!busy.ok) {
      expect(busy.error.code).toBe(ErrorCode.CACHE_BUSY);
      expect(busy.error.isRetryable).toBe(true);
    }
    expect(syncCreate).not.toHaveBeenCalled();
    expect(hit).toEqual({ ok: true, value: "W" });

    resolveProducer("A");
    await expect(pending).resolves.toEqual({ ok: true, value: "A" });
    expect(maxActive).toBe(1);

    expect(cache.getOrAdd("b", 0, syncCreate)).toEqual({ ok: true, value: "B" });
    expect(cache.keys()).toEqual(["warm", "a", "b"]);
  });

  it("logs how long the producer took at debug level", async () => {
    const transport = createMockTransport();
    const cache = new LruCache<string>({ logger: new Logger({ level: "debug", transports: [transport] }) });

    await cache.getOrAddAsync("key", 0, async () => "value");

    expect(transport.entries).toHaveLength(1);
    expect(transport.entries[0]?.message).toBe("cache producer resolved");
    expect(transport.entries[0]?.data).toEqual({ key: "key", durationMs: expect.any(Number) });
  });
});
