import { EventEmitter } from "node:events";
import { describe, expect, test, vi } from "vitest";
import { MemorySemaphoreStore } from "../../semaphore/memory.js";
import { ReleaseGuard } from "../release-guard.js";

describe("ReleaseGuard", () => {
  test("starts NotAcquired and releasing is a no-op", async () => {
    const store = new MemorySemaphoreStore(2);
    const guard = new ReleaseGuard(store);

    expect(guard.state).toBe("NotAcquired");
    expect(await guard.release()).toBe(false);
    expect(guard.releaseSync()).toBe(false);
    expect(await store.read()).toBe(2);
  });

  test("releases a held slot exactly once", async () => {
    const store = new MemorySemaphoreStore(2);
    const guard = new ReleaseGuard(store);
    guard.markAcquired();

    expect(await guard.release()).toBe(true);
    expect(guard.state).toBe("Released");
    expect(await guard.release()).toBe(false);
    expect(guard.releaseSync()).toBe(false);
    expect(await store.read()).toBe(1);
  });

  test("concurrent releases share one decrement", async () => {
    const store = new MemorySemaphoreStore(3);
    const spy = vi.spyOn(store, "release");
    const guard = new ReleaseGuard(store);
    guard.markAcquired();

    const results = await Promise.all([guard.release(), guard.release()]);

    expect(results).toEqual([true, true]);
    expect(spy).toHaveBeenCalledTimes(1);
    expect(await store.read()).toBe(2);
  });

  test("sync release latches too", async () => {
    const store = new MemorySemaphoreStore(1);
    const guard = new ReleaseGuard(store);
    guard.markAcquired();

    expect(guard.releaseSync()).toBe(true);
    expect(await guard.release()).toBe(false);
    expect(await store.read()).toBe(0);
  });

  test("sync release skips while an async release is in flight", async () => {
    const store = new MemorySemaphoreStore(2);
    const guard = new ReleaseGuard(store);
    guard.markAcquired();

    const pending = guard.release();
    expect(guard.state).toBe("Releasing");
    expect(guard.releaseSync()).toBe(false);

    await pending;
    expect(await store.read()).toBe(1);
  });

  test("a failed release can be retried", async () => {
    const store = new MemorySemaphoreStore(1);
    vi.spyOn(store, "release").mockRejectedValueOnce(new Error("disk full"));
    const guard = new ReleaseGuard(store);
    guard.markAcquired();

    await expect(guard.release()).rejects.toThrow("disk full");
    expect(guard.state).toBe("Acquired");
    expect(guard.releaseSync()).toBe(true);
    expect(await store.read()).toBe(0);
  });

  test("a failed sync release is reported and left Acquired", () => {
    const store = new MemorySemaphoreStore(1);
    vi.spyOn(store, "releaseSync").mockImplementationOnce(() => {
      throw new Error("EACCES");
    });
    const guard = new ReleaseGuard(store);
    guard.markAcquired();

    expect(guard.releaseSync()).toBe(false);
    expect(guard.state).toBe("Acquired");
  });

  test("markAcquired only once", () => {
    const guard = new ReleaseGuard(new MemorySemaphoreStore());
    guard.markAcquired();

    expect(() => guard.markAcquired()).toThrow(
      "ReleaseGuard already used (state: Acquired)",
    );
  });

  test("exit hook releases synchronously until detached", async () => {
    const store = new MemorySemaphoreStore(2);
    const proc = new EventEmitter();
    const guard = new ReleaseGuard(store);
    const detach = guard.attach(proc);
    guard.markAcquired();

    proc.emit("exit", 0);
    expect(guard.state).toBe("Released");
    expect(await store.read()).toBe(1);

    detach();
    expect(proc.listenerCount("exit")).toBe(0);
  });

  test("exit before acquiring leaves the counter alone", async () => {
    const store = new MemorySemaphoreStore(1);
    const proc = new EventEmitter();
    const guard = new ReleaseGuard(store);
    guard.attach(proc);

    proc.emit("exit", 130);

    expect(guard.state).toBe("NotAcquired");
    expect(await store.read()).toBe(1);
  });
});
