import { describe, expect, it, vi } from "vitest";
import { LazyResource } from "./lazyResource";

describe("LazyResource", () => {
  it("creates the value once for concurrent callers", async () => {
    const create = vi.fn(async () => ({ id: 1 }));
    const lazy = new LazyResource(create);

    const [a, b] = await Promise.all([lazy.get(), lazy.get()]);
    const c = await lazy.get();

    expect(create).toHaveBeenCalledTimes(1);
    expect(a).toBe(b);
    expect(c).toBe(a);
    expect(lazy.isReady).toBe(true);
  });

  it("retries after a failed creation", async () => {
    const create = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("model missing"))
      .mockResolvedValueOnce("engine");
    const lazy = new LazyResource(create);

    await expect(lazy.get()).rejects.toThrow("model missing");
    expect(lazy.isReady).toBe(false);
    await expect(lazy.get()).resolves.toBe("engine");
    expect(create).toHaveBeenCalledTimes(2);
  });

  it("reports warm-up failures without rejecting", async () => {
    const lazy = new LazyResource<string>(async () => {
      throw new Error("no binary");
    });
    const errors: unknown[] = [];

    lazy.warmUp((error) => errors.push(error));
    await vi.waitFor(() => expect(errors).toHaveLength(1));

    expect(errors[0]).toBeInstanceOf(Error);
  });
});
