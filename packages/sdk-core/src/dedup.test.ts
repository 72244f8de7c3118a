import { describe, it, expect, vi } from "vitest";
import { RequestDeduplicator } from "./dedup";

describe("RequestDeduplicator", () => {
  it("should execute the function and return its result", async () => {
    const dedup = new RequestDeduplicator<string[]>();
    const fn = vi.fn().mockResolvedValue(["dark-mode"]);

    const result = await dedup.dedupe("flags:web:prod", fn);

    expect(result).toEqual(["dark-mode"]);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("should share one call between concurrent callers", async () => {
    const dedup = new RequestDeduplicator<string>();
    let resolveLoad: (value: string) => void = () => {};
    const fn = vi.fn(
      () =>
        new Promise<string>((resolve) => {
          resolveLoad = resolve;
        }),
    );

    const first = dedup.dedupe("flags:web:prod", fn);
    const second = dedup.dedupe("flags:web:prod", fn);
    expect(dedup.isInflight("flags:web:prod")).toBe(true);

    resolveLoad("loaded");

    expect(await Promise.all([first, second])).toEqual(["loaded", "loaded"]);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(dedup.isInflight("flags:web:prod")).toBe(false);
  });

  it("should call again once the previous call settled", async () => {
    const dedup = new RequestDeduplicator<number>();
    const fn = vi.fn().mockResolvedValue(1);

    await dedup.dedupe("key", fn);
    await dedup.dedupe("key", fn);

    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("should keep different keys independent", async () => {
    const dedup = new RequestDeduplicator<string>();
    const config = vi.fn().mockResolvedValue("config");
    const latest = vi.fn().mockResolvedValue("latest");

    const results = await Promise.all([
      dedup.dedupe("config:web:prod:stable", config),
      dedup.dedupe("config:web:prod:latest", latest),
    ]);

    expect(results).toEqual(["config", "latest"]);
  });

  it("should propagate rejections to every caller and release the key", async () => {
    const dedup = new RequestDeduplicator<string>();
    const fn = vi.fn().mockRejectedValue(new Error("unreachable"));

    const first = dedup.dedupe("key", fn);
    const second = dedup.dedupe("key", fn);

    await expect(first).rejects.toThrow("unreachable");
    await expect(second).rejects.toThrow("unreachable");
    expect(dedup.isInflight("key")).toBe(false);
  });
});
