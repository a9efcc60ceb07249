import { describe, it, expect } from "vitest";
import { Err, Ok } from "@archlens/core";
import { AnalysisHandle } from "../src/core/services/AnalysisHandle.js";
import { makeResult } from "./fixtures.js";

describe("AnalysisHandle", () => {
  it("starts empty at version 0", () => {
    const handle = new AnalysisHandle();
    expect(handle.version).toBe(0);
    expect(handle.current()).toBeUndefined();
    expect(handle.previous()).toBeUndefined();
  });

  it("swaps in each successful result and keeps the one before", async () => {
    const handle = new AnalysisHandle();
    const first = await handle.publish<Error>(async (version) => Ok(makeResult(version)));
    const second = await handle.publish<Error>(async (version) => Ok(makeResult(version)));

    expect(first.ok && first.value.version).toBe(1);
    expect(second.ok && second.value.version).toBe(2);
    expect(handle.version).toBe(2);
    expect(handle.previous()?.version).toBe(1);
  });

  it("leaves both slots alone on failure", async () => {
    const handle = new AnalysisHandle();
    await handle.publish<Error>(async (version) => Ok(makeResult(version)));
    const before = handle.current();

    const failed = await handle.publish<Error>(async () => Err(new Error("cancelled")));
    expect(failed.ok).toBe(false);
    await expect(handle.publish<Error>(async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");

    expect(handle.current()).toBe(before);
    expect(handle.previous()).toBeUndefined();
    expect(handle.version).toBe(1);
  });

  it("runs publications one after another", async () => {
    const handle = new AnalysisHandle();
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const seen: string[] = [];

    const slow = handle.publish<Error>(async (version) => {
      await gate;
      seen.push(`slow v${version}`);
      return Ok(makeResult(version));
    });
    const fast = handle.publish<Error>(async (version, current) => {
      seen.push(`fast v${version} after v${current?.version ?? 0}`);
      return Ok(makeResult(version));
    });
    release();
    await Promise.all([slow, fast]);

    expect(seen).toEqual(["slow v1", "fast v2 after v1"]);
    expect(handle.version).toBe(2);
  });
});
