import { describe, expect, it } from "vitest";
import { AttemptTimeoutError } from "./errors";
import { withTimeout } from "./timeout";

describe("withTimeout", () => {
  it("resolves with the task result before the deadline", async () => {
    await expect(withTimeout("quick", 1_000, async () => 42)).resolves.toBe(42);
  });

  it("aborts the signal and rejects at the deadline", async () => {
    const observed: AbortSignal[] = [];
    const pending = withTimeout("slow", 10, (signal) => {
      observed.push(signal);
      return new Promise<never>(() => undefined);
    });

    await expect(pending).rejects.toThrow(new AttemptTimeoutError("slow", 10));
    expect(observed.map((signal) => signal.aborted)).toEqual([true]);
  });
});
