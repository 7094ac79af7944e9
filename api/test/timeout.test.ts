import { describe, expect, it } from "vitest";
import { TimeoutError } from "../src/errors.js";
import { withTimeout } from "../src/timeout.js";

describe("withTimeout", () => {
  it("resolves with the call's result in time", async () => {
    await expect(withTimeout("Lookup", 100, async () => "ok")).resolves.toBe("ok");
  });

  it("aborts the call and rejects after the deadline", async () => {
    let aborted = false;
    const pending = withTimeout("Lookup", 5, (signal) => {
      signal.addEventListener("abort", () => {
        aborted = true;
      });
      return new Promise<string>(() => {});
    });

    await expect(pending).rejects.toThrow(TimeoutError);
    await expect(pending).rejects.toThrow("Lookup timed out after 5ms");
    expect(aborted).toBe(true);
  });

  it("reports the timeout when the call rejects on abort", async () => {
    const pending = withTimeout(
      "Lookup",
      5,
      (signal) =>
        new Promise<string>((_resolve, reject) => {
          signal.addEventListener("abort", () => reject(new Error("aborted")));
        })
    );

    await expect(pending).rejects.toThrow("Lookup timed out after 5ms");
  });

  it("passes the call's own failure through", async () => {
    await expect(withTimeout("Lookup", 100, async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
  });
});
