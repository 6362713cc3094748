import { describe, it, expect } from "vitest";
import { TimeoutError, withTimeout } from "../timeout.js";

describe("withTimeout", () => {
  it("resolves with the value when it arrives in time", async () => {
    await expect(withTimeout(Promise.resolve(7), 50)).resolves.toBe(7);
  });

  it("rejects with a TimeoutError once the deadline passes", async () => {
    const error = await withTimeout(new Promise(() => {}), 10, "too slow").catch(
      (caught: unknown) => caught
    );

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({ message: "too slow", ms: 10 });
  });

  it("passes rejections through", async () => {
    await expect(withTimeout(Promise.reject(new Error("nope")), 50)).rejects.toThrow("nope");
  });

  it("returns the promise untouched without a deadline", async () => {
    const promise = Promise.resolve("same");
    expect(withTimeout(promise, undefined)).toBe(promise);
  });
});
