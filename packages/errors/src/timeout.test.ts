import { describe, it, expect } from "vitest";
import { withTimeout } from "./timeout.js";
import { TimeoutError } from "./errors.js";

describe("withTimeout", () => {
  it("resolves when the work finishes first", async () => {
    await expect(withTimeout(Promise.resolve("done"), 50, "parse")).resolves.toBe("done");
  });

  it("rejects with TimeoutError when the timer wins", async () => {
    const never = new Promise<string>(() => undefined);
    const err = await withTimeout(never, 5, "ocr").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TimeoutError);
    expect(err).toMatchObject({ timeoutMs: 5, message: "ocr timed out after 5ms" });
  });

  it("passes through the work's own rejection", async () => {
    await expect(withTimeout(Promise.reject(new Error("bad pdf")), 50, "parse")).rejects.toThrow(
      "bad pdf",
    );
  });
});
