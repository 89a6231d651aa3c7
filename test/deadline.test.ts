import { describe, expect, it } from "vitest";
import { DeadlineError, withDeadline } from "../src/core/deadline.js";
import { never, untilAborted } from "./fakes.js";

describe("withDeadline", () => {
  it("returns the value when the work finishes in time", async () => {
    await expect(withDeadline(async () => 42, { timeoutMs: 1000, label: "answer" })).resolves.toBe(42);
  });

  it("settles at the deadline even when the work ignores its signal", async () => {
    const attempt = withDeadline(never, { timeoutMs: 20, label: "stuck step" });
    await expect(attempt).rejects.toBeInstanceOf(DeadlineError);
    await expect(withDeadline(never, { timeoutMs: 20, label: "stuck step" })).rejects.toThrow(
      "stuck step timed out after 20ms",
    );
  });

  it("passes a parent abort through with its reason", async () => {
    const parent = new AbortController();
    const pending = withDeadline(untilAborted, { timeoutMs: 1000, label: "child", signal: parent.signal });
    parent.abort(new Error("shutting down"));
    await expect(pending).rejects.toThrow("shutting down");
  });

  it("refuses to start under an already aborted parent", async () => {
    const parent = new AbortController();
    parent.abort(new Error("gone"));
    let started = false;
    const attempt = withDeadline(
      async () => {
        started = true;
        return 1;
      },
      { timeoutMs: 1000, label: "late", signal: parent.signal },
    );
    await expect(attempt).rejects.toThrow("gone");
    expect(started).toBe(false);
  });
});
