import { describe, expect, it, vi } from "vitest";

import { BatchStateTracker, canTransition, isTerminalStatus } from "./batch-state.js";

describe("batch state machine", () => {
  it("allows the verified path to done", () => {
    const visited: string[] = [];
    const tracker = new BatchStateTracker(1, ({ to }) => visited.push(to));

    tracker.transition("running");
    tracker.transition("compressed");
    tracker.transition("verifying");
    tracker.transition("verified");
    tracker.transition("done");

    expect(tracker.terminalStatus()).toBe("done");
    expect(visited).toEqual(["running", "compressed", "verifying", "verified", "done"]);
  });

  it("ends a failed verification as failed, never done", () => {
    expect(canTransition("verify_failed", "failed")).toBe(true);
    expect(canTransition("verify_failed", "done")).toBe(false);
  });

  it("rejects transitions out of terminal states", () => {
    const tracker = new BatchStateTracker(4);
    tracker.transition("skipped");

    expect(() => tracker.transition("running")).toThrow("Batch 4 cannot move from skipped to running");
  });

  it("refuses to report a terminal status before the batch finishes", () => {
    const tracker = new BatchStateTracker(2);
    tracker.transition("running");

    expect(() => tracker.terminalStatus()).toThrow("Batch 2 has not finished (status running)");
  });

  it("notifies the listener on every transition", () => {
    const listener = vi.fn();
    const tracker = new BatchStateTracker(3, listener);

    tracker.transition("running");
    tracker.transition("failed");

    expect(listener.mock.calls).toEqual([
      [{ index: 3, from: "planned", to: "running" }],
      [{ index: 3, from: "running", to: "failed" }],
    ]);
  });

  it("knows the terminal states", () => {
    expect(isTerminalStatus("done")).toBe(true);
    expect(isTerminalStatus("failed")).toBe(true);
    expect(isTerminalStatus("skipped")).toBe(true);
    expect(isTerminalStatus("verified")).toBe(false);
  });
});
