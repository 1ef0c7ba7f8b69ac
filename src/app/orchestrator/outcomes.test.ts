import { describe, expect, it } from "vitest";

import { ExecutionError, ToolUnavailableError, VerificationError } from "../../core/errors.js";

import { classifyFailure } from "./outcomes.js";

describe("classifyFailure", () => {
  it("maps each error type to its failure kind", () => {
    expect(classifyFailure(new ToolUnavailableError("7z"))).toEqual({
      kind: "tool_unavailable",
      message: "7z executable not found in PATH",
    });
    expect(classifyFailure(new ExecutionError("exit 2", 2))).toEqual({ kind: "execution", message: "exit 2" });
    expect(classifyFailure(new VerificationError("bad crc"))).toEqual({ kind: "verification", message: "bad crc" });
    expect(classifyFailure("plain string")).toEqual({ kind: "unexpected", message: "plain string" });
  });
});
