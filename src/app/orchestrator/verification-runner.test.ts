import fs from "node:fs";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { ExecutionError } from "../../core/errors.js";

import {
  FakeToolRunner,
  makeQuietLogger,
  makeTempDir,
  readLogMessages,
} from "./__tests__/fakes.js";
import { VerificationRunner } from "./verification-runner.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

describe("VerificationRunner", () => {
  it("passes when the integrity test exits with zero", async () => {
    const dir = makeTempDir("verify-", tempDirs);
    const logPath = path.join(dir, "run.log");
    const tool = new FakeToolRunner();
    const runner = new VerificationRunner({ toolRunner: tool, logger: makeQuietLogger(logPath) });

    const result = await runner.verify("/out/archive_1.7z");

    expect(result).toEqual({ ok: true });
    expect(tool.calls[0].args).toEqual(["t", "-y", "-bso0", "-bsp0", "--", "/out/archive_1.7z"]);
    expect(readLogMessages(logPath)).toEqual([
      "Verifying archive_1.7z...",
      "Verification passed: archive_1.7z",
    ]);
  });

  it("tests the first volume of a split archive with the password", async () => {
    const tool = new FakeToolRunner();
    const runner = new VerificationRunner({
      toolRunner: tool,
      logger: makeQuietLogger(),
      password: "test-secret",
      timeoutSeconds: 60,
    });

    await runner.verify("/out/archive_1.7z", { splitVolumes: true });

    expect(tool.calls[0]).toEqual({
      args: ["t", "-y", "-bso0", "-bsp0", "-ptest-secret", "--", "/out/archive_1.7z.001"],
      options: { timeoutSeconds: 60 },
    });
  });

  it("fails with the tool's diagnostics on a non-zero exit", async () => {
    const tool = new FakeToolRunner();
    tool.onRun(() => ({ exitCode: 2, stdout: "", stderr: "Data Error in encrypted file" }));
    const runner = new VerificationRunner({ toolRunner: tool, logger: makeQuietLogger() });

    const result = await runner.verify("/out/archive_2.7z");

    expect(result).toEqual({
      ok: false,
      message: "integrity test of archive_2.7z failed (exit 2): Data Error in encrypted file",
    });
  });

  it("turns a runner error into a failed verification", async () => {
    const tool = new FakeToolRunner();
    tool.onRun(() => {
      throw new ExecutionError("7z timed out after 5s");
    });
    const runner = new VerificationRunner({ toolRunner: tool, logger: makeQuietLogger() });

    expect(await runner.verify("/out/archive_3.7z")).toEqual({
      ok: false,
      message: "7z timed out after 5s",
    });
  });
});
