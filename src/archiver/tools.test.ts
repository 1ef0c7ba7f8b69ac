import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { checkTools, findExecutable } from "./tools.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

function makeBinDir(executables: string[], plainFiles: string[] = []): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "tools-bin-"));
  tempDirs.push(dir);
  for (const name of executables) {
    fs.writeFileSync(path.join(dir, name), "#!/bin/sh\nexit 0\n", { mode: 0o755 });
  }
  for (const name of plainFiles) {
    fs.writeFileSync(path.join(dir, name), "data", { mode: 0o644 });
  }
  return dir;
}

describe("findExecutable", () => {
  it("finds an executable in the first PATH entry that has it", async () => {
    const empty = makeBinDir([]);
    const bin = makeBinDir(["7z"]);

    const found = await findExecutable("7z", { PATH: [empty, bin].join(path.delimiter) }, "linux");

    expect(found).toBe(path.join(bin, "7z"));
  });

  it("returns null when the tool is missing or not executable", async () => {
    const bin = makeBinDir([], ["7z"]);

    expect(await findExecutable("7z", { PATH: bin }, "linux")).toBeNull();
    expect(await findExecutable("7z", {}, "linux")).toBeNull();
  });
});

describe("checkTools", () => {
  it("reports each tool with its path or null", async () => {
    const bin = makeBinDir(["7z", "zip"]);

    expect(await checkTools(["7z", "zip", "rar"], { PATH: bin })).toEqual([
      { tool: "7z", path: path.join(bin, "7z") },
      { tool: "zip", path: path.join(bin, "zip") },
      { tool: "rar", path: null },
    ]);
  });
});
