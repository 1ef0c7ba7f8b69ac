import { describe, expect, it } from "vitest";

import { buildCompressArgs, buildTestArgs, redactArgs } from "./seven-zip.js";

describe("buildCompressArgs", () => {
  it("builds a quiet, non-interactive add command", () => {
    expect(
      buildCompressArgs({ archivePath: "/out/archive_1.7z", files: ["a.txt", "-odd.txt"], compressionLevel: 9 }),
    ).toEqual(["a", "-y", "-bso0", "-bsp0", "-mx=9", "--", "/out/archive_1.7z", "a.txt", "-odd.txt"]);
  });

  it("always pairs a password with header encryption", () => {
    const args = buildCompressArgs({
      archivePath: "/out/a.7z",
      files: ["a.txt"],
      compressionLevel: 5,
      password: "test-secret",
    });

    expect(args).toContain("-ptest-secret");
    expect(args).toContain("-mhe=on");
    expect(args.indexOf("-mhe=on")).toBeLessThan(args.indexOf("--"));
  });

  it("passes the volume size in bytes", () => {
    const args = buildCompressArgs({
      archivePath: "/out/a.7z",
      files: ["a.txt"],
      compressionLevel: 5,
      splitSize: 104857600,
    });

    expect(args).toContain("-v104857600b");
  });
});

describe("buildTestArgs", () => {
  it("builds the integrity test command", () => {
    expect(buildTestArgs({ archivePath: "/out/a.7z" })).toEqual(["t", "-y", "-bso0", "-bsp0", "--", "/out/a.7z"]);
    expect(buildTestArgs({ archivePath: "/out/a.7z", password: "test-secret" })).toContain("-ptest-secret");
  });
});

describe("redactArgs", () => {
  it("hides the password switch only", () => {
    expect(redactArgs(["a", "-ptest-secret", "-mhe=on", "-p"])).toEqual(["a", "-p***", "-mhe=on", "-p"]);
  });
});
