import { describe, expect, it } from "vitest";

import { ValidationError } from "./errors.js";
import { resolveLoggingSettings, resolveRunSettings } from "./settings.js";

const required = { input: "./in", output: "./out" };

describe("resolveRunSettings", () => {
  it("applies defaults for everything not provided", () => {
    expect(resolveRunSettings(required)).toEqual({
      input: "./in",
      output: "./out",
      batchSize: 80,
      prefix: "archive",
      extension: "7z",
      auto: false,
      threads: 1,
      dryRun: false,
      compressionLevel: 5,
      password: undefined,
      splitSize: undefined,
      exclude: [],
      recursive: false,
      overwrite: false,
      verify: false,
      metadataPath: undefined,
      timeoutSeconds: undefined,
      logfile: "compress_batches.log",
      verbose: false,
    });
  });

  it("requires input and output", () => {
    expect(() => resolveRunSettings({ input: "./in" })).toThrow(
      "--input and --output are required unless using --check or --version",
    );
  });

  it("validates numeric ranges", () => {
    expect(() => resolveRunSettings({ ...required, batch: 0 })).toThrow("--batch must be at least 1");
    expect(() => resolveRunSettings({ ...required, threads: 0 })).toThrow("--threads must be at least 1");
    expect(() => resolveRunSettings({ ...required, compressionLevel: 10 })).toThrow(
      "--compression-level must be between 0 and 9",
    );
    expect(() => resolveRunSettings({ ...required, batch: 2.5 })).toThrow(
      "--batch must be an integer (received 2.5)",
    );
  });

  it("accepts compression level zero", () => {
    expect(resolveRunSettings({ ...required, compressionLevel: 0 }).compressionLevel).toBe(0);
  });

  it("rejects unknown formats", () => {
    expect(() => resolveRunSettings({ ...required, ext: "tar" })).toThrow(
      "--ext must be one of 7z, zip, rar (received tar)",
    );
  });

  it("rejects prefixes that cannot be part of a file name", () => {
    expect(() => resolveRunSettings({ ...required, prefix: "a/b" })).toThrow(
      '--prefix contains invalid characters: <>:"/\\|?*',
    );
    expect(() => resolveRunSettings({ ...required, prefix: "" })).toThrow("--prefix must not be empty");
  });

  it("only accepts a password for 7z archives", () => {
    expect(resolveRunSettings({ ...required, password: "test-secret" }).password).toBe("test-secret");
    expect(() => resolveRunSettings({ ...required, password: "test-secret", ext: "zip" })).toThrow(
      ValidationError,
    );
    expect(() => resolveRunSettings({ ...required, password: "" })).toThrow("--password must not be empty");
  });

  it("parses the split size to bytes", () => {
    expect(resolveRunSettings({ ...required, splitSize: "100M" }).splitSize).toBe(100 * 1024 ** 2);
    expect(() => resolveRunSettings({ ...required, splitSize: "huge" })).toThrow(
      "Invalid size format: huge",
    );
  });

  it("rejects a non-positive timeout", () => {
    expect(() => resolveRunSettings({ ...required, timeout: 0 })).toThrow(
      "--timeout must be a positive number of seconds",
    );
    expect(resolveRunSettings({ ...required, timeout: 90 }).timeoutSeconds).toBe(90);
  });
});

describe("resolveLoggingSettings", () => {
  it("defaults the log file and verbosity", () => {
    expect(resolveLoggingSettings({})).toEqual({ logfile: "compress_batches.log", verbose: false });
    expect(resolveLoggingSettings({ logfile: "run.log", verbose: true })).toEqual({
      logfile: "run.log",
      verbose: true,
    });
  });
});
