import { execa } from "execa";

import { ExecutionError, ToolUnavailableError } from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ToolRunResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type ToolRunOptions = {
  cwd?: string;
  timeoutSeconds?: number;
};

/**
 * Runs the archiving executable. A non-zero exit resolves with its exit code;
 * a missing binary throws ToolUnavailableError and any other spawn failure or
 * timeout throws ExecutionError.
 */
export interface ToolRunner {
  readonly command: string;
  run(args: string[], options?: ToolRunOptions): Promise<ToolRunResult>;
}

type ExecaFailureDetails = {
  message: string;
  stdout: string;
  stderr: string;
  code?: string;
  exitCode?: number;
  timedOut: boolean;
};

// =============================================================================
// RUNNER
// =============================================================================

export class ExecaToolRunner implements ToolRunner {
  constructor(readonly command: string) {}

  async run(args: string[], options: ToolRunOptions = {}): Promise<ToolRunResult> {
    try {
      const res = await execa(this.command, args, {
        cwd: options.cwd,
        stdin: "ignore",
        stdout: "pipe",
        stderr: "pipe",
        timeout: options.timeoutSeconds !== undefined ? options.timeoutSeconds * 1000 : undefined,
        windowsHide: true,
      });
      return { exitCode: res.exitCode, stdout: res.stdout, stderr: res.stderr };
    } catch (err) {
      const details = resolveExecaFailureDetails(err);

      if (details.code === "ENOENT") {
        throw new ToolUnavailableError(this.command, err);
      }
      if (details.timedOut) {
        throw new ExecutionError(
          `${this.command} timed out after ${options.timeoutSeconds ?? 0}s`,
          details.exitCode,
          err,
        );
      }
      if (details.exitCode !== undefined) {
        return { exitCode: details.exitCode, stdout: details.stdout, stderr: details.stderr };
      }

      throw new ExecutionError(
        `${this.command} could not be run: ${details.message}`,
        undefined,
        err,
      );
    }
  }
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

function resolveExecaFailureDetails(err: unknown): ExecaFailureDetails {
  if (!err || typeof err !== "object") {
    return { message: String(err), stdout: "", stderr: "", timedOut: false };
  }

  const message = readString(err, "message") ?? String(err);
  const exitCodeRaw: unknown = Reflect.get(err, "exitCode");

  return {
    message,
    stdout: readString(err, "stdout") ?? "",
    stderr: readString(err, "stderr") ?? "",
    code: readString(err, "code"),
    exitCode: typeof exitCodeRaw === "number" ? exitCodeRaw : undefined,
    timedOut: Reflect.get(err, "timedOut") === true,
  };
}

function readString(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === "string" ? value : undefined;
}
