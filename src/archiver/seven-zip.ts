/*
Purpose: argument vectors for the 7z executable.
Assumptions: paths are passed after `--` so member names starting with "-" stay file names.
Usage: toolRunner.run(buildCompressArgs({ archivePath, files, compressionLevel }), { cwd }).
*/

export const SEVEN_ZIP_COMMAND = "7z";

export const SUPPORTED_TOOLS = ["7z", "zip", "rar"] as const;

// Assume yes on every query, keep stdout quiet, no progress percentage.
const NON_INTERACTIVE_SWITCHES = ["-y", "-bso0", "-bsp0"];

export type CompressArgsInput = {
  archivePath: string;
  files: readonly string[];
  compressionLevel: number;
  password?: string;
  splitSize?: number;
};

export type TestArgsInput = {
  archivePath: string;
  password?: string;
};

export function buildCompressArgs(input: CompressArgsInput): string[] {
  const args = ["a", ...NON_INTERACTIVE_SWITCHES, `-mx=${input.compressionLevel}`];

  if (input.password !== undefined) {
    // Header encryption always accompanies a password so file names are hidden too.
    args.push(`-p${input.password}`, "-mhe=on");
  }

  if (input.splitSize !== undefined) {
    args.push(`-v${input.splitSize}b`);
  }

  args.push("--", input.archivePath, ...input.files);
  return args;
}

export function buildTestArgs(input: TestArgsInput): string[] {
  const args = ["t", ...NON_INTERACTIVE_SWITCHES];
  if (input.password !== undefined) {
    args.push(`-p${input.password}`);
  }
  args.push("--", input.archivePath);
  return args;
}

/**
 * Redacts the password switch before an argument vector is logged.
 */
export function redactArgs(args: readonly string[]): string[] {
  return args.map((arg) => (arg.startsWith("-p") && arg.length > 2 ? "-p***" : arg));
}
