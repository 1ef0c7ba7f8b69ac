/*
Purpose: type the parsed commander options and map them onto SettingsInput.
Assumptions: options carry no commander defaults, so `undefined` means "flag not passed".
Usage: const cli = toSettingsInput(parseCliOptions(program.opts()));
*/

import { InvalidArgumentError } from "commander";
import { z } from "zod";

import type { SettingsInput } from "../core/config.js";

// =============================================================================
// SCHEMA
// =============================================================================

export const CliOptionsSchema = z.object({
  input: z.string().optional(),
  output: z.string().optional(),
  batch: z.number().optional(),
  prefix: z.string().optional(),
  ext: z.string().optional(),
  auto: z.boolean().optional(),
  threads: z.number().optional(),
  dryRun: z.boolean().optional(),
  compressionLevel: z.number().optional(),
  password: z.string().optional(),
  splitSize: z.string().optional(),
  exclude: z.array(z.string()).optional(),
  recursive: z.boolean().optional(),
  overwrite: z.boolean().optional(),
  verify: z.boolean().optional(),
  metadata: z.string().optional(),
  timeout: z.number().optional(),
  config: z.string().optional(),
  logfile: z.string().optional(),
  verbose: z.boolean().optional(),
  debug: z.boolean().optional(),
  check: z.boolean().optional(),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export function parseCliOptions(raw: unknown): CliOptions {
  return CliOptionsSchema.parse(raw);
}

export function toSettingsInput(options: CliOptions): SettingsInput {
  return {
    input: options.input,
    output: options.output,
    batch: options.batch,
    prefix: options.prefix,
    ext: options.ext,
    auto: options.auto,
    threads: options.threads,
    dryRun: options.dryRun,
    compressionLevel: options.compressionLevel,
    password: options.password,
    splitSize: options.splitSize,
    exclude: options.exclude,
    recursive: options.recursive,
    overwrite: options.overwrite,
    verify: options.verify,
    metadata: options.metadata,
    timeout: options.timeout,
    logfile: options.logfile,
    verbose: options.verbose,
  };
}

// =============================================================================
// ARGUMENT PARSERS
// =============================================================================

export function parseIntegerArg(value: string): number {
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new InvalidArgumentError("Expected an integer.");
  }
  return Number.parseInt(trimmed, 10);
}

export function parseSecondsArg(value: string): number {
  const parsed = Number(value.trim());
  if (value.trim().length === 0 || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError("Expected a number of seconds.");
  }
  return parsed;
}

export function collectPattern(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}
