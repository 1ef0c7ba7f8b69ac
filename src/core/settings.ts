/*
Purpose: validate merged CLI/config input into the settings a compression run uses.
Assumptions: input has already been merged (CLI over config file); defaults are applied here.
Usage: const settings = resolveRunSettings(mergeSettingsInput(cli, file));
*/

import {
  ARCHIVE_EXTENSIONS,
  SETTINGS_DEFAULTS,
  type ArchiveExtension,
  type SettingsInput,
} from "./config.js";
import { ValidationError } from "./errors.js";
import { parseSize } from "./sizes.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunSettings = {
  input: string;
  output: string;
  batchSize: number;
  prefix: string;
  extension: ArchiveExtension;
  auto: boolean;
  threads: number;
  dryRun: boolean;
  compressionLevel: number;
  password?: string;
  splitSize?: number;
  exclude: string[];
  recursive: boolean;
  overwrite: boolean;
  verify: boolean;
  metadataPath?: string;
  timeoutSeconds?: number;
  logfile: string;
  verbose: boolean;
};

export type LoggingSettings = {
  logfile: string;
  verbose: boolean;
};

export const INVALID_PREFIX_CHARS = '<>:"/\\|?*';

// =============================================================================
// PUBLIC API
// =============================================================================

export function resolveLoggingSettings(input: SettingsInput): LoggingSettings {
  return {
    logfile: input.logfile ?? SETTINGS_DEFAULTS.logfile,
    verbose: input.verbose ?? false,
  };
}

export function resolveRunSettings(input: SettingsInput): RunSettings {
  if (!input.input || !input.output) {
    throw new ValidationError(
      "--input and --output are required unless using --check or --version",
    );
  }

  const batchSize = input.batch ?? SETTINGS_DEFAULTS.batch;
  assertIntegerInRange("--batch", batchSize, 1);

  const threads = input.threads ?? SETTINGS_DEFAULTS.threads;
  assertIntegerInRange("--threads", threads, 1);

  const compressionLevel = input.compressionLevel ?? SETTINGS_DEFAULTS.compressionLevel;
  assertIntegerInRange("--compression-level", compressionLevel, 0, 9);

  const extension = resolveExtension(input.ext ?? SETTINGS_DEFAULTS.ext);
  const prefix = resolvePrefix(input.prefix ?? SETTINGS_DEFAULTS.prefix);

  const password = input.password;
  if (password !== undefined && password.length === 0) {
    throw new ValidationError("--password must not be empty");
  }
  if (password !== undefined && extension !== "7z") {
    throw new ValidationError(
      `--password requires the 7z format: header encryption is not available for .${extension} archives`,
    );
  }

  const splitSize = input.splitSize !== undefined ? parseSize(input.splitSize) : undefined;

  if (input.timeout !== undefined && !(input.timeout > 0)) {
    throw new ValidationError("--timeout must be a positive number of seconds");
  }

  return {
    input: input.input,
    output: input.output,
    batchSize,
    prefix,
    extension,
    auto: input.auto ?? false,
    threads,
    dryRun: input.dryRun ?? false,
    compressionLevel,
    password,
    splitSize,
    exclude: input.exclude ?? [],
    recursive: input.recursive ?? false,
    overwrite: input.overwrite ?? false,
    verify: input.verify ?? false,
    metadataPath: input.metadata,
    timeoutSeconds: input.timeout,
    ...resolveLoggingSettings(input),
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function assertIntegerInRange(flag: string, value: number, min: number, max?: number): void {
  if (!Number.isInteger(value)) {
    throw new ValidationError(`${flag} must be an integer (received ${value})`);
  }
  if (value < min) {
    throw new ValidationError(`${flag} must be at least ${min}`);
  }
  if (max !== undefined && value > max) {
    throw new ValidationError(`${flag} must be between ${min} and ${max}`);
  }
}

function resolveExtension(value: string): ArchiveExtension {
  const match = ARCHIVE_EXTENSIONS.find((ext) => ext === value);
  if (!match) {
    throw new ValidationError(
      `--ext must be one of ${ARCHIVE_EXTENSIONS.join(", ")} (received ${value})`,
    );
  }
  return match;
}

function resolvePrefix(value: string): string {
  if (value.length === 0) {
    throw new ValidationError("--prefix must not be empty");
  }
  if ([...INVALID_PREFIX_CHARS].some((char) => value.includes(char))) {
    throw new ValidationError(`--prefix contains invalid characters: ${INVALID_PREFIX_CHARS}`);
  }
  return value;
}
