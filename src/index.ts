#!/usr/bin/env node
import { existsSync, realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";

import { CommanderError, type Command } from "commander";

import { renderCliError } from "./cli/error-format.js";
import { buildCli } from "./cli/index.js";
import {
  ConfigError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
  ValidationError,
} from "./core/errors.js";

// =============================================================================
// EXIT CODES
// =============================================================================

export const EXIT_CODES = {
  ok: 0,
  failure: 1,
  usage: 2,
} as const;

// =============================================================================
// ERROR HANDLING
// =============================================================================

function configureCliErrorHandling(program: Command): void {
  program.configureOutput({
    outputError: (_message: string, _write: (chunk: string) => void) => undefined,
  });

  program.exitOverride();
}

function isHelpOrVersionExit(error: unknown): boolean {
  if (!(error instanceof CommanderError)) {
    return false;
  }

  return (
    error.code === "commander.helpDisplayed" ||
    error.code === "commander.version" ||
    error.code === "commander.help"
  );
}

function resolveDebugFlagFromArgv(argv: string[]): boolean {
  let debugFlag = false;

  for (const arg of argv) {
    if (arg === "--") {
      break;
    }

    if (arg === "--debug") {
      debugFlag = true;
    }
  }

  return debugFlag;
}

function normalizeCommanderError(error: unknown): unknown {
  if (!(error instanceof CommanderError)) {
    return error;
  }

  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.validation,
    title: "Invalid command line.",
    message: error.message.replace(/^error:\s*/i, ""),
    hint: "Run batch-archiver --help to see the available options.",
    cause: error,
  });
}

export function resolveExitCode(error: unknown): number {
  if (error instanceof UserFacingError) {
    return error.code === USER_FACING_ERROR_CODES.validation ||
      error.code === USER_FACING_ERROR_CODES.config
      ? EXIT_CODES.usage
      : EXIT_CODES.failure;
  }
  if (error instanceof ValidationError || error instanceof ConfigError) {
    return EXIT_CODES.usage;
  }
  if (error instanceof CommanderError) {
    return EXIT_CODES.usage;
  }
  return EXIT_CODES.failure;
}

// =============================================================================
// ENTRY POINT
// =============================================================================

export async function main(argv: string[]): Promise<void> {
  const program = buildCli();
  configureCliErrorHandling(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (isHelpOrVersionExit(error)) {
      process.exitCode = EXIT_CODES.ok;
      return;
    }

    const normalized = normalizeCommanderError(error);
    console.error(renderCliError(normalized, { debug: resolveDebugFlagFromArgv(argv) }));
    process.exitCode = resolveExitCode(normalized);
  }
}

// =============================================================================
// DIRECT EXECUTION
// =============================================================================

function isDirectExecution(): boolean {
  const entry = process.argv[1];
  if (!entry || !existsSync(entry)) return false;
  // npm links the bin through a symlink
  return import.meta.url === pathToFileURL(realpathSync(entry)).href;
}

if (isDirectExecution()) {
  void main(process.argv);
}
