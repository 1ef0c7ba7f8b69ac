/*
Purpose: the batch-archiver command: resolve settings, check the tool, run, summarize.
Assumptions: commander has already parsed argv into CliOptions.
Usage: process.exitCode = await runCompressCommand(parseCliOptions(program.opts()));
*/

import { SEVEN_ZIP_COMMAND } from "../archiver/seven-zip.js";
import { findExecutable, type ToolLookupEnv } from "../archiver/tools.js";
import {
  runBatchOrchestration,
  type RunSummary,
} from "../app/orchestrator/batch-orchestrator.js";
import type { OrchestratorPorts } from "../app/orchestrator/ports.js";
import { createRunContext } from "../app/orchestrator/run-context.js";
import { mergeSettingsInput, settingsFromConfigFile, type SettingsInput } from "../core/config.js";
import { loadConfigFile } from "../core/config-loader.js";
import { formatErrorMessage } from "../core/error-format.js";
import { USER_FACING_ERROR_CODES, UserFacingError, ValidationError } from "../core/errors.js";
import { assertInputDirectory } from "../core/file-catalog.js";
import { RunLogger } from "../core/logger.js";
import { resolveLoggingSettings, resolveRunSettings, type RunSettings } from "../core/settings.js";
import { formatSize } from "../core/sizes.js";
import { VERSION } from "../version.js";

import { runCheckCommand } from "./check.js";
import { toSettingsInput, type CliOptions } from "./options.js";
import { createRunStopSignalHandler } from "./signal-handlers.js";

// =============================================================================
// TYPES
// =============================================================================

export type CompressCommandDeps = {
  ports?: Partial<OrchestratorPorts>;
  interactive?: boolean;
  env?: ToolLookupEnv;
  // Set to false to keep log lines off the console (the log file still gets them).
  console?: boolean;
  stopSignal?: AbortSignal;
};

const SUMMARY_RULE = "=".repeat(50);

// =============================================================================
// COMMAND
// =============================================================================

export async function runCompressCommand(
  options: CliOptions,
  deps: CompressCommandDeps = {},
): Promise<number> {
  const merged = resolveSettingsInput(options);
  const logging = resolveLoggingSettings(merged);
  const logger = new RunLogger({
    filePath: logging.logfile,
    level: logging.verbose ? "debug" : "info",
    console: deps.console ?? true,
    debug: options.debug,
  });

  try {
    logger.debug(`batch-archiver version ${VERSION}`);

    if (options.check) {
      await runCheckCommand(logger, deps.env);
      return 0;
    }

    const settings = await resolveValidatedSettings(merged);

    const toolPath = await findExecutable(SEVEN_ZIP_COMMAND, deps.env);
    if (!toolPath) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.tool,
        title: "7-Zip is not installed.",
        message: "7z not found in PATH. Please install 7-Zip first.",
        hint: "Download from: https://www.7-zip.org/",
      });
    }
    logger.debug(`Using ${SEVEN_ZIP_COMMAND} at ${toolPath}`);

    const stopHandler = deps.stopSignal
      ? null
      : createRunStopSignalHandler({
          onSignal: (signal) => logger.warn(formatStopNotice(signal)),
        });

    let summary: RunSummary;
    try {
      summary = await runBatchOrchestration(
        createRunContext({
          settings,
          logger,
          ports: deps.ports,
          interactive: deps.interactive,
          stopSignal: deps.stopSignal ?? stopHandler?.signal,
        }),
      );
    } finally {
      stopHandler?.cleanup();
    }

    logRunSummary(logger, summary);
    return resolveRunExitCode(summary);
  } finally {
    logger.close();
  }
}

// =============================================================================
// SETTINGS
// =============================================================================

function resolveSettingsInput(options: CliOptions): SettingsInput {
  const fromFile = options.config ? settingsFromConfigFile(loadConfigFile(options.config)) : {};
  return mergeSettingsInput(toSettingsInput(options), fromFile);
}

async function resolveValidatedSettings(input: SettingsInput): Promise<RunSettings> {
  try {
    const settings = resolveRunSettings(input);
    await assertInputDirectory(settings.input);
    return settings;
  } catch (err) {
    if (err instanceof ValidationError) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.validation,
        title: "Invalid options.",
        message: formatErrorMessage(err),
        hint: "Run batch-archiver --help to see the available options.",
        cause: err,
      });
    }
    throw err;
  }
}

// =============================================================================
// SUMMARY
// =============================================================================

export function logRunSummary(logger: RunLogger, summary: RunSummary): void {
  const total = summary.succeeded + summary.failed;
  if (total === 0) return;

  logger.info(SUMMARY_RULE);
  logger.info("SUMMARY");
  logger.info(SUMMARY_RULE);
  logger.info(`Total batches:    ${total}`);
  logger.info(`Successful:       ${summary.succeeded}`);
  logger.info(`Failed:           ${summary.failed}`);
  logger.info(`Input size:       ${formatSize(summary.totalInputSize)}`);

  if (summary.totalOutputSize > 0) {
    logger.info(`Output size:      ${formatSize(summary.totalOutputSize)}`);
    logger.info(`Compression:      ${summary.compressionRatio.toFixed(1)}% reduced`);
  }

  if (summary.notStarted > 0) {
    logger.warn(`Not started:      ${summary.notStarted}`);
  }
  if (summary.failed > 0) {
    logger.warn("Some batches failed. Check log for details.");
  }
}

// A terminal Ctrl+C reaches the 7z children too, so running batches are not promised to finish.
export function formatStopNotice(signal: NodeJS.Signals): string {
  return `Received ${signal}. No new batches will start; batches already running may fail if 7z was interrupted too.`;
}

export function resolveRunExitCode(summary: RunSummary): number {
  if (summary.failed > 0 || summary.outcome === "stopped") return 1;
  return 0;
}
